/**
 * ServerConfig Tests
 *
 * Centralized server configuration combining CLI args and environment variables.
 */

import { afterEach, describe, it, expect } from 'vitest';
import {
  getServerConfig,
  initServerConfig,
  resetServerConfig,
} from '../../../src/server/server-config.js';
import { ErrorCode } from '../../../src/shared/errors/error-codes.js';
import { catchError } from '../../helpers/test-utils.js';

describe('ServerConfig', () => {
  afterEach(() => {
    resetServerConfig();
  });

  it('should initialize with default config', () => {
    initServerConfig([], {});

    expect(getServerConfig()).toEqual({ formsDir: 'forms', dataFile: undefined, logLevel: 'info' });
  });

  it('should read environment variables', () => {
    const config = initServerConfig([], { FORMS_DIR: '/srv/forms', DATA_FILE: '/srv/seed.json', LOG_LEVEL: 'debug' });

    expect(config).toEqual({ formsDir: '/srv/forms', dataFile: '/srv/seed.json', logLevel: 'debug' });
  });

  it('should prefer CLI arguments over the environment', () => {
    const config = initServerConfig(['--formsDir=./defs', '--logLevel', 'error'], {
      FORMS_DIR: '/srv/forms',
      LOG_LEVEL: 'debug',
    });

    expect(config.formsDir).toBe('./defs');
    expect(config.logLevel).toBe('error');
  });

  it('should fall back to info for an unknown LOG_LEVEL', () => {
    expect(initServerConfig([], { LOG_LEVEL: 'loud' }).logLevel).toBe('info');
  });

  it('should throw before initialization and after reset', () => {
    expect(() => getServerConfig()).toThrow('Server config not initialized');

    initServerConfig([], {});
    resetServerConfig();

    expect(catchError(() => getServerConfig())).toMatchObject({ code: ErrorCode.NOT_INITIALIZED });
  });
});
