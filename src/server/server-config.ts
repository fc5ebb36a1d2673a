/**
 * Server Configuration
 *
 * Global server configuration combining CLI args and environment variables.
 * CLI arguments win over the environment.
 */

import { parseArgs } from '../cli/args.js';
import { ErrorCode } from '../shared/errors/error-codes.js';
import { HostError } from '../shared/errors/form-error.js';
import { isLogLevel, type LogLevel } from '../shared/services/logging.service.js';

export interface ResolvedServerConfig {
  formsDir: string;
  dataFile?: string;
  logLevel: LogLevel;
}

const DEFAULT_FORMS_DIR = 'forms';

// Singleton instance
let serverConfig: ResolvedServerConfig | null = null;

/**
 * Initialize server configuration from CLI arguments and environment variables
 * (FORMS_DIR, DATA_FILE, LOG_LEVEL).
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 */
export function initServerConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): ResolvedServerConfig {
  const args = parseArgs(argv);
  const envLevel = env.LOG_LEVEL;

  serverConfig = {
    formsDir: args.formsDir ?? env.FORMS_DIR ?? DEFAULT_FORMS_DIR,
    dataFile: args.dataFile ?? env.DATA_FILE,
    logLevel: args.logLevel ?? (isLogLevel(envLevel) ? envLevel : 'info'),
  };
  return serverConfig;
}

/**
 * Get the current server configuration.
 * Throws if not initialized.
 */
export function getServerConfig(): ResolvedServerConfig {
  if (!serverConfig) {
    throw new HostError(
      'Server config not initialized. Call initServerConfig() first.',
      ErrorCode.NOT_INITIALIZED,
    );
  }
  return serverConfig;
}

/**
 * Reset server state (for testing).
 */
export function resetServerConfig(): void {
  serverConfig = null;
}
