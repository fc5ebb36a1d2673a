/**
 * CLI Argument Parsing
 *
 * Parses command-line arguments for server configuration.
 */

import { isLogLevel, type LogLevel } from '../shared/services/logging.service.js';

/**
 * Server configuration from CLI arguments
 */
export interface ServerArgs {
  /** Directory holding form definition JSON files */
  formsDir?: string;

  /** JSON seed for the in-memory data store */
  dataFile?: string;

  /** Minimum log level */
  logLevel?: LogLevel;
}

/** Known CLI argument base names for validation */
const KNOWN_ARG_NAMES = new Set(['formsDir', 'dataFile', 'logLevel']);

/**
 * Check if an argument is a known CLI flag (handles --arg and --arg=value forms).
 */
function isKnownArg(arg: string): boolean {
  if (!arg.startsWith('--')) return true; // Not a flag, skip validation
  const withoutDashes = arg.slice(2);
  const baseName = withoutDashes.split('=')[0];
  return KNOWN_ARG_NAMES.has(baseName);
}

/**
 * Split `--name=value` into its parts.
 */
function inlineValue(arg: string, name: string): string | undefined {
  const prefix = `--${name}=`;
  return arg.startsWith(prefix) ? arg.slice(prefix.length) : undefined;
}

/**
 * Parse command-line arguments into ServerArgs.
 *
 * @param argv - Command line arguments (process.argv.slice(2))
 * @returns Parsed server configuration
 */
export function parseArgs(argv: string[]): ServerArgs {
  const args: ServerArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--formsDir' && argv[i + 1]) {
      args.formsDir = argv[++i];
    } else if (inlineValue(arg, 'formsDir') !== undefined) {
      args.formsDir = inlineValue(arg, 'formsDir');
    } else if (arg === '--dataFile' && argv[i + 1]) {
      args.dataFile = argv[++i];
    } else if (inlineValue(arg, 'dataFile') !== undefined) {
      args.dataFile = inlineValue(arg, 'dataFile');
    } else if (arg === '--logLevel' && argv[i + 1]) {
      setLogLevel(args, argv[++i]);
    } else if (inlineValue(arg, 'logLevel') !== undefined) {
      setLogLevel(args, inlineValue(arg, 'logLevel'));
    } else if (!isKnownArg(arg)) {
      // Warn about unknown arguments to catch typos like --formDir
      console.warn(`Warning: Unknown argument "${arg}" - ignored`);
    }
  }

  return args;
}

function setLogLevel(args: ServerArgs, value: string | undefined): void {
  if (isLogLevel(value)) {
    args.logLevel = value;
  } else {
    console.warn(`Warning: Unknown log level "${value}" - ignored`);
  }
}
