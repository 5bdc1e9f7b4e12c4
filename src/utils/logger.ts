export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Console logger. Everything goes to stderr so stdout only carries command output.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;

  return {
    info: (message) => console.error(`ℹ️  ${message}`),
    success: (message) => console.error(`✅ ${message}`),
    warn: (message) => console.error(`⚠️  ${message}`),
    error: (message) => console.error(`❌ ${message}`),
    debug: (message) => {
      if (verbose) {
        console.error(`   ${message}`);
      }
    },
  };
}

/**
 * Logger that drops everything. Services default to it.
 */
export const silentLogger: Logger = {
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
