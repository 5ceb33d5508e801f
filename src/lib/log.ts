export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

/** Console logger; `debug` lines only show up when `verbose` is set. */
export function createConsoleLogger(verbose: boolean): Logger {
  return {
    debug(message) {
      if (verbose) console.log(`  · ${message}`);
    },
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.warn(`⚠️  ${message}`);
    },
    error(message, err) {
      if (err === undefined) console.error(`❌ ${message}`);
      else console.error(`❌ ${message}`, err instanceof Error ? err.message : err);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
