export interface Logger {
  info(message: string): void;
  error(message: string, err?: unknown): void;
}

export function createLogger(scope: string): Logger {
  return {
    info(message) {
      console.log(`[${scope}] ${message}`);
    },
    error(message, err) {
      if (err === undefined) console.error(`[${scope}] ${message}`);
      else console.error(`[${scope}] ${message}`, err);
    },
  };
}

/** Discards everything; for tests and embedding. */
export const silentLogger: Logger = {
  info() {},
  error() {},
};
