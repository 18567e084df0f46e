export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export function createLogger(options: { verbose?: boolean } = {}): Logger {
  const verbose = options.verbose ?? false;

  return {
    info: (message, ...details) => console.log(message, ...details),
    warn: (message, ...details) => console.warn(message, ...details),
    error: (message, ...details) => console.error(message, ...details),
    debug: (message, ...details) => {
      if (verbose) {
        console.debug(message, ...details);
      }
    }
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
