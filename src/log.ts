export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function formatError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function createConsoleLogger(debug = false): Logger {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
    debug: (message) => {
      if (debug) console.error(`[debug] ${message}`);
    },
  };
}
