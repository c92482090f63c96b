/**
 * Minimal logging surface used by library code; the CLI prints through the console.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message: string): void => console.log(message),
  warn: (message: string): void => console.warn(message)
};

/** Swallows everything; for callers that report results themselves. */
export const silentLogger: Logger = {
  info: (): void => undefined,
  warn: (): void => undefined
};
