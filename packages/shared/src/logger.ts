/**
 * Minimal logging contract accepted by every entry point that touches the
 * filesystem. Build scripts usually pass `console`.
 */
export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const nullLogger: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
