export type Logger = {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/**
 * Console logger that tags every line with `[scope]`, matching the rest of the app.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    log: (...args) => console.log(tag, ...args),
    warn: (...args) => console.warn(tag, ...args),
    error: (...args) => console.error(tag, ...args),
  };
}
