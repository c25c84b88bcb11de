/**
 * @fileoverview Console logger with a debug toggle
 * @description Debug, info and warning output is silent until enabled with setDebug();
 * errors are always printed. Every line is prefixed with the logger's scope.
 */

let debugOutputEnabled: boolean = false;

/**
 * Enables or disables debug output for every scope.
 */
function setDebug(enable: boolean): void {
  debugOutputEnabled = enable;
}

/**
 * Gets the current debug state.
 */
function isDebugEnabled(): boolean {
  return debugOutputEnabled;
}

/**
 * Logger interface, shaped after console so other logging libraries can stand in
 */
interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setDebug(enable: boolean): void;
  isDebugEnabled(): boolean;
}

/**
 * Create a logger whose lines start with `[scope]`
 */
function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(...args: unknown[]): void {
      if (debugOutputEnabled) {
        // eslint-disable-next-line no-console
        console.log(prefix, ...args);
      }
    },
    info(...args: unknown[]): void {
      if (debugOutputEnabled) {
        // eslint-disable-next-line no-console
        console.info(prefix, ...args);
      }
    },
    warn(...args: unknown[]): void {
      if (debugOutputEnabled) {
        // eslint-disable-next-line no-console
        console.warn(prefix, ...args);
      }
    },
    error(...args: unknown[]): void {
      // eslint-disable-next-line no-console
      console.error(prefix, ...args);
    },
    setDebug,
    isDebugEnabled
  };
}

/**
 * Default logger instance
 */
const logger: Logger = createLogger('varray');

export {
  createLogger,
  setDebug,
  isDebugEnabled,
  logger,
  type Logger
};

export default logger;
