export interface LogFacility {
  error: (...args: unknown[]) => void;
}

export interface Logger {
  debug: (msg: string) => void;
  error: (msg: string) => void;
}

/**
 * Scoped logger over a console-like facility. Debug lines are dropped unless enabled;
 * everything goes to the facility's error stream so report output on stdout stays clean.
 */
export const createLogger = (scope: string, debugEnabled: boolean, out: LogFacility = console): Logger => ({
  debug: (msg: string): void => {
    if (debugEnabled) out.error(`${scope}: ${msg}`);
  },
  error: (msg: string): void => {
    out.error(`${scope}: error: ${msg}`);
  },
});
