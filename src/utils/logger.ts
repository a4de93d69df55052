/**
 * Logger Interface for Library Code
 *
 * Library functions such as extractFile() accept a Logger instead of
 * writing to the console. The CLI passes its CommandContext, which
 * satisfies this interface; tests pass silentLogger or a vi.fn() pair.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - not all contexts need debug) */
  debug?: (message: string) => void;
}

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
