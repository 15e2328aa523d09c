/**
 * Shared I/O types for declaration and state files
 */

/**
 * Result of a save operation
 */
export interface SaveResult {
  success: boolean;
  error?: string;
}

/**
 * Logger interface injected into library classes
 */
export interface IOLogger {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

/**
 * No-op logger for when logging is not needed
 */
export const noopLogger: IOLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * FileSystemAdapter - Abstraction for file system operations
 *
 * Lets the state and declaration I/O run against the real disk or an
 * in-memory store in tests.
 */
export interface FileSystemAdapter {
  /**
   * Read file as UTF-8 string.
   * @throws Error if file doesn't exist
   */
  readFile(filePath: string): Promise<string>;

  /**
   * Write content to file (UTF-8).
   * Creates parent directories if needed.
   */
  writeFile(filePath: string, content: string): Promise<void>;

  exists(filePath: string): Promise<boolean>;
}

/** Common error messages */
export const ERROR_LINKS_NOT_MAP = 'YAML links is not a map';
export const ERROR_STATE_VERSION = 'Unsupported state file version';
