/**
 * File system abstraction for the CLI commands.
 * Generators and the core never touch the file system; commands go through
 * this interface so tests can run against an in-memory implementation.
 */

/**
 * Logger interface for I/O operations
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

  /**
   * Delete file.
   * Should not throw if file doesn't exist.
   */
  unlink(filePath: string): Promise<void>;

  /**
   * Rename/move file.
   */
  rename(oldPath: string, newPath: string): Promise<void>;

  /**
   * Check if file exists
   */
  exists(filePath: string): Promise<boolean>;

  /**
   * Names of the sub-directories of a directory, sorted.
   */
  listDirectories(dirPath: string): Promise<string[]>;

  dirname(filePath: string): string;

  basename(filePath: string, ext?: string): string;

  join(...segments: string[]): string;
}
