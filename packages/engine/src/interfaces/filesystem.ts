/**
 * Abstract File System Interface
 *
 * The server treats storage as an opaque byte-store of named resources.
 * Paths are passed through as given.
 */

export interface IFileSystem {
  /**
   * Read a whole file.
   * Rejects with ResourceNotFoundError when nothing exists at `path`.
   */
  readFile(path: string): Promise<Uint8Array>

  /** Create or overwrite a file with exactly `data`. */
  writeFile(path: string, data: Uint8Array): Promise<void>

  /** Create a directory and any missing parents. Existing ones are fine. */
  mkdir(path: string): Promise<void>
}
