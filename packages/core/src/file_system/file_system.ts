/**
 * FileSystemPort Interface
 *
 * Abstracts the handful of file system calls the inventory makes so the
 * tree builder, inspectors and printer run the same way against the real
 * disk or an in-memory tree.
 *
 * @module file_system
 */

import type { EntryStats } from './file_system.types';
import type { FsPath } from './fs_path';

export type { EntryStats, MemoryFileContent, MemoryFileSystemOptions } from './file_system.types';
export type { FsPath } from './fs_path';
export { decodeName, displayPath, joinPath } from './fs_path';
export type { InventoryErrorCode, FieldResult } from './file_system.errors';
export {
  InventoryError,
  fieldOk,
  fieldFailed,
  unwrapField,
  errnoCodeOf,
  errorMessageOf,
  classifyFsError,
  toInventoryError,
} from './file_system.errors';

/**
 * Interface for the file system calls made during a scan.
 * Implementations reject with errno-style errors (`code: 'ENOENT'`, `'EACCES'`, ...).
 *
 * @example
 * ```typescript
 * // Real disk
 * import { NodeFileSystem } from '@fsinventory/core/fs';
 * const fileSystem = new NodeFileSystem();
 *
 * // In memory (testing)
 * import { MemoryFileSystem } from '@fsinventory/core/memory';
 * const fileSystem = new MemoryFileSystem({ files: { '/data/a.txt': 'hello' } });
 * ```
 */
export interface FileSystemPort {
  /** Stats the entry itself, without following a final symlink. */
  lstat(filePath: FsPath): Promise<EntryStats>;

  /** Stats the entry, following symlinks. */
  stat(filePath: FsPath): Promise<EntryStats>;

  /**
   * Lists the raw names (not paths) inside a directory, in listing order.
   * Names are bytes so that entries whose names are not valid UTF-8 can
   * still be reached; join them with `joinPath`.
   */
  readdir(dirPath: FsPath): Promise<Buffer[]>;

  /** Reads a whole file as bytes. */
  readFile(filePath: FsPath): Promise<Uint8Array>;

  /**
   * Reads a file sequentially in blocks of at most `chunkSize` bytes.
   * The underlying handle is released when iteration ends, early or not.
   */
  readChunks(filePath: FsPath, chunkSize: number): AsyncIterable<Uint8Array>;
}
