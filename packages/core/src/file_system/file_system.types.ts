/**
 * Subset of `fs.Stats` the inventory relies on.
 */
export interface EntryStats {
  /** Raw mode bits (file type + permission bits) */
  mode: number;
  /** Size in bytes */
  size: number;
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

/**
 * Contents accepted for a file in MemoryFileSystem.
 */
export type MemoryFileContent = string | Uint8Array;

/**
 * Options for MemoryFileSystem. All paths are absolute POSIX paths.
 */
export interface MemoryFileSystemOptions {
  /** Map of filePath -> content; parent directories are created implicitly */
  files?: Map<string, MemoryFileContent> | Record<string, MemoryFileContent>;
  /** Directories to create, including empty ones */
  directories?: string[];
  /** Map of linkPath -> target path */
  symlinks?: Record<string, string>;
  /** Map of path -> permission bits (e.g. 0o755); type bits are derived from the entry */
  modes?: Record<string, number>;
  /**
   * Map of path -> errno code (e.g. 'EACCES') raised when the entry is listed
   * or read. lstat/stat on the entry itself still succeed.
   */
  failures?: Record<string, string>;
}
