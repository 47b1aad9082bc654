/**
 * In-memory implementations (no filesystem required)
 *
 * Suitable for testing and for embedding the scanner over virtual trees.
 */

// FileSystemPort
export { MemoryFileSystem } from './file_system/memory';
export type { MemoryFileSystemOptions, MemoryFileContent } from './file_system/memory';

// Logger
export { CollectingLogger } from './logger';
export type { LogEntry } from './logger';
