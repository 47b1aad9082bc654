/**
 * Filesystem-dependent implementations
 *
 * This module exports the implementations that touch the real disk.
 * Use @fsinventory/core/memory for in-memory alternatives.
 */

// FileSystemPort
export { NodeFileSystem } from './file_system/fs';

// Scans (default to NodeFileSystem when no fileSystem option is given)
export { buildTree, scanTree } from './tree_builder';
export { renderTree } from './tree_printer';

// Field inspectors
export { calculateFileChecksum, computeFileChecksum } from './checksum';
export { readFileToString, readText } from './content_reader';
export {
  getFileSizeInBytes,
  inspectFileSize,
  getPermissions,
  inspectPermissions,
} from './stat_inspector';
