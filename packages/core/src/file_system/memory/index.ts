export { MemoryFileSystem } from './memory_file_system';
export type { MemoryFileSystemOptions, MemoryFileContent } from '../file_system';
