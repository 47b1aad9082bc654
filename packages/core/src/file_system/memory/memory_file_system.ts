/**
 * MemoryFileSystem - In-memory FileSystemPort
 *
 * Simulates a POSIX tree with files, directories and symlinks, and can be told
 * to fail chosen paths with an errno code. Used for unit testing failure paths
 * (access denial, I/O errors) that the real disk will not produce on demand.
 *
 * @module file_system/memory/memory_file_system
 */

import * as path from 'path';
import { displayPath } from '../file_system';
import type {
  EntryStats,
  FileSystemPort,
  FsPath,
  MemoryFileContent,
  MemoryFileSystemOptions,
} from '../file_system';

const S_IFREG = 0o100000;
const S_IFDIR = 0o040000;
const S_IFLNK = 0o120000;
const MAX_SYMLINK_HOPS = 40;

type MemoryNode =
  | { kind: 'file'; content: Uint8Array; permissions: number }
  | { kind: 'directory'; children: string[]; permissions: number }
  | { kind: 'symlink'; target: string; permissions: number };

class MemoryStats implements EntryStats {
  constructor(
    public readonly mode: number,
    public readonly size: number
  ) {}

  isFile(): boolean {
    return (this.mode & 0o170000) === S_IFREG;
  }

  isDirectory(): boolean {
    return (this.mode & 0o170000) === S_IFDIR;
  }

  isSymbolicLink(): boolean {
    return (this.mode & 0o170000) === S_IFLNK;
  }
}

function errnoError(code: string, syscall: string, filePath: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: ${syscall} '${filePath}'`), {
    code,
    syscall,
    path: filePath,
  });
}

function toBytes(content: MemoryFileContent): Uint8Array {
  return typeof content === 'string' ? Buffer.from(content, 'utf-8') : Uint8Array.from(content);
}

/**
 * In-memory FileSystemPort for testing.
 *
 * @example
 * ```typescript
 * const fileSystem = new MemoryFileSystem({
 *   files: { '/scan/readme.md': '# Notes' },
 *   directories: ['/scan/locked'],
 *   failures: { '/scan/locked': 'EACCES' },
 * });
 * ```
 */
export class MemoryFileSystem implements FileSystemPort {
  private readonly nodes = new Map<string, MemoryNode>();
  private readonly failures: Map<string, string>;

  constructor(options: MemoryFileSystemOptions = {}) {
    this.nodes.set('/', { kind: 'directory', children: [], permissions: 0o755 });

    for (const dirPath of options.directories ?? []) {
      this.ensureDirectory(path.posix.resolve(dirPath));
    }

    const files = options.files instanceof Map
      ? Array.from(options.files.entries())
      : Object.entries(options.files ?? {});
    for (const [filePath, content] of files) {
      this.addNode(path.posix.resolve(filePath), {
        kind: 'file',
        content: toBytes(content),
        permissions: 0o644,
      });
    }

    for (const [linkPath, target] of Object.entries(options.symlinks ?? {})) {
      this.addNode(path.posix.resolve(linkPath), { kind: 'symlink', target, permissions: 0o777 });
    }

    for (const [entryPath, permissions] of Object.entries(options.modes ?? {})) {
      const node = this.nodes.get(path.posix.resolve(entryPath));
      if (node) {
        node.permissions = permissions & 0o7777;
      }
    }

    this.failures = new Map(
      Object.entries(options.failures ?? {}).map(([entryPath, code]) => [path.posix.resolve(entryPath), code])
    );
  }

  async lstat(filePath: FsPath): Promise<EntryStats> {
    const node = this.nodes.get(path.posix.resolve(displayPath(filePath)));
    if (!node) {
      throw errnoError('ENOENT', 'lstat', displayPath(filePath));
    }
    return this.statsOf(node);
  }

  async stat(filePath: FsPath): Promise<EntryStats> {
    return this.statsOf(this.follow(displayPath(filePath), 'stat'));
  }

  async readdir(dirPath: FsPath): Promise<Buffer[]> {
    const target = displayPath(dirPath);
    this.throwIfFailing(target, 'scandir');
    const node = this.follow(target, 'scandir');
    if (node.kind !== 'directory') {
      throw errnoError('ENOTDIR', 'scandir', target);
    }
    return node.children.map(name => Buffer.from(name, 'utf-8'));
  }

  async readFile(filePath: FsPath): Promise<Uint8Array> {
    return Uint8Array.from(this.openFile(displayPath(filePath)).content);
  }

  async *readChunks(filePath: FsPath, chunkSize: number): AsyncGenerator<Uint8Array> {
    const { content } = this.openFile(displayPath(filePath));
    for (let offset = 0; offset < content.length; offset += chunkSize) {
      yield content.slice(offset, offset + chunkSize);
    }
  }

  private openFile(filePath: string): Extract<MemoryNode, { kind: 'file' }> {
    this.throwIfFailing(filePath, 'open');
    const node = this.follow(filePath, 'open');
    if (node.kind === 'directory') {
      throw errnoError('EISDIR', 'read', filePath);
    }
    if (node.kind !== 'file') {
      throw errnoError('EINVAL', 'open', filePath);
    }
    return node;
  }

  private statsOf(node: MemoryNode): MemoryStats {
    switch (node.kind) {
      case 'file':
        return new MemoryStats(S_IFREG | node.permissions, node.content.length);
      case 'directory':
        return new MemoryStats(S_IFDIR | node.permissions, 4096);
      case 'symlink':
        return new MemoryStats(S_IFLNK | node.permissions, Buffer.byteLength(node.target));
    }
  }

  /**
   * Resolves the final path component through symlinks.
   */
  private follow(filePath: string, syscall: string): MemoryNode {
    let current = path.posix.resolve(filePath);
    for (let hop = 0; hop <= MAX_SYMLINK_HOPS; hop++) {
      const node = this.nodes.get(current);
      if (!node) {
        throw errnoError('ENOENT', syscall, filePath);
      }
      if (node.kind !== 'symlink') {
        return node;
      }
      this.throwIfFailing(current, syscall);
      current = path.posix.resolve(path.posix.dirname(current), node.target);
    }
    throw errnoError('ELOOP', syscall, filePath);
  }

  private throwIfFailing(filePath: string, syscall: string): void {
    const code = this.failures.get(path.posix.resolve(filePath));
    if (code) {
      throw errnoError(code, syscall, filePath);
    }
  }

  private ensureDirectory(dirPath: string): void {
    const existing = this.nodes.get(dirPath);
    if (existing) {
      if (existing.kind !== 'directory') {
        throw new Error(`Cannot create directory over existing entry: ${dirPath}`);
      }
      return;
    }
    this.addNode(dirPath, { kind: 'directory', children: [], permissions: 0o755 });
  }

  private addNode(entryPath: string, node: MemoryNode): void {
    if (this.nodes.has(entryPath)) {
      throw new Error(`Entry already exists: ${entryPath}`);
    }
    const parentPath = path.posix.dirname(entryPath);
    this.ensureDirectory(parentPath);
    const parent = this.nodes.get(parentPath);
    if (parent?.kind === 'directory') {
      parent.children.push(path.posix.basename(entryPath));
    }
    this.nodes.set(entryPath, node);
  }
}
