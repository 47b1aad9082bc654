/**
 * NodeFileSystem - FileSystemPort over fs/promises
 *
 * Used whenever a scan runs against the real disk.
 *
 * @module file_system/fs/node_file_system
 */

import * as fs from 'fs/promises';
import type { EntryStats, FileSystemPort, FsPath } from '../file_system';

/**
 * Filesystem-backed FileSystemPort implementation.
 *
 * @example
 * ```typescript
 * const fileSystem = new NodeFileSystem();
 * for await (const chunk of fileSystem.readChunks('/etc/hosts', 4096)) {
 *   hash.update(chunk);
 * }
 * ```
 */
export class NodeFileSystem implements FileSystemPort {
  async lstat(filePath: FsPath): Promise<EntryStats> {
    return fs.lstat(filePath);
  }

  async stat(filePath: FsPath): Promise<EntryStats> {
    return fs.stat(filePath);
  }

  async readdir(dirPath: FsPath): Promise<Buffer[]> {
    return fs.readdir(dirPath, { encoding: 'buffer' });
  }

  async readFile(filePath: FsPath): Promise<Uint8Array> {
    return fs.readFile(filePath);
  }

  async *readChunks(filePath: FsPath, chunkSize: number): AsyncGenerator<Uint8Array> {
    const handle = await fs.open(filePath, 'r');
    try {
      while (true) {
        const buffer = Buffer.alloc(chunkSize);
        const { bytesRead } = await handle.read(buffer, 0, chunkSize, null);
        if (bytesRead === 0) {
          break;
        }
        yield buffer.subarray(0, bytesRead);
      }
    } finally {
      await handle.close();
    }
  }
}
