import type { FileSystemPort } from '../file_system';
import type { Logger } from '../logger';

/**
 * Serialisable scan settings.
 */
export type ScanSettings = {
  /** Digest algorithm passed to crypto.createHash. Default: 'sha256' */
  algorithm: string;
  /** Block size in bytes for chunked hashing. Default: 4096 */
  chunkSize: number;
  /** Hash and capture content from a single read of each file. Default: true */
  singlePass: boolean;
}

/**
 * Options accepted by every inventory operation.
 */
export type ScanOptions = Partial<ScanSettings> & {
  /** File system to scan. Default: NodeFileSystem */
  fileSystem?: FileSystemPort;
  /** Sink for diagnostics. Default: the shared console logger */
  logger?: Logger;
}

export type ResolvedScanOptions = ScanSettings & {
  fileSystem: FileSystemPort;
  logger: Logger;
}
