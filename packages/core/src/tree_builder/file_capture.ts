import { fieldFailed, fieldOk, toInventoryError } from '../file_system';
import type { FieldResult, FsPath } from '../file_system';
import type { ResolvedScanOptions } from '../config';
import { computeFileChecksum, createChecksumHash } from '../checksum';
import { decodeUtf8, readText } from '../content_reader';

export interface FileCapture {
  checksum: FieldResult<string>;
  content: FieldResult<string>;
}

/**
 * Reads a file once, feeding every chunk to the digest while buffering it for
 * decoding. A read failure fails both fields; a decode failure only fails content.
 */
async function captureSinglePass(filePath: FsPath, options: ResolvedScanOptions): Promise<FileCapture> {
  const { fileSystem, logger, chunkSize } = options;
  const hashResult = createChecksumHash(options.algorithm, logger);
  const chunks: Uint8Array[] = [];

  try {
    for await (const chunk of fileSystem.readChunks(filePath, chunkSize)) {
      if (hashResult.ok) {
        hashResult.value.update(chunk);
      }
      chunks.push(chunk);
    }
  } catch (err: unknown) {
    const error = toInventoryError(err, 'read', filePath);
    logger.warn(error.message);
    return {
      checksum: hashResult.ok ? fieldFailed<string>(error) : hashResult,
      content: fieldFailed<string>(error),
    };
  }

  return {
    checksum: hashResult.ok ? fieldOk(hashResult.value.digest('hex')) : hashResult,
    content: decodeUtf8(Buffer.concat(chunks), filePath, logger),
  };
}

/**
 * Computes checksum and content for a regular file, in one read or two
 * depending on `singlePass`.
 */
export async function captureFile(filePath: FsPath, options: ResolvedScanOptions): Promise<FileCapture> {
  if (options.singlePass) {
    return captureSinglePass(filePath, options);
  }
  const checksum = await computeFileChecksum(filePath, options);
  const content = await readText(filePath, options);
  return { checksum, content };
}
