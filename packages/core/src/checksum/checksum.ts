import { createHash, getHashes } from 'crypto';
import type { Hash } from 'crypto';
import {
  displayPath,
  fieldFailed,
  fieldOk,
  InventoryError,
  toInventoryError,
  unwrapField,
} from '../file_system';
import type { FieldResult, FsPath } from '../file_system';
import { resolveScanOptions } from '../config';
import type { ScanOptions } from '../config';
import type { Logger } from '../logger';

const ALGORITHM_ALIASES = new Map<string, string>([
  ['blake2b', 'blake2b512'],
  ['blake2s', 'blake2s256'],
]);

/**
 * Maps an algorithm name to the digest name crypto.createHash knows. Besides
 * the runtime's own names, underscore spellings (`sha3_256`) and the unsized
 * BLAKE2 names (`blake2b`, `blake2s`) are accepted. Null when unknown.
 */
export function resolveAlgorithm(algorithm: string): string | null {
  const hashes = getHashes();
  if (hashes.includes(algorithm)) {
    return algorithm;
  }
  const candidate = ALGORITHM_ALIASES.get(algorithm) ?? algorithm.replace(/_/g, '-');
  return hashes.includes(candidate) ? candidate : null;
}

/**
 * Whether `algorithm` names a digest resolveAlgorithm can map.
 */
export function isSupportedAlgorithm(algorithm: string): boolean {
  return resolveAlgorithm(algorithm) !== null;
}

/**
 * Creates the incremental hash for `algorithm`, or a failed result when the
 * algorithm is unknown.
 */
export function createChecksumHash(algorithm: string, logger: Logger): FieldResult<Hash> {
  const digestName = resolveAlgorithm(algorithm);
  if (digestName === null) {
    const error = new InventoryError(`Unsupported hash algorithm '${algorithm}'.`, 'UNSUPPORTED_ALGORITHM');
    logger.warn(error.message);
    logger.debug(`Supported algorithms: ${getHashes().join(', ')}`);
    return fieldFailed(error);
  }
  return fieldOk(createHash(digestName));
}

/**
 * Streams `filePath` through the configured digest in `chunkSize` blocks and
 * returns the lowercase hex digest.
 */
export async function computeFileChecksum(
  filePath: FsPath,
  options: ScanOptions = {}
): Promise<FieldResult<string>> {
  const { algorithm, chunkSize, fileSystem, logger } = resolveScanOptions(options);

  const hashResult = createChecksumHash(algorithm, logger);
  if (!hashResult.ok) {
    return hashResult;
  }
  const hash = hashResult.value;

  try {
    for await (const chunk of fileSystem.readChunks(filePath, chunkSize)) {
      hash.update(chunk);
    }
    return fieldOk(hash.digest('hex'));
  } catch (err: unknown) {
    const error = toInventoryError(err, 'read', filePath);
    logger.warn(`Could not checksum '${displayPath(filePath)}': ${error.message}`);
    return fieldFailed(error);
  }
}

/**
 * Hex checksum of `filePath`, or null when the algorithm is unsupported or the
 * file cannot be read.
 */
export async function calculateFileChecksum(
  filePath: FsPath,
  algorithm: string = 'sha256',
  chunkSize: number = 4096,
  options: ScanOptions = {}
): Promise<string | null> {
  return unwrapField(await computeFileChecksum(filePath, { ...options, algorithm, chunkSize }));
}
