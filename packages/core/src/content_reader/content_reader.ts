import { TextDecoder } from 'util';
import {
  displayPath,
  fieldFailed,
  fieldOk,
  InventoryError,
  toInventoryError,
  unwrapField,
  errorMessageOf,
} from '../file_system';
import type { FieldResult, FsPath } from '../file_system';
import { resolveScanOptions } from '../config';
import type { ScanOptions } from '../config';
import type { Logger } from '../logger';

/**
 * Strictly decodes UTF-8 bytes. A byte order mark is kept as U+FEFF so the
 * text matches the file exactly; invalid sequences fail with DECODE_ERROR.
 */
export function decodeUtf8(bytes: Uint8Array, rawPath: FsPath, logger: Logger): FieldResult<string> {
  const filePath = displayPath(rawPath);
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  try {
    return fieldOk(decoder.decode(bytes));
  } catch (err: unknown) {
    const error = new InventoryError(
      `Could not decode '${filePath}' as UTF-8: ${errorMessageOf(err)}`,
      'DECODE_ERROR',
      filePath
    );
    logger.warn(error.message);
    return fieldFailed(error);
  }
}

/**
 * Reads the whole file and decodes it as UTF-8. No size limit is applied.
 */
export async function readText(filePath: FsPath, options: ScanOptions = {}): Promise<FieldResult<string>> {
  const { fileSystem, logger } = resolveScanOptions(options);

  let bytes: Uint8Array;
  try {
    bytes = await fileSystem.readFile(filePath);
  } catch (err: unknown) {
    const error = toInventoryError(err, 'read', filePath);
    logger.warn(error.message);
    return fieldFailed(error);
  }

  return decodeUtf8(bytes, filePath, logger);
}

/**
 * File content as a string, or null when it cannot be read or decoded.
 */
export async function readFileToString(filePath: FsPath, options: ScanOptions = {}): Promise<string | null> {
  return unwrapField(await readText(filePath, options));
}
