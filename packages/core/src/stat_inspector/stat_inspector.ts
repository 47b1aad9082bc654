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

/** Permission string reported when an entry's mode bits cannot be read. */
export const PERMISSIONS_UNAVAILABLE = '?????????? (Permission denied or error)';

const S_IFMT = 0o170000;

const FILE_TYPE_CHARS: ReadonlyArray<[number, string]> = [
  [0o120000, 'l'],
  [0o140000, 's'],
  [0o100000, '-'],
  [0o060000, 'b'],
  [0o040000, 'd'],
  [0o020000, 'c'],
  [0o010000, 'p'],
];

function fileTypeChar(mode: number): string {
  const type = mode & S_IFMT;
  return FILE_TYPE_CHARS.find(([bits]) => bits === type)?.[1] ?? '?';
}

function triad(mode: number, shift: number, specialBit: number, special: string): string {
  const bits = (mode >> shift) & 0o7;
  const read = bits & 0o4 ? 'r' : '-';
  const write = bits & 0o2 ? 'w' : '-';
  const executable = (bits & 0o1) !== 0;
  let execute = executable ? 'x' : '-';
  if (mode & specialBit) {
    execute = executable ? special : special.toUpperCase();
  }
  return `${read}${write}${execute}`;
}

/**
 * Renders raw mode bits the way `ls -l` does: one type character followed by
 * the owner, group and other triads, including setuid, setgid and sticky bits.
 *
 * @example
 * formatMode(0o100644); // '-rw-r--r--'
 * formatMode(0o041777); // 'drwxrwxrwt'
 */
export function formatMode(mode: number): string {
  return fileTypeChar(mode) +
    triad(mode, 6, 0o4000, 's') +
    triad(mode, 3, 0o2000, 's') +
    triad(mode, 0, 0o1000, 't');
}

/**
 * Reads the entry's own mode bits (symlinks are not followed) and renders them.
 */
export async function inspectPermissions(
  filePath: FsPath,
  options: ScanOptions = {}
): Promise<FieldResult<string>> {
  const { fileSystem, logger } = resolveScanOptions(options);
  try {
    const stats = await fileSystem.lstat(filePath);
    return fieldOk(formatMode(stats.mode));
  } catch (err: unknown) {
    const error = toInventoryError(err, 'get permissions for', filePath);
    logger.warn(`Could not get permissions for ${displayPath(filePath)}: ${error.message}`);
    return fieldFailed(error);
  }
}

/**
 * Permission string for `filePath`, or the PERMISSIONS_UNAVAILABLE sentinel.
 */
export async function getPermissions(filePath: FsPath, options: ScanOptions = {}): Promise<string> {
  return unwrapField(await inspectPermissions(filePath, options)) ?? PERMISSIONS_UNAVAILABLE;
}

/**
 * Size in bytes of a regular file. Missing paths and non-files fail rather than
 * reporting a size.
 */
export async function inspectFileSize(
  filePath: FsPath,
  options: ScanOptions = {}
): Promise<FieldResult<number>> {
  const { fileSystem, logger } = resolveScanOptions(options);
  try {
    const stats = await fileSystem.stat(filePath);
    if (!stats.isFile()) {
      const shown = displayPath(filePath);
      const error = stats.isDirectory()
        ? new InventoryError(`'${shown}' is a directory, not a file.`, 'NOT_A_FILE', shown)
        : new InventoryError(`'${shown}' is not a regular file.`, 'NOT_A_FILE', shown);
      logger.warn(error.message);
      return fieldFailed(error);
    }
    return fieldOk(stats.size);
  } catch (err: unknown) {
    const error = toInventoryError(err, 'access', filePath);
    logger.warn(`Error accessing file '${displayPath(filePath)}': ${error.message}`);
    return fieldFailed(error);
  }
}

/**
 * Size in bytes of a regular file, or null.
 */
export async function getFileSizeInBytes(filePath: FsPath, options: ScanOptions = {}): Promise<number | null> {
  return unwrapField(await inspectFileSize(filePath, options));
}
