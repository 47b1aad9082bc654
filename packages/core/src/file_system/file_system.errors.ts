import { displayPath } from './fs_path';
import type { FsPath } from './fs_path';

/**
 * Error codes for inventory operations.
 */
export type InventoryErrorCode =
  | 'NOT_FOUND'
  | 'ACCESS_DENIED'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'DECODE_ERROR'
  | 'UNSUPPORTED_ALGORITHM'
  | 'IO_FAILURE'
  | 'TYPE_CONTRACT_VIOLATION'
  | 'INVALID_OPTIONS';

/**
 * Error raised (or carried inside a failed FieldResult) when an inventory
 * operation cannot produce its value.
 */
export class InventoryError extends Error {
  constructor(
    message: string,
    public readonly code: InventoryErrorCode,
    public readonly filePath?: string
  ) {
    super(message);
    this.name = 'InventoryError';
  }
}

/**
 * Outcome of computing a single descriptor field.
 */
export type FieldResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: InventoryError };

export function fieldOk<T>(value: T): FieldResult<T> {
  return { ok: true, value };
}

export function fieldFailed<T>(error: InventoryError): FieldResult<T> {
  return { ok: false, error };
}

/**
 * Collapses a FieldResult to its value, or null when it failed.
 */
export function unwrapField<T>(result: FieldResult<T>): T | null {
  return result.ok ? result.value : null;
}

/**
 * Extracts the errno-style code (`ENOENT`, `EACCES`, ...) from a thrown value.
 */
export function errnoCodeOf(err: unknown): string | undefined {
  // Checked structurally: `fs` errors can belong to another realm than this module's Error
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessageOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

/**
 * Maps an OS-level failure to the inventory error taxonomy.
 */
export function classifyFsError(err: unknown): InventoryErrorCode {
  switch (errnoCodeOf(err)) {
    case 'ENOENT':
      return 'NOT_FOUND';
    case 'EACCES':
    case 'EPERM':
      return 'ACCESS_DENIED';
    case 'EISDIR':
      return 'NOT_A_FILE';
    case 'ENOTDIR':
      return 'NOT_A_DIRECTORY';
    default:
      return 'IO_FAILURE';
  }
}

/**
 * Wraps an OS-level failure into an InventoryError with a readable message.
 */
export function toInventoryError(err: unknown, action: string, rawPath: FsPath): InventoryError {
  const filePath = displayPath(rawPath);
  const code = classifyFsError(err);
  switch (code) {
    case 'NOT_FOUND':
      return new InventoryError(`File not found at '${filePath}'`, code, filePath);
    case 'ACCESS_DENIED':
      return new InventoryError(`Permission denied when trying to ${action} '${filePath}'`, code, filePath);
    case 'NOT_A_FILE':
      return new InventoryError(`'${filePath}' is a directory, not a file`, code, filePath);
    case 'NOT_A_DIRECTORY':
      return new InventoryError(`'${filePath}' is not a directory`, code, filePath);
    default:
      return new InventoryError(`Could not ${action} '${filePath}': ${errorMessageOf(err)}`, code, filePath);
  }
}
