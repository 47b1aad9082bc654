import { InventoryError } from '../file_system';

/**
 * Returns the extension of a file name without its dot, or null when there is none.
 *
 * The extension is whatever follows the last dot, provided a non-dot character
 * precedes that dot. Leading dots belong to the stem, so `.bashrc`, `.` and `..`
 * have no extension while `.config.fish` has `fish`. A trailing dot
 * (`notes.`) yields null rather than an empty string.
 *
 * @example
 * getFileExtension('archive.tar.gz'); // 'gz'
 * getFileExtension('.bashrc');        // null
 *
 * @throws InventoryError with code TYPE_CONTRACT_VIOLATION when `fileName` is not a string
 */
export function getFileExtension(fileName: string): string | null {
  if (typeof fileName !== 'string') {
    throw new InventoryError('Input must be a string.', 'TYPE_CONTRACT_VIOLATION');
  }

  const dotIndex = fileName.lastIndexOf('.');
  if (dotIndex <= 0) {
    return null;
  }

  // Only leading dots before the last one: a dotfile such as `..hidden`
  const stem = fileName.slice(0, dotIndex);
  if (/^\.*$/.test(stem)) {
    return null;
  }

  const extension = fileName.slice(dotIndex + 1);
  return extension === '' ? null : extension;
}
