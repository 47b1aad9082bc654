import type { InventoryErrorCode } from '../file_system';

/**
 * Classification of a visited entry.
 * - file: regular file
 * - directory: directory that was listed (or whose listing failed for a non-permission reason)
 * - other: symlink, socket, device, fifo, or an entry that could not be stat'ed
 * - directory_inaccessible: directory whose listing was denied; never has descendants
 */
export type EntryType = 'file' | 'directory' | 'other' | 'directory_inaccessible';

/**
 * One record per visited filesystem entry.
 */
export interface FileSystemEntryDescriptor {
  /** Base name of the entry */
  name: string;
  /** Absolute path, resolved at scan start */
  fullPath: string;
  /** Path relative to the scan root; equals `name` for top-level entries */
  relativePath: string;
  /** `ls -l` style permission string, or a sentinel when unavailable */
  permissions: string;
  /** Hex digest for files; null otherwise or when the file could not be hashed */
  checksum: string | null;
  /** Byte count for files; null otherwise */
  size: number | null;
  /** Extension without the dot for files; null otherwise */
  extension: string | null;
  /** Decoded UTF-8 text for files; null otherwise or on read/decode failure */
  content: string | null;
  type: EntryType;
}

export type DescriptorField = 'permissions' | 'size' | 'checksum' | 'content' | 'listing';

/**
 * A recoverable fault met during a scan.
 */
export interface ScanDiagnostic {
  /** Relative path of the entry the fault belongs to */
  path: string;
  field: DescriptorField;
  code: InventoryErrorCode;
  message: string;
}

export interface TreeScanResult {
  /** Absolute scan root */
  rootPath: string;
  entries: FileSystemEntryDescriptor[];
  diagnostics: ScanDiagnostic[];
}
