import * as path from 'path';

/**
 * A path as handed to the file system. Plain strings cover every path whose
 * bytes are valid UTF-8; a Buffer carries the raw bytes of one that is not.
 */
export type FsPath = string | Buffer;

/**
 * Decodes a raw directory-entry name. Invalid UTF-8 sequences become U+FFFD,
 * so the result is for display only.
 */
export function decodeName(name: Buffer): string {
  return name.toString('utf-8');
}

/**
 * Human-readable form of a path, for descriptors and messages.
 */
export function displayPath(filePath: FsPath): string {
  return typeof filePath === 'string' ? filePath : filePath.toString('utf-8');
}

/**
 * Joins a raw entry name onto a directory path. Stays a string while both
 * parts round-trip through UTF-8, and switches to raw bytes otherwise.
 */
export function joinPath(dirPath: FsPath, name: Buffer): FsPath {
  const decoded = decodeName(name);
  if (typeof dirPath === 'string' && Buffer.from(decoded, 'utf-8').equals(name)) {
    return path.join(dirPath, decoded);
  }

  const dirBytes = typeof dirPath === 'string' ? Buffer.from(dirPath, 'utf-8') : dirPath;
  const separator = Buffer.from(path.sep, 'utf-8');
  const endsWithSeparator = dirBytes.length > 0 && dirBytes[dirBytes.length - 1] === separator[0];
  return endsWithSeparator
    ? Buffer.concat([dirBytes, name])
    : Buffer.concat([dirBytes, separator, name]);
}
