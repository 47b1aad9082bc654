import * as path from 'path';
import { decodeName, displayPath, errorMessageOf, joinPath } from '../file_system';
import type { FileSystemPort, FsPath } from '../file_system';
import { resolveScanOptions } from '../config';
import type { ScanOptions } from '../config';

interface DirectoryContents {
  directories: Buffer[];
  files: Buffer[];
}

/**
 * Splits a directory's names into subdirectories to descend into and the rest.
 * Symlinks to directories are dropped: they are neither walked nor printed as files.
 */
async function partition(fileSystem: FileSystemPort, dirPath: FsPath, names: Buffer[]): Promise<DirectoryContents> {
  const contents: DirectoryContents = { directories: [], files: [] };

  for (const name of names) {
    const fullPath = joinPath(dirPath, name);
    const stats = await fileSystem.lstat(fullPath).catch(() => null);

    if (stats?.isDirectory()) {
      contents.directories.push(name);
    } else if (stats?.isSymbolicLink()) {
      const target = await fileSystem.stat(fullPath).catch(() => null);
      if (!target?.isDirectory()) {
        contents.files.push(name);
      }
    } else {
      contents.files.push(name);
    }
  }

  return contents;
}

function depthOf(rootPath: string, dirPath: FsPath): number {
  const relative = path.relative(rootPath, displayPath(dirPath));
  return relative === '' ? 0 : relative.split(path.sep).length;
}

/**
 * Renders an indented text view of the tree under `rootPath`, top-down: each
 * directory's line, then its files one level deeper, then its subdirectories.
 * Directories that cannot be listed are left out, so a missing root (or a root
 * that is a file) renders as ''.
 *
 * @example
 * ```
 * +-- project/
 * |   |-- README.md
 * |   +-- src/
 * |   |   |-- index.ts
 * ```
 */
export async function renderTree(
  rootPath: string,
  indentToken: string = '|   ',
  fileToken: string = '|-- ',
  dirToken: string = '+-- ',
  options: ScanOptions = {}
): Promise<string> {
  const { fileSystem, logger } = resolveScanOptions(options);
  const absoluteRoot = path.resolve(rootPath);
  const pending: FsPath[] = [absoluteRoot];
  let tree = '';

  let dirPath = pending.pop();
  while (dirPath !== undefined) {
    let names: Buffer[] | null = null;
    try {
      names = await fileSystem.readdir(dirPath);
    } catch (err: unknown) {
      logger.debug(`Skipping unreadable directory ${displayPath(dirPath)}: ${errorMessageOf(err)}`);
    }

    if (names) {
      const level = depthOf(absoluteRoot, dirPath);
      const { directories, files } = await partition(fileSystem, dirPath, names);

      tree += `${indentToken.repeat(level)}${dirToken}${path.basename(displayPath(dirPath))}/\n`;
      const subIndent = indentToken.repeat(level + 1);
      for (const file of files) {
        tree += `${subIndent}${fileToken}${decodeName(file)}\n`;
      }

      const parent = dirPath;
      pending.push(...[...directories].reverse().map(name => joinPath(parent, name)));
    }

    dirPath = pending.pop();
  }

  return tree;
}
