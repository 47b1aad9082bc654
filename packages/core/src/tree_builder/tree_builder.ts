/**
 * Tree Builder
 *
 * Walks a directory depth-first and produces one flat list of descriptors,
 * enriching each file with size, checksum, content and extension. Faults on a
 * single entry are downgraded to null fields plus diagnostics; the walk always
 * runs to completion.
 *
 * @module tree_builder
 */

import * as path from 'path';
import {
  classifyFsError,
  decodeName,
  errorMessageOf,
  joinPath,
  toInventoryError,
  unwrapField,
} from '../file_system';
import type { EntryStats, FsPath, InventoryError } from '../file_system';
import { resolveScanOptions } from '../config';
import type { ResolvedScanOptions, ScanOptions } from '../config';
import { formatMode, inspectFileSize, PERMISSIONS_UNAVAILABLE } from '../stat_inspector';
import { getFileExtension } from '../extension';
import { captureFile } from './file_capture';
import type {
  DescriptorField,
  EntryType,
  FileSystemEntryDescriptor,
  ScanDiagnostic,
  TreeScanResult,
} from './tree_builder.types';

/** Permission string carried by a directory_inaccessible marker. */
export const INACCESSIBLE_PERMISSIONS = 'd????????? (Permission Denied)';

interface PendingEntry {
  name: string;
  fullPath: string;
  relativePath: string;
  /** Path handed to the file system; raw bytes when the name is not valid UTF-8. */
  ioPath: FsPath;
}

type DirectoryListing =
  | { status: 'listed'; names: Buffer[] }
  | { status: 'denied'; error: InventoryError }
  | { status: 'failed'; error: InventoryError };

function classify(stats: EntryStats | null): EntryType {
  if (stats?.isDirectory()) return 'directory';
  if (stats?.isFile()) return 'file';
  return 'other';
}

function emptyDescriptor(entry: PendingEntry, permissions: string, type: EntryType): FileSystemEntryDescriptor {
  return {
    name: entry.name,
    fullPath: entry.fullPath,
    relativePath: entry.relativePath,
    permissions,
    checksum: null,
    size: null,
    extension: null,
    content: null,
    type,
  };
}

/**
 * State for a single scan: the owned result buffers plus the pending-entry stack.
 */
class TreeScan {
  readonly entries: FileSystemEntryDescriptor[] = [];
  readonly diagnostics: ScanDiagnostic[] = [];
  private readonly pending: PendingEntry[] = [];

  constructor(
    private readonly rootPath: string,
    private readonly options: ResolvedScanOptions
  ) {}

  async run(): Promise<void> {
    const root: PendingEntry = {
      name: path.basename(this.rootPath),
      fullPath: this.rootPath,
      relativePath: path.basename(this.rootPath),
      ioPath: this.rootPath,
    };

    const listing = await this.list(root);
    if (listing.status === 'denied') {
      this.entries.push(emptyDescriptor(root, INACCESSIBLE_PERMISSIONS, 'directory_inaccessible'));
      return;
    }
    if (listing.status === 'listed') {
      this.enqueueChildren(root, listing.names);
    }

    let entry = this.pending.pop();
    while (entry) {
      await this.visit(entry);
      entry = this.pending.pop();
    }
  }

  private async visit(entry: PendingEntry): Promise<void> {
    const { fileSystem, logger } = this.options;

    let stats: EntryStats | null = null;
    try {
      stats = await fileSystem.lstat(entry.ioPath);
    } catch (err: unknown) {
      const error = toInventoryError(err, 'get permissions for', entry.ioPath);
      logger.warn(`Could not get permissions for ${entry.fullPath}: ${error.message}`);
      this.report(entry, 'permissions', error);
    }

    const permissions = stats ? formatMode(stats.mode) : PERMISSIONS_UNAVAILABLE;
    const type = classify(stats);

    if (type === 'directory') {
      await this.visitDirectory(entry, permissions);
      return;
    }

    if (type === 'file') {
      this.entries.push(await this.describeFile(entry, permissions));
      return;
    }

    this.entries.push(emptyDescriptor(entry, permissions, type));
  }

  private async visitDirectory(entry: PendingEntry, permissions: string): Promise<void> {
    const listing = await this.list(entry);
    if (listing.status === 'denied') {
      this.entries.push(emptyDescriptor(entry, INACCESSIBLE_PERMISSIONS, 'directory_inaccessible'));
      return;
    }

    this.entries.push(emptyDescriptor(entry, permissions, 'directory'));
    if (listing.status === 'listed') {
      this.enqueueChildren(entry, listing.names);
    }
  }

  private async describeFile(entry: PendingEntry, permissions: string): Promise<FileSystemEntryDescriptor> {
    const size = await inspectFileSize(entry.ioPath, this.options);
    if (!size.ok) this.report(entry, 'size', size.error);

    const { checksum, content } = await captureFile(entry.ioPath, this.options);
    if (!checksum.ok) this.report(entry, 'checksum', checksum.error);
    if (!content.ok) this.report(entry, 'content', content.error);

    return {
      ...emptyDescriptor(entry, permissions, 'file'),
      checksum: unwrapField(checksum),
      size: unwrapField(size),
      extension: getFileExtension(entry.name),
      content: unwrapField(content),
    };
  }

  /**
   * Lists a directory. Access denial and other failures are told apart so the
   * caller can emit an inaccessibility marker for the former only.
   */
  private async list(entry: PendingEntry): Promise<DirectoryListing> {
    const { fileSystem, logger } = this.options;
    try {
      return { status: 'listed', names: await fileSystem.readdir(entry.ioPath) };
    } catch (err: unknown) {
      const error = toInventoryError(err, 'list', entry.ioPath);
      this.report(entry, 'listing', error);
      if (classifyFsError(err) === 'ACCESS_DENIED') {
        logger.warn(`Permission denied to access directory ${entry.fullPath}`);
        return { status: 'denied', error };
      }
      logger.warn(`Could not list directory ${entry.fullPath}: ${errorMessageOf(err)}`);
      return { status: 'failed', error };
    }
  }

  /**
   * Pushes children in reverse so they pop in listing order, each subtree
   * completing before the next sibling. Names are decoded for the descriptor
   * only; I/O keeps using the raw bytes.
   */
  private enqueueChildren(parent: PendingEntry, rawNames: Buffer[]): void {
    for (const rawName of [...rawNames].reverse()) {
      const name = decodeName(rawName);
      const fullPath = path.join(parent.fullPath, name);
      this.pending.push({
        name,
        fullPath,
        relativePath: path.relative(this.rootPath, fullPath),
        ioPath: joinPath(parent.ioPath, rawName),
      });
    }
  }

  private report(entry: PendingEntry, field: DescriptorField, error: InventoryError): void {
    this.diagnostics.push({
      path: entry.relativePath,
      field,
      code: error.code,
      message: error.message,
    });
  }
}

/**
 * Scans `rootPath` and returns its descriptors together with every recoverable
 * fault met on the way. Returns null when the root is missing or not a directory.
 *
 * Entries come out depth-first in directory-listing order: each directory's
 * descriptor is followed by its whole subtree before the next sibling. No sort
 * is applied.
 */
export async function scanTree(rootPath: string, options: ScanOptions = {}): Promise<TreeScanResult | null> {
  const resolved = resolveScanOptions(options);
  const { fileSystem, logger } = resolved;
  const absoluteRoot = path.resolve(rootPath);

  try {
    const stats = await fileSystem.stat(absoluteRoot);
    if (!stats.isDirectory()) {
      logger.error(`Path '${rootPath}' is not a directory.`);
      return null;
    }
  } catch (err: unknown) {
    if (classifyFsError(err) === 'NOT_FOUND') {
      logger.error(`Path '${rootPath}' does not exist.`);
    } else {
      logger.error(`Could not access '${rootPath}': ${errorMessageOf(err)}`);
    }
    return null;
  }

  const scan = new TreeScan(absoluteRoot, resolved);
  await scan.run();

  return {
    rootPath: absoluteRoot,
    entries: scan.entries,
    diagnostics: scan.diagnostics,
  };
}

/**
 * Flat list of descriptors for everything under `rootPath`, or null when the
 * root is missing or not a directory.
 *
 * @example
 * ```typescript
 * const entries = await buildTree('./project');
 * const files = entries?.filter(entry => entry.type === 'file') ?? [];
 * ```
 */
export async function buildTree(
  rootPath: string,
  options: ScanOptions = {}
): Promise<FileSystemEntryDescriptor[] | null> {
  const result = await scanTree(rootPath, options);
  return result ? result.entries : null;
}
