export * as FileSystem from "./file_system";
export * as Config from "./config";
export * as Logger from "./logger";
export * as Extension from "./extension";
export * as Stats from "./stat_inspector";
export * as Checksum from "./checksum";
export * as Content from "./content_reader";
export * as Inventory from "./tree_builder";
export * as TreePrinter from "./tree_printer";

// Most-used entry points
export { buildTree, scanTree } from "./tree_builder";
export { renderTree } from "./tree_printer";
export { InventoryError } from "./file_system";
export type {
  FileSystemEntryDescriptor,
  EntryType,
  ScanDiagnostic,
  TreeScanResult,
} from "./tree_builder";
export type { FieldResult, InventoryErrorCode, FileSystemPort } from "./file_system";
export type { ScanOptions } from "./config";
