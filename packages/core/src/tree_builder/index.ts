export { INACCESSIBLE_PERMISSIONS, scanTree, buildTree } from './tree_builder';
export type {
  EntryType,
  FileSystemEntryDescriptor,
  DescriptorField,
  ScanDiagnostic,
  TreeScanResult,
} from './tree_builder.types';
export { captureFile } from './file_capture';
export type { FileCapture } from './file_capture';
