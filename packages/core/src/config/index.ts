export { DEFAULT_SCAN_SETTINGS, resolveScanOptions } from './scan_options';
export type { ScanSettings, ScanOptions, ResolvedScanOptions } from './scan_options.types';
