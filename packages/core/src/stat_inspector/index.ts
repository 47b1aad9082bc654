export {
  PERMISSIONS_UNAVAILABLE,
  formatMode,
  inspectPermissions,
  getPermissions,
  inspectFileSize,
  getFileSizeInBytes,
} from './stat_inspector';
