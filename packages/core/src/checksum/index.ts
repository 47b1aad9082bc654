export {
  resolveAlgorithm,
  isSupportedAlgorithm,
  createChecksumHash,
  computeFileChecksum,
  calculateFileChecksum,
} from './checksum';
