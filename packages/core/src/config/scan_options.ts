import Ajv from 'ajv';
import { InventoryError } from '../file_system';
import { NodeFileSystem } from '../file_system/fs/node_file_system';
import { logger as sharedLogger } from '../logger';
import type { ResolvedScanOptions, ScanOptions, ScanSettings } from './scan_options.types';

export const DEFAULT_SCAN_SETTINGS: Readonly<ScanSettings> = {
  algorithm: 'sha256',
  chunkSize: 4096,
  singlePass: true,
};

const scanSettingsSchema = {
  type: 'object',
  properties: {
    algorithm: { type: 'string', minLength: 1 },
    chunkSize: { type: 'integer', minimum: 1 },
    singlePass: { type: 'boolean' },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateSettings = ajv.compile<Partial<ScanSettings>>(scanSettingsSchema);

/**
 * Validates the serialisable settings and fills in defaults.
 * @throws InventoryError with code INVALID_OPTIONS when a setting is malformed
 */
export function resolveScanOptions(options: ScanOptions = {}): ResolvedScanOptions {
  const { fileSystem, logger, ...settings } = options;

  if (!validateSettings(settings)) {
    const details = (validateSettings.errors ?? [])
      .map(error => `${error.instancePath || 'options'} ${error.message ?? 'is invalid'}`)
      .join('; ');
    throw new InventoryError(`Invalid scan options: ${details}`, 'INVALID_OPTIONS');
  }

  return {
    algorithm: settings.algorithm ?? DEFAULT_SCAN_SETTINGS.algorithm,
    chunkSize: settings.chunkSize ?? DEFAULT_SCAN_SETTINGS.chunkSize,
    singlePass: settings.singlePass ?? DEFAULT_SCAN_SETTINGS.singlePass,
    fileSystem: fileSystem ?? new NodeFileSystem(),
    logger: logger ?? sharedLogger,
  };
}
