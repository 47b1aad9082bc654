import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { createHash } from 'crypto';
import { calculateFileChecksum, computeFileChecksum, isSupportedAlgorithm, resolveAlgorithm } from './checksum';
import { InventoryError } from '../file_system';
import { MemoryFileSystem } from '../file_system/memory';
import { CollectingLogger } from '../logger';

describe('calculateFileChecksum', () => {
  let tempDir: string;
  let filePath: string;
  const bytes = Buffer.from('The quick brown fox jumps over the lazy dog\n');

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'checksum-test-'));
    filePath = path.join(tempDir, 'fox.txt');
    await fs.writeFile(filePath, bytes);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should match the sha256 digest of the file bytes', async () => {
    const expected = createHash('sha256').update(bytes).digest('hex');

    expect(await calculateFileChecksum(filePath)).toBe(expected);
  });

  it('should support other digest algorithms', async () => {
    expect(await calculateFileChecksum(filePath, 'md5')).toBe(createHash('md5').update(bytes).digest('hex'));
    expect(await calculateFileChecksum(filePath, 'sha512')).toBe(createHash('sha512').update(bytes).digest('hex'));
  });

  it('should accept underscore and unsized BLAKE2 algorithm names', async () => {
    expect(await calculateFileChecksum(filePath, 'sha3_256')).toBe(createHash('sha3-256').update(bytes).digest('hex'));
    expect(await calculateFileChecksum(filePath, 'blake2b')).toBe(createHash('blake2b512').update(bytes).digest('hex'));
  });

  it('should produce the same digest whatever the chunk size', async () => {
    const expected = createHash('sha256').update(bytes).digest('hex');

    expect(await calculateFileChecksum(filePath, 'sha256', 1)).toBe(expected);
    expect(await calculateFileChecksum(filePath, 'sha256', 7)).toBe(expected);
    expect(await calculateFileChecksum(filePath, 'sha256', 1 << 20)).toBe(expected);
  });

  it('should hash an empty file', async () => {
    const emptyPath = path.join(tempDir, 'empty');
    await fs.writeFile(emptyPath, '');

    expect(await calculateFileChecksum(emptyPath)).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    );
  });

  it('should return null for an unsupported algorithm', async () => {
    const logger = new CollectingLogger();

    const result = await computeFileChecksum(filePath, { algorithm: 'not-a-hash', logger });

    expect(result.ok ? null : result.error.code).toBe('UNSUPPORTED_ALGORITHM');
    expect(logger.messages('warn')).toEqual(["Unsupported hash algorithm 'not-a-hash'."]);
    expect(await calculateFileChecksum(filePath, 'not-a-hash')).toBeNull();
  });

  it('should return null for a missing file', async () => {
    const result = await computeFileChecksum(path.join(tempDir, 'missing.bin'));

    expect(result.ok ? null : result.error.code).toBe('NOT_FOUND');
  });

  it('should return null for a directory', async () => {
    const result = await computeFileChecksum(tempDir);

    expect(result.ok ? null : result.error.code).toBe('NOT_A_FILE');
  });

  it('should reject a chunk size that is not a positive integer', async () => {
    await expect(calculateFileChecksum(filePath, 'sha256', 0)).rejects.toThrow(InventoryError);
    await expect(calculateFileChecksum(filePath, 'sha256', 2.5)).rejects.toMatchObject({ code: 'INVALID_OPTIONS' });
  });
});

describe('computeFileChecksum with an injected file system', () => {
  it('should read in blocks of the configured chunk size', async () => {
    const fileSystem = new MemoryFileSystem({ files: { '/blob': 'abcdefg' } });
    const readChunks = jest.spyOn(fileSystem, 'readChunks');

    const result = await computeFileChecksum('/blob', { fileSystem, chunkSize: 3 });

    expect(readChunks).toHaveBeenCalledWith('/blob', 3);
    expect(result).toEqual({ ok: true, value: createHash('sha256').update('abcdefg').digest('hex') });
  });

  it('should report access denial', async () => {
    const fileSystem = new MemoryFileSystem({
      files: { '/secret': 'classified' },
      failures: { '/secret': 'EACCES' },
    });

    const result = await computeFileChecksum('/secret', { fileSystem });

    expect(result.ok ? null : result.error.code).toBe('ACCESS_DENIED');
  });
});

describe('isSupportedAlgorithm', () => {
  it('should accept names the crypto module provides', () => {
    expect(isSupportedAlgorithm('sha256')).toBe(true);
    expect(isSupportedAlgorithm('sha1')).toBe(true);
    expect(isSupportedAlgorithm('rot13')).toBe(false);
  });
});

describe('resolveAlgorithm', () => {
  it('should map alternative spellings to crypto digest names', () => {
    expect(resolveAlgorithm('sha256')).toBe('sha256');
    expect(resolveAlgorithm('sha3_256')).toBe('sha3-256');
    expect(resolveAlgorithm('blake2b')).toBe('blake2b512');
    expect(resolveAlgorithm('blake2s')).toBe('blake2s256');
    expect(resolveAlgorithm('rot13')).toBeNull();
  });
});
