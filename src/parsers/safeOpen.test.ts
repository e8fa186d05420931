import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { SafetensorsFile } from './safeOpen';
import { serialize, serializeToFile } from './serializer';
import { SafetensorsError, SafetensorsIoError } from '../utils/errors';
import {
  buildRawBuffer,
  cleanupTestDir,
  createByteRamp,
  createFloat32Buffer,
  makeTempDir,
} from '../test/helpers/createTestSafetensors';

let testDirs: string[] = [];

function tempDir(): string {
  const d = makeTempDir('safe-open-test-');
  testDirs.push(d);
  return d;
}

afterEach(() => {
  vi.restoreAllMocks();
  for (const d of testDirs) {
    cleanupTestDir(d);
  }
  testDirs = [];
});

describe('SafetensorsFile', () => {
  it('opens a file written by serializeToFile', async () => {
    const dir = tempDir();
    const filePath = path.join(dir, 'model.safetensors');
    const weight = createFloat32Buffer(16);
    await serializeToFile(
      [
        { name: 'weight_a', dtype: 'F32', shape: [4, 4], data: weight },
        { name: 'weight_b', dtype: 'BF16', shape: [2, 3], data: Buffer.alloc(12) },
      ],
      { format: 'pt' },
      filePath,
    );

    const file = await SafetensorsFile.open(filePath);

    expect(file.source).toBe(filePath);
    expect(file.keys()).toEqual(['weight_a', 'weight_b']);
    expect(file.metadata()).toEqual(new Map([['format', 'pt']]));
    expect(file.getTensor('weight_a').data.equals(weight)).toBe(true);
    expect(file.getTensor('weight_b').shape).toEqual([2, 3]);
    expect(file.byteLength).toBe(fs.statSync(filePath).size);
  });

  it('lists keys by data offset, not header order', () => {
    const header =
      '{"late":{"dtype":"U8","shape":[2],"data_offsets":[2,4]},' +
      '"early":{"dtype":"U8","shape":[2],"data_offsets":[0,2]}}';
    const file = SafetensorsFile.fromBuffer(buildRawBuffer(header, createByteRamp(4)));

    expect(file.keys()).toEqual(['early', 'late']);
    expect(file.getTensor('late').data.equals(Buffer.from([2, 3]))).toBe(true);
    expect(file.source).toBeUndefined();
  });

  it('decodes the header text once per buffer', () => {
    const decode = vi.spyOn(TextDecoder.prototype, 'decode');
    const file = SafetensorsFile.fromBuffer(
      serialize([{ name: 'x', dtype: 'U8', shape: [2], data: Buffer.from([1, 2]) }], { k: 'v' }),
    );

    expect(decode).toHaveBeenCalledTimes(1);
    expect(file.keys()).toEqual(['x']);
    expect(file.metadata().get('k')).toBe('v');
  });

  it('reports missing tensors', () => {
    const file = SafetensorsFile.fromBuffer(serialize([]));

    expect(file.hasTensor('nope')).toBe(false);
    expect(() => file.getTensor('nope')).toThrow('Tensor "nope" not found');
    try {
      file.getTensor('nope');
    } catch (err) {
      expect(err).toBeInstanceOf(SafetensorsError);
      expect(err).toMatchObject({ kind: 'TensorNotFound', tensor: 'nope' });
    }
  });

  it('hands out copies of its key list and metadata', () => {
    const file = SafetensorsFile.fromBuffer(
      serialize([{ name: 'x', dtype: 'U8', shape: [1], data: Buffer.from([7]) }], { k: 'v' }),
    );

    file.keys().push('y');
    file.metadata().set('k', 'changed');

    expect(file.keys()).toEqual(['x']);
    expect(file.metadata().get('k')).toBe('v');
  });

  it('wraps read failures as I/O errors', async () => {
    const missing = path.join(tempDir(), 'absent.safetensors');

    const err: unknown = await SafetensorsFile.open(missing).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SafetensorsIoError);
    expect(err).toMatchObject({ operation: 'read', path: missing });
  });

  it('propagates format errors from a corrupt file', async () => {
    const filePath = path.join(tempDir(), 'bad.safetensors');
    fs.writeFileSync(filePath, buildRawBuffer('{ this is not valid json !!!'));

    await expect(SafetensorsFile.open(filePath)).rejects.toMatchObject({ kind: 'MalformedHeader' });
  });
});
