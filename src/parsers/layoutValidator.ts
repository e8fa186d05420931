import { TensorInfo } from '../types/safetensors';
import { SafetensorsError, isSafetensorsError } from '../utils/errors';
import { isValidShape, storedByteLength } from './dtypes';

function checkUniqueNames(entries: ReadonlyArray<readonly [string, TensorInfo]>): void {
  const seen = new Set<string>();
  for (const [name] of entries) {
    if (seen.has(name)) {
      throw new SafetensorsError('DuplicateName', `Tensor "${name}" is declared more than once`, name);
    }
    seen.add(name);
  }
}

function checkOffsets(entries: ReadonlyArray<readonly [string, TensorInfo]>): void {
  for (const [name, info] of entries) {
    const [begin, end] = info.dataOffsets;
    if (!Number.isSafeInteger(begin) || !Number.isSafeInteger(end) || begin < 0 || end < begin) {
      throw new SafetensorsError(
        'InvalidOffset',
        `Invalid data_offsets [${begin}, ${end}] for tensor "${name}"`,
        name,
      );
    }
  }
}

/**
 * Sorted by begin, the ranges must tile [0, dataLength) exactly: every
 * data byte belongs to one tensor.
 */
function checkPartition(entries: ReadonlyArray<readonly [string, TensorInfo]>, dataLength: number): void {
  const sorted = [...entries].sort(
    ([, a], [, b]) => a.dataOffsets[0] - b.dataOffsets[0] || a.dataOffsets[1] - b.dataOffsets[1],
  );

  let expected = 0;
  for (const [name, info] of sorted) {
    const [begin, end] = info.dataOffsets;
    if (begin !== expected) {
      const what = begin < expected ? 'overlaps the previous tensor' : `leaves a gap after byte ${expected}`;
      throw new SafetensorsError(
        'OffsetOverlapOrGap',
        `Tensor "${name}" at [${begin}, ${end}) ${what}`,
        name,
      );
    }
    expected = end;
  }

  if (expected !== dataLength) {
    throw new SafetensorsError(
      'OffsetOverlapOrGap',
      `Tensors cover ${expected} bytes but the data segment holds ${dataLength}`,
    );
  }
}

function checkShapes(entries: ReadonlyArray<readonly [string, TensorInfo]>): void {
  for (const [name, info] of entries) {
    if (!isValidShape(info.shape)) {
      throw new SafetensorsError(
        'InvalidShape',
        `Shape [${info.shape.join(', ')}] of tensor "${name}" must hold non-negative integers`,
        name,
      );
    }
  }
}

function checkSizes(entries: ReadonlyArray<readonly [string, TensorInfo]>): void {
  for (const [name, info] of entries) {
    let expected: number;
    try {
      expected = storedByteLength(info.shape, info.dtype, name);
    } catch (err) {
      if (isSafetensorsError(err, 'InvalidShapeForDtype')) {
        throw new SafetensorsError('InvalidShape', err.message, name);
      }
      throw err;
    }

    const [begin, end] = info.dataOffsets;
    if (end - begin !== expected) {
      throw new SafetensorsError(
        'TensorSizeMismatch',
        `Tensor "${name}" (${info.dtype} [${info.shape.join(', ')}]) needs ${expected} bytes, ` +
          `data_offsets span ${end - begin}`,
        name,
      );
    }
  }
}

/**
 * Check a header against the length of its data segment. Runs, stopping
 * at the first failure: unique names, well-formed offsets, exact offset
 * partition, well-formed shapes, byte size per shape and dtype.
 *
 * Accepts any iterable of entries so that lists with repeated names can be
 * checked too.
 */
export function validateLayout(
  tensors: Iterable<readonly [string, TensorInfo]>,
  dataLength: number,
): void {
  const entries = [...tensors];
  checkUniqueNames(entries);
  checkOffsets(entries);
  checkPartition(entries, dataLength);
  checkShapes(entries);
  checkSizes(entries);
}
