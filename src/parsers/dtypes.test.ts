import { describe, it, expect } from 'vitest';
import {
  DTYPES,
  bitsOf,
  compareDtypes,
  dtypeRank,
  elementCount,
  isDtype,
  isPacked,
  nameOf,
  packingGroup,
  parseDtype,
  storedByteLength,
  storedShape,
  widestDtype,
} from './dtypes';
import { SafetensorsError } from '../utils/errors';

function errorKind(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof SafetensorsError ? err.kind : 'not-a-SafetensorsError';
  }
  return undefined;
}

describe('Dtype registry', () => {
  it('lists dtypes in non-decreasing alignment', () => {
    const alignment = (i: number) => Math.ceil(bitsOf(DTYPES[i]) / 8);
    for (let i = 1; i < DTYPES.length; i++) {
      expect(alignment(i)).toBeGreaterThanOrEqual(alignment(i - 1));
    }
    expect(DTYPES[0]).toBe('BOOL');
    expect(DTYPES[DTYPES.length - 1]).toBe('U64');
    expect(DTYPES).toHaveLength(19);
  });

  it('ranks sub-byte types below byte types', () => {
    expect(dtypeRank('F4')).toBeLessThan(dtypeRank('U8'));
    expect(dtypeRank('F6_E3M2')).toBeLessThan(dtypeRank('I8'));
    expect(compareDtypes('F32', 'F16')).toBeGreaterThan(0);
    expect(compareDtypes('BF16', 'BF16')).toBe(0);
  });

  it('picks the widest dtype of a batch', () => {
    expect(widestDtype(['F16', 'U8', 'F32', 'I16'])).toBe('F32');
    expect(widestDtype(['I64', 'F64'])).toBe('I64');
    expect(widestDtype([])).toBeUndefined();
  });

  it('round-trips every name', () => {
    for (const dtype of DTYPES) {
      expect(parseDtype(nameOf(dtype))).toBe(dtype);
      expect(isDtype(dtype)).toBe(true);
    }
  });

  it('rejects unknown names', () => {
    expect(isDtype('F128')).toBe(false);
    expect(isDtype('f32')).toBe(false);
    expect(() => parseDtype('F128', 'w')).toThrow('Unknown dtype "F128" for tensor "w"');
    expect(errorKind(() => parseDtype('C64'))).toBe('UnknownDtype');
  });

  it('reports width and packing', () => {
    expect(bitsOf('F4')).toBe(4);
    expect(bitsOf('F6_E2M3')).toBe(6);
    expect(bitsOf('BOOL')).toBe(8);
    expect(bitsOf('BF16')).toBe(16);
    expect(bitsOf('U64')).toBe(64);
    expect(isPacked('F4')).toBe(true);
    expect(isPacked('F6_E3M2')).toBe(true);
    expect(isPacked('F8_E8M0')).toBe(false);
    expect(packingGroup('F4')).toBe(2);
    expect(packingGroup('F6_E2M3')).toBe(4);
    expect(packingGroup('F32')).toBe(1);
  });
});

describe('Packing law', () => {
  it('counts bytes for byte-sized dtypes', () => {
    expect(storedByteLength([2, 3], 'F32')).toBe(24);
    expect(storedByteLength([4, 4], 'BF16')).toBe(32);
    expect(storedByteLength([], 'F64')).toBe(8);
    expect(storedByteLength([0, 5], 'I32')).toBe(0);
    expect(storedByteLength([7], 'BOOL')).toBe(7);
  });

  it('halves the last dimension for F4', () => {
    expect(storedByteLength([3, 8], 'F4')).toBe(12);
    expect(storedByteLength([2, 2, 4], 'F4')).toBe(8);
    expect(storedByteLength([5, 0], 'F4')).toBe(0);
  });

  it('packs four 6-bit elements into three bytes', () => {
    expect(storedByteLength([2, 4], 'F6_E2M3')).toBe(6);
    expect(storedByteLength([8], 'F6_E3M2')).toBe(6);
  });

  it('rejects shapes that do not pack evenly', () => {
    expect(errorKind(() => storedByteLength([3], 'F4'))).toBe('InvalidShapeForDtype');
    expect(errorKind(() => storedByteLength([2, 5], 'F4'))).toBe('InvalidShapeForDtype');
    expect(errorKind(() => storedByteLength([], 'F4'))).toBe('InvalidShapeForDtype');
    expect(errorKind(() => storedByteLength([6], 'F6_E2M3'))).toBe('InvalidShapeForDtype');
    expect(() => storedByteLength([3], 'F4', 'q')).toThrow(
      'Shape [3] cannot be packed as F4 for tensor "q": last dimension must be a multiple of 2',
    );
  });

  it('rejects negative and fractional dimensions', () => {
    expect(errorKind(() => storedByteLength([-1, 2], 'F32'))).toBe('InvalidShape');
    expect(errorKind(() => storedByteLength([1.5], 'U8'))).toBe('InvalidShape');
  });

  it('rejects shapes beyond the addressable size', () => {
    expect(errorKind(() => storedByteLength([2 ** 40, 2 ** 20], 'F64'))).toBe('InvalidShape');
  });

  it('counts elements with scalars as one', () => {
    expect(elementCount([])).toBe(1n);
    expect(elementCount([2, 3, 4])).toBe(24n);
    expect(elementCount([2, 0])).toBe(0n);
  });

  it('reports the stored shape of packed tensors', () => {
    expect(storedShape([3, 8], 'F4')).toEqual([3, 4]);
    expect(storedShape([2, 4], 'F6_E2M3')).toEqual([2, 3]);
    expect(storedShape([2, 3], 'F32')).toEqual([2, 3]);
    expect(storedShape([], 'U8')).toEqual([]);
  });
});
