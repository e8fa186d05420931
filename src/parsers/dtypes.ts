import { SafetensorsError } from '../utils/errors';

/**
 * Every element type the format knows, in non-decreasing order of element
 * size/alignment. Consumers compare ranks to pick the widest type in a
 * batch, so a new dtype goes in at its alignment rank, never just appended.
 */
const DTYPE_TABLE = [
  { name: 'BOOL', bits: 8, packed: false },
  { name: 'F4', bits: 4, packed: true },
  { name: 'F6_E2M3', bits: 6, packed: true },
  { name: 'F6_E3M2', bits: 6, packed: true },
  { name: 'U8', bits: 8, packed: false },
  { name: 'I8', bits: 8, packed: false },
  { name: 'F8_E5M2', bits: 8, packed: false },
  { name: 'F8_E4M3', bits: 8, packed: false },
  { name: 'F8_E8M0', bits: 8, packed: false },
  { name: 'I16', bits: 16, packed: false },
  { name: 'U16', bits: 16, packed: false },
  { name: 'F16', bits: 16, packed: false },
  { name: 'BF16', bits: 16, packed: false },
  { name: 'I32', bits: 32, packed: false },
  { name: 'U32', bits: 32, packed: false },
  { name: 'F32', bits: 32, packed: false },
  { name: 'F64', bits: 64, packed: false },
  { name: 'I64', bits: 64, packed: false },
  { name: 'U64', bits: 64, packed: false },
] as const;

export type Dtype = (typeof DTYPE_TABLE)[number]['name'];

interface DtypeEntry {
  rank: number;
  bits: number;
  packed: boolean;
}

const BY_NAME: ReadonlyMap<string, DtypeEntry> = new Map(
  DTYPE_TABLE.map((d, rank): [string, DtypeEntry] => [d.name, { rank, bits: d.bits, packed: d.packed }]),
);

/** All dtypes, narrowest first. */
export const DTYPES: readonly Dtype[] = DTYPE_TABLE.map((d) => d.name);

function entry(dtype: Dtype): DtypeEntry {
  const found = BY_NAME.get(dtype);
  if (!found) {
    throw new SafetensorsError('UnknownDtype', `Unknown dtype "${dtype}"`);
  }
  return found;
}

export function isDtype(name: string): name is Dtype {
  return BY_NAME.has(name);
}

/** Inverse of `nameOf`, for header round-tripping. */
export function parseDtype(name: string, tensor?: string): Dtype {
  if (!isDtype(name)) {
    const where = tensor === undefined ? '' : ` for tensor "${tensor}"`;
    throw new SafetensorsError('UnknownDtype', `Unknown dtype "${name}"${where}`, tensor);
  }
  return name;
}

export function nameOf(dtype: Dtype): string {
  return dtype;
}

export function bitsOf(dtype: Dtype): number {
  return entry(dtype).bits;
}

/** True for dtypes that store more than one element per byte. */
export function isPacked(dtype: Dtype): boolean {
  return entry(dtype).packed;
}

export function dtypeRank(dtype: Dtype): number {
  return entry(dtype).rank;
}

export function compareDtypes(a: Dtype, b: Dtype): number {
  return dtypeRank(a) - dtypeRank(b);
}

/** The dtype with the largest alignment in `dtypes`, or undefined if empty. */
export function widestDtype(dtypes: Iterable<Dtype>): Dtype | undefined {
  let widest: Dtype | undefined;
  for (const d of dtypes) {
    if (widest === undefined || compareDtypes(d, widest) > 0) {
      widest = d;
    }
  }
  return widest;
}

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

/**
 * Number of logical elements that fill a whole number of bytes: 2 for F4,
 * 4 for the 6-bit types, 1 for everything byte-sized.
 */
export function packingGroup(dtype: Dtype): number {
  const bits = bitsOf(dtype);
  return 8 / gcd(bits, 8);
}

export function isValidShape(shape: readonly number[]): boolean {
  return shape.every((d) => Number.isSafeInteger(d) && d >= 0);
}

function assertShape(shape: readonly number[], tensor?: string): void {
  if (!isValidShape(shape)) {
    const where = tensor === undefined ? '' : ` of tensor "${tensor}"`;
    throw new SafetensorsError(
      'InvalidShape',
      `Shape [${shape.join(', ')}]${where} must hold non-negative integers`,
      tensor,
    );
  }
}

/** Element count of a shape. A rank-0 shape is a scalar with one element. */
export function elementCount(shape: readonly number[]): bigint {
  assertShape(shape);
  return shape.reduce((acc, d) => acc * BigInt(d), 1n);
}

/**
 * The packing law: stored byte length of a tensor with logical `shape`.
 *
 * For packed dtypes the last dimension must be a whole number of packing
 * groups, so that every row starts on a byte boundary. Scalars are never
 * packable.
 */
export function storedByteLength(shape: readonly number[], dtype: Dtype, tensor?: string): number {
  assertShape(shape, tensor);
  const bits = BigInt(bitsOf(dtype));
  const count = shape.reduce((acc, d) => acc * BigInt(d), 1n);

  if (isPacked(dtype)) {
    const group = packingGroup(dtype);
    const last = shape.length === 0 ? undefined : shape[shape.length - 1];
    if (last === undefined || last % group !== 0) {
      const where = tensor === undefined ? '' : ` for tensor "${tensor}"`;
      throw new SafetensorsError(
        'InvalidShapeForDtype',
        `Shape [${shape.join(', ')}] cannot be packed as ${dtype}${where}: ` +
          `last dimension must be a multiple of ${group}`,
        tensor,
      );
    }
  }

  const bytes = (count * bits + 7n) / 8n;
  if (bytes > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new SafetensorsError(
      'InvalidShape',
      `Shape [${shape.join(', ')}] of ${dtype} exceeds the addressable size`,
      tensor,
    );
  }
  return Number(bytes);
}

/**
 * Physical shape of a packed tensor: the last dimension counted in stored
 * bytes instead of elements. Identity for byte-sized dtypes.
 */
export function storedShape(shape: readonly number[], dtype: Dtype): number[] {
  if (!isPacked(dtype) || shape.length === 0) {
    return [...shape];
  }
  const out = [...shape];
  const last = out.length - 1;
  out[last] = (out[last] * bitsOf(dtype)) / 8;
  return out;
}
