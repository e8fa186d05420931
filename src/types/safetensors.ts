import type { Dtype } from '../parsers/dtypes';

/** Reserved header key holding the free-form string metadata. */
export const METADATA_KEY = '__metadata__';

/** Size of the little-endian u64 header length prefix. */
export const HEADER_LENGTH_PREFIX = 8;

/**
 * A tensor entry as recorded in the header. Offsets are relative to the
 * start of the data segment, not the whole buffer.
 */
export interface TensorInfo {
  dtype: Dtype;
  shape: number[];
  dataOffsets: [number, number];
}

export interface DecodedHeader {
  /** Tensor entries in the order they appear in the header text. */
  tensors: Map<string, TensorInfo>;
  metadata: Map<string, string>;
}

export interface ParsedHeader extends DecodedHeader {
  /** Byte length of the header text (the `N` of the prefix). */
  headerLength: number;
  /** Byte length of the data segment that follows the header. */
  dataLength: number;
}

/**
 * A named tensor handed to the serializer. `data` is read, never retained.
 */
export interface TensorInput {
  name: string;
  dtype: Dtype;
  /** Logical shape, counted in elements even for packed dtypes. */
  shape: readonly number[];
  data: Uint8Array;
}

export type TensorInputs =
  | readonly TensorInput[]
  | ReadonlyMap<string, Omit<TensorInput, 'name'>>
  | Readonly<Record<string, Omit<TensorInput, 'name'>>>;

export type MetadataInput = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

/**
 * A decoded tensor. `data` borrows from the buffer passed to `deserialize`;
 * it stays valid only while that buffer is left unmodified.
 */
export interface TensorView {
  readonly name: string;
  readonly dtype: Dtype;
  /** Logical shape in elements. */
  readonly shape: readonly number[];
  /**
   * Physical shape: for packed dtypes the last dimension is counted in
   * stored bytes, otherwise identical to `shape`.
   */
  readonly storedShape: readonly number[];
  readonly dataOffsets: readonly [number, number];
  readonly data: Buffer;
}

export interface DecodeOptions {
  /** Upper bound on the header length prefix. Defaults to the loaded config. */
  maxHeaderSize?: number;
}
