import {
  DecodeOptions,
  HEADER_LENGTH_PREFIX,
  ParsedHeader,
  TensorView,
} from '../types/safetensors';
import { loadConfig } from '../utils/config';
import { SafetensorsError } from '../utils/errors';
import { storedShape } from './dtypes';
import { decodeHeader } from './headerCodec';
import { validateLayout } from './layoutValidator';

/** A zero-copy Buffer over the same memory as `bytes`. */
function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function isHeaderLimit(value: number | undefined): value is number {
  return value !== undefined && Number.isSafeInteger(value) && value > 0;
}

/**
 * Read the length prefix and decode the header, without looking at the
 * data segment beyond its length.
 *
 * Binary format: 8-byte LE uint64 header length, UTF-8 JSON header, raw tensor bytes.
 */
export function readHeader(bytes: Uint8Array, options: DecodeOptions = {}): ParsedHeader {
  const buffer = asBuffer(bytes);
  const maxHeaderSize = isHeaderLimit(options.maxHeaderSize)
    ? options.maxHeaderSize
    : loadConfig().maxHeaderSize;

  if (buffer.length < HEADER_LENGTH_PREFIX) {
    throw new SafetensorsError(
      'BufferTooShort',
      `Buffer of ${buffer.length} bytes cannot hold the ${HEADER_LENGTH_PREFIX}-byte header length`,
    );
  }

  const declared = buffer.readBigUInt64LE(0);
  if (declared > BigInt(maxHeaderSize)) {
    throw new SafetensorsError(
      'HeaderTooLarge',
      `Header size ${declared} bytes exceeds maximum allowed ${maxHeaderSize} bytes`,
    );
  }

  const headerLength = Number(declared);
  const dataStart = HEADER_LENGTH_PREFIX + headerLength;
  if (buffer.length < dataStart) {
    throw new SafetensorsError(
      'BufferTooShort',
      `Header declares ${headerLength} bytes but only ${buffer.length - HEADER_LENGTH_PREFIX} follow the prefix`,
    );
  }

  const { tensors, metadata } = decodeHeader(buffer.subarray(HEADER_LENGTH_PREFIX, dataStart));
  return { tensors, metadata, headerLength, dataLength: buffer.length - dataStart };
}

/** Metadata only; tensor entries are decoded but not validated or viewed. */
export function readMetadata(bytes: Uint8Array, options: DecodeOptions = {}): Map<string, string> {
  return readHeader(bytes, options).metadata;
}

/**
 * Views over the data segment for an already validated header. Each view's
 * `data` is a subarray of `bytes`.
 */
export function tensorViews(bytes: Uint8Array, header: ParsedHeader): Map<string, TensorView> {
  const buffer = asBuffer(bytes);
  const dataStart = HEADER_LENGTH_PREFIX + header.headerLength;
  const views = new Map<string, TensorView>();

  for (const [name, info] of header.tensors) {
    const [begin, end] = info.dataOffsets;
    views.set(name, {
      name,
      dtype: info.dtype,
      shape: info.shape,
      storedShape: storedShape(info.shape, info.dtype),
      dataOffsets: [begin, end],
      data: buffer.subarray(dataStart + begin, dataStart + end),
    });
  }

  return views;
}

/**
 * Decode a complete buffer into views keyed by tensor name, in header
 * order. The layout is validated before any view is built, so no tensor
 * bytes are copied.
 */
export function deserialize(bytes: Uint8Array, options: DecodeOptions = {}): Map<string, TensorView> {
  const buffer = asBuffer(bytes);
  const header = readHeader(buffer, options);
  validateLayout(header.tensors, header.dataLength);
  return tensorViews(buffer, header);
}
