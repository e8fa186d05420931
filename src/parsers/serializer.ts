import * as fs from 'fs';
import {
  HEADER_LENGTH_PREFIX,
  METADATA_KEY,
  MetadataInput,
  TensorInfo,
  TensorInput,
  TensorInputs,
} from '../types/safetensors';
import { SafetensorsError, SafetensorsIoError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { storedByteLength } from './dtypes';
import { encodeHeader } from './headerCodec';
import { validateLayout } from './layoutValidator';

type TensorFields = Omit<TensorInput, 'name'>;

function isTensorList(tensors: TensorInputs): tensors is readonly TensorInput[] {
  return Array.isArray(tensors);
}

function isTensorMap(tensors: TensorInputs): tensors is ReadonlyMap<string, TensorFields> {
  return tensors instanceof Map;
}

function isMetadataMap(metadata: MetadataInput): metadata is ReadonlyMap<string, string> {
  return metadata instanceof Map;
}

function toTensorList(tensors: TensorInputs): TensorInput[] {
  if (isTensorList(tensors)) {
    return [...tensors];
  }
  const entries = isTensorMap(tensors) ? [...tensors] : Object.entries(tensors);
  return entries.map(([name, t]) => ({ name, dtype: t.dtype, shape: t.shape, data: t.data }));
}

function toMetadataMap(metadata: MetadataInput): Map<string, string> {
  return new Map<string, string>(isMetadataMap(metadata) ? metadata : Object.entries(metadata));
}

/**
 * Lays out tensors back to back in input order and returns the whole file
 * as one buffer: u64 LE header length, header text, data segment.
 *
 * Offsets follow input order; nothing is re-sorted by name or size.
 */
export function serialize(tensors: TensorInputs, metadata: MetadataInput = {}): Buffer {
  const list = toTensorList(tensors);

  const seen = new Set<string>();
  for (const { name } of list) {
    if (name === METADATA_KEY) {
      throw new SafetensorsError('ReservedName', `"${METADATA_KEY}" is reserved for metadata`, name);
    }
    if (seen.has(name)) {
      throw new SafetensorsError('DuplicateTensorName', `Tensor "${name}" is given more than once`, name);
    }
    seen.add(name);
  }

  const layout: Array<[string, TensorInfo]> = [];
  let currentOffset = 0;
  for (const tensor of list) {
    const byteLength = storedByteLength(tensor.shape, tensor.dtype, tensor.name);
    if (tensor.data.byteLength !== byteLength) {
      throw new SafetensorsError(
        'TensorSizeMismatch',
        `Tensor "${tensor.name}" (${tensor.dtype} [${tensor.shape.join(', ')}]) needs ` +
          `${byteLength} bytes, got ${tensor.data.byteLength}`,
        tensor.name,
      );
    }
    layout.push([
      tensor.name,
      {
        dtype: tensor.dtype,
        shape: [...tensor.shape],
        dataOffsets: [currentOffset, currentOffset + byteLength],
      },
    ]);
    currentOffset += byteLength;
  }

  const headerBuf = encodeHeader(layout, toMetadataMap(metadata));

  // Self-check: a layout built above always passes.
  validateLayout(layout, currentOffset);

  const out = Buffer.allocUnsafe(HEADER_LENGTH_PREFIX + headerBuf.length + currentOffset);
  out.writeBigUInt64LE(BigInt(headerBuf.length), 0);
  headerBuf.copy(out, HEADER_LENGTH_PREFIX);

  let cursor = HEADER_LENGTH_PREFIX + headerBuf.length;
  for (const tensor of list) {
    out.set(tensor.data, cursor);
    cursor += tensor.data.byteLength;
  }

  Logger.debug(
    `Serialized ${list.length} tensors (${headerBuf.length} header bytes, ${currentOffset} data bytes)`,
    'serialize',
  );
  return out;
}

/**
 * Serialize and write the result to `outputPath`. Format errors are raised
 * before the file is opened; file-system failures come back as
 * `SafetensorsIoError`. The handle is closed on every path.
 */
export async function serializeToFile(
  tensors: TensorInputs,
  metadata: MetadataInput,
  outputPath: string,
): Promise<void> {
  const bytes = serialize(tensors, metadata);

  const fh = await fs.promises.open(outputPath, 'w').catch((err: unknown) => {
    Logger.error(`Failed to open ${outputPath}`, err);
    throw new SafetensorsIoError('open', outputPath, err);
  });
  let writeFailed = false;
  try {
    await fh.writeFile(bytes);
  } catch (err) {
    writeFailed = true;
    Logger.error(`Failed to write ${outputPath}`, err);
    throw new SafetensorsIoError('write', outputPath, err);
  } finally {
    await fh.close().catch((err: unknown) => {
      Logger.error(`Failed to close ${outputPath}`, err);
      // A pending write error takes precedence.
      if (!writeFailed) {
        throw new SafetensorsIoError('close', outputPath, err);
      }
    });
  }

  Logger.log(`Wrote ${bytes.length} bytes to ${outputPath}`, 'serializeToFile');
}
