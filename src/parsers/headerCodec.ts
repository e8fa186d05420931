import { DecodedHeader, METADATA_KEY, TensorInfo } from '../types/safetensors';
import { SafetensorsError } from '../utils/errors';
import { parseDtype } from './dtypes';

/**
 * Produce the canonical header text: compact JSON, tensors in the order
 * given, entry keys fixed as `dtype`, `shape`, `data_offsets`, and the
 * metadata object last (omitted when empty).
 *
 * The text is assembled by hand rather than through one `JSON.stringify`
 * call, which would hoist integer-like tensor names to the front.
 */
export function encodeHeader(
  tensors: Iterable<readonly [string, TensorInfo]>,
  metadata: ReadonlyMap<string, string> = new Map(),
): Buffer {
  const parts: string[] = [];

  for (const [name, info] of tensors) {
    parts.push(
      `${JSON.stringify(name)}:{"dtype":${JSON.stringify(info.dtype)},` +
        `"shape":${JSON.stringify(info.shape)},` +
        `"data_offsets":${JSON.stringify(info.dataOffsets)}}`,
    );
  }

  if (metadata.size > 0) {
    const fields = [...metadata].map(([k, v]) => `${JSON.stringify(k)}:${JSON.stringify(v)}`);
    parts.push(`${JSON.stringify(METADATA_KEY)}:{${fields.join(',')}}`);
  }

  return Buffer.from(`{${parts.join(',')}}`, 'utf-8');
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function stringEnd(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length && text[i] !== '"') {
    i += text[i] === '\\' ? 2 : 1;
  }
  return i;
}

/**
 * Top-level object keys of already-valid JSON text, in document order and
 * with repeats kept.
 */
export function scanTopLevelKeys(text: string): string[] {
  const keys: string[] = [];
  let depth = 0;
  let expectKey = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') {
      const end = stringEnd(text, i);
      if (depth === 1 && expectKey) {
        const key: unknown = JSON.parse(text.slice(i, end + 1));
        if (typeof key === 'string') {
          keys.push(key);
        }
        expectKey = false;
      }
      i = end;
    } else if (ch === '{' || ch === '[') {
      depth++;
      expectKey = depth === 1 && ch === '{';
    } else if (ch === '}' || ch === ']') {
      depth--;
    } else if (ch === ',' && depth === 1) {
      expectKey = true;
    }
  }

  return keys;
}

function decodeText(bytes: Uint8Array): string {
  // fatal: reject instead of substituting U+FFFD; ignoreBOM: keep a BOM so
  // it fails the start check below.
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  try {
    return decoder.decode(bytes);
  } catch (err) {
    throw new SafetensorsError(
      'InvalidUtf8',
      `Header is not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function decodeMetadata(value: unknown): Map<string, string> {
  const metadata = new Map<string, string>();
  if (value === null) {
    return metadata;
  }
  if (!isObject(value)) {
    throw new SafetensorsError('MalformedHeader', `"${METADATA_KEY}" must be an object of strings`);
  }
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'string') {
      throw new SafetensorsError(
        'MalformedHeader',
        `Metadata value for "${key}" must be a string, got ${typeof v}`,
      );
    }
    metadata.set(key, v);
  }
  return metadata;
}

function decodeEntry(name: string, value: unknown): TensorInfo {
  if (!isObject(value)) {
    throw new SafetensorsError('MalformedHeader', `Entry for tensor "${name}" must be an object`, name);
  }

  for (const field of ['dtype', 'shape', 'data_offsets']) {
    if (!(field in value)) {
      throw new SafetensorsError('MissingField', `Tensor "${name}" is missing "${field}"`, name);
    }
  }

  const { dtype, shape, data_offsets: offsets } = value;

  if (typeof dtype !== 'string') {
    throw new SafetensorsError('MalformedHeader', `Invalid dtype for tensor "${name}"`, name);
  }
  if (!isNumberArray(shape)) {
    throw new SafetensorsError('MalformedHeader', `Invalid shape for tensor "${name}"`, name);
  }
  if (!isNumberArray(offsets) || offsets.length !== 2) {
    throw new SafetensorsError('MalformedHeader', `Invalid data_offsets for tensor "${name}"`, name);
  }

  return {
    dtype: parseDtype(dtype, name),
    shape,
    dataOffsets: [offsets[0], offsets[1]],
  };
}

/**
 * Parse header bytes into tensor entries and metadata. Shapes and offsets
 * are only type-checked here; their consistency is the layout validator's
 * job.
 */
export function decodeHeader(bytes: Uint8Array): DecodedHeader {
  const text = decodeText(bytes);

  if (!text.startsWith('{')) {
    throw new SafetensorsError('InvalidHeaderStart', 'Header must start with "{"');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SafetensorsError(
      'MalformedHeader',
      `Header is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isObject(raw)) {
    throw new SafetensorsError('MalformedHeader', 'Header must be a JSON object');
  }

  const values = new Map(Object.entries(raw));
  const seen = new Set<string>();
  const tensors = new Map<string, TensorInfo>();
  let metadata = new Map<string, string>();

  for (const key of scanTopLevelKeys(text)) {
    if (seen.has(key)) {
      throw new SafetensorsError('DuplicateName', `Key "${key}" appears more than once in the header`, key);
    }
    seen.add(key);

    const value = values.get(key);
    if (key === METADATA_KEY) {
      metadata = decodeMetadata(value);
    } else {
      tensors.set(key, decodeEntry(key, value));
    }
  }

  return { tensors, metadata };
}
