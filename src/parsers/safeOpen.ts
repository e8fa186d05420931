import * as fs from 'fs';
import { DecodeOptions, TensorView } from '../types/safetensors';
import { SafetensorsError, SafetensorsIoError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { readHeader, tensorViews } from './deserializer';
import { validateLayout } from './layoutValidator';

/**
 * A decoded safetensors buffer with name lookup. Holds the buffer it was
 * built from, so the views it hands out stay backed for as long as the
 * instance is reachable.
 */
export class SafetensorsFile {
  private readonly tensors: Map<string, TensorView>;
  private readonly meta: Map<string, string>;
  private readonly orderedKeys: string[];

  private constructor(
    readonly source: string | undefined,
    private readonly buffer: Buffer,
    options: DecodeOptions,
  ) {
    const header = readHeader(buffer, options);
    validateLayout(header.tensors, header.dataLength);
    this.tensors = tensorViews(buffer, header);
    this.meta = header.metadata;
    this.orderedKeys = [...this.tensors.values()]
      .sort((a, b) => a.dataOffsets[0] - b.dataOffsets[0] || a.dataOffsets[1] - b.dataOffsets[1])
      .map((t) => t.name);
  }

  /** Read a whole file into memory and decode it. */
  static async open(filePath: string, options: DecodeOptions = {}): Promise<SafetensorsFile> {
    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(filePath);
    } catch (err) {
      Logger.error(`Failed to read ${filePath}`, err);
      throw new SafetensorsIoError('read', filePath, err);
    }

    const file = new SafetensorsFile(filePath, buffer, options);
    Logger.log(`Loaded ${file.orderedKeys.length} tensors from ${filePath}`, 'open');
    return file;
  }

  static fromBuffer(bytes: Uint8Array, options: DecodeOptions = {}): SafetensorsFile {
    const buffer = Buffer.isBuffer(bytes)
      ? bytes
      : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    return new SafetensorsFile(undefined, buffer, options);
  }

  /** Tensor names ordered by their position in the data segment. */
  keys(): string[] {
    return [...this.orderedKeys];
  }

  hasTensor(name: string): boolean {
    return this.tensors.has(name);
  }

  getTensor(name: string): TensorView {
    const tensor = this.tensors.get(name);
    if (!tensor) {
      throw new SafetensorsError('TensorNotFound', `Tensor "${name}" not found`, name);
    }
    return tensor;
  }

  metadata(): Map<string, string> {
    return new Map(this.meta);
  }

  get byteLength(): number {
    return this.buffer.length;
  }
}
