export type SafetensorsErrorKind =
  // structural
  | 'BufferTooShort'
  | 'HeaderTooLarge'
  // syntax
  | 'InvalidUtf8'
  | 'InvalidHeaderStart'
  | 'MalformedHeader'
  // semantic
  | 'UnknownDtype'
  | 'MissingField'
  | 'DuplicateName'
  | 'DuplicateTensorName'
  | 'ReservedName'
  | 'InvalidOffset'
  | 'OffsetOverlapOrGap'
  | 'TensorSizeMismatch'
  | 'InvalidShape'
  | 'InvalidShapeForDtype'
  // lookup
  | 'TensorNotFound';

export type SafetensorsErrorCategory = 'structural' | 'syntax' | 'semantic' | 'lookup';

const CATEGORY: Record<SafetensorsErrorKind, SafetensorsErrorCategory> = {
  BufferTooShort: 'structural',
  HeaderTooLarge: 'structural',
  InvalidUtf8: 'syntax',
  InvalidHeaderStart: 'syntax',
  MalformedHeader: 'syntax',
  UnknownDtype: 'semantic',
  MissingField: 'semantic',
  DuplicateName: 'semantic',
  DuplicateTensorName: 'semantic',
  ReservedName: 'semantic',
  InvalidOffset: 'semantic',
  OffsetOverlapOrGap: 'semantic',
  TensorSizeMismatch: 'semantic',
  InvalidShape: 'semantic',
  InvalidShapeForDtype: 'semantic',
  TensorNotFound: 'lookup',
};

/**
 * A format error: the bytes or the tensors handed in are not a valid
 * safetensors layout. `kind` tells corruption classes apart.
 */
export class SafetensorsError extends Error {
  readonly kind: SafetensorsErrorKind;
  /** Name of the offending tensor, when the failure is about one. */
  readonly tensor?: string;

  constructor(kind: SafetensorsErrorKind, message: string, tensor?: string) {
    super(message);
    this.name = 'SafetensorsError';
    this.kind = kind;
    this.tensor = tensor;
  }

  get category(): SafetensorsErrorCategory {
    return CATEGORY[this.kind];
  }
}

export type IoOperation = 'open' | 'read' | 'write' | 'close';

/**
 * A file-system failure on one of the file convenience paths. Kept apart
 * from `SafetensorsError` so "bad data" and "bad environment" differ.
 */
export class SafetensorsIoError extends Error {
  readonly operation: IoOperation;
  readonly path: string;

  constructor(operation: IoOperation, path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${path}: ${reason}`, { cause });
    this.name = 'SafetensorsIoError';
    this.operation = operation;
    this.path = path;
  }
}

export function isSafetensorsError(
  err: unknown,
  kind?: SafetensorsErrorKind,
): err is SafetensorsError {
  return err instanceof SafetensorsError && (kind === undefined || err.kind === kind);
}
