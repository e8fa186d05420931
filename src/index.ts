export * from './parsers';
export * from './types/safetensors';
export {
  SafetensorsError,
  SafetensorsIoError,
  isSafetensorsError,
} from './utils/errors';
export type { IoOperation, SafetensorsErrorCategory, SafetensorsErrorKind } from './utils/errors';
export { DEFAULT_CONFIG, DEFAULT_MAX_HEADER_SIZE, loadConfig } from './utils/config';
export type { LogLevel, SafetensorsConfig } from './utils/config';
export { Logger } from './utils/logger';
export type { OutputChannel } from './utils/logger';
