export {
  DTYPES,
  bitsOf,
  compareDtypes,
  dtypeRank,
  elementCount,
  isDtype,
  isPacked,
  isValidShape,
  nameOf,
  packingGroup,
  parseDtype,
  storedByteLength,
  storedShape,
  widestDtype,
} from './dtypes';
export type { Dtype } from './dtypes';
export { encodeHeader, decodeHeader } from './headerCodec';
export { validateLayout } from './layoutValidator';
export { serialize, serializeToFile } from './serializer';
export { deserialize, readHeader, readMetadata } from './deserializer';
export { SafetensorsFile } from './safeOpen';
