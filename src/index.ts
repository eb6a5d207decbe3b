export {
  decodeBulk,
  decodeOneshot,
  encodeBulk,
  frameItems,
  getBulkSize,
  isBulkStream,
} from './api';
export { createDecoder, createEncoder, type DecoderDefaults } from './factory';
export {
  BulkDecoder,
  type BulkDecoderOptions,
  type DecoderState,
} from './decoder';
export { createDataItem } from './item';
export {
  BufferSource,
  StreamSource,
  toByteSource,
  type ByteSource,
} from './reader';
export {
  getDecoderLogger,
  LOG_CATEGORY,
  type DecodeMode,
  type Logger,
} from './logger';
export {
  DEFAULT_MAX_ONESHOT_BYTES,
  DEFAULT_MAX_SECTION_BYTES,
  HEADER_SIZE,
  MAGIC,
  MAX_LENGTH_FIELD,
  PROTOCOL_VERSION,
  SectionTag,
} from './constants';
export {
  BadMagicError,
  ClipframeError,
  ContentWithoutMimeTypeError,
  InvalidEncodingError,
  InvalidSourceError,
  isClipframeError,
  NoValidMimeTypeError,
  SectionTooLargeError,
  StreamInUseError,
  TruncatedInputError,
  UnknownSectionTagError,
  UnsupportedVersionError,
  type DecodeErrorKind,
  type ReadField,
} from './errors';
export type {
  DataItem,
  DataItemInput,
  DecodeBulkOptions,
  DecodeInput,
  DecodeOneshotOptions,
  EncodeOptions,
} from './types';
