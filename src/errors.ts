import type { Buffer } from 'node:buffer';

export type DecodeErrorKind =
  | 'BadMagic'
  | 'UnsupportedVersion'
  | 'TruncatedInput'
  | 'InvalidEncoding'
  | 'ContentWithoutMimeType'
  | 'UnknownSectionTag'
  | 'NoValidMimeType'
  | 'SectionTooLarge'
  | 'InvalidSource'
  | 'StreamInUse';

/** Name of the field being read when a read fails. */
export type ReadField =
  | 'magic'
  | 'version'
  | 'mime-type length'
  | 'mime-type'
  | 'content length'
  | 'content'
  | 'oneshot content';

function hex(bytes: Buffer): string {
  return bytes.length === 0 ? '<empty>' : bytes.toString('hex');
}

// Base class for consumers that want a single instanceof check
export class ClipframeError extends Error {
  readonly kind: DecodeErrorKind;

  constructor(kind: DecodeErrorKind, message: string) {
    super(message);
    this.name = 'ClipframeError';
    this.kind = kind;
  }
}

export class BadMagicError extends ClipframeError {
  readonly received: Buffer;

  constructor(received: Buffer) {
    super('BadMagic', `Magic header mismatch: received ${hex(received)}`);
    this.name = 'BadMagicError';
    this.received = received;
  }
}

export class UnsupportedVersionError extends ClipframeError {
  readonly version: number;

  constructor(version: number) {
    super('UnsupportedVersion', `Unsupported protocol version: ${version}`);
    this.name = 'UnsupportedVersionError';
    this.version = version;
  }
}

export class TruncatedInputError extends ClipframeError {
  readonly field: ReadField;
  readonly expected: number;
  readonly received: number;

  constructor(field: ReadField, expected: number, received: number) {
    super(
      'TruncatedInput',
      `Unexpected end of stream while reading ${field}: expected ${expected} bytes, received ${received}`
    );
    this.name = 'TruncatedInputError';
    this.field = field;
    this.expected = expected;
    this.received = received;
  }
}

export class InvalidEncodingError extends ClipframeError {
  readonly bytes: Buffer;

  constructor(bytes: Buffer) {
    super('InvalidEncoding', `MIME type is not valid UTF-8: ${hex(bytes)}`);
    this.name = 'InvalidEncodingError';
    this.bytes = bytes;
  }
}

export class ContentWithoutMimeTypeError extends ClipframeError {
  readonly sectionIndex: number;

  constructor(sectionIndex: number) {
    super(
      'ContentWithoutMimeType',
      `Content section ${sectionIndex} is not preceded by a MIME type section`
    );
    this.name = 'ContentWithoutMimeTypeError';
    this.sectionIndex = sectionIndex;
  }
}

export class UnknownSectionTagError extends ClipframeError {
  readonly tag: number;
  readonly sectionIndex: number;

  constructor(tag: number, sectionIndex: number) {
    super(
      'UnknownSectionTag',
      `Unknown tag 0x${tag.toString(16).padStart(2, '0')} at section ${sectionIndex}`
    );
    this.name = 'UnknownSectionTagError';
    this.tag = tag;
    this.sectionIndex = sectionIndex;
  }
}

export class NoValidMimeTypeError extends ClipframeError {
  readonly candidates: readonly string[];

  constructor(candidates: readonly string[]) {
    super(
      'NoValidMimeType',
      `All ${candidates.length} given MIME types are empty`
    );
    this.name = 'NoValidMimeTypeError';
    this.candidates = candidates;
  }
}

export class SectionTooLargeError extends ClipframeError {
  readonly field: ReadField;
  readonly length: number;
  readonly limit: number;

  constructor(field: ReadField, length: number, limit: number) {
    super(
      'SectionTooLarge',
      `${field} of ${length} bytes exceeds the limit of ${limit} bytes`
    );
    this.name = 'SectionTooLargeError';
    this.field = field;
    this.length = length;
    this.limit = limit;
  }
}

export class InvalidSourceError extends ClipframeError {
  constructor(message = 'Source must be a readable stream or a byte array') {
    super('InvalidSource', message);
    this.name = 'InvalidSourceError';
  }
}

export class StreamInUseError extends ClipframeError {
  constructor(
    message = 'Stream has active data listeners. Detach them before decoding.'
  ) {
    super('StreamInUse', message);
    this.name = 'StreamInUseError';
  }
}

export function isClipframeError(value: unknown): value is ClipframeError {
  return value instanceof ClipframeError;
}
