import type { Buffer } from 'node:buffer';
import type { Readable } from 'node:stream';
import type { Logger } from './logger';

/** A decoded payload together with its MIME type labels. */
export type DataItem = {
  readonly mimeType: readonly string[];
  readonly content: Buffer;
};

/** What the encoder accepts: labels plus content as bytes or UTF-8 text. */
export type DataItemInput = {
  mimeType: readonly string[];
  content: Uint8Array | string;
};

/** Anything the decoders can read from. */
export type DecodeInput = Readable | Uint8Array;

export type DecodeBulkOptions = {
  maxSectionBytes?: number;
  logger?: Logger;
};

export type DecodeOneshotOptions = {
  maxOneshotBytes?: number;
  logger?: Logger;
};

export type EncodeOptions = {
  maxSectionBytes?: number;
};
