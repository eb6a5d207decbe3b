import { Buffer } from 'node:buffer';
import type { Readable } from 'node:stream';
import {
  HEADER_SIZE,
  LENGTH_BYTES,
  MAGIC,
  MAGIC_LENGTH,
  MAX_LENGTH_FIELD,
  PROTOCOL_VERSION,
  SECTION_OVERHEAD,
  SectionTag,
  type SectionTagValue,
  UTF8,
} from './constants';
import { InvalidSourceError, SectionTooLargeError } from './errors';
import type { DataItemInput } from './types';

/**
 * Checks a caller-supplied byte limit, falling back to `fallback` when unset.
 */
export function resolveLimit(
  name: string,
  value: number | undefined,
  fallback: number
): number {
  const limit = value ?? fallback;
  if (!Number.isInteger(limit) || limit < 0 || limit > MAX_LENGTH_FIELD) {
    throw new TypeError(
      `${name} must be an integer between 0 and ${MAX_LENGTH_FIELD}`
    );
  }
  return limit;
}

/**
 * Keeps the non-empty labels in their original order.
 */
export function filterMimeTypes(candidates: readonly string[]): string[] {
  return candidates.filter((mimeType) => mimeType !== '');
}

export function isHeader(bytes: Buffer): boolean {
  return (
    bytes.length === HEADER_SIZE &&
    bytes.subarray(0, MAGIC_LENGTH).equals(MAGIC) &&
    bytes[MAGIC_LENGTH] === PROTOCOL_VERSION
  );
}

export function makeHeaderBuffer(): Buffer {
  const buffer = Buffer.allocUnsafe(HEADER_SIZE);
  MAGIC.copy(buffer, 0);
  buffer.writeUInt8(PROTOCOL_VERSION, MAGIC_LENGTH);
  return buffer;
}

export function makeSectionBuffer(tag: SectionTagValue, payload: Buffer): Buffer {
  const buffer = Buffer.allocUnsafe(SECTION_OVERHEAD + payload.length);
  buffer.writeUInt8(tag, 0);
  buffer.writeUInt32BE(payload.length, 1);
  payload.copy(buffer, 1 + LENGTH_BYTES);
  return buffer;
}

type EncodedItem = { labels: Buffer[]; content: Buffer };

function toContentBuffer(content: Uint8Array | string): Buffer {
  return typeof content === 'string'
    ? Buffer.from(content, UTF8)
    : toBuffer(content);
}

/**
 * Validates items for encoding and converts labels and content to bytes.
 */
export function prepareItems(
  items: readonly DataItemInput[],
  maxSectionBytes: number
): EncodedItem[] {
  return items.map((item, index) => {
    const path = `items[${index}]`;
    if (item.mimeType.length === 0) {
      throw new TypeError(`${path}.mimeType must be a non-empty array`);
    }

    const labels = item.mimeType.map((mimeType, i) => {
      if (typeof mimeType !== 'string') {
        throw new TypeError(`${path}.mimeType[${i}] must be a string`);
      }
      const bytes = Buffer.from(mimeType, UTF8);
      if (bytes.length > maxSectionBytes) {
        throw new SectionTooLargeError('mime-type', bytes.length, maxSectionBytes);
      }
      return bytes;
    });

    const content = toContentBuffer(item.content);
    if (content.length > maxSectionBytes) {
      throw new SectionTooLargeError('content', content.length, maxSectionBytes);
    }
    return { labels, content };
  });
}

export function encodedItemSize(item: EncodedItem): number {
  return item.labels.reduce(
    (sum, label) => sum + SECTION_OVERHEAD + label.length,
    SECTION_OVERHEAD + item.content.length
  );
}

export function makeItemBuffer(item: EncodedItem): Buffer {
  return Buffer.concat([
    ...item.labels.map((label) => makeSectionBuffer(SectionTag.MIME_TYPE, label)),
    makeSectionBuffer(SectionTag.CONTENT, item.content),
  ]);
}

export function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, UTF8);
  }
  if (chunk instanceof ArrayBuffer) {
    return Buffer.from(chunk);
  }
  if (ArrayBuffer.isView(chunk)) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }
  throw new TypeError('Unsupported chunk type received from stream');
}

export function hasDataListeners(stream: Readable): boolean {
  return stream.listenerCount('data') > 0;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function validateReadableStream(
  stream: unknown
): asserts stream is Readable {
  if (stream === null || stream === undefined) {
    throw new InvalidSourceError('Source cannot be null or undefined');
  }

  if (!isObject(stream)) {
    throw new InvalidSourceError('Source must be an object');
  }

  if (typeof stream.read !== 'function' || typeof stream.pause !== 'function') {
    throw new InvalidSourceError('Source must be a readable stream');
  }

  if (typeof stream.on !== 'function') {
    throw new InvalidSourceError('Source must be an event emitter');
  }

  if (!('readable' in stream) || typeof stream.readable !== 'boolean') {
    throw new InvalidSourceError('Source must be a readable stream');
  }
}
