import { Buffer } from 'node:buffer';
import type { Readable } from 'node:stream';
import { TextDecoder } from 'node:util';
import { LENGTH_BYTES } from './constants';
import {
  InvalidEncodingError,
  SectionTooLargeError,
  StreamInUseError,
  TruncatedInputError,
  type ReadField,
} from './errors';
import { hasDataListeners, toBuffer, validateReadableStream } from './utils';

const EMPTY = Buffer.alloc(0);

/**
 * Sequential read capability the decoders are written against.
 * No seeking and no peeking.
 */
export interface ByteSource {
  /**
   * Resolves with `size` bytes, or with fewer only when the source has ended.
   * An empty buffer for a non-zero `size` means end of stream.
   */
  read(size: number): Promise<Buffer>;

  /**
   * Reads everything left in the source.
   * Rejects with {@link SectionTooLargeError} once more than `limit` bytes arrive.
   */
  drain(limit: number, field: ReadField): Promise<Buffer>;
}

/**
 * Reads a paused Node.js `Readable` through `read(n)` and the
 * `readable`/`end`/`error` events.
 */
export class StreamSource implements ByteSource {
  constructor(private readonly stream: Readable) {}

  async read(size: number): Promise<Buffer> {
    const buffers: Buffer[] = [];
    let collected = 0;

    while (collected < size) {
      const chunk: unknown = this.stream.read(size - collected);
      if (chunk !== null) {
        let buf = toBuffer(chunk);
        const remaining = size - collected;
        // object mode streams ignore the size argument
        if (buf.length > remaining) {
          this.stream.unshift(buf.subarray(remaining));
          buf = buf.subarray(0, remaining);
        }
        buffers.push(buf);
        collected += buf.length;
        continue;
      }

      if (await this.waitForData()) {
        break;
      }
    }

    return join(buffers, collected);
  }

  async drain(limit: number, field: ReadField): Promise<Buffer> {
    const buffers: Buffer[] = [];
    let collected = 0;

    for (;;) {
      const chunk: unknown = this.stream.read();
      if (chunk !== null) {
        const buf = toBuffer(chunk);
        collected += buf.length;
        if (collected > limit) {
          throw new SectionTooLargeError(field, collected, limit);
        }
        buffers.push(buf);
        continue;
      }

      if (await this.waitForData()) {
        return join(buffers, collected);
      }
    }
  }

  /**
   * Looks at the first `size` bytes without consuming them.
   *
   * Whatever was read is pushed back with `unshift` before the stream can emit
   * `'end'`, so a stream shorter than `size` keeps its bytes too.
   */
  async peek(size: number): Promise<Buffer> {
    for (;;) {
      const chunk: unknown = this.stream.read(size);
      if (chunk !== null) {
        const buf = toBuffer(chunk);
        this.stream.unshift(buf);
        return buf.subarray(0, size);
      }

      if (await this.waitForData()) {
        return EMPTY;
      }
    }
  }

  // Resolves true once the stream has ended, false when more data may be read.
  private waitForData(): Promise<boolean> {
    const stream = this.stream;
    if (stream.readableEnded) {
      return Promise.resolve(true);
    }
    if (stream.destroyed) {
      return stream.errored
        ? Promise.reject(stream.errored)
        : Promise.resolve(true);
    }

    return new Promise<boolean>((resolve, reject) => {
      const onReadable = () => {
        cleanup();
        resolve(false);
      };
      const onEnd = () => {
        cleanup();
        resolve(true);
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const cleanup = () => {
        stream.off('readable', onReadable);
        stream.off('end', onEnd);
        stream.off('close', onEnd);
        stream.off('error', onError);
      };

      stream.once('readable', onReadable);
      stream.once('end', onEnd);
      stream.once('close', onEnd);
      stream.once('error', onError);
    });
  }
}

/** Reads from an in-memory byte array. Returned buffers are copies. */
export class BufferSource implements ByteSource {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  read(size: number): Promise<Buffer> {
    const end = Math.min(this.offset + size, this.bytes.length);
    const out = Buffer.from(this.bytes.subarray(this.offset, end));
    this.offset = end;
    return Promise.resolve(out);
  }

  drain(limit: number, field: ReadField): Promise<Buffer> {
    const left = this.bytes.length - this.offset;
    if (left > limit) {
      return Promise.reject(new SectionTooLargeError(field, left, limit));
    }
    return this.read(left);
  }
}

function join(buffers: Buffer[], collected: number): Buffer {
  if (buffers.length === 0) {
    return EMPTY;
  }
  if (buffers.length === 1 && buffers[0] !== undefined) {
    return buffers[0];
  }
  return Buffer.concat(buffers, collected);
}

/**
 * Wraps decoder input in a {@link ByteSource}.
 *
 * Streams are switched to paused mode. A stream with `data` listeners is
 * rejected: Node resumes such a stream whenever a `readable` listener is
 * removed, and the listeners would then receive bytes meant for the decoder.
 */
export function toByteSource(input: unknown): ByteSource {
  if (input instanceof Uint8Array) {
    return new BufferSource(input);
  }

  validateReadableStream(input);
  if (hasDataListeners(input)) {
    throw new StreamInUseError();
  }
  input.pause();
  return new StreamSource(input);
}

// ============================================================================
// Primitive readers
// ============================================================================

const LENGTH_FIELD = {
  'mime-type': 'mime-type length',
  content: 'content length',
} as const;

type BlockField = keyof typeof LENGTH_FIELD;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export async function readExactBytes(
  source: ByteSource,
  size: number,
  field: ReadField
): Promise<Buffer> {
  const buf = await source.read(size);
  if (buf.length < size) {
    throw new TruncatedInputError(field, size, buf.length);
  }
  return buf;
}

/**
 * Reads a big-endian u32 length followed by that many bytes.
 * Lengths above `maxBytes` are rejected before the payload is read.
 */
export async function readLengthPrefixedBlock(
  source: ByteSource,
  field: BlockField,
  maxBytes: number
): Promise<Buffer> {
  const lengthField = LENGTH_FIELD[field];
  const prefix = await readExactBytes(source, LENGTH_BYTES, lengthField);
  const length = prefix.readUInt32BE(0);
  if (length > maxBytes) {
    throw new SectionTooLargeError(field, length, maxBytes);
  }
  return readExactBytes(source, length, field);
}

export async function readMimeTypeString(
  source: ByteSource,
  maxBytes: number
): Promise<string> {
  const bytes = await readLengthPrefixedBlock(source, 'mime-type', maxBytes);
  try {
    return strictUtf8.decode(bytes);
  } catch {
    throw new InvalidEncodingError(bytes);
  }
}

export function readContentBlock(
  source: ByteSource,
  maxBytes: number
): Promise<Buffer> {
  return readLengthPrefixedBlock(source, 'content', maxBytes);
}

export function readToEnd(
  source: ByteSource,
  maxBytes: number
): Promise<Buffer> {
  return source.drain(maxBytes, 'oneshot content');
}
