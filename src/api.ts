import { Buffer } from 'node:buffer';
import { Readable } from 'node:stream';
import {
  DEFAULT_MAX_ONESHOT_BYTES,
  DEFAULT_MAX_SECTION_BYTES,
  HEADER_SIZE,
  MAX_LENGTH_FIELD,
} from './constants';
import { BulkDecoder } from './decoder';
import { NoValidMimeTypeError } from './errors';
import { createDataItem } from './item';
import { getDecoderLogger } from './logger';
import { readToEnd, StreamSource, toByteSource } from './reader';
import {
  encodedItemSize,
  filterMimeTypes,
  hasDataListeners,
  isHeader,
  makeHeaderBuffer,
  makeItemBuffer,
  prepareItems,
  resolveLimit,
  validateReadableStream,
} from './utils';
import type {
  DataItem,
  DataItemInput,
  DecodeBulkOptions,
  DecodeInput,
  DecodeOneshotOptions,
  EncodeOptions,
} from './types';

/**
 * Decodes a bulk stream into its data items.
 *
 * The stream must start with the magic header and version byte, followed by any
 * number of `M` (MIME type) and `C` (content) sections. Every `C` section becomes
 * one item carrying the labels of the `M` sections read since the previous `C`.
 * Labels left over when the stream ends produce no item.
 *
 * Decoding is all-or-nothing: the promise either resolves with every item or
 * rejects with the first error. The caller's stream is never destroyed.
 *
 * @param input - A readable stream, or the complete stream contents as bytes
 * @param opts - Optional configuration for decoding behavior
 * @param opts.maxSectionBytes - Largest accepted section length (default: 64 MiB)
 * @param opts.logger - LogTape logger for per-section debug entries (default: `clipframe.bulk`)
 * @returns Promise resolving to the items in stream order
 * @throws {BadMagicError} If the first four bytes are not the magic marker
 * @throws {UnsupportedVersionError} If the version byte is not supported
 * @throws {TruncatedInputError} If the stream ends inside a header or section
 * @throws {InvalidEncodingError} If a MIME type is not valid UTF-8
 * @throws {ContentWithoutMimeTypeError} If a `C` section has no pending MIME type
 * @throws {UnknownSectionTagError} If a section tag is neither `M` nor `C`
 * @throws {SectionTooLargeError} If a section length exceeds `maxSectionBytes`
 * @throws {StreamInUseError} If the stream has `data` listeners
 *
 * @example
 * ```ts
 * import { decodeBulk } from 'clipframe';
 *
 * const items = await decodeBulk(socket);
 * for (const item of items) {
 *   console.log(item.mimeType.join(', '), item.content.length);
 * }
 * ```
 */
export async function decodeBulk(
  input: DecodeInput,
  opts: DecodeBulkOptions = {}
): Promise<DataItem[]> {
  const maxSectionBytes = resolveLimit(
    'maxSectionBytes',
    opts.maxSectionBytes,
    DEFAULT_MAX_SECTION_BYTES
  );
  const logger = opts.logger ?? getDecoderLogger('bulk');
  const source = toByteSource(input);
  return new BulkDecoder(source, { maxSectionBytes, logger }).run();
}

/**
 * Decodes a whole stream as one item labelled by the caller.
 *
 * Empty strings among `candidateMimeTypes` are skipped; the rest keep their order.
 *
 * @param input - A readable stream, or the payload as bytes
 * @param candidateMimeTypes - Labels for the payload
 * @param opts - Optional configuration for decoding behavior
 * @param opts.maxOneshotBytes - Largest accepted payload (default: 256 MiB)
 * @param opts.logger - LogTape logger for the payload size entry (default: `clipframe.oneshot`)
 * @returns Promise resolving to a single-element item list
 * @throws {NoValidMimeTypeError} If every candidate label is empty
 * @throws {SectionTooLargeError} If the payload exceeds `maxOneshotBytes`
 *
 * @example
 * ```ts
 * import { decodeOneshot } from 'clipframe';
 *
 * const [item] = await decodeOneshot(process.stdin, ['text/plain']);
 * ```
 */
export async function decodeOneshot(
  input: DecodeInput,
  candidateMimeTypes: readonly string[],
  opts: DecodeOneshotOptions = {}
): Promise<DataItem[]> {
  const maxOneshotBytes = resolveLimit(
    'maxOneshotBytes',
    opts.maxOneshotBytes,
    DEFAULT_MAX_ONESHOT_BYTES
  );
  if (!Array.isArray(candidateMimeTypes)) {
    throw new TypeError('candidateMimeTypes must be an array of strings');
  }
  const logger = opts.logger ?? getDecoderLogger('oneshot');
  const source = toByteSource(input);

  const content = await readToEnd(source, maxOneshotBytes);
  logger.debug('Read oneshot content of {bytes} bytes', {
    bytes: content.length,
  });

  const mimeType = filterMimeTypes(candidateMimeTypes);
  if (mimeType.length === 0) {
    throw new NoValidMimeTypeError(candidateMimeTypes);
  }
  return [createDataItem(mimeType, content)];
}

/**
 * Encodes items into a complete bulk stream.
 *
 * Each item is written as one `M` section per label followed by one `C` section.
 * String content is encoded as UTF-8.
 *
 * @param items - Items to encode, each with at least one label
 * @param opts - Optional configuration for encoding behavior
 * @param opts.maxSectionBytes - Largest allowed section payload (default: 2^32 - 1)
 * @returns Buffer holding the header and every section
 *
 * @example
 * ```ts
 * import { encodeBulk } from 'clipframe';
 *
 * socket.end(
 *   encodeBulk([
 *     { mimeType: ['text/plain', 'TEXT'], content: 'SOME Data' },
 *     { mimeType: ['text/html'], content: '<b>HTML code</b>' },
 *   ])
 * );
 * ```
 */
export function encodeBulk(
  items: readonly DataItemInput[],
  opts: EncodeOptions = {}
): Buffer {
  const maxSectionBytes = resolveLimit(
    'maxSectionBytes',
    opts.maxSectionBytes,
    MAX_LENGTH_FIELD
  );
  const prepared = prepareItems(items, maxSectionBytes);
  return Buffer.concat([makeHeaderBuffer(), ...prepared.map(makeItemBuffer)]);
}

/**
 * Encodes items into a readable stream: the header first, then one chunk per item.
 *
 * Items are validated before the stream is created, so invalid input throws here
 * rather than surfacing as a stream error.
 */
export function frameItems(
  items: readonly DataItemInput[],
  opts: EncodeOptions = {}
): Readable {
  const maxSectionBytes = resolveLimit(
    'maxSectionBytes',
    opts.maxSectionBytes,
    MAX_LENGTH_FIELD
  );
  const prepared = prepareItems(items, maxSectionBytes);

  function* chunks(): Generator<Buffer> {
    yield makeHeaderBuffer();
    for (const item of prepared) {
      yield makeItemBuffer(item);
    }
  }
  return Readable.from(chunks(), { objectMode: false });
}

/**
 * Calculates the number of bytes {@link encodeBulk} produces for `items`.
 *
 * Useful for setting a Content-Length before streaming with {@link frameItems}.
 */
export function getBulkSize(
  items: readonly DataItemInput[],
  opts: EncodeOptions = {}
): number {
  const maxSectionBytes = resolveLimit(
    'maxSectionBytes',
    opts.maxSectionBytes,
    MAX_LENGTH_FIELD
  );
  return prepareItems(items, maxSectionBytes).reduce(
    (sum, item) => sum + encodedItemSize(item),
    HEADER_SIZE
  );
}

/**
 * Checks whether input starts with a bulk stream header.
 *
 * For a stream, the bytes read are pushed back with `unshift`, so a following
 * {@link decodeBulk} call sees the stream from its first byte. A stream with
 * `data` listeners is left alone and reported as `false`.
 *
 * @example
 * ```ts
 * import { decodeBulk, decodeOneshot, isBulkStream } from 'clipframe';
 *
 * const items = (await isBulkStream(stream))
 *   ? await decodeBulk(stream)
 *   : await decodeOneshot(stream, ['text/plain']);
 * ```
 */
export async function isBulkStream(input: DecodeInput): Promise<boolean> {
  if (input instanceof Uint8Array) {
    return isHeader(Buffer.from(input.subarray(0, HEADER_SIZE)));
  }

  validateReadableStream(input);
  if (hasDataListeners(input)) {
    // avoid interfering with existing consumers
    return false;
  }
  input.pause();

  try {
    return isHeader(await new StreamSource(input).peek(HEADER_SIZE));
  } catch {
    return false;
  }
}
