import { Buffer } from 'node:buffer';
import type { DataItem } from './types';

/**
 * Builds an immutable {@link DataItem}.
 *
 * The label list and the content are copied, so later changes to the caller's
 * array or to the stream chunk the bytes came from do not reach the item. The
 * content gets a buffer of its own rather than a view into a larger one.
 * Throws a `TypeError` when no label is given.
 */
export function createDataItem(
  mimeType: readonly string[],
  content: Uint8Array
): DataItem {
  if (mimeType.length === 0) {
    throw new TypeError('A data item needs at least one MIME type');
  }
  const body = Buffer.alloc(content.byteLength);
  body.set(content);
  return Object.freeze({
    mimeType: Object.freeze([...mimeType]),
    content: body,
  });
}
