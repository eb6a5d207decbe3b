/**
 * Property-based tests for bulk encoding and decoding
 */

import { Buffer } from 'node:buffer';
import { PassThrough } from 'node:stream';

import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import {
  BadMagicError,
  decodeBulk,
  decodeOneshot,
  encodeBulk,
  MAGIC,
  UnsupportedVersionError,
} from '../src';

const itemArb = fc.record({
  mimeType: fc.array(fc.fullUnicodeString({ maxLength: 40 }), {
    minLength: 1,
    maxLength: 4,
  }),
  content: fc.uint8Array({ minLength: 0, maxLength: 512 }),
});

const itemsArb = fc.array(itemArb, { minLength: 0, maxLength: 8 });

function streamOf(buffer: Buffer, cuts: number[]): PassThrough {
  const stream = new PassThrough();
  let offset = 0;
  for (const cut of [...new Set(cuts)].sort((a, b) => a - b)) {
    stream.write(buffer.subarray(offset, cut));
    offset = cut;
  }
  stream.end(buffer.subarray(offset));
  return stream;
}

describe('Bulk encoding round-trip', () => {
  it('decodeBulk reproduces labels and content of encoded items', async () => {
    await fc.assert(
      fc.asyncProperty(itemsArb, async (items) => {
        const decoded = await decodeBulk(encodeBulk(items));

        expect(decoded.map((item) => item.mimeType)).toEqual(
          items.map((item) => item.mimeType)
        );
        decoded.forEach((item, index) => {
          const original = items[index]?.content ?? new Uint8Array();
          expect(item.content.equals(Buffer.from(original))).toBe(true);
        });
      }),
      { numRuns: 100 }
    );
  });

  it('chunk boundaries do not change the result', async () => {
    await fc.assert(
      fc.asyncProperty(
        itemsArb,
        fc.array(fc.nat(), { maxLength: 16 }),
        async (items, rawCuts) => {
          const encoded = encodeBulk(items);
          const cuts = rawCuts.map((cut) => cut % (encoded.length + 1));

          const whole = await decodeBulk(encoded);
          const chunked = await decodeBulk(streamOf(encoded, cuts));

          expect(chunked).toEqual(whole);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('labels declared after the last content section produce no item', async () => {
    await fc.assert(
      fc.asyncProperty(
        itemsArb,
        fc.array(fc.string({ maxLength: 20 }), { minLength: 1, maxLength: 3 }),
        async (items, trailing) => {
          const sections = trailing.map((label) => {
            const body = Buffer.from(label);
            const prefix = Buffer.alloc(5);
            prefix.writeUInt8(0x4d, 0);
            prefix.writeUInt32BE(body.length, 1);
            return Buffer.concat([prefix, body]);
          });

          const decoded = await decodeBulk(
            Buffer.concat([encodeBulk(items), ...sections])
          );

          expect(decoded).toHaveLength(items.length);
        }
      ),
      { numRuns: 50 }
    );
  });
});

describe('Header validation', () => {
  it('any change to a magic byte fails with BadMagic', async () => {
    await fc.assert(
      fc.asyncProperty(
        itemsArb,
        fc.integer({ min: 0, max: 3 }),
        fc.integer({ min: 1, max: 255 }),
        async (items, index, delta) => {
          const encoded = encodeBulk(items);
          encoded[index] = ((MAGIC[index] ?? 0) + delta) % 256;

          await expect(decodeBulk(encoded)).rejects.toBeInstanceOf(
            BadMagicError
          );
        }
      ),
      { numRuns: 100 }
    );
  });

  it('any other version byte fails with UnsupportedVersion', async () => {
    await fc.assert(
      fc.asyncProperty(
        itemsArb,
        fc.integer({ min: 1, max: 255 }),
        async (items, version) => {
          const encoded = encodeBulk(items);
          encoded[4] = version;

          await expect(decodeBulk(encoded)).rejects.toMatchObject({
            kind: 'UnsupportedVersion',
            version,
          });
          await expect(decodeBulk(encoded)).rejects.toBeInstanceOf(
            UnsupportedVersionError
          );
        }
      ),
      { numRuns: 50 }
    );
  });
});

describe('Oneshot decoding', () => {
  it('keeps the non-empty labels in order and the content intact', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.oneof(fc.constant(''), fc.string({ maxLength: 12 })), {
          maxLength: 6,
        }),
        fc.uint8Array({ maxLength: 512 }),
        async (candidates, content) => {
          const expected = candidates.filter((label) => label !== '');
          const pending = decodeOneshot(Buffer.from(content), candidates);

          if (expected.length === 0) {
            await expect(pending).rejects.toMatchObject({
              kind: 'NoValidMimeType',
            });
            return;
          }

          const [item] = await pending;
          expect(item?.mimeType).toEqual(expected);
          expect(item?.content.equals(Buffer.from(content))).toBe(true);
        }
      ),
      { numRuns: 100 }
    );
  });
});
