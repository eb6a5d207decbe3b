import { Buffer } from 'node:buffer';
import { PassThrough, Readable } from 'node:stream';

import { describe, expect, it } from 'vitest';

import {
  BufferSource,
  InvalidSourceError,
  StreamInUseError,
  StreamSource,
  toByteSource,
  TruncatedInputError,
} from '../src';
import {
  readContentBlock,
  readExactBytes,
  readLengthPrefixedBlock,
  readMimeTypeString,
  readToEnd,
} from '../src/reader';

describe('primitive readers', () => {
  it('reads a MIME type string', async () => {
    await expect(
      readMimeTypeString(
        new BufferSource(Buffer.from([0, 0, 0, 4, 0x74, 0x65, 0x78, 0x74])),
        1024
      )
    ).resolves.toBe('text');
  });

  it('fails when the length field is shorter than four bytes', async () => {
    await expect(
      readContentBlock(new BufferSource(Buffer.from([0, 0, 0])), 1024)
    ).rejects.toMatchObject({
      kind: 'TruncatedInput',
      field: 'content length',
      expected: 4,
      received: 3,
    });
  });

  it('fails when the payload is missing', async () => {
    await expect(
      readMimeTypeString(new BufferSource(Buffer.from([0, 0, 0, 1])), 1024)
    ).rejects.toMatchObject({
      kind: 'TruncatedInput',
      field: 'mime-type',
      expected: 1,
      received: 0,
    });
  });

  it('returns content bytes unchanged', async () => {
    const content = await readContentBlock(
      new BufferSource(Buffer.from([0, 0, 0, 5, 0x74, 0x65, 0x78, 0x74, 0x42])),
      1024
    );

    expect(content).toEqual(Buffer.from([0x74, 0x65, 0x78, 0x74, 0x42]));
  });

  it('reads lengths above 255 as big-endian', async () => {
    const input = Buffer.alloc(256 + 4);
    input[2] = 1;

    const content = await readContentBlock(new BufferSource(input), 1024);

    expect(content).toEqual(Buffer.alloc(256));
  });

  it('stops before the payload when the length exceeds the limit', async () => {
    const source = new BufferSource(Buffer.from([0, 0, 1, 0, 0xaa, 0xbb]));

    await expect(
      readLengthPrefixedBlock(source, 'content', 255)
    ).rejects.toMatchObject({
      kind: 'SectionTooLarge',
      field: 'content',
      length: 256,
      limit: 255,
    });
    await expect(source.read(2)).resolves.toEqual(Buffer.from([0xaa, 0xbb]));
  });

  it('returns an empty buffer for a zero-byte read', async () => {
    await expect(
      readExactBytes(new BufferSource(Buffer.alloc(0)), 0, 'content')
    ).resolves.toEqual(Buffer.alloc(0));
  });

  it('reads the rest of a source', async () => {
    const source = new BufferSource(Buffer.from('abcdef'));
    await source.read(2);

    await expect(readToEnd(source, 4)).resolves.toEqual(Buffer.from('cdef'));
  });
});

describe('StreamSource', () => {
  it('collects reads across chunks', async () => {
    const stream = new PassThrough();
    stream.write(Buffer.from('ab'));
    stream.write(Buffer.from('cd'));
    stream.end(Buffer.from('ef'));
    const source = new StreamSource(stream);

    await expect(source.read(3)).resolves.toEqual(Buffer.from('abc'));
    await expect(source.read(3)).resolves.toEqual(Buffer.from('def'));
    await expect(source.read(1)).resolves.toEqual(Buffer.alloc(0));
  });

  it('returns a short read at end of stream', async () => {
    const stream = new PassThrough();
    stream.end(Buffer.from('xy'));

    await expect(new StreamSource(stream).read(4)).resolves.toEqual(
      Buffer.from('xy')
    );
  });

  it('splits oversized chunks from object mode streams', async () => {
    const source = new StreamSource(Readable.from([Buffer.from('abcdef')]));

    await expect(source.read(4)).resolves.toEqual(Buffer.from('abcd'));
    await expect(source.read(4)).resolves.toEqual(Buffer.from('ef'));
  });

  it('rejects with the stream error', async () => {
    const stream = new PassThrough();
    stream.write(Buffer.from('ab'));
    const pending = readExactBytes(new StreamSource(stream), 4, 'magic');

    stream.destroy(new Error('socket hang up'));

    await expect(pending).rejects.toThrowError('socket hang up');
  });

  it('treats a destroyed stream as ended', async () => {
    const stream = new PassThrough();
    stream.destroy();

    await expect(
      readExactBytes(new StreamSource(stream), 4, 'magic')
    ).rejects.toBeInstanceOf(TruncatedInputError);
  });

  it('peeks without consuming', async () => {
    const stream = new PassThrough();
    stream.end(Buffer.from('abcdef'));
    const source = new StreamSource(stream);

    await expect(source.peek(4)).resolves.toEqual(Buffer.from('abcd'));
    await expect(source.read(6)).resolves.toEqual(Buffer.from('abcdef'));
  });

  it('peeks at a stream shorter than the requested size', async () => {
    const stream = new PassThrough();
    stream.end(Buffer.from('ab'));
    const source = new StreamSource(stream);

    await expect(source.peek(5)).resolves.toEqual(Buffer.from('ab'));
    await expect(source.read(5)).resolves.toEqual(Buffer.from('ab'));
  });

  it('enforces the drain limit', async () => {
    const stream = new PassThrough();
    stream.end(Buffer.from('0123456789'));

    await expect(
      new StreamSource(stream).drain(9, 'oneshot content')
    ).rejects.toMatchObject({ kind: 'SectionTooLarge', length: 10, limit: 9 });
  });
});

describe('toByteSource', () => {
  it('wraps byte arrays', () => {
    expect(toByteSource(new Uint8Array([1]))).toBeInstanceOf(BufferSource);
  });

  it('pauses streams', () => {
    const stream = new PassThrough();

    expect(toByteSource(stream)).toBeInstanceOf(StreamSource);
    expect(stream.readableFlowing).toBe(false);
  });

  it.each([null, undefined, 42, 'text', {}])('rejects %j', (input) => {
    expect(() => toByteSource(input)).toThrowError(InvalidSourceError);
  });

  it('rejects a stream with data listeners, even when paused', () => {
    const stream = new PassThrough();
    stream.on('data', () => {});

    expect(() => toByteSource(stream)).toThrowError(StreamInUseError);

    stream.pause();
    expect(() => toByteSource(stream)).toThrowError(StreamInUseError);
  });
});
