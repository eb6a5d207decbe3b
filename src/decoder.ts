import { Buffer } from 'node:buffer';
import {
  MAGIC,
  MAGIC_LENGTH,
  PROTOCOL_VERSION,
  SectionTag,
  TAG_LENGTH,
  UTF8,
  VERSION_LENGTH,
} from './constants';
import {
  BadMagicError,
  ContentWithoutMimeTypeError,
  UnknownSectionTagError,
  UnsupportedVersionError,
} from './errors';
import { createDataItem } from './item';
import type { Logger } from './logger';
import {
  readContentBlock,
  readExactBytes,
  readMimeTypeString,
  type ByteSource,
} from './reader';
import type { DataItem } from './types';

/**
 * Position of the bulk decoder within the stream.
 *
 * The labels a content section belongs to travel inside the
 * `expect-content-body` state, so that state cannot be entered without them.
 */
export type DecoderState =
  | { kind: 'expect-header' }
  | { kind: 'expect-section-or-end' }
  | { kind: 'expect-mime-body' }
  | { kind: 'expect-content-body'; mimeType: string[] }
  | { kind: 'done' };

export type BulkDecoderOptions = {
  maxSectionBytes: number;
  logger: Logger;
};

/**
 * State machine over a bulk stream: header, then `M` and `C` sections
 * until a clean end of stream at a section boundary.
 */
export class BulkDecoder {
  private state: DecoderState = { kind: 'expect-header' };
  private pending: string[] = [];
  private readonly items: DataItem[] = [];
  private sectionIndex = 0;

  constructor(
    private readonly source: ByteSource,
    private readonly opts: BulkDecoderOptions
  ) {}

  get current(): DecoderState['kind'] {
    return this.state.kind;
  }

  /** Performs exactly one state transition. */
  async step(): Promise<void> {
    const state = this.state;
    switch (state.kind) {
      case 'expect-header':
        await this.readHeader();
        this.state = { kind: 'expect-section-or-end' };
        return;

      case 'expect-section-or-end':
        this.state = await this.readTag();
        return;

      case 'expect-mime-body': {
        const mimeType = await readMimeTypeString(
          this.source,
          this.opts.maxSectionBytes
        );
        this.opts.logger.debug(
          'Received MIME type {mimeType} ({length} bytes)',
          { mimeType, length: Buffer.byteLength(mimeType, UTF8) }
        );
        this.pending.push(mimeType);
        this.state = { kind: 'expect-section-or-end' };
        return;
      }

      case 'expect-content-body': {
        const content = await readContentBlock(
          this.source,
          this.opts.maxSectionBytes
        );
        this.opts.logger.debug('Received {length} bytes of {mimeType}', {
          length: content.length,
          mimeType: state.mimeType,
        });
        this.items.push(createDataItem(state.mimeType, content));
        this.state = { kind: 'expect-section-or-end' };
        return;
      }

      case 'done':
        return;
    }
  }

  /** Steps until the stream ends cleanly, or throws on the first error. */
  async run(): Promise<DataItem[]> {
    while (this.state.kind !== 'done') {
      await this.step();
    }
    return this.items;
  }

  private async readHeader(): Promise<void> {
    const magic = await readExactBytes(this.source, MAGIC_LENGTH, 'magic');
    if (!magic.equals(MAGIC)) {
      throw new BadMagicError(magic);
    }

    const version = (
      await readExactBytes(this.source, VERSION_LENGTH, 'version')
    ).readUInt8(0);
    if (version !== PROTOCOL_VERSION) {
      throw new UnsupportedVersionError(version);
    }
    this.opts.logger.debug('Accepted stream header version {version}', {
      version,
    });
  }

  private async readTag(): Promise<DecoderState> {
    const flag = await this.source.read(TAG_LENGTH);
    if (flag.length === 0) {
      if (this.pending.length > 0) {
        this.opts.logger.debug(
          'Dropping MIME types without content: {mimeType}',
          { mimeType: this.pending }
        );
        this.pending = [];
      }
      this.opts.logger.debug('Reached end of stream after {items} items', {
        items: this.items.length,
      });
      return { kind: 'done' };
    }

    const tag = flag.readUInt8(0);
    const index = this.sectionIndex++;
    this.opts.logger.debug('Read section {section} tag {tag}', {
      section: index,
      tag: String.fromCharCode(tag),
    });

    switch (tag) {
      case SectionTag.MIME_TYPE:
        return { kind: 'expect-mime-body' };
      case SectionTag.CONTENT: {
        if (this.pending.length === 0) {
          throw new ContentWithoutMimeTypeError(index);
        }
        const mimeType = this.pending;
        this.pending = [];
        return { kind: 'expect-content-body', mimeType };
      }
      default:
        throw new UnknownSectionTagError(tag, index);
    }
  }
}
