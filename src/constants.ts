import { Buffer } from 'node:buffer';

/** Magic marker opening every bulk stream. */
export const MAGIC = Buffer.from([0x20, 0x09, 0x02, 0x14]);
export const MAGIC_LENGTH = 4;

/** The only protocol version this package reads and writes. */
export const PROTOCOL_VERSION = 0;
export const VERSION_LENGTH = 1;

/** Magic plus version byte. */
export const HEADER_SIZE = MAGIC_LENGTH + VERSION_LENGTH;

export const TAG_LENGTH = 1;
export const LENGTH_BYTES = 4;

/** Tag byte plus length field preceding every section payload. */
export const SECTION_OVERHEAD = TAG_LENGTH + LENGTH_BYTES;

export const SectionTag = {
  MIME_TYPE: 0x4d, // 'M'
  CONTENT: 0x43, // 'C'
} as const;

export type SectionTagValue = (typeof SectionTag)[keyof typeof SectionTag];

/** Largest value a u32 length field can carry. */
export const MAX_LENGTH_FIELD = 0xffffffff;

export const DEFAULT_MAX_SECTION_BYTES = 64 * 1024 * 1024;
export const DEFAULT_MAX_ONESHOT_BYTES = 256 * 1024 * 1024;

export const UTF8 = 'utf8' as const;
