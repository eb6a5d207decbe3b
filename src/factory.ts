import {
  decodeBulk,
  decodeOneshot,
  encodeBulk,
  frameItems,
  getBulkSize,
} from './api';
import type {
  DataItemInput,
  DecodeBulkOptions,
  DecodeInput,
  DecodeOneshotOptions,
  EncodeOptions,
} from './types';

export type DecoderDefaults = DecodeBulkOptions & DecodeOneshotOptions;

/**
 * Creates bulk and oneshot decoders with pre-configured options.
 *
 * Useful for applying the same limits and logger to every transfer an
 * application receives.
 *
 * @param defaults - Options applied to every call; per-call options take precedence
 *
 * @example
 * ```ts
 * import { createDecoder } from 'clipframe';
 *
 * const decoder = createDecoder({ maxSectionBytes: 1024 * 1024 });
 *
 * const items = await decoder.bulk(socket);
 * const [pasted] = await decoder.oneshot(process.stdin, ['text/plain']);
 * ```
 */
export function createDecoder(defaults: DecoderDefaults = {}) {
  return {
    bulk: (input: DecodeInput, opts: DecodeBulkOptions = {}) =>
      decodeBulk(input, { ...defaults, ...opts }),
    oneshot: (
      input: DecodeInput,
      candidateMimeTypes: readonly string[],
      opts: DecodeOneshotOptions = {}
    ) => decodeOneshot(input, candidateMimeTypes, { ...defaults, ...opts }),
  };
}

/**
 * Creates an encoder with pre-configured options.
 */
export function createEncoder(defaults: EncodeOptions = {}) {
  return {
    encode: (items: readonly DataItemInput[], opts: EncodeOptions = {}) =>
      encodeBulk(items, { ...defaults, ...opts }),
    frame: (items: readonly DataItemInput[], opts: EncodeOptions = {}) =>
      frameItems(items, { ...defaults, ...opts }),
    size: (items: readonly DataItemInput[], opts: EncodeOptions = {}) =>
      getBulkSize(items, { ...defaults, ...opts }),
  };
}
