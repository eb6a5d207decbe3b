import { getLogger, type Logger } from '@logtape/logtape';

export type { Logger };

/** Root category of every logger this package creates. */
export const LOG_CATEGORY = 'clipframe';

export type DecodeMode = 'bulk' | 'oneshot';

/**
 * Logger used when the caller passes none. Nothing is written until the
 * application configures LogTape for the `clipframe` category.
 */
export function getDecoderLogger(mode: DecodeMode): Logger {
  return getLogger([LOG_CATEGORY, mode]);
}
