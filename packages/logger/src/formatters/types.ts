import type { LogRecord } from '../record.js';

export type LogFormat = 'color' | 'plain' | 'json' | 'profile';

export const LOG_FORMATS = ['color', 'plain', 'json', 'profile'] as const satisfies readonly LogFormat[];

/**
 * One record in, one string out. Implementations must not mutate the record:
 * the same instance can be handed to several formatters.
 */
export interface RecordFormatter {
  format(record: LogRecord): string;
}
