import { stripAnsi } from '../ansi.js';
import { toSortedJson } from '../json.js';
import { messageText, type LogRecord } from '../record.js';
import type { RecordFormatter } from './types.js';

export const JSON_RECORD_KEYS = [
  'created',
  'filename',
  'funcName',
  'levelname',
  'lineno',
  'msg',
  'module',
  'name',
  'pathname',
  'process',
  'thread',
  'processName',
  'threadName',
  'log_id',
] as const satisfies readonly (keyof LogRecord)[];

export class JsonFormatter implements RecordFormatter {
  format(record: LogRecord): string {
    const view: LogRecord = { ...record, msg: stripAnsi(messageText(record.msg)) };

    const out: Record<string, unknown> = {};
    for (const key of JSON_RECORD_KEYS) {
      if (view[key] !== undefined) out[key] = view[key];
    }
    return toSortedJson(out);
  }
}
