import { LogLineParseError } from './errors.js';
import { isLogLevel, LEVEL_VALUES, levelName, levelNameFor } from './levels.js';
import { isRecord, toSortedJson } from './json.js';

export type StructuredMessage = Readonly<Record<string, unknown>>;

export type LogMessage = string | StructuredMessage | Uint8Array | number | boolean | null;

/**
 * A single emitted event as the formatters see it. Property names double as
 * the JSON wire names, hence the mixed `funcName` / `log_id` casing.
 */
export type LogRecord = Readonly<{
  levelno: number;
  levelname: string;
  msg: LogMessage;
  created?: number;
  name?: string;
  pathname?: string;
  filename?: string;
  module?: string;
  lineno?: number;
  funcName?: string;
  process?: number;
  processName?: string;
  thread?: number;
  threadName?: string;
  log_id?: string;
  excText?: string;
  extra?: Readonly<Record<string, unknown>>;
}>;

export type LogLine = Readonly<Record<string, unknown>>;

/** Key the logger factory uses to carry a mapping message through pino. */
export const STRUCTURED_MESSAGE_KEY = 'structured_message';

const CONSUMED_KEYS = new Set([
  'timestamp',
  'time',
  'level',
  'message',
  'msg',
  STRUCTURED_MESSAGE_KEY,
  'service',
  'name',
  'pid',
  'process_name',
  'thread_id',
  'thread_name',
  'pathname',
  'filename',
  'module',
  'lineno',
  'func_name',
  'log_id',
  'error',
  'err',
]);

export function isStructuredMessage(msg: LogMessage): msg is StructuredMessage {
  return isRecord(msg) && !(msg instanceof Uint8Array);
}

/** Text form of any message: mappings become sorted JSON, bytes are read as UTF-8. */
export function messageText(msg: LogMessage): string {
  if (typeof msg === 'string') return msg;
  if (msg instanceof Uint8Array) return Buffer.from(msg).toString('utf8');
  if (msg !== null && typeof msg === 'object') return toSortedJson(msg);
  return String(msg);
}

export function parseLogLine(raw: string): LogLine {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new LogLineParseError({ line: raw, cause: error });
  }
  if (!isRecord(parsed)) {
    throw new LogLineParseError({ line: raw });
  }
  return parsed;
}

export function recordFromLogLine(line: LogLine): LogRecord {
  const { levelno, levelname } = parseLevel(line['level']);
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(line)) {
    if (!CONSUMED_KEYS.has(key)) extra[key] = value;
  }

  return {
    levelno,
    levelname,
    msg: parseMessage(line),
    created: parseCreated(line),
    name: stringField(line, 'name') ?? stringField(line, 'service'),
    pathname: stringField(line, 'pathname'),
    filename: stringField(line, 'filename'),
    module: stringField(line, 'module'),
    lineno: numberField(line, 'lineno'),
    funcName: stringField(line, 'func_name'),
    process: numberField(line, 'pid'),
    processName: stringField(line, 'process_name'),
    thread: numberField(line, 'thread_id'),
    threadName: stringField(line, 'thread_name'),
    log_id: stringField(line, 'log_id'),
    excText: errorStack(line['error']) ?? errorStack(line['err']),
    extra: Object.keys(extra).length > 0 ? extra : undefined,
  };
}

function parseLevel(value: unknown): { levelno: number; levelname: string } {
  if (typeof value === 'number') {
    return { levelno: value, levelname: levelNameFor(value) };
  }
  if (typeof value === 'string') {
    if (isLogLevel(value)) {
      return { levelno: LEVEL_VALUES[value], levelname: levelName(value) };
    }
    return { levelno: 0, levelname: value.toUpperCase() };
  }
  return { levelno: LEVEL_VALUES.info, levelname: levelName('info') };
}

function parseMessage(line: LogLine): LogMessage {
  const structured = line[STRUCTURED_MESSAGE_KEY];
  if (isRecord(structured)) return structured;

  const message = line['message'] ?? line['msg'];
  if (typeof message === 'string' || typeof message === 'number' || typeof message === 'boolean') {
    return message;
  }
  if (isRecord(message)) return message;
  return '';
}

function parseCreated(line: LogLine): number | undefined {
  const timestamp = line['timestamp'];
  if (typeof timestamp === 'string') {
    const ms = Date.parse(timestamp);
    if (!Number.isNaN(ms)) return ms / 1000;
  }
  const time = line['time'];
  if (typeof time === 'number') return time / 1000;
  return undefined;
}

function errorStack(value: unknown): string | undefined {
  if (!isRecord(value)) return undefined;
  const stack = value['stack'];
  if (typeof stack === 'string' && stack) return stack;
  const message = value['message'];
  return typeof message === 'string' && message ? message : undefined;
}

function stringField(line: LogLine, key: string): string | undefined {
  const value = line[key];
  return typeof value === 'string' ? value : undefined;
}

function numberField(line: LogLine, key: string): number | undefined {
  const value = line[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}
