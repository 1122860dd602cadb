import { fileURLToPath } from 'node:url';
import { isMainThread, threadId } from 'node:worker_threads';

import { pino, type DestinationStream, type Logger as PinoLogger } from 'pino';

import { captureCallsite } from './callsite.js';
import { createFormattingDestination, type FormattingErrorHandler } from './destination.js';
import { createFormatter } from './formatters/index.js';
import type { LogFormat } from './formatters/types.js';
import { CUSTOM_LEVELS, type LogLevel } from './levels.js';
import type { MemoryProbe } from './memory.js';
import { getTraceContext } from './otel-correlation.js';
import { STRUCTURED_MESSAGE_KEY, type StructuredMessage } from './record.js';
import { redactDeep, type RedactionMode } from './redaction.js';

export type { LogLevel } from './levels.js';

export type LogMessageInput = string | StructuredMessage;

type LogMethod = (context: Record<string, unknown>, message: LogMessageInput) => void;

export type Logger = Readonly<{
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  success: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (baseContext: Record<string, unknown>) => Logger;
}>;

export type CreateLoggerOptions = Readonly<{
  service: string;
  env: RedactionMode;
  level: LogLevel;
  version?: string;
  /** Formatter applied to every line; pino's own JSON line when omitted. */
  format?: LogFormat;
  template?: string;
  /** Where lines end up. Defaults to stdout. */
  sink?: DestinationStream;
  /**
   * Record pathname, filename, module, lineno and func_name of the caller.
   * On by default for the profile format, whose lines carry `module`.
   */
  callsite?: boolean;
  memoryProbe?: MemoryProbe;
  onFormatError?: FormattingErrorHandler;
}>;

type LoggerRuntime = Readonly<{
  mode: RedactionMode;
  callsite: boolean;
}>;

const SELF_FILE = fileURLToPath(import.meta.url);

export function createLogger(options: CreateLoggerOptions): Logger {
  const pinoLogger = createPinoLogger(options);
  return createLoggerWrapper(
    pinoLogger,
    { mode: options.env, callsite: options.callsite ?? options.format === 'profile' },
    {}
  );
}

function createPinoLogger(options: CreateLoggerOptions): PinoLogger<'success'> {
  const sink = options.sink ?? pino.destination({ dest: 1, sync: true });
  const destination = options.format
    ? createFormattingDestination({
        formatter: createFormatter(options.format, {
          template: options.template,
          memoryProbe: options.memoryProbe,
        }),
        sink,
        onError: options.onFormatError,
      })
    : sink;

  return pino<'success'>(
    {
      level: options.level,
      customLevels: CUSTOM_LEVELS,
      messageKey: 'message',
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      base: {
        service: options.service,
        env: options.env,
        version: options.version ?? process.env['npm_package_version'] ?? '0.0.0',
        pid: process.pid,
        process_name: process.title,
        thread_id: threadId,
        thread_name: isMainThread ? 'MainThread' : `Worker-${threadId}`,
      },
      redact: {
        paths: [
          'req.headers.authorization',
          'req.headers.cookie',
          '*.password',
          '*.secret',
          '*.token',
          '*.access_token',
          '*.refresh_token',
          '*.api_key',
          '*.api_secret',
        ],
        censor: '[REDACTED]',
      },
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    destination
  );
}

function createLoggerWrapper(
  pinoLogger: PinoLogger<'success'>,
  runtime: LoggerRuntime,
  baseContext: Record<string, unknown>
): Logger {
  const log = (level: LogLevel, context: Record<string, unknown>, message: LogMessageInput): void => {
    if (!pinoLogger.isLevelEnabled(level)) return;

    const merged = {
      ...baseContext,
      ...context,
    };

    const snake = toSnakeCaseDeep(merged) as Record<string, unknown>;
    const redacted = redactDeep(snake, runtime.mode) as Record<string, unknown>;
    const correlation = {
      ...getCorrelationFields(snake),
      ...(runtime.callsite ? captureCallsite([SELF_FILE]) : undefined),
    };

    if (typeof message === 'string') {
      pinoLogger[level]({ ...redacted, ...correlation }, message);
      return;
    }
    pinoLogger[level]({
      ...redacted,
      ...correlation,
      [STRUCTURED_MESSAGE_KEY]: message,
    });
  };

  return {
    trace: (context, message) => log('trace', context, message),
    debug: (context, message) => log('debug', context, message),
    info: (context, message) => log('info', context, message),
    success: (context, message) => log('success', context, message),
    warn: (context, message) => log('warn', context, message),
    error: (context, message) => log('error', context, message),
    fatal: (context, message) => log('fatal', context, message),
    child: (ctx) => createLoggerWrapper(pinoLogger, runtime, { ...baseContext, ...ctx }),
  };
}

// Added after redaction: ids and paths are opaque strings the redactor would mask.
function getCorrelationFields(context: Record<string, unknown>): Record<string, string> {
  const { traceId, spanId } = getTraceContext();
  const explicit = context['log_id'];
  const logId = typeof explicit === 'string' && explicit ? explicit : traceId;

  const out: Record<string, string> = {};
  if (traceId) out['trace_id'] = traceId;
  if (spanId) out['span_id'] = spanId;
  if (logId) out['log_id'] = logId;
  return out;
}

function toSnakeCaseDeep(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map(toSnakeCaseDeep);
  if (value instanceof Error) return value;
  if (typeof value !== 'object') return value;

  const obj = value as Record<string, unknown>;
  const out: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    out[toSnakeKey(key)] = toSnakeCaseDeep(val);
  }
  return out;
}

function toSnakeKey(key: string): string {
  // Preserve existing snake_case.
  if (key.includes('_')) return key.toLowerCase();

  // camelCase / PascalCase -> snake_case
  const withUnderscore = key
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z0-9]+)/g, '$1_$2');
  return withUnderscore.toLowerCase();
}
