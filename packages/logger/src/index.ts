export {
  createLogger,
  type CreateLoggerOptions,
  type Logger,
  type LogLevel,
  type LogMessageInput,
} from './schema.js';
export { createLoggerFromEnv, type LoggerFromEnvOverrides } from './from-env.js';

export {
  CUSTOM_LEVELS,
  LEVEL_STYLES,
  LEVEL_VALUES,
  SEVERITIES,
  levelName,
  levelNameFor,
  severityFor,
  styleFor,
  type Severity,
  type StyleDirective,
} from './levels.js';

export {
  STRUCTURED_MESSAGE_KEY,
  isStructuredMessage,
  messageText,
  parseLogLine,
  recordFromLogLine,
  type LogLine,
  type LogMessage,
  type LogRecord,
  type StructuredMessage,
} from './record.js';

export {
  ColorFormatter,
  JsonFormatter,
  JSON_RECORD_KEYS,
  LOG_FORMATS,
  PlainFormatter,
  ProfileFormatter,
  TemplateFormatter,
  createFormatter,
  type ColorFormatterOptions,
  type CreateFormatterOptions,
  type LogFormat,
  type ProfileFormatterOptions,
  type RecordFormatter,
  type TemplateFormatterOptions,
} from './formatters/index.js';

export {
  createFormattingDestination,
  type FormattingDestinationOptions,
  type FormattingErrorHandler,
} from './destination.js';

export { MAX_PLAIN_MESSAGE_LENGTH, stripAnsi } from './ansi.js';
export { compileTemplate, DEFAULT_TEMPLATE, type CompiledTemplate } from './template.js';
export { toSortedJson } from './json.js';
export { usedMemory, type MemoryProbe } from './memory.js';
export { LogLineParseError } from './errors.js';
export { redactDeep, type RedactionMode } from './redaction.js';
export { getTraceContext, withSpan, withSpanSync, type TraceContext } from './otel-correlation.js';
