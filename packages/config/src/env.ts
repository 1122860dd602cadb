export type NodeEnv = 'development' | 'staging' | 'production' | 'test';

export type LogLevelSetting = 'trace' | 'debug' | 'info' | 'success' | 'warn' | 'error' | 'fatal';

export type LogFormatSetting = 'color' | 'plain' | 'json' | 'profile';

export type LoggingEnv = Readonly<{
  nodeEnv: NodeEnv;
  logLevel: LogLevelSetting;
  logFormat: LogFormatSetting;
  logTemplate: string | undefined;
  serviceName: string;
  /** Unset leaves the choice to the logger (on for the profile format). */
  callsite: boolean | undefined;
}>;

export type LoadEnvOptions = Readonly<{
  /** Whether stdout is a terminal; decides the default format. */
  isTTY?: boolean;
}>;

type EnvSource = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevelSetting[] = [
  'trace',
  'debug',
  'info',
  'success',
  'warn',
  'error',
  'fatal',
];

const LOG_FORMATS: readonly LogFormatSetting[] = ['color', 'plain', 'json', 'profile'];

function optionalString(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value == null) return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function parseNodeEnv(value: string | undefined): NodeEnv {
  const normalized = (value ?? 'development').trim();
  if (
    normalized === 'development' ||
    normalized === 'staging' ||
    normalized === 'production' ||
    normalized === 'test'
  ) {
    return normalized;
  }
  throw new Error(`Invalid NODE_ENV: ${normalized}`);
}

function parseLogLevel(value: string | undefined): LogLevelSetting {
  const normalized = (value ?? 'info').trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new Error(`Invalid LOG_LEVEL: ${normalized}`);
  }
  return level;
}

function isSet(env: EnvSource, key: string): boolean {
  return env[key] !== undefined;
}

function parseLogFormat(env: EnvSource, isTTY: boolean): LogFormatSetting {
  // https://no-color.org: any value, even empty, disables color.
  const colorAllowed = !isSet(env, 'NO_COLOR');
  const colorForced = isSet(env, 'FORCE_COLOR') && env['FORCE_COLOR'] !== '0';

  const raw = optionalString(env, 'LOG_FORMAT');
  if (!raw) {
    return colorAllowed && (isTTY || colorForced) ? 'color' : 'plain';
  }

  const normalized = raw.toLowerCase();
  const format = LOG_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new Error(`Invalid LOG_FORMAT: ${raw}`);
  }
  if (format === 'color' && !colorAllowed) return 'plain';
  return format;
}

function parseFlag(env: EnvSource, key: string): boolean | undefined {
  const raw = optionalString(env, key);
  if (raw == null) return undefined;
  const normalized = raw.toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no') return false;
  throw new Error(`Invalid ${key}: ${raw}`);
}

export function loadEnv(env: EnvSource = process.env, options: LoadEnvOptions = {}): LoggingEnv {
  const isTTY = options.isTTY ?? Boolean(process.stdout.isTTY);

  return {
    nodeEnv: parseNodeEnv(env['NODE_ENV']),
    logLevel: parseLogLevel(env['LOG_LEVEL']),
    logFormat: parseLogFormat(env, isTTY),
    // Templates keep their surrounding whitespace.
    logTemplate: env['LOG_TEMPLATE'] || undefined,
    serviceName: optionalString(env, 'LOG_SERVICE_NAME') ?? 'app',
    callsite: parseFlag(env, 'LOG_CALLSITE'),
  };
}
