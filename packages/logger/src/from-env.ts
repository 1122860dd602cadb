import { loadEnv, type LoadEnvOptions } from '@app/config';

import { createLogger, type CreateLoggerOptions, type Logger } from './schema.js';

export type LoggerFromEnvOverrides = Partial<
  Omit<CreateLoggerOptions, 'env' | 'level' | 'format' | 'template' | 'callsite'>
>;

/** Logger configured from NODE_ENV, LOG_LEVEL, LOG_FORMAT, LOG_TEMPLATE and LOG_CALLSITE. */
export function createLoggerFromEnv(
  env: Record<string, string | undefined> = process.env,
  overrides: LoggerFromEnvOverrides = {},
  options: LoadEnvOptions = {}
): Logger {
  const config = loadEnv(env, options);
  return createLogger({
    ...overrides,
    service: overrides.service ?? config.serviceName,
    env: config.nodeEnv,
    level: config.logLevel,
    format: config.logFormat,
    template: config.logTemplate,
    callsite: config.callsite,
  });
}
