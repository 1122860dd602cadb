import type { ForegroundColorName, ModifierName } from 'chalk';

export type LogLevel = 'trace' | 'debug' | 'info' | 'success' | 'warn' | 'error' | 'fatal';

export const LEVEL_VALUES = {
  trace: 10,
  debug: 20,
  info: 30,
  success: 35,
  warn: 40,
  error: 50,
  fatal: 60,
} as const satisfies Record<LogLevel, number>;

/** pino levels this package adds on top of the built-in ones. */
export const CUSTOM_LEVELS = { success: LEVEL_VALUES.success } as const;

export const SEVERITIES = ['DEBUG', 'INFO', 'SUCCESS', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type Severity = (typeof SEVERITIES)[number];

const LEVEL_NAMES: Readonly<Record<LogLevel, string>> = {
  trace: 'TRACE',
  debug: 'DEBUG',
  info: 'INFO',
  success: 'SUCCESS',
  warn: 'WARNING',
  error: 'ERROR',
  fatal: 'CRITICAL',
};

const SEVERITY_VALUES: Readonly<Record<Severity, number>> = {
  DEBUG: LEVEL_VALUES.debug,
  INFO: LEVEL_VALUES.info,
  SUCCESS: LEVEL_VALUES.success,
  WARNING: LEVEL_VALUES.warn,
  ERROR: LEVEL_VALUES.error,
  CRITICAL: LEVEL_VALUES.fatal,
};

export type StyleDirective = Readonly<{
  color?: ForegroundColorName;
  attrs?: readonly ModifierName[];
}>;

export const LEVEL_STYLES: Readonly<Record<Severity, StyleDirective>> = Object.freeze({
  // renders as grey on most terminals
  DEBUG: { color: 'black', attrs: ['bold'] },
  INFO: {},
  SUCCESS: { color: 'green' },
  WARNING: { color: 'yellow' },
  ERROR: { color: 'red' },
  CRITICAL: { color: 'red', attrs: ['bold'] },
});

const NO_STYLE: StyleDirective = Object.freeze({});

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_VALUES, value);
}

export function severityValue(severity: Severity): number {
  return SEVERITY_VALUES[severity];
}

export function severityFor(levelno: number): Severity | undefined {
  return SEVERITIES.find((severity) => SEVERITY_VALUES[severity] === levelno);
}

/**
 * Style for a numeric level. Levels outside the six severities (pino's
 * `trace`, custom levels) get no styling.
 */
export function styleFor(levelno: number): StyleDirective {
  const severity = severityFor(levelno);
  return severity ? LEVEL_STYLES[severity] : NO_STYLE;
}

export function levelName(level: LogLevel): string {
  return LEVEL_NAMES[level];
}

export function levelNameFor(levelno: number): string {
  const entry = Object.entries(LEVEL_VALUES).find(([, value]) => value === levelno);
  if (entry && isLogLevel(entry[0])) return LEVEL_NAMES[entry[0]];
  return `Level ${levelno}`;
}
