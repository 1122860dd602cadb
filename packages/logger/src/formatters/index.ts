import type { MemoryProbe } from '../memory.js';
import { ColorFormatter } from './color.js';
import { JsonFormatter } from './json.js';
import { PlainFormatter } from './plain.js';
import { ProfileFormatter } from './profile.js';
import type { LogFormat, RecordFormatter } from './types.js';

export type CreateFormatterOptions = Readonly<{
  template?: string;
  memoryProbe?: MemoryProbe;
}>;

export function createFormatter(
  format: LogFormat,
  options: CreateFormatterOptions = {}
): RecordFormatter {
  switch (format) {
    case 'color':
      return new ColorFormatter({ template: options.template });
    case 'plain':
      return new PlainFormatter({ template: options.template });
    case 'json':
      return new JsonFormatter();
    case 'profile':
      return new ProfileFormatter({ memoryProbe: options.memoryProbe });
  }
}

export { ColorFormatter, applyStyle, type ColorFormatterOptions } from './color.js';
export { JsonFormatter, JSON_RECORD_KEYS } from './json.js';
export { PlainFormatter } from './plain.js';
export { ProfileFormatter, type ProfileFormatterOptions } from './profile.js';
export { TemplateFormatter, type TemplateFormatterOptions } from './template-formatter.js';
export { LOG_FORMATS, type LogFormat, type RecordFormatter } from './types.js';
