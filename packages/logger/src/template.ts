import { toSortedJson } from './json.js';
import { messageText, type LogRecord } from './record.js';

export const DEFAULT_TEMPLATE = '{asctime} {levelname:<8} {name}: {message}';

export type CompiledTemplate = (record: LogRecord) => string;

type Alignment = '<' | '>' | '^';

type Segment =
  | Readonly<{ kind: 'text'; text: string }>
  | Readonly<{ kind: 'field'; name: string; align?: Alignment; width?: number }>;

const TOKEN_REGEX = /\{\{|\}\}|\{([A-Za-z_]\w*)(?::([<>^])(\d+))?\}/g;

/**
 * Compiles a `{field}` line template. `{field:<N}`, `{field:>N}` and
 * `{field:^N}` pad to width N; `{{` and `}}` are literal braces.
 */
export function compileTemplate(template: string): CompiledTemplate {
  const segments = parseTemplate(template);
  return (record) => segments.map((segment) => renderSegment(segment, record)).join('');
}

function parseTemplate(template: string): readonly Segment[] {
  const segments: Segment[] = [];
  let cursor = 0;

  for (const match of template.matchAll(TOKEN_REGEX)) {
    const index = match.index ?? 0;
    if (index > cursor) {
      segments.push({ kind: 'text', text: template.slice(cursor, index) });
    }
    cursor = index + match[0].length;

    if (match[0] === '{{') {
      segments.push({ kind: 'text', text: '{' });
      continue;
    }
    if (match[0] === '}}') {
      segments.push({ kind: 'text', text: '}' });
      continue;
    }

    const name = match[1] ?? '';
    const align = parseAlignment(match[2]);
    const width = match[3] ? Number(match[3]) : undefined;
    segments.push(align && width ? { kind: 'field', name, align, width } : { kind: 'field', name });
  }

  if (cursor < template.length) {
    segments.push({ kind: 'text', text: template.slice(cursor) });
  }
  return segments;
}

function parseAlignment(value: string | undefined): Alignment | undefined {
  if (value === '<' || value === '>' || value === '^') return value;
  return undefined;
}

function renderSegment(segment: Segment, record: LogRecord): string {
  if (segment.kind === 'text') return segment.text;

  const value = resolveField(record, segment.name);
  if (!segment.align || !segment.width) return value;
  return pad(value, segment.align, segment.width);
}

function pad(value: string, align: Alignment, width: number): string {
  switch (align) {
    case '<':
      return value.padEnd(width);
    case '>':
      return value.padStart(width);
    case '^': {
      const left = Math.floor((width - value.length) / 2);
      return value.padStart(value.length + Math.max(0, left)).padEnd(width);
    }
  }
}

export function resolveField(record: LogRecord, name: string): string {
  if (name === 'message') return messageText(record.msg);
  if (name === 'asctime') {
    return record.created === undefined ? '' : new Date(record.created * 1000).toISOString();
  }

  const fields: Readonly<Record<string, unknown>> = record;
  if (name !== 'extra' && Object.hasOwn(fields, name)) {
    return stringifyField(fields[name]);
  }
  return stringifyField(record.extra?.[name]);
}

function stringifyField(value: unknown): string {
  if (value === undefined) return '';
  if (typeof value === 'string') return value;
  if (value !== null && typeof value === 'object') return toSortedJson(value);
  return String(value);
}
