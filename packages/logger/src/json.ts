type JsonValue = null | boolean | number | string | JsonObject | JsonValue[];
interface JsonObject {
  [key: string]: JsonValue;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Compact single-line JSON with object keys sorted at every depth.
 *
 * Never throws: values JSON has no representation for are written as strings
 * (bigint, symbol, function, NaN/Infinity, Error), dates as ISO strings and
 * circular references as `"[Circular]"`. `undefined` members are dropped.
 */
export function toSortedJson(value: unknown): string {
  return JSON.stringify(toJsonValue(value, new WeakSet<object>()) ?? null);
}

function toJsonValue(value: unknown, seen: WeakSet<object>): JsonValue | undefined {
  switch (typeof value) {
    case 'undefined':
      return undefined;
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : String(value);
    case 'bigint':
      return value.toString();
    case 'symbol':
      return value.toString();
    case 'function':
      return `[Function ${value.name || 'anonymous'}]`;
    default:
      break;
  }

  if (value === null) return null;
  if (seen.has(value)) return '[Circular]';

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('utf8');
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => toJsonValue(item, seen) ?? null);
    }

    if ('toJSON' in value && typeof value.toJSON === 'function') {
      const json: unknown = value.toJSON();
      return toJsonValue(json, seen);
    }

    if (!isRecord(value)) return String(value);

    const out: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      const converted = toJsonValue(value[key], seen);
      if (converted !== undefined) {
        out[key] = converted;
      }
    }
    return out;
  } finally {
    seen.delete(value);
  }
}
