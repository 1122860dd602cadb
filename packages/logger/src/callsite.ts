import path from 'node:path';
import { fileURLToPath } from 'node:url';

export type Callsite = Readonly<{
  pathname: string;
  filename: string;
  module: string;
  lineno: number;
  func_name: string;
}>;

const SELF_FILE = fileURLToPath(import.meta.url);

const FRAME_REGEX = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

/**
 * First stack frame outside this file and `skipFiles`, i.e. the code that
 * called into the logger.
 */
export function captureCallsite(skipFiles: readonly string[] = []): Callsite | undefined {
  const stack = new Error().stack ?? '';
  for (const frame of stack.split('\n').slice(1)) {
    const match = FRAME_REGEX.exec(frame);
    if (!match?.[2] || !match[3]) continue;

    const file = normalizeLocation(match[2]);
    if (file === SELF_FILE || skipFiles.includes(file)) continue;
    if (file.startsWith('node:')) continue;

    return {
      pathname: file,
      filename: path.basename(file),
      module: path.parse(file).name,
      lineno: Number(match[3]),
      func_name: (match[1] ?? '<anonymous>').replace(/^async /, ''),
    };
  }
  return undefined;
}

function normalizeLocation(location: string): string {
  if (!location.startsWith('file://')) return location;
  try {
    return fileURLToPath(location);
  } catch {
    return location;
  }
}
