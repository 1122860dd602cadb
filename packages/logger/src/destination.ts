import type { DestinationStream } from 'pino';

import type { RecordFormatter } from './formatters/types.js';
import { parseLogLine, recordFromLogLine } from './record.js';

export type FormattingErrorHandler = (error: unknown, line: string) => void;

export type FormattingDestinationOptions = Readonly<{
  formatter: RecordFormatter;
  sink: DestinationStream;
  onError?: FormattingErrorHandler;
}>;

/**
 * pino destination that formats each JSON line before handing it to `sink`.
 * Lines that cannot be parsed or formatted reach the sink unchanged.
 */
export function createFormattingDestination(
  options: FormattingDestinationOptions
): DestinationStream {
  const onError = options.onError ?? reportFormattingError;

  const writeLine = (line: string): void => {
    let output: string;
    try {
      output = options.formatter.format(recordFromLogLine(parseLogLine(line)));
    } catch (error) {
      onError(error, line);
      options.sink.write(`${line}\n`);
      return;
    }
    if (output) options.sink.write(`${output}\n`);
  };

  return {
    write(chunk: string): void {
      for (const line of chunk.split('\n')) {
        if (line.trim()) writeLine(line);
      }
    },
  };
}

function reportFormattingError(error: unknown, line: string): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.emitWarning(`log line passed through unformatted: ${reason}`, {
    code: 'LOG_FORMAT_FAILED',
    detail: line.slice(0, 200),
  });
}
