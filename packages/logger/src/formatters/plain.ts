import { MAX_PLAIN_MESSAGE_LENGTH, stripAnsi, truncateText } from '../ansi.js';
import type { LogRecord } from '../record.js';
import { TemplateFormatter } from './template-formatter.js';

/** Text for files and pipes: no escape sequences, message capped at 512 characters. */
export class PlainFormatter extends TemplateFormatter {
  override format(record: LogRecord): string {
    if (typeof record.msg !== 'string') return super.format(record);

    const msg = truncateText(stripAnsi(record.msg), MAX_PLAIN_MESSAGE_LENGTH);
    return super.format({ ...record, msg });
  }
}
