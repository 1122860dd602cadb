import type { LogRecord } from '../record.js';
import { compileTemplate, DEFAULT_TEMPLATE, type CompiledTemplate } from '../template.js';
import type { RecordFormatter } from './types.js';

export type TemplateFormatterOptions = Readonly<{
  template?: string;
}>;

/** Field substitution against a line template, with the error stack on the following line. */
export class TemplateFormatter implements RecordFormatter {
  protected readonly template: string;
  private readonly compiled: CompiledTemplate;

  constructor(options: TemplateFormatterOptions = {}) {
    this.template = options.template ?? DEFAULT_TEMPLATE;
    this.compiled = compileTemplate(this.template);
  }

  format(record: LogRecord): string {
    return this.render(record, this.compiled);
  }

  protected render(record: LogRecord, compiled: CompiledTemplate): string {
    const line = compiled(record);
    return record.excText ? `${line}\n${record.excText}` : line;
  }
}
