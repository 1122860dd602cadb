import { Chalk, type ChalkInstance } from 'chalk';

import { LEVEL_STYLES, SEVERITIES, severityValue, type StyleDirective } from '../levels.js';
import type { LogRecord } from '../record.js';
import { compileTemplate, type CompiledTemplate } from '../template.js';
import { TemplateFormatter, type TemplateFormatterOptions } from './template-formatter.js';

export type ColorFormatterOptions = TemplateFormatterOptions &
  Readonly<{
    /** chalk color level; 1 is the basic 16-color palette. */
    colorLevel?: 1 | 2 | 3;
  }>;

/**
 * Colors whole lines by severity. The style wraps the template itself, so
 * every substituted value on the line shares the level's color.
 */
export class ColorFormatter extends TemplateFormatter {
  private readonly byLevel: ReadonlyMap<number, CompiledTemplate>;

  constructor(options: ColorFormatterOptions = {}) {
    super(options);
    const chalk = new Chalk({ level: options.colorLevel ?? 1 });
    this.byLevel = new Map(
      SEVERITIES.map(
        (severity) =>
          [
            severityValue(severity),
            compileTemplate(applyStyle(chalk, LEVEL_STYLES[severity], this.template)),
          ] as const
      )
    );
  }

  override format(record: LogRecord): string {
    const compiled = this.byLevel.get(record.levelno);
    if (!compiled) return super.format(record);
    return this.render(record, compiled);
  }
}

export function applyStyle(chalk: ChalkInstance, style: StyleDirective, text: string): string {
  if (!style.color && !style.attrs?.length) return text;

  let painter = chalk;
  if (style.color) painter = painter[style.color];
  for (const attr of style.attrs ?? []) {
    painter = painter[attr];
  }
  return painter(text);
}
