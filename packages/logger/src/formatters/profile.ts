import { toSortedJson } from '../json.js';
import { usedMemory, type MemoryProbe } from '../memory.js';
import { isStructuredMessage, type LogRecord } from '../record.js';
import type { RecordFormatter } from './types.js';

export type ProfileFormatterOptions = Readonly<{
  memoryProbe?: MemoryProbe;
}>;

/**
 * Emits structured messages as JSON together with the process's resident
 * memory. Text messages produce `''`, which sinks treat as nothing to write.
 */
export class ProfileFormatter implements RecordFormatter {
  private readonly memoryProbe: MemoryProbe;

  constructor(options: ProfileFormatterOptions = {}) {
    this.memoryProbe = options.memoryProbe ?? usedMemory;
  }

  format(record: LogRecord): string {
    if (!isStructuredMessage(record.msg)) return '';

    return toSortedJson({
      ...record.msg,
      created: record.created,
      module: record.module,
      process: record.process,
      thread: record.thread,
      memory: this.readMemory(),
    });
  }

  private readMemory(): number {
    try {
      return this.memoryProbe();
    } catch {
      return -1;
    }
  }
}
