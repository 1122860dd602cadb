/** Reads the current memory figure to attach to profile records. */
export type MemoryProbe = () => number;

/** Resident set size of this process in bytes. */
export function usedMemory(): number {
  return process.memoryUsage.rss();
}
