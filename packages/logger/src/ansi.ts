import stripAnsiSequences from 'strip-ansi';

export const MAX_PLAIN_MESSAGE_LENGTH = 512;

// ESC [ through the first final byte in @-~, intermediates included.
const CSI_REGEX = /\u001b\[.*?[@-~]/g;

export function stripAnsi(text: string): string {
  if (!text.includes('\u001b') && !text.includes('\u009b')) return text;
  return stripAnsiSequences(text.replace(CSI_REGEX, ''));
}

/** Hard cut at `max` code points, so a surrogate pair is never split. */
export function truncateText(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join('');
}
