import type { InferenceResult, Overlay } from './relay.types.js';

export const MAX_CHARS_PER_LINE = 60;

export const WAITING_TEXT = 'Waiting for first result...';

export function overlayText(result: InferenceResult | null): string {
  if (!result) return WAITING_TEXT;
  if (result.status === 'ok') return result.text;
  return `Error: ${result.error.message}`;
}

// Greedy word wrap; a single word longer than the limit gets a line of its own.
export function wrapText(text: string, maxChars = MAX_CHARS_PER_LINE): string[] {
  const lines: string[] = [];
  let current: string[] = [];
  let length = 0;

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    if (current.length === 0) {
      current = [word];
      length = word.length;
    } else if (length + 1 + word.length <= maxChars) {
      current.push(word);
      length += 1 + word.length;
    } else {
      lines.push(current.join(' '));
      current = [word];
      length = word.length;
    }
  }
  if (current.length > 0) lines.push(current.join(' '));
  return lines;
}

export function buildOverlay(result: InferenceResult | null, processing: boolean): Overlay {
  const text = overlayText(result);
  const overlay: Overlay = {
    text,
    status: processing ? 'Processing...' : 'Ready',
    lines: Object.freeze(wrapText(text))
  };
  return Object.freeze(overlay);
}
