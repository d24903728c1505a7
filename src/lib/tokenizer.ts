import type { Word } from '../types';

/**
 * Create a word that does not end a paragraph.
 */
export function createWord(text: string, isParagraphEnd = false): Word {
  return { text, isParagraphEnd };
}

/**
 * Split raw text into words.
 *
 * A single newline is ordinary whitespace. A blank line (empty or whitespace
 * only) flags the last word before it as a paragraph end, so the long pause
 * lands before the eye moves on rather than on the first word of the next
 * paragraph.
 */
export function segmentText(text: string): Word[] {
  const words: Word[] = [];

  for (const line of text.split('\n')) {
    const trimmed = line.trim();

    if (trimmed.length === 0) {
      const last = words.length - 1;
      if (last >= 0 && !words[last].isParagraphEnd) {
        words[last] = createWord(words[last].text, true);
      }
      continue;
    }

    for (const token of trimmed.split(/\s+/)) {
      words.push(createWord(token));
    }
  }

  return words;
}

/**
 * Count whitespace-delimited words without building a sequence.
 */
export function wordCount(text: string): number {
  return text.split(/\s+/).filter(w => w.length > 0).length;
}
