import type { FixationSplit, Word } from '../types';

// Pause multipliers. The largest applicable one wins; they never stack.
const LONG_WORD_LENGTH = 10;
const LONG_WORD_MULTIPLIER = 1.3;
const CLAUSE_END_MULTIPLIER = 2.0;
const SENTENCE_END_MULTIPLIER = 3.0;
const PARAGRAPH_END_MULTIPLIER = 4.0;

const CLAUSE_END = /[,;]$/;
const SENTENCE_END = /[.?!]$/;

function charCount(text: string): number {
  return Array.from(text).length;
}

/**
 * Index of the character the eye should fixate on (slightly left of center).
 * Longer words need the fixation point further in.
 */
export function fixationIndex(text: string): number {
  const length = charCount(text);
  let index: number;
  if (length <= 1) index = 0;
  else if (length <= 5) index = 1;
  else if (length <= 9) index = 2;
  else if (length <= 13) index = 3;
  else index = 4;

  return Math.max(0, Math.min(index, length - 1));
}

/**
 * Calculate how long a word stays on screen, in milliseconds.
 *
 * At 300 WPM the base is 200ms. Punctuation and paragraph ends take the
 * largest matching multiplier, so "extraordinarily." gets the sentence pause
 * (x3.0) rather than sentence pause times long-word pause.
 */
export function displayDuration(word: Word, wpm: number): number {
  const baseMs = 60000 / wpm;
  let multiplier = 1.0;

  if (charCount(word.text) > LONG_WORD_LENGTH) {
    multiplier = Math.max(multiplier, LONG_WORD_MULTIPLIER);
  }
  if (CLAUSE_END.test(word.text)) {
    multiplier = Math.max(multiplier, CLAUSE_END_MULTIPLIER);
  }
  if (SENTENCE_END.test(word.text)) {
    multiplier = Math.max(multiplier, SENTENCE_END_MULTIPLIER);
  }
  if (word.isParagraphEnd) {
    multiplier = Math.max(multiplier, PARAGRAPH_END_MULTIPLIER);
  }

  return Math.round(baseMs * multiplier);
}

/**
 * Split a word around its fixation letter.
 */
export function splitAtFixation(text: string): FixationSplit {
  const chars = Array.from(text);
  const index = fixationIndex(text);
  return {
    before: chars.slice(0, index).join(''),
    focus: chars[index] ?? '',
    after: chars.slice(index + 1).join(''),
  };
}

/**
 * Calculate remaining time from current position to end.
 */
export function remainingTime(words: readonly Word[], currentIndex: number, wpm: number): number {
  let totalMs = 0;
  for (let i = Math.max(0, currentIndex); i < words.length; i++) {
    totalMs += displayDuration(words[i], wpm);
  }
  return totalMs;
}

/**
 * Format milliseconds as h:mm:ss or mm:ss string.
 */
export function formatTime(ms: number): string {
  const totalSeconds = Math.ceil(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}`;
  }
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}
