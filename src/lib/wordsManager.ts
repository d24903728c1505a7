import type { Word, WordSequence } from '../types';

export interface WordsManagerOptions {
  cacheId: string;
  currentIndex?: number;
  // Called after every navigation that lands on a word
  onWordChanged: () => void;
}

/**
 * Owns one tab's word sequence and read position.
 *
 * Words are never mutated; only the index moves. Every navigation that lands
 * on a word ends with exactly one onWordChanged call, so the timer and the
 * displayed word cannot drift apart.
 */
export class WordsManager {
  readonly words: WordSequence;
  readonly cacheId: string;
  private index: number;
  private readonly onWordChanged: () => void;

  constructor(words: WordSequence, options: WordsManagerOptions) {
    this.words = words;
    this.cacheId = options.cacheId;
    this.onWordChanged = options.onWordChanged;
    this.index = this.clamp(options.currentIndex ?? 0);
  }

  get currentIndex(): number {
    return this.index;
  }

  hasWords(): boolean {
    return this.words.length > 0;
  }

  currentWord(): Word | null {
    return this.words[this.index] ?? null;
  }

  isAtEnd(): boolean {
    return this.index + 1 >= this.words.length;
  }

  /**
   * Move to the next word. Returns false, without notifying, at the last word.
   */
  advance(): boolean {
    if (this.isAtEnd()) return false;
    this.index += 1;
    this.onWordChanged();
    return true;
  }

  skipForward(amount: number): void {
    this.moveTo(this.index + amount);
  }

  skipBackward(amount: number): void {
    this.moveTo(this.index - amount);
  }

  restart(): void {
    this.moveTo(0);
  }

  /**
   * Fraction of the sequence already passed: 0 at the first word, 1 at the last.
   */
  progress(): number {
    if (this.words.length <= 1) return 0;
    return this.index / (this.words.length - 1);
  }

  /**
   * Returns 1-indexed current position and total for display.
   */
  position(): { current: number; total: number } {
    return {
      current: this.hasWords() ? this.index + 1 : 0,
      total: this.words.length,
    };
  }

  private moveTo(target: number): void {
    if (!this.hasWords()) return;
    this.index = this.clamp(target);
    this.onWordChanged();
  }

  private clamp(index: number): number {
    if (Number.isNaN(index)) return 0;
    return Math.max(0, Math.min(Math.trunc(index), this.words.length - 1));
  }
}
