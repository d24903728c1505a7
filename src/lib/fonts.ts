import type { FontSettings } from '../types';

// Approximate glyph width relative to font size for monospace-like fonts
export const CHAR_WIDTH_RATIO = 0.6;

export interface FontSizeRange {
  minSize: number;
  maxSize: number;
  // Used in place of sizes that are not finite numbers
  defaultSize: number;
}

export const DEFAULT_FONT_SIZES: FontSizeRange = { minSize: 12, maxSize: 160, defaultSize: 48 };

/**
 * Available font names. The first name (sorted) is the default.
 * Discovering font files is the host's job; this only resolves names.
 */
export class FontCatalog {
  private readonly names: string[];
  private readonly sizes: FontSizeRange;

  constructor(names: readonly string[], sizes: FontSizeRange = DEFAULT_FONT_SIZES) {
    const unique = Array.from(new Set(names.filter(name => name.length > 0))).sort();
    if (unique.length === 0) {
      throw new Error('FontCatalog needs at least one font');
    }
    this.names = unique;
    this.sizes = sizes;
  }

  get defaultFont(): string {
    return this.names[0];
  }

  list(): readonly string[] {
    return this.names;
  }

  has(name: string): boolean {
    return this.names.includes(name);
  }

  /**
   * Returns the requested font if available, otherwise the default.
   */
  resolve(name: string | undefined): string {
    return name !== undefined && this.has(name) ? name : this.defaultFont;
  }

  clampSize(size: number): number {
    const { minSize, maxSize, defaultSize } = this.sizes;
    if (!Number.isFinite(size)) return defaultSize;
    return Math.max(minSize, Math.min(maxSize, size));
  }

  settings(name: string | undefined, size: number): FontSettings {
    return { name: this.resolve(name), size: this.clampSize(size) };
  }
}

/**
 * Horizontal offset that makes the text either side of the focus letter meet its edges.
 */
export function focusHalfWidth(fontSize: number): number {
  return fontSize * CHAR_WIDTH_RATIO * 0.5;
}
