import type { FixationSplit, FontSettings, TabId } from '../types';
import type { ReaderBus } from './events';
import { focusHalfWidth } from './fonts';
import { splitAtFixation } from './rsvp';
import type { TabRegistry } from './tabs';

export interface DisplayGeometry {
  font: FontSettings;
  // Distance from the focus letter's center to where the left and right text are anchored
  focusOffset: number;
}

export interface DisplayState {
  tabId: TabId | null;
  split: FixationSplit;
  geometry: DisplayGeometry | null;
}

const EMPTY_SPLIT: FixationSplit = { before: '', focus: '', after: '' };

/**
 * What the renderer draws: the current word split around its fixation
 * letter, and the font geometry that keeps that letter pixel-fixed.
 *
 * Text is recomputed only on wordChanged; geometry only on fontChanged, and
 * cleared when a tab without content is selected.
 */
export class DisplayModel {
  private readonly registry: TabRegistry;
  private current: DisplayState;

  constructor(bus: ReaderBus, registry: TabRegistry) {
    this.registry = registry;
    const active = registry.activeTab();
    this.current = {
      tabId: null,
      split: EMPTY_SPLIT,
      geometry: active?.content ? this.geometryFor(active.font) : null,
    };
    this.recomputeText();

    bus.on('wordChanged', ({ tabId }) => {
      if (tabId === this.registry.activeTabId) this.recomputeText();
    });
    bus.on('fontChanged', ({ tabId, font }) => {
      if (tabId === this.registry.activeTabId) this.recomputeGeometry(font);
    });
    bus.on('tabSelected', () => {
      if (!this.registry.activeTab()?.content) this.current = { ...this.current, geometry: null };
    });
  }

  get state(): DisplayState {
    return this.current;
  }

  private recomputeText(): void {
    const tab = this.registry.activeTab();
    const word = tab?.content?.currentWord();
    this.current = {
      ...this.current,
      tabId: tab?.id ?? null,
      split: word ? splitAtFixation(word.text) : EMPTY_SPLIT,
    };
  }

  private recomputeGeometry(font: FontSettings): void {
    this.current = { ...this.current, geometry: this.geometryFor(font) };
  }

  private geometryFor(font: Readonly<FontSettings>): DisplayGeometry {
    return { font: { ...font }, focusOffset: focusHalfWidth(font.size) };
  }
}
