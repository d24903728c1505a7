import type { FontSettings, ReadingState, TabId } from '../types';
import { EventBus } from './eventBus';

/**
 * Notifications exchanged between the registry, the state machine and the display.
 */
export interface ReaderEvents {
  // The current word changed (advance, skip, restart, tab switch); null when no tab is active
  wordChanged: { tabId: TabId | null };
  fontChanged: { tabId: TabId; font: FontSettings };
  tabCreated: { tabId: TabId };
  tabClosed: { tabId: TabId };
  tabSelected: { tabId: TabId | null; previousId: TabId | null };
  stateChanged: { state: ReadingState; previous: ReadingState };
  wpmChanged: { tabId: TabId; wpm: number };
}

export type ReaderBus = EventBus<ReaderEvents>;

export function createReaderBus(): ReaderBus {
  return new EventBus<ReaderEvents>();
}
