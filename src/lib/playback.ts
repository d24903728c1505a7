import type { ReaderCommand, ReadingState, ReadingTimer } from '../types';
import type { ReaderBus } from './events';
import { createLogger } from './logger';
import { displayDuration } from './rsvp';
import type { ReaderSettings } from './settings';
import type { TabRegistry } from './tabs';
import type { WordsManager } from './wordsManager';

const logger = createLogger('playback');

export interface ReadingStateMachineOptions {
  bus: ReaderBus;
  registry: TabRegistry;
  settings: Pick<ReaderSettings, 'wpmStep' | 'skipAmount'>;
}

/**
 * Idle / playing / paused state of the active tab, plus its one-shot word timer.
 *
 * The timer is only ever reset by the wordChanged reaction. A speed change
 * does not touch it: the word on screen finishes at the old speed and the new
 * speed applies from the next word.
 */
export class ReadingStateMachine {
  private readonly bus: ReaderBus;
  private readonly registry: TabRegistry;
  private readonly settings: ReadingStateMachineOptions['settings'];
  private current: ReadingState = 'idle';
  private timerState: ReadingTimer | null = null;

  constructor(options: ReadingStateMachineOptions) {
    this.bus = options.bus;
    this.registry = options.registry;
    this.settings = options.settings;

    this.bus.on('wordChanged', ({ tabId }) => {
      if (tabId === this.registry.activeTabId) this.resetTimer();
    });
    this.bus.on('tabSelected', () => {
      if (!this.activeContent()?.hasWords()) this.stop();
    });

    this.resetTimer();
  }

  get state(): ReadingState {
    return this.current;
  }

  get timer(): Readonly<ReadingTimer> | null {
    return this.timerState;
  }


  dispatch(command: ReaderCommand): void {
    switch (command) {
      case 'play':
        this.play();
        break;
      case 'pause':
        this.pause();
        break;
      case 'togglePlayPause':
        if (this.current === 'playing') this.pause();
        else this.play();
        break;
      case 'stop':
        this.stop();
        break;
      case 'skipForward':
        this.activeContent()?.skipForward(this.settings.skipAmount);
        break;
      case 'skipBackward':
        this.activeContent()?.skipBackward(this.settings.skipAmount);
        break;
      case 'restart':
        this.activeContent()?.restart();
        break;
      case 'increaseSpeed':
        this.adjustWpm(this.settings.wpmStep);
        break;
      case 'decreaseSpeed':
        this.adjustWpm(-this.settings.wpmStep);
        break;
    }
  }

  /**
   * Advance the timer by the elapsed frame time. At most one word advance
   * happens per tick; leftover overshoot is dropped.
   */
  tick(deltaMs: number): void {
    if (this.current !== 'playing' || !this.timerState) return;

    this.timerState.remainingMs -= deltaMs;
    if (this.timerState.remainingMs > 0) return;

    const content = this.activeContent();
    if (!content?.advance()) {
      logger.debug('Reached the end of the text');
      this.stop();
    }
  }

  private play(): void {
    if (this.current === 'playing') return;
    const tabId = this.registry.activeTabId;
    if (!this.activeContent()?.hasWords()) return;

    if (this.current === 'paused' && this.timerState) {
      this.transition('playing');
      return;
    }
    this.transition('playing');
    this.bus.emit('wordChanged', { tabId });
  }

  private pause(): void {
    if (this.current === 'playing') this.transition('paused');
  }

  private stop(): void {
    if (this.current === 'idle') return;
    this.timerState = null;
    this.transition('idle');
  }

  private adjustWpm(delta: number): void {
    const tab = this.registry.activeTab();
    if (!tab?.content) return;
    this.registry.setWpm(tab.id, tab.wpm + delta);
  }

  // Restart the timer from the active word's full display duration
  private resetTimer(): void {
    const tab = this.registry.activeTab();
    const word = tab?.content?.currentWord();
    if (!tab || !word) {
      this.timerState = null;
      return;
    }
    const durationMs = displayDuration(word, tab.wpm);
    this.timerState = { durationMs, remainingMs: durationMs };
  }

  private activeContent(): WordsManager | null {
    return this.registry.activeTab()?.content ?? null;
  }

  private transition(next: ReadingState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    logger.debug(`${previous} -> ${next}`);
    this.bus.emit('stateChanged', { state: next, previous });
  }
}
