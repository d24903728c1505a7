import type { FontSettings, ReaderCommand, ReadingState, ReadingTimer, TabId } from '../types';
import { DisplayModel, type DisplayState } from './display';
import { createReaderBus, type ReaderBus, type ReaderEvents } from './events';
import { FontCatalog } from './fonts';
import { FrameLoop } from './frameLoop';
import { createLogger, setLogLevel } from './logger';
import type { PersistenceGateway } from './persistence';
import { ReadingStateMachine } from './playback';
import { remainingTime } from './rsvp';
import { SessionPersistence } from './session';
import { resolveSettings, type ReaderSettings } from './settings';
import { createStorage } from './storage';
import { TabRegistry, type PendingTab, type SourceParserFn, type Tab } from './tabs';

const logger = createLogger('reader');

const EVENT_KINDS = [
  'wordChanged',
  'fontChanged',
  'tabCreated',
  'tabClosed',
  'tabSelected',
  'stateChanged',
  'wpmChanged',
] as const satisfies readonly (keyof ReaderEvents)[];

export interface TabSummary {
  id: TabId;
  name: string;
  isActive: boolean;
  hasContent: boolean;
  wpm: number;
  progress: number;
}

export interface ReaderSnapshot {
  state: ReadingState;
  activeTabId: TabId | null;
  tabs: TabSummary[];
  display: DisplayState;
  wpm: number | null;
  position: { current: number; total: number } | null;
  progress: number;
  // Reading time left in the active tab at its current speed
  remainingMs: number;
}

export interface ReaderOptions {
  settings?: Partial<ReaderSettings>;
  persistence?: PersistenceGateway;
  parse?: SourceParserFn;
  now?: () => number;
}

/**
 * The reading engine: tabs, playback, display and persistence wired to one
 * notification bus. Hosts drive it with commands and frame ticks and render
 * from getSnapshot().
 */
export class Reader {
  readonly settings: ReaderSettings;
  readonly bus: ReaderBus;
  readonly registry: TabRegistry;
  readonly playback: ReadingStateMachine;
  readonly display: DisplayModel;
  readonly session: SessionPersistence;
  private readonly loop: FrameLoop;
  private readonly listeners = new Set<() => void>();
  private snapshot: ReaderSnapshot | null = null;

  constructor(options: ReaderOptions = {}) {
    this.settings = resolveSettings(options.settings ?? {});
    setLogLevel(this.settings.logLevel);

    const persistence = options.persistence ?? createStorage(this.settings);
    this.bus = createReaderBus();
    this.registry = new TabRegistry({
      bus: this.bus,
      persistence,
      fonts: new FontCatalog(this.settings.fonts, {
        minSize: this.settings.minFontSize,
        maxSize: this.settings.maxFontSize,
        defaultSize: this.settings.defaultFontSize,
      }),
      settings: this.settings,
      parse: options.parse,
    });
    this.playback = new ReadingStateMachine({
      bus: this.bus,
      registry: this.registry,
      settings: this.settings,
    });
    this.display = new DisplayModel(this.bus, this.registry);
    this.session = new SessionPersistence({
      registry: this.registry,
      persistence,
      saveIntervalMs: this.settings.saveIntervalMs,
    });
    this.loop = new FrameLoop({ onFrame: deltaMs => this.tick(deltaMs), now: options.now });

    for (const kind of EVENT_KINDS) {
      this.bus.on(kind, () => this.invalidate());
    }
  }

  get state(): ReadingState {
    return this.playback.state;
  }

  get timer(): Readonly<ReadingTimer> | null {
    return this.playback.timer;
  }

  dispatch(command: ReaderCommand): void {
    this.playback.dispatch(command);
  }

  tick(deltaMs: number): void {
    this.playback.tick(deltaMs);
    this.session.tick(deltaMs);
  }

  start(): void {
    this.loop.start();
  }

  stop(): void {
    this.loop.stop();
  }

  /**
   * Stop the frame loop and write the final tab state.
   */
  async shutdown(): Promise<void> {
    this.loop.stop();
    await this.session.flush();
    await this.session.save();
    logger.info('Reader state saved');
  }

  restore(): Promise<Tab[]> {
    return this.session.restore();
  }

  save(): Promise<void> {
    return this.session.save();
  }

  openText(text: string, name?: string): PendingTab {
    return this.registry.beginCreateTab({ source: { kind: 'text', text }, name });
  }

  openFile(path: string): PendingTab {
    return this.registry.beginCreateTab({ source: { kind: 'file', path } });
  }

  selectTab(id: TabId): boolean {
    return this.registry.selectTab(id);
  }

  closeTab(id: TabId): Promise<boolean> {
    return this.registry.closeTab(id);
  }

  setFont(id: TabId, font: Partial<FontSettings>): boolean {
    return this.registry.setFont(id, font);
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Returns the same object until the next notification.
   */
  getSnapshot = (): ReaderSnapshot => {
    if (!this.snapshot) {
      this.snapshot = this.buildSnapshot();
    }
    return this.snapshot;
  };

  private invalidate(): void {
    this.snapshot = null;
    for (const listener of this.listeners) {
      listener();
    }
  }

  private buildSnapshot(): ReaderSnapshot {
    const active = this.registry.activeTab();
    const content = active?.content ?? null;
    return {
      state: this.playback.state,
      activeTabId: active?.id ?? null,
      tabs: this.registry.tabs().map(tab => ({
        id: tab.id,
        name: tab.name,
        isActive: tab.id === active?.id,
        hasContent: tab.content !== null,
        wpm: tab.wpm,
        progress: tab.content?.progress() ?? 0,
      })),
      display: this.display.state,
      wpm: content && active ? active.wpm : null,
      position: content?.position() ?? null,
      progress: content?.progress() ?? 0,
      remainingMs: content && active ? remainingTime(content.words, content.currentIndex, active.wpm) : 0,
    };
  }
}
