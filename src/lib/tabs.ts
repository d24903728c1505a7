import type { FontSettings, ParsedSource, TabId, TextSource, Word } from '../types';
import type { ReaderBus } from './events';
import { FontCatalog } from './fonts';
import { createLogger } from './logger';
import { generateId, type PersistenceGateway } from './persistence';
import type { ReaderSettings } from './settings';
import { fileStem, parseSource, type ParseSourceOptions } from './sources';
import { WordsManager } from './wordsManager';

const logger = createLogger('tabs');

export const HOME_TAB_NAME = 'Home';

export interface Tab {
  readonly id: TabId;
  readonly name: string;
  readonly font: Readonly<FontSettings>;
  readonly wpm: number;
  readonly sourcePath: string | null;
  // Absent for non-content tabs such as the home tab
  readonly content: WordsManager | null;
}

type TabRecord = { -readonly [K in keyof Tab]: Tab[K] };

export type TabSource =
  | TextSource
  | { kind: 'cached'; cacheId: string; words: Word[]; path?: string | null }
  | { kind: 'home' };

export interface TabCreateRequest {
  source: TabSource;
  id?: TabId;
  name?: string;
  font?: Partial<FontSettings>;
  wpm?: number;
  position?: number;
  // Defaults to true
  active?: boolean;
}

export interface PendingTab {
  readonly id: TabId;
  // Resolves to null when the creation was cancelled before it completed
  readonly promise: Promise<Tab | null>;
  cancel(): void;
}

export type SourceParserFn = (source: TextSource, options: ParseSourceOptions) => Promise<ParsedSource>;

/**
 * Display and adjacency order of the live tabs. Only ever changed in reaction
 * to tab creation and removal.
 */
export class TabOrder {
  private order: TabId[] = [];

  constructor(bus: ReaderBus) {
    bus.on('tabCreated', ({ tabId }) => {
      this.order.push(tabId);
    });
    bus.on('tabClosed', ({ tabId }) => {
      this.order = this.order.filter(id => id !== tabId);
    });
  }

  ids(): readonly TabId[] {
    return this.order;
  }

  /**
   * Returns the tab after `target`, else the one before it, never `target` itself.
   */
  adjacent(target: TabId): TabId | null {
    const index = this.order.indexOf(target);
    if (index === -1) return null;
    return this.order[index + 1] ?? this.order[index - 1] ?? null;
  }
}

export interface TabRegistryOptions {
  bus: ReaderBus;
  persistence: PersistenceGateway;
  fonts: FontCatalog;
  settings: Pick<ReaderSettings, 'defaultWpm' | 'minWpm' | 'maxWpm' | 'defaultFontSize'>;
  parse?: SourceParserFn;
}

/**
 * Owns every tab, keyed by id, and the single active-tab selector.
 *
 * All tabs, including the home tab and restored tabs, are built by
 * beginCreateTab. Nothing else constructs a tab.
 */
export class TabRegistry {
  readonly order: TabOrder;
  private readonly bus: ReaderBus;
  private readonly persistence: PersistenceGateway;
  private readonly fonts: FontCatalog;
  private readonly settings: TabRegistryOptions['settings'];
  private readonly parse: SourceParserFn;
  private readonly records = new Map<TabId, TabRecord>();
  private readonly pending = new Map<TabId, AbortController>();
  // Word cache writes still running, so a close can wait before deleting
  private readonly cacheWrites = new Map<TabId, Promise<void>>();
  private textTabCount = 0;
  private activeId: TabId | null = null;

  constructor(options: TabRegistryOptions) {
    this.bus = options.bus;
    this.persistence = options.persistence;
    this.fonts = options.fonts;
    this.settings = options.settings;
    this.parse = options.parse ?? parseSource;
    this.order = new TabOrder(this.bus);

    this.bus.on('fontChanged', ({ tabId, font }) => {
      const record = this.records.get(tabId);
      if (record) record.font = { ...font };
    });

    this.beginCreateTab({ source: { kind: 'home' }, name: HOME_TAB_NAME });
  }

  get(id: TabId): Tab | null {
    return this.records.get(id) ?? null;
  }

  has(id: TabId): boolean {
    return this.records.has(id);
  }

  tabs(): Tab[] {
    return this.order.ids().flatMap(id => this.records.get(id) ?? []);
  }

  contentTabs(): Tab[] {
    return this.tabs().filter(tab => tab.content !== null);
  }

  get activeTabId(): TabId | null {
    return this.activeId;
  }

  activeTab(): Tab | null {
    return this.activeId === null ? null : this.get(this.activeId);
  }

  adjacentTab(id: TabId): TabId | null {
    return this.order.adjacent(id);
  }

  isPending(id: TabId): boolean {
    return this.pending.has(id);
  }

  /**
   * The single tab creation entry point.
   *
   * Text and file sources are parsed in the background; the tab id is
   * reserved up front so the creation can be cancelled through closeTab.
   * Home and cached sources need no parsing and are inserted immediately.
   */
  beginCreateTab(request: TabCreateRequest): PendingTab {
    const id = this.reserveId(request.id);
    const { source } = request;

    if (source.kind === 'home' || source.kind === 'cached') {
      const tab = this.insertTab(id, request, source.kind === 'cached' ? source : null);
      return { id, promise: Promise.resolve(tab), cancel: () => undefined };
    }

    const controller = new AbortController();
    this.pending.set(id, controller);
    const promise = this.completeCreation(id, request, source, controller.signal);
    return { id, promise, cancel: () => this.cancelPending(id) };
  }

  createTab(request: TabCreateRequest): Promise<Tab | null> {
    return this.beginCreateTab(request).promise;
  }

  cancelPending(id: TabId): boolean {
    const controller = this.pending.get(id);
    if (!controller) return false;
    this.pending.delete(id);
    controller.abort();
    logger.debug(`Cancelled pending tab ${id}`);
    return true;
  }

  /**
   * Make a tab the active one. Announces the tab's font and current word so
   * the display and timer follow the switch.
   */
  selectTab(id: TabId): boolean {
    const record = this.records.get(id);
    if (!record) return false;
    if (this.activeId === id) return true;

    const previousId = this.activeId;
    this.activeId = id;
    this.bus.emit('tabSelected', { tabId: id, previousId });
    if (record.content) {
      this.bus.emit('fontChanged', { tabId: id, font: { ...record.font } });
    }
    this.bus.emit('wordChanged', { tabId: id });
    return true;
  }

  /**
   * Close a content tab, or cancel a creation still in flight. The tab's word
   * cache is deleted; if it was active, the next tab (else the previous) takes over.
   */
  async closeTab(id: TabId): Promise<boolean> {
    if (this.cancelPending(id)) return true;

    const record = this.records.get(id);
    if (!record?.content) return false;

    const wasActive = this.activeId === id;
    const adjacent = this.order.adjacent(id);
    this.records.delete(id);
    this.bus.emit('tabClosed', { tabId: id });

    if (wasActive) {
      if (adjacent !== null) {
        this.selectTab(adjacent);
      } else {
        this.activeId = null;
        this.bus.emit('tabSelected', { tabId: null, previousId: id });
        this.bus.emit('wordChanged', { tabId: null });
      }
    }
    logger.info(`Closed tab '${record.name}'`);

    const { cacheId } = record.content;
    try {
      await this.cacheWrites.get(id);
      await this.persistence.deleteWordCache(cacheId);
    } catch (err) {
      logger.warn(`Failed to delete word cache ${cacheId}`, err);
    }
    return true;
  }

  setFont(id: TabId, font: Partial<FontSettings>): boolean {
    const record = this.records.get(id);
    if (!record?.content) return false;
    const next = this.fonts.settings(font.name ?? record.font.name, font.size ?? record.font.size);
    this.bus.emit('fontChanged', { tabId: id, font: next });
    return true;
  }

  setWpm(id: TabId, wpm: number): number | null {
    const record = this.records.get(id);
    if (!record) return null;
    const clamped = this.clampWpm(wpm);
    if (clamped !== record.wpm) {
      record.wpm = clamped;
      this.bus.emit('wpmChanged', { tabId: id, wpm: clamped });
    }
    return clamped;
  }

  clampWpm(wpm: number): number {
    const { minWpm, maxWpm } = this.settings;
    if (!Number.isFinite(wpm)) return this.settings.defaultWpm;
    return Math.max(minWpm, Math.min(maxWpm, Math.round(wpm)));
  }

  private reserveId(requested: TabId | undefined): TabId {
    if (requested !== undefined && !this.records.has(requested) && !this.pending.has(requested)) {
      return requested;
    }
    if (requested !== undefined) {
      logger.warn(`Tab id ${requested} already in use, assigning a new one`);
    }
    let id = generateId();
    while (this.records.has(id) || this.pending.has(id)) {
      id = generateId();
    }
    return id;
  }

  private async completeCreation(
    id: TabId,
    request: TabCreateRequest,
    source: TextSource,
    signal: AbortSignal
  ): Promise<Tab | null> {
    let parsed: ParsedSource;
    try {
      parsed = await this.parse(source, { signal });
    } catch (err) {
      if (signal.aborted) return null;
      this.pending.delete(id);
      logger.warn('Failed to open source', err);
      throw err;
    }
    if (signal.aborted) return null;
    this.pending.delete(id);

    const cacheId = this.persistence.generateCacheId();
    const name =
      request.name ?? parsed.title ?? (source.kind === 'file' ? fileStem(source.path) : this.nextTextName());
    const write = this.writeCache(id, cacheId, parsed.words, name);
    const tab = this.insertTab(id, { ...request, name }, {
      cacheId,
      words: parsed.words,
      path: source.kind === 'file' ? source.path : null,
    });

    await write;
    return tab;
  }

  private writeCache(id: TabId, cacheId: string, words: Word[], name: string): Promise<void> {
    const write = this.persistence
      .writeWordCache(cacheId, words)
      .catch((err: unknown) => {
        logger.warn(`Failed to write word cache for '${name}'`, err);
      })
      .finally(() => {
        this.cacheWrites.delete(id);
      });
    this.cacheWrites.set(id, write);
    return write;
  }

  // Numbers only go up, and skip names already taken by restored tabs
  private nextTextName(): string {
    let name: string;
    do {
      this.textTabCount += 1;
      name = `Text ${this.textTabCount}`;
    } while (this.tabs().some(tab => tab.name === name));
    return name;
  }

  private insertTab(
    id: TabId,
    request: TabCreateRequest,
    content: { cacheId: string; words: Word[]; path?: string | null } | null
  ): Tab {
    const record: TabRecord = {
      id,
      name: request.name ?? (content ? this.nextTextName() : HOME_TAB_NAME),
      font: this.fonts.settings(request.font?.name, request.font?.size ?? this.settings.defaultFontSize),
      wpm: this.clampWpm(request.wpm ?? this.settings.defaultWpm),
      sourcePath: content?.path ?? null,
      content: content
        ? new WordsManager(content.words, {
            cacheId: content.cacheId,
            currentIndex: request.position,
            onWordChanged: () => this.bus.emit('wordChanged', { tabId: id }),
          })
        : null,
    };

    this.records.set(id, record);
    this.bus.emit('tabCreated', { tabId: id });
    logger.info(`Created tab '${record.name}'`, { words: content?.words.length ?? 0 });

    if (request.active ?? true) {
      this.selectTab(id);
    }
    return record;
  }
}
