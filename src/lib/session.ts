import type { SavedSession, SavedTab, TabId } from '../types';
import { createLogger } from './logger';
import type { PersistenceGateway } from './persistence';
import type { Tab, TabRegistry } from './tabs';

const logger = createLogger('session');

export interface SessionPersistenceOptions {
  registry: TabRegistry;
  persistence: PersistenceGateway;
  saveIntervalMs: number;
}

/**
 * Saves and restores the open tabs through the persistence gateway.
 * Every storage failure is logged and skipped; none escapes to the caller.
 */
export class SessionPersistence {
  private readonly registry: TabRegistry;
  private readonly persistence: PersistenceGateway;
  private readonly saveIntervalMs: number;
  private sinceLastSave = 0;
  private inFlight: Promise<void> | null = null;

  constructor(options: SessionPersistenceOptions) {
    this.registry = options.registry;
    this.persistence = options.persistence;
    this.saveIntervalMs = options.saveIntervalMs;
  }

  /**
   * Recreate the saved tabs through the registry's creation entry point,
   * after deleting word caches that no saved tab refers to.
   */
  async restore(): Promise<Tab[]> {
    let session: SavedSession;
    try {
      session = await this.persistence.loadTabMetadata();
    } catch (err) {
      logger.warn('Failed to load saved tabs', err);
      return [];
    }

    await this.deleteOrphanCaches(session);

    const restored: Tab[] = [];
    const idMap = new Map<TabId, TabId>();
    for (const saved of session.tabs) {
      const tab = await this.restoreTab(saved);
      if (tab) {
        restored.push(tab);
        idMap.set(saved.id, tab.id);
      }
    }

    const activeId = session.activeId === null ? undefined : idMap.get(session.activeId);
    if (activeId !== undefined) {
      this.registry.selectTab(activeId);
    }

    logger.info(`Restored ${restored.length} of ${session.tabs.length} tabs`);
    return restored;
  }

  collect(): SavedSession {
    const tabs: SavedTab[] = this.registry.contentTabs().flatMap(tab =>
      tab.content
        ? [{
            id: tab.id,
            name: tab.name,
            fontName: tab.font.name,
            fontSize: tab.font.size,
            wpm: tab.wpm,
            sourcePath: tab.sourcePath,
            position: tab.content.currentIndex,
            cacheId: tab.content.cacheId,
          }]
        : []
    );
    const active = this.registry.activeTab();
    return { tabs, activeId: active?.content ? active.id : null };
  }

  async save(): Promise<void> {
    const session = this.collect();
    try {
      await this.persistence.saveTabMetadata(session);
      logger.debug(`Saved ${session.tabs.length} tabs`);
    } catch (err) {
      logger.warn('Failed to save tabs', err);
    }
  }

  /**
   * Count elapsed time and start a save once per interval. A save already
   * running is not started twice.
   */
  tick(deltaMs: number): void {
    this.sinceLastSave += deltaMs;
    if (this.sinceLastSave < this.saveIntervalMs) return;
    this.sinceLastSave = 0;
    if (this.inFlight) return;
    this.inFlight = this.save().finally(() => {
      this.inFlight = null;
    });
  }

  /**
   * Wait for a save started by tick, if one is running.
   */
  async flush(): Promise<void> {
    if (this.inFlight) await this.inFlight;
  }

  private async restoreTab(saved: SavedTab): Promise<Tab | null> {
    try {
      const words = await this.persistence.loadWordCache(saved.cacheId);
      return await this.registry.createTab({
        id: saved.id,
        name: saved.name,
        font: { name: saved.fontName, size: saved.fontSize },
        wpm: saved.wpm,
        position: saved.position,
        active: false,
        source: { kind: 'cached', cacheId: saved.cacheId, words, path: saved.sourcePath },
      });
    } catch (err) {
      logger.warn(`Skipping tab '${saved.name}': word cache unavailable`, err);
      return null;
    }
  }

  private async deleteOrphanCaches(session: SavedSession): Promise<void> {
    let cacheIds: string[];
    try {
      cacheIds = await this.persistence.listWordCacheIds();
    } catch (err) {
      logger.warn('Failed to list word caches', err);
      return;
    }

    const referenced = new Set(session.tabs.map(tab => tab.cacheId));
    for (const tab of this.registry.contentTabs()) {
      if (tab.content) referenced.add(tab.content.cacheId);
    }
    for (const cacheId of cacheIds) {
      if (referenced.has(cacheId)) continue;
      try {
        await this.persistence.deleteWordCache(cacheId);
        logger.info(`Deleted orphaned word cache ${cacheId}`);
      } catch (err) {
        logger.warn(`Failed to delete orphaned word cache ${cacheId}`, err);
      }
    }
  }
}
