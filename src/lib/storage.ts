import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { SavedSession, StorageKind, Word, WordSequence } from '../types';
import type { ReaderSettings } from './settings';
import {
  assertCacheId,
  emptySession,
  generateId,
  parseSavedSession,
  parseWordCache,
  serializeWordCache,
  type PersistenceGateway,
} from './persistence';

const STORAGE_KEYS = {
  tabs: 'glance_tabs',
  wordsPrefix: 'glance_words_',
} as const;

const TABS_FILE = 'tabs.json';
const CACHE_DIR = 'cache';

/**
 * Persistence on top of the Web Storage API (localStorage in browsers).
 */
export class BrowserStorage implements PersistenceGateway {
  private readonly store: Storage;

  constructor(store: Storage = localStorage) {
    this.store = store;
  }

  async saveTabMetadata(session: SavedSession): Promise<void> {
    this.store.setItem(STORAGE_KEYS.tabs, JSON.stringify(session));
  }

  async loadTabMetadata(): Promise<SavedSession> {
    const data = this.store.getItem(STORAGE_KEYS.tabs);
    return data ? parseSavedSession(JSON.parse(data)) : emptySession();
  }

  generateCacheId(): string {
    return generateId();
  }

  async writeWordCache(cacheId: string, words: WordSequence): Promise<void> {
    assertCacheId(cacheId);
    this.store.setItem(STORAGE_KEYS.wordsPrefix + cacheId, serializeWordCache(words));
  }

  async loadWordCache(cacheId: string): Promise<Word[]> {
    assertCacheId(cacheId);
    const data = this.store.getItem(STORAGE_KEYS.wordsPrefix + cacheId);
    if (data === null) {
      throw new Error(`No word cache for ${cacheId}`);
    }
    return parseWordCache(JSON.parse(data));
  }

  async deleteWordCache(cacheId: string): Promise<void> {
    assertCacheId(cacheId);
    this.store.removeItem(STORAGE_KEYS.wordsPrefix + cacheId);
  }

  async listWordCacheIds(): Promise<string[]> {
    const ids: string[] = [];
    for (let i = 0; i < this.store.length; i++) {
      const key = this.store.key(i);
      if (key?.startsWith(STORAGE_KEYS.wordsPrefix)) {
        ids.push(key.slice(STORAGE_KEYS.wordsPrefix.length));
      }
    }
    return ids;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Persistence as JSON files: tab metadata in tabs.json, one file per word cache.
 */
export class FileSystemStorage implements PersistenceGateway {
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  private get tabsPath(): string {
    return path.join(this.dataDir, TABS_FILE);
  }

  private cachePath(cacheId: string): string {
    assertCacheId(cacheId);
    return path.join(this.dataDir, CACHE_DIR, `${cacheId}.json`);
  }

  async saveTabMetadata(session: SavedSession): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    await fs.writeFile(this.tabsPath, JSON.stringify(session, null, 2));
  }

  async loadTabMetadata(): Promise<SavedSession> {
    let data: string;
    try {
      data = await fs.readFile(this.tabsPath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return emptySession();
      throw err;
    }
    return parseSavedSession(JSON.parse(data));
  }

  generateCacheId(): string {
    return generateId();
  }

  async writeWordCache(cacheId: string, words: WordSequence): Promise<void> {
    const filePath = this.cachePath(cacheId);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, serializeWordCache(words));
  }

  async loadWordCache(cacheId: string): Promise<Word[]> {
    const data = await fs.readFile(this.cachePath(cacheId), 'utf-8');
    return parseWordCache(JSON.parse(data));
  }

  async deleteWordCache(cacheId: string): Promise<void> {
    await fs.rm(this.cachePath(cacheId), { force: true });
  }

  async listWordCacheIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(path.join(this.dataDir, CACHE_DIR));
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }
    return entries
      .filter(name => name.endsWith('.json'))
      .map(name => name.slice(0, -'.json'.length))
      .sort();
  }
}

/**
 * Pick the storage backend named by the settings.
 */
export function createStorage(
  settings: Pick<ReaderSettings, 'storage' | 'dataDir'>,
  store?: Storage
): PersistenceGateway {
  const kind: StorageKind = settings.storage;
  switch (kind) {
    case 'browser':
      return new BrowserStorage(store);
    case 'filesystem':
      return new FileSystemStorage(settings.dataDir);
  }
}
