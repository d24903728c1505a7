import { z } from 'zod';
import type { SavedSession, SavedTab, Word, WordSequence } from '../types';
import { createLogger } from './logger';

const logger = createLogger('persistence');

/**
 * Storage capability the reading core depends on. Backends are chosen at
 * startup (see createStorage) and every method may reject; callers treat
 * failures as non-fatal.
 */
export interface PersistenceGateway {
  saveTabMetadata(session: SavedSession): Promise<void>;
  // Resolves to an empty session when nothing has been saved yet
  loadTabMetadata(): Promise<SavedSession>;
  generateCacheId(): string;
  writeWordCache(cacheId: string, words: WordSequence): Promise<void>;
  loadWordCache(cacheId: string): Promise<Word[]>;
  deleteWordCache(cacheId: string): Promise<void>;
  listWordCacheIds(): Promise<string[]>;
}

const savedTabSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  fontName: z.string(),
  fontSize: z.number().positive(),
  wpm: z.number().int().positive(),
  sourcePath: z.string().nullable().default(null),
  position: z.number().int().min(0),
  cacheId: z.string().min(1),
});

// Tabs are checked one by one so a single bad record does not cost the rest
const savedSessionSchema = z.object({
  tabs: z.array(z.unknown()),
  activeId: z.string().nullable().default(null),
});

const wordCacheSchema = z.array(
  z.object({
    text: z.string(),
    isParagraphEnd: z.boolean().default(false),
  })
);

export function emptySession(): SavedSession {
  return { tabs: [], activeId: null };
}

/**
 * Validate decoded tab metadata. Throws when the session itself is malformed;
 * tab records that fail validation are dropped and logged.
 */
export function parseSavedSession(raw: unknown): SavedSession {
  const session = savedSessionSchema.parse(raw);
  const tabs: SavedTab[] = [];
  session.tabs.forEach((entry, index) => {
    const result = savedTabSchema.safeParse(entry);
    if (result.success) {
      tabs.push(result.data);
    } else {
      logger.warn(`Dropping saved tab ${index}: ${result.error.issues.map(issue => issue.message).join('; ')}`);
    }
  });
  return { tabs, activeId: session.activeId };
}

/**
 * Validate a decoded word cache. Throws on anything that is not a word list.
 */
export function parseWordCache(raw: unknown): Word[] {
  return wordCacheSchema.parse(raw);
}

export function serializeWordCache(words: WordSequence): string {
  return JSON.stringify(words.map(({ text, isParagraphEnd }) => ({ text, isParagraphEnd })));
}

// Cache ids double as file names and storage keys
const CACHE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function assertCacheId(cacheId: string): void {
  if (!CACHE_ID_PATTERN.test(cacheId)) {
    throw new Error(`Invalid cache id: ${cacheId}`);
  }
}

/**
 * Generate a unique ID.
 */
export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}
