import { describe, it, expect, vi } from 'vitest';
import type { SavedTab } from '../types';
import { createReaderBus } from './events';
import { FontCatalog } from './fonts';
import { SessionPersistence } from './session';
import { DEFAULT_SETTINGS } from './settings';
import { BrowserStorage } from './storage';
import { TabRegistry } from './tabs';
import { createWord, segmentText } from './tokenizer';

function setup(storage = new BrowserStorage(localStorage)) {
  const registry = new TabRegistry({
    bus: createReaderBus(),
    persistence: storage,
    fonts: new FontCatalog(DEFAULT_SETTINGS.fonts),
    settings: DEFAULT_SETTINGS,
  });
  const session = new SessionPersistence({ registry, persistence: storage, saveIntervalMs: 5000 });
  return { storage, registry, session };
}

function savedTab(overrides: Partial<SavedTab> = {}): SavedTab {
  return {
    id: 'tab-1',
    name: 'Saved',
    fontName: 'UbuntuMono-Regular.ttf',
    fontSize: 40,
    wpm: 450,
    sourcePath: null,
    position: 1,
    cacheId: 'cache-1',
    ...overrides,
  };
}

describe('SessionPersistence', () => {
  describe('collect', () => {
    it('describes every content tab', async () => {
      const { registry, session } = setup();
      const tab = await registry.createTab({ source: { kind: 'text', text: 'a b c' }, name: 'Notes', wpm: 400 });
      tab?.content?.skipForward(2);

      expect(session.collect()).toEqual({
        tabs: [
          {
            id: tab?.id,
            name: 'Notes',
            fontName: 'JetBrainsMono-Regular.ttf',
            fontSize: 48,
            wpm: 400,
            sourcePath: null,
            position: 2,
            cacheId: tab?.content?.cacheId,
          },
        ],
        activeId: tab?.id,
      });
    });

    it('saves no active tab while the home tab is selected', async () => {
      const { registry, session } = setup();
      const [home] = registry.tabs();
      await registry.createTab({ source: { kind: 'text', text: 'a' } });
      registry.selectTab(home.id);

      expect(session.collect().activeId).toBeNull();
    });
  });

  describe('restore', () => {
    it('brings back the saved tabs, positions and selection', async () => {
      const first = setup();
      const a = await first.registry.createTab({ source: { kind: 'text', text: 'one two three' }, name: 'A' });
      a?.content?.skipForward(1);
      await first.registry.createTab({
        source: { kind: 'text', text: 'four five' },
        name: 'B',
        font: { name: 'UbuntuMono-Regular.ttf', size: 36 },
        wpm: 500,
      });
      first.registry.selectTab(a?.id ?? '');
      await first.session.save();

      const second = setup(first.storage);
      const restored = await second.session.restore();

      expect(restored.map(tab => tab.name)).toEqual(['A', 'B']);
      expect(restored[0].content?.currentIndex).toBe(1);
      expect(restored[1].font).toEqual({ name: 'UbuntuMono-Regular.ttf', size: 36 });
      expect(restored[1].wpm).toBe(500);
      expect(second.registry.activeTab()?.name).toBe('A');
      expect(second.registry.tabs().map(tab => tab.name)).toEqual(['Home', 'A', 'B']);
    });

    it('deletes word caches that no saved tab refers to', async () => {
      const { storage, session } = setup();
      await storage.writeWordCache('cache-1', segmentText('kept words'));
      await storage.writeWordCache('orphan-1', segmentText('stale'));
      await storage.saveTabMetadata({ tabs: [savedTab()], activeId: null });

      await session.restore();

      expect(await storage.listWordCacheIds()).toEqual(['cache-1']);
    });

    it('keeps the caches of tabs already open', async () => {
      const { storage, registry, session } = setup();
      const live = await registry.createTab({ source: { kind: 'text', text: 'open' } });

      await session.restore();

      expect(await storage.listWordCacheIds()).toEqual([live?.content?.cacheId]);
    });

    it('restores nothing and deletes nothing when the metadata cannot be read', async () => {
      const { storage, registry, session } = setup();
      await storage.writeWordCache('cache-1', segmentText('words'));
      localStorage.setItem('glance_tabs', '{ broken');

      expect(await session.restore()).toEqual([]);
      expect(registry.contentTabs()).toEqual([]);
      expect(await storage.listWordCacheIds()).toEqual(['cache-1']);
    });

    it('restores the valid tabs when one saved record is invalid', async () => {
      const { storage, session } = setup();
      await storage.writeWordCache('cache-1', segmentText('first words'));
      await storage.writeWordCache('cache-2', segmentText('second words'));
      localStorage.setItem(
        'glance_tabs',
        JSON.stringify({
          tabs: [savedTab(), savedTab({ id: 'tab-2', cacheId: 'cache-2', fontSize: -1 })],
          activeId: 'tab-1',
        })
      );

      const restored = await session.restore();

      expect(restored.map(tab => tab.name)).toEqual(['Saved']);
      expect(restored[0].font).toEqual({ name: 'UbuntuMono-Regular.ttf', size: 40 });
    });

    it('skips tabs whose word cache is missing', async () => {
      const { storage, session } = setup();
      await storage.writeWordCache('cache-2', [createWord('present')]);
      await storage.saveTabMetadata({
        tabs: [savedTab(), savedTab({ id: 'tab-2', name: 'Second', cacheId: 'cache-2', position: 0 })],
        activeId: 'tab-1',
      });

      const restored = await session.restore();

      expect(restored.map(tab => tab.name)).toEqual(['Second']);
    });
  });

  describe('save', () => {
    it('does not throw when the backend fails', async () => {
      const { storage, session } = setup();
      vi.spyOn(storage, 'saveTabMetadata').mockRejectedValue(new Error('disk full'));

      await expect(session.save()).resolves.toBeUndefined();
    });
  });

  describe('tick', () => {
    it('saves once per interval of elapsed time', async () => {
      const { storage, session } = setup();
      const save = vi.spyOn(storage, 'saveTabMetadata');

      session.tick(4999);
      expect(save).not.toHaveBeenCalled();

      session.tick(1);
      await session.flush();
      expect(save).toHaveBeenCalledTimes(1);

      session.tick(2500);
      session.tick(2500);
      await session.flush();
      expect(save).toHaveBeenCalledTimes(2);
    });

    it('does not start a second save while one is running', async () => {
      const { storage, session } = setup();
      const save = vi.spyOn(storage, 'saveTabMetadata');

      session.tick(5000);
      session.tick(5000);
      await session.flush();

      expect(save).toHaveBeenCalledTimes(1);
    });
  });
});
