import { describe, it, expect } from 'vitest';
import type { ReadingState } from '../types';
import { DisplayModel } from './display';
import { createReaderBus } from './events';
import { FontCatalog } from './fonts';
import { ReadingStateMachine } from './playback';
import { DEFAULT_SETTINGS } from './settings';
import { BrowserStorage } from './storage';
import { TabRegistry } from './tabs';

// Durations at 300 wpm: one 200ms, two, 400ms, three. 600ms
const TEXT = 'one two, three.';

function setup() {
  const bus = createReaderBus();
  const registry = new TabRegistry({
    bus,
    persistence: new BrowserStorage(localStorage),
    fonts: new FontCatalog(DEFAULT_SETTINGS.fonts),
    settings: DEFAULT_SETTINGS,
  });
  const playback = new ReadingStateMachine({ bus, registry, settings: DEFAULT_SETTINGS });
  const display = new DisplayModel(bus, registry);
  const states: ReadingState[] = [];
  bus.on('stateChanged', ({ state }) => states.push(state));
  return { bus, registry, playback, display, states };
}

async function setupWithText(text = TEXT) {
  const context = setup();
  const tab = await context.registry.createTab({ source: { kind: 'text', text } });
  const content = tab?.content;
  if (!tab || !content) throw new Error('expected a content tab');
  return { ...context, tab, content };
}

describe('ReadingStateMachine', () => {
  it('starts idle with no timer on the home tab', () => {
    const { playback } = setup();
    expect(playback.state).toBe('idle');
    expect(playback.timer).toBeNull();
  });

  it('ignores play when the active tab has no words', () => {
    const { playback, states } = setup();
    playback.dispatch('play');
    expect(playback.state).toBe('idle');
    expect(states).toEqual([]);
  });

  it('arms the timer for the first word of a new tab', async () => {
    const { playback } = await setupWithText();
    expect(playback.timer).toEqual({ durationMs: 200, remainingMs: 200 });
  });

  describe('state transitions', () => {
    it('moves between idle, playing and paused', async () => {
      const { playback, states } = await setupWithText();

      playback.dispatch('play');
      playback.dispatch('pause');
      playback.dispatch('togglePlayPause');
      playback.dispatch('togglePlayPause');
      playback.dispatch('stop');

      expect(states).toEqual(['playing', 'paused', 'playing', 'paused', 'idle']);
      expect(playback.timer).toBeNull();
    });

    it('ignores pause unless playing and stop when idle', async () => {
      const { playback, states } = await setupWithText();

      playback.dispatch('pause');
      playback.dispatch('stop');

      expect(states).toEqual([]);
    });

    it('resumes a paused word with the time it had left', async () => {
      const { playback, content } = await setupWithText();
      playback.dispatch('play');
      playback.tick(150);
      playback.dispatch('pause');

      playback.tick(1000);
      expect(playback.timer?.remainingMs).toBe(50);

      playback.dispatch('play');
      expect(playback.state).toBe('playing');
      expect(playback.timer).toEqual({ durationMs: 200, remainingMs: 50 });
      expect(content.currentIndex).toBe(0);
    });

    it('restarts the word timer when playing from idle', async () => {
      const { playback } = await setupWithText();
      playback.dispatch('play');
      playback.tick(150);
      playback.dispatch('stop');

      playback.dispatch('play');

      expect(playback.timer).toEqual({ durationMs: 200, remainingMs: 200 });
    });
  });

  describe('tick', () => {
    it('advances when the word time runs out and arms the next word', async () => {
      const { playback, content } = await setupWithText();
      playback.dispatch('play');

      playback.tick(150);
      expect(content.currentIndex).toBe(0);
      expect(playback.timer?.remainingMs).toBe(50);

      playback.tick(50);
      expect(content.currentIndex).toBe(1);
      expect(playback.timer).toEqual({ durationMs: 400, remainingMs: 400 });
    });

    it('advances at most one word per tick', async () => {
      const { playback, content } = await setupWithText();
      playback.dispatch('play');

      playback.tick(10_000);

      expect(content.currentIndex).toBe(1);
      expect(playback.timer?.remainingMs).toBe(400);
    });

    it('does nothing unless playing', async () => {
      const { playback, content } = await setupWithText();
      playback.tick(10_000);
      expect(content.currentIndex).toBe(0);
      expect(playback.timer?.remainingMs).toBe(200);
    });

    it('goes idle after the last word', async () => {
      const { playback, content, states } = await setupWithText();
      content.skipForward(2);
      playback.dispatch('play');

      playback.tick(600);

      expect(content.currentIndex).toBe(2);
      expect(playback.state).toBe('idle');
      expect(states).toEqual(['playing', 'idle']);
    });
  });

  describe('navigation', () => {
    it('restart keeps playing from the first word', async () => {
      const { playback, content } = await setupWithText();
      playback.dispatch('play');
      playback.dispatch('skipForward');

      playback.dispatch('restart');

      expect(playback.state).toBe('playing');
      expect(content.currentIndex).toBe(0);
      expect(playback.timer).toEqual({ durationMs: 200, remainingMs: 200 });
    });

    it('skips by the configured amount, clamped to the text', async () => {
      const { playback, content } = await setupWithText('a b c d e f g h');
      playback.dispatch('skipForward');
      expect(content.currentIndex).toBe(5);
      playback.dispatch('skipForward');
      expect(content.currentIndex).toBe(7);
      playback.dispatch('skipBackward');
      expect(content.currentIndex).toBe(2);
    });

    it('restart from idle rewinds without starting playback', async () => {
      const { playback, content, states } = await setupWithText();
      content.skipForward(2);

      playback.dispatch('restart');

      expect(playback.state).toBe('idle');
      expect(states).toEqual([]);
      expect(content.currentIndex).toBe(0);
      expect(playback.timer).toEqual({ durationMs: 200, remainingMs: 200 });
    });

    it('restart while paused stays paused on the first word', async () => {
      const { playback, content, states } = await setupWithText();
      playback.dispatch('play');
      playback.tick(100);
      playback.dispatch('skipForward');
      playback.dispatch('pause');

      playback.dispatch('restart');

      expect(playback.state).toBe('paused');
      expect(states).toEqual(['playing', 'paused']);
      expect(content.currentIndex).toBe(0);
      expect(playback.timer).toEqual({ durationMs: 200, remainingMs: 200 });
    });

    it('re-arms the timer and redraws the word on every move', async () => {
      const { bus, tab, playback, display } = await setupWithText();
      playback.dispatch('play');
      playback.tick(150);
      const seen: string[] = [];
      bus.on('wordChanged', ({ tabId }) => {
        if (tabId !== tab.id) return;
        const { before, focus, after } = display.state.split;
        seen.push(`${before}${focus}${after} ${playback.timer?.remainingMs}`);
      });

      playback.dispatch('skipForward');
      playback.dispatch('restart');

      expect(seen).toEqual(['three. 600', 'one 200']);
    });

    it('ignores word changes in inactive tabs', async () => {
      const { registry, playback } = await setupWithText();
      const other = await registry.createTab({ source: { kind: 'text', text: 'x y z' }, active: false });
      playback.dispatch('play');
      playback.tick(50);

      other?.content?.skipForward(1);

      expect(playback.timer).toEqual({ durationMs: 200, remainingMs: 150 });
    });
  });

  describe('speed', () => {
    it('steps the active tab speed', async () => {
      const { playback, registry, tab } = await setupWithText();

      playback.dispatch('increaseSpeed');
      expect(registry.get(tab.id)?.wpm).toBe(350);

      playback.dispatch('decreaseSpeed');
      playback.dispatch('decreaseSpeed');
      expect(registry.get(tab.id)?.wpm).toBe(250);
    });

    it('stays within the speed limits', async () => {
      const { playback, registry, tab } = await setupWithText();
      registry.setWpm(tab.id, 100);

      playback.dispatch('decreaseSpeed');

      expect(registry.get(tab.id)?.wpm).toBe(100);
    });

    it('finishes the current word at the old speed and times the next at the new one', async () => {
      const { playback, content } = await setupWithText();
      playback.dispatch('play');
      playback.tick(150);

      playback.dispatch('increaseSpeed');
      expect(playback.timer).toEqual({ durationMs: 200, remainingMs: 50 });

      playback.tick(50);
      expect(content.currentIndex).toBe(1);
      // 60000 / 350 * 2
      expect(playback.timer?.durationMs).toBe(343);
    });
  });

  describe('tab switches', () => {
    it('goes idle when the selected tab has no words', async () => {
      const { playback, registry } = await setupWithText();
      const empty = await registry.createTab({ source: { kind: 'text', text: '' }, active: false });
      playback.dispatch('play');

      registry.selectTab(empty?.id ?? '');

      expect(playback.state).toBe('idle');
      expect(playback.timer).toBeNull();
    });

    it('goes idle when switching to the home tab', async () => {
      const { playback, registry } = await setupWithText();
      const [home] = registry.tabs();
      playback.dispatch('play');

      registry.selectTab(home.id);

      expect(playback.state).toBe('idle');
    });

    it('keeps playing and re-arms the timer for the selected tab', async () => {
      const { playback, registry } = await setupWithText();
      const other = await registry.createTab({ source: { kind: 'text', text: 'finished.' }, active: false });
      playback.dispatch('play');

      registry.selectTab(other?.id ?? '');

      expect(playback.state).toBe('playing');
      expect(playback.timer).toEqual({ durationMs: 600, remainingMs: 600 });
    });
  });
});
