// Playback state of the active reading session
export type ReadingState = 'idle' | 'playing' | 'paused';

export type ReaderCommand =
  | 'play'
  | 'pause'
  | 'togglePlayPause'
  | 'stop'
  | 'skipForward'
  | 'skipBackward'
  | 'increaseSpeed'
  | 'decreaseSpeed'
  | 'restart';

export interface Word {
  readonly text: string;
  readonly isParagraphEnd: boolean;
}

export type WordSequence = readonly Word[];

export type TabId = string;

export interface FontSettings {
  name: string;
  size: number;
}

export interface ReadingTimer {
  durationMs: number;
  remainingMs: number;
}

// Three-segment split around the fixation letter
export interface FixationSplit {
  before: string;
  focus: string;
  after: string;
}

export type SourceFormat = 'text' | 'markup';

export type TextSource =
  | { kind: 'text'; text: string }
  | { kind: 'file'; path: string };

export interface ParsedSource {
  words: Word[];
  title?: string;
}

// Persisted per-tab record. Word content lives in the word cache under cacheId.
export interface SavedTab {
  id: TabId;
  name: string;
  fontName: string;
  fontSize: number;
  wpm: number;
  sourcePath: string | null;
  position: number;
  cacheId: string;
}

export interface SavedSession {
  tabs: SavedTab[];
  activeId: TabId | null;
}

export type StorageKind = 'filesystem' | 'browser';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
