export type * from './types';
export { segmentText, createWord, wordCount } from './lib/tokenizer';
export { fixationIndex, displayDuration, splitAtFixation, remainingTime, formatTime } from './lib/rsvp';
export {
  ParseError,
  parseSource,
  parserForPath,
  supportedExtensions,
  plainTextParser,
  markupParser,
  type ParseErrorReason,
  type SourceParser,
} from './lib/sources';
export { WordsManager } from './lib/wordsManager';
export { EventBus } from './lib/eventBus';
export { createReaderBus, type ReaderEvents, type ReaderBus } from './lib/events';
export { ReadingStateMachine } from './lib/playback';
export { DisplayModel, type DisplayState, type DisplayGeometry } from './lib/display';
export { TabRegistry, TabOrder, HOME_TAB_NAME, type Tab, type TabCreateRequest, type PendingTab } from './lib/tabs';
export type { PersistenceGateway } from './lib/persistence';
export { BrowserStorage, FileSystemStorage, createStorage } from './lib/storage';
export { SessionPersistence } from './lib/session';
export { Reader, type ReaderSnapshot, type ReaderOptions, type TabSummary } from './lib/reader';
export { FrameLoop } from './lib/frameLoop';
export { FontCatalog } from './lib/fonts';
export { KEY_BINDINGS, commandForKey } from './lib/keymap';
export { DEFAULT_SETTINGS, resolveSettings, loadSettingsFile, type ReaderSettings } from './lib/settings';
export { createLogger, setLogLevel, type Logger } from './lib/logger';
export { useReader } from './hooks/useReader';
export { useKeyboard } from './hooks/useKeyboard';
