import type { ReaderCommand } from '../types';

// KeyboardEvent.code -> command
export const KEY_BINDINGS: Readonly<Record<string, ReaderCommand>> = {
  Space: 'togglePlayPause',
  Escape: 'stop',
  KeyR: 'restart',
  ArrowLeft: 'skipBackward',
  ArrowRight: 'skipForward',
  ArrowUp: 'increaseSpeed',
  ArrowDown: 'decreaseSpeed',
};

export function commandForKey(code: string): ReaderCommand | null {
  return Object.prototype.hasOwnProperty.call(KEY_BINDINGS, code) ? KEY_BINDINGS[code] : null;
}
