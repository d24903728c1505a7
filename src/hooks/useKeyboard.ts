import { useEffect, useRef } from 'react';
import type { ReaderCommand } from '../types';
import { commandForKey } from '../lib/keymap';

function isTextInput(target: EventTarget | null): boolean {
  if (!(target instanceof HTMLElement)) return false;
  return target.tagName === 'INPUT' || target.tagName === 'TEXTAREA' || target.isContentEditable;
}

export function useKeyboard(onCommand: (command: ReaderCommand) => void): void {
  const onCommandRef = useRef(onCommand);
  onCommandRef.current = onCommand;

  useEffect(() => {
    const handleKeyDown = (event: KeyboardEvent) => {
      // Ignore if user is typing in an input
      if (isTextInput(event.target)) return;

      const command = commandForKey(event.code);
      if (!command) return;
      event.preventDefault();
      onCommandRef.current(command);
    };

    window.addEventListener('keydown', handleKeyDown);
    return () => window.removeEventListener('keydown', handleKeyDown);
  }, []);
}
