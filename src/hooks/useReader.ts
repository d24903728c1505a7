import { useEffect, useSyncExternalStore } from 'react';
import type { Reader, ReaderSnapshot } from '../lib/reader';

interface UseReaderOptions {
  // Drive the reader's frame loop while mounted
  animate?: boolean;
}

export function useReader(reader: Reader, options: UseReaderOptions = {}): ReaderSnapshot {
  const { animate = true } = options;

  useEffect(() => {
    if (!animate) return;
    reader.start();
    return () => reader.stop();
  }, [reader, animate]);

  return useSyncExternalStore(reader.subscribe, reader.getSnapshot, reader.getSnapshot);
}
