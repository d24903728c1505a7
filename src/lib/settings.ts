import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { LogLevel, StorageKind } from '../types';
import { createLogger } from './logger';

const logger = createLogger('settings');

export interface ReaderSettings {
  defaultWpm: number;
  minWpm: number;
  maxWpm: number;
  wpmStep: number;
  skipAmount: number;
  fonts: string[];
  defaultFontSize: number;
  minFontSize: number;
  maxFontSize: number;
  saveIntervalMs: number;
  storage: StorageKind;
  dataDir: string;
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: ReaderSettings = {
  defaultWpm: 300,
  minWpm: 100,
  maxWpm: 1000,
  wpmStep: 50,
  skipAmount: 5,
  fonts: ['JetBrainsMono-Regular.ttf', 'UbuntuMono-Regular.ttf'],
  defaultFontSize: 48,
  minFontSize: 12,
  maxFontSize: 160,
  saveIntervalMs: 5000,
  storage: 'filesystem',
  dataDir: path.join(homedir(), '.config', 'glance-reader'),
  logLevel: 'info',
};

// Every key is optional; unknown keys are ignored so old settings files still load.
const settingsSchema = z
  .object({
    defaultWpm: z.number().int(),
    minWpm: z.number().int().positive(),
    maxWpm: z.number().int().positive(),
    wpmStep: z.number().int().positive(),
    skipAmount: z.number().int().positive(),
    fonts: z.array(z.string().min(1)).min(1),
    defaultFontSize: z.number().positive(),
    minFontSize: z.number().positive(),
    maxFontSize: z.number().positive(),
    saveIntervalMs: z.number().int().positive(),
    storage: z.enum(['filesystem', 'browser']),
    dataDir: z.string().min(1),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  })
  .partial();

/**
 * Merge raw settings over the defaults and clamp values into usable ranges.
 */
export function resolveSettings(raw: unknown): ReaderSettings {
  const parsed = settingsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    logger.warn('Ignoring invalid settings', parsed.error.issues.map(issue => issue.path.join('.')));
    return { ...DEFAULT_SETTINGS };
  }

  const settings: ReaderSettings = { ...DEFAULT_SETTINGS, ...parsed.data };
  if (settings.minWpm > settings.maxWpm) {
    settings.minWpm = DEFAULT_SETTINGS.minWpm;
    settings.maxWpm = DEFAULT_SETTINGS.maxWpm;
  }
  settings.defaultWpm = Math.max(settings.minWpm, Math.min(settings.maxWpm, settings.defaultWpm));
  if (settings.minFontSize > settings.maxFontSize) {
    settings.minFontSize = DEFAULT_SETTINGS.minFontSize;
    settings.maxFontSize = DEFAULT_SETTINGS.maxFontSize;
  }
  settings.defaultFontSize = Math.max(
    settings.minFontSize,
    Math.min(settings.maxFontSize, settings.defaultFontSize)
  );
  settings.fonts = [...settings.fonts].sort();
  return settings;
}

/**
 * Load settings from a JSON file. A missing or unreadable file yields the defaults.
 */
export async function loadSettingsFile(filePath: string): Promise<ReaderSettings> {
  let data: string;
  try {
    data = await readFile(filePath, 'utf-8');
  } catch (err) {
    logger.debug(`No settings file at ${filePath}`, err);
    return resolveSettings({});
  }

  try {
    return resolveSettings(JSON.parse(data));
  } catch (err) {
    logger.warn(`Failed to parse settings file ${filePath}`, err);
    return resolveSettings({});
  }
}
