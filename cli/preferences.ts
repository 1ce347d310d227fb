import fs from 'node:fs/promises';
import path from 'node:path';
import { RECENT_FILES_MAX } from '../src/editor/constants';
import { createLogger } from '../src/editor/logger';
import type { Logger } from '../src/editor/logger';

export type AppPreferences = {
  recentFiles: string[];
  lastDirectory: string | null;
};

const PREFERENCES_FILE = 'preferences.json';

export const DEFAULT_PREFERENCES: AppPreferences = {
  recentFiles: [],
  lastDirectory: null
};

export function getPreferencesPath(homeDir: string): string {
  return path.join(homeDir, PREFERENCES_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Unreadable or malformed preferences fall back to the defaults.
export async function loadPreferences(homeDir: string, logger: Logger = createLogger()): Promise<AppPreferences> {
  let raw: string;
  try {
    raw = await fs.readFile(getPreferencesPath(homeDir), 'utf8');
  } catch {
    return { ...DEFAULT_PREFERENCES, recentFiles: [] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn('ignoring unreadable preferences', error);
    return { ...DEFAULT_PREFERENCES, recentFiles: [] };
  }
  if (!isRecord(parsed)) {
    logger.warn('ignoring preferences that are not an object');
    return { ...DEFAULT_PREFERENCES, recentFiles: [] };
  }

  const recentFiles = Array.isArray(parsed.recentFiles)
    ? parsed.recentFiles.filter((item): item is string => typeof item === 'string')
    : [];
  const lastDirectory = typeof parsed.lastDirectory === 'string' ? parsed.lastDirectory : null;
  return {
    recentFiles: recentFiles.slice(0, RECENT_FILES_MAX),
    lastDirectory
  };
}

// Write failures are logged and otherwise ignored.
export async function savePreferences(homeDir: string, preferences: AppPreferences, logger: Logger = createLogger()): Promise<void> {
  try {
    await fs.mkdir(homeDir, { recursive: true });
    await fs.writeFile(getPreferencesPath(homeDir), JSON.stringify(preferences, null, 2), 'utf8');
  } catch (error) {
    logger.warn('failed to save preferences', error);
  }
}

export function addRecentFile(preferences: AppPreferences, filePath: string): AppPreferences {
  return {
    recentFiles: [filePath, ...preferences.recentFiles.filter((item) => item !== filePath)].slice(0, RECENT_FILES_MAX),
    lastDirectory: path.dirname(filePath)
  };
}

export function removeRecentFile(preferences: AppPreferences, filePath: string): AppPreferences {
  return {
    ...preferences,
    recentFiles: preferences.recentFiles.filter((item) => item !== filePath)
  };
}

// Moves the file to the front of the recent list and persists the change.
export async function rememberRecentFile(
  homeDir: string,
  preferences: AppPreferences,
  filePath: string,
  logger: Logger = createLogger()
): Promise<AppPreferences> {
  const next = addRecentFile(preferences, filePath);
  await savePreferences(homeDir, next, logger);
  return next;
}

export async function forgetRecentFile(
  homeDir: string,
  preferences: AppPreferences,
  filePath: string,
  logger: Logger = createLogger()
): Promise<AppPreferences> {
  const next = removeRecentFile(preferences, filePath);
  await savePreferences(homeDir, next, logger);
  return next;
}
