import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Logger } from '../src/editor/logger';
import {
  addRecentFile,
  forgetRecentFile,
  getPreferencesPath,
  loadPreferences,
  rememberRecentFile,
  removeRecentFile,
  savePreferences
} from './preferences';

describe('preferences', () => {
  let homeDir: string;
  let mockLogger: Logger;

  beforeEach(async () => {
    homeDir = await fs.mkdtemp(path.join(os.tmpdir(), 'termpix-prefs-'));
    mockLogger = {
      trace: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn()
    };
  });

  afterEach(async () => {
    await fs.rm(homeDir, { recursive: true, force: true });
  });

  it('falls back to defaults when there is no file', async () => {
    expect(await loadPreferences(homeDir, mockLogger)).toEqual({ recentFiles: [], lastDirectory: null });
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  it('warns about malformed files and uses defaults', async () => {
    await fs.writeFile(getPreferencesPath(homeDir), '{broken', 'utf8');
    expect(await loadPreferences(homeDir, mockLogger)).toEqual({ recentFiles: [], lastDirectory: null });
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it('saves into a new directory and loads back', async () => {
    const nested = path.join(homeDir, 'nested');
    await savePreferences(nested, { recentFiles: ['/art/a.termpix'], lastDirectory: '/art' }, mockLogger);
    expect(await loadPreferences(nested, mockLogger)).toEqual({ recentFiles: ['/art/a.termpix'], lastDirectory: '/art' });
  });

  it('drops entries that are not strings and caps the list', async () => {
    const recentFiles: unknown[] = Array.from({ length: 12 }, (_, i) => `/art/${i}.termpix`);
    recentFiles.splice(1, 0, 42);
    await fs.writeFile(getPreferencesPath(homeDir), JSON.stringify({ recentFiles, lastDirectory: 7 }), 'utf8');

    const loaded = await loadPreferences(homeDir, mockLogger);
    expect(loaded.recentFiles).toHaveLength(10);
    expect(loaded.recentFiles[1]).toBe('/art/1.termpix');
    expect(loaded.lastDirectory).toBeNull();
  });

  it('moves a reopened file to the front of the recent list', () => {
    const start = { recentFiles: ['/a/one.termpix', '/b/two.termpix'], lastDirectory: null };
    expect(addRecentFile(start, '/b/two.termpix')).toEqual({
      recentFiles: ['/b/two.termpix', '/a/one.termpix'],
      lastDirectory: '/b'
    });
    expect(removeRecentFile(start, '/a/one.termpix').recentFiles).toEqual(['/b/two.termpix']);
  });

  it('persists remembered and forgotten files', async () => {
    const start = { recentFiles: ['/art/old.termpix'], lastDirectory: '/art' };
    const remembered = await rememberRecentFile(homeDir, start, '/art/new.termpix', mockLogger);
    expect(remembered.recentFiles).toEqual(['/art/new.termpix', '/art/old.termpix']);

    const forgotten = await forgetRecentFile(homeDir, remembered, '/art/old.termpix', mockLogger);
    expect(forgotten).toEqual({ recentFiles: ['/art/new.termpix'], lastDirectory: '/art' });
    expect(await loadPreferences(homeDir, mockLogger)).toEqual(forgotten);
  });
});
