import fs from 'node:fs/promises';
import path from 'node:path';
import { AUTOSAVE_SUFFIX, PALETTE_EXTENSION, PROJECT_EXTENSION } from '../src/editor/constants';
import { createLogger } from '../src/editor/logger';
import type { Logger } from '../src/editor/logger';
import { parseCustomPalette, serializeCustomPalette } from '../src/editor/palette';
import type { CustomPalette } from '../src/editor/palette';
import { autosavePath, parseProject, serializeProject } from '../src/editor/project';
import type { Project } from '../src/editor/project';
import type { LoadPaletteResult, OpenProjectResult, ReadError, RemoveResult, WriteResult } from '../src/fileApi';

function errorCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readText(filePath: string): Promise<{ ok: true; text: string } | { ok: false; error: ReadError; message: string }> {
  try {
    return { ok: true, text: await fs.readFile(filePath, 'utf8') };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { ok: false, error: 'not-found', message: `File not found: ${filePath}` };
    }
    return { ok: false, error: 'read-failed', message: `Read error: ${errorMessage(error)}` };
  }
}

async function writeText(filePath: string, text: string, logger: Logger): Promise<WriteResult> {
  try {
    await fs.writeFile(filePath, text, 'utf8');
    return { ok: true, filePath };
  } catch (error) {
    logger.warn(`failed to write ${filePath}`, error);
    return { ok: false, error: 'write-failed', message: `Write error: ${errorMessage(error)}`, filePath };
  }
}

async function listByExtension(dir: string, extension: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
      .map((entry) => entry.name)
      .sort();
  } catch {
    return [];
  }
}

export async function saveProjectFile(filePath: string, project: Project, logger: Logger = createLogger()): Promise<WriteResult> {
  const result = await writeText(filePath, serializeProject(project), logger);
  if (!result.ok) {
    return result;
  }
  try {
    await fs.rm(autosavePath(filePath), { force: true });
  } catch (error) {
    logger.warn(`failed to remove autosave for ${filePath}`, error);
  }
  return result;
}

export async function writeAutosave(filePath: string | null, project: Project, logger: Logger = createLogger()): Promise<WriteResult> {
  return writeText(autosavePath(filePath), serializeProject(project), logger);
}

export async function openProjectFile(filePath: string, logger: Logger = createLogger()): Promise<OpenProjectResult> {
  const read = await readText(filePath);
  if (!read.ok) {
    if (read.error === 'read-failed') {
      logger.warn(read.message);
    }
    return { ...read, filePath };
  }
  const parsed = parseProject(read.text);
  if (!parsed.ok) {
    logger.warn(`${filePath}: ${parsed.message}`);
    return { ok: false, error: parsed.error, message: parsed.message, filePath };
  }
  return { ok: true, project: parsed.project, filePath };
}

export async function listProjectFiles(dir: string): Promise<string[]> {
  return listByExtension(dir, PROJECT_EXTENSION);
}

// First autosave file in the directory, by name.
export async function findAutosave(dir: string): Promise<string | null> {
  const [first] = await listByExtension(dir, AUTOSAVE_SUFFIX);
  return first ? path.join(dir, first) : null;
}

export async function saveCustomPalette(filePath: string, palette: CustomPalette, logger: Logger = createLogger()): Promise<WriteResult> {
  return writeText(filePath, serializeCustomPalette(palette), logger);
}

export async function loadCustomPalette(filePath: string): Promise<LoadPaletteResult> {
  const read = await readText(filePath);
  if (!read.ok) {
    return { ...read, filePath };
  }
  const palette = parseCustomPalette(read.text);
  if (!palette) {
    return { ok: false, error: 'invalid-palette', message: `Not a palette file: ${filePath}`, filePath };
  }
  return { ok: true, palette, filePath };
}

export async function listPaletteFiles(dir: string): Promise<string[]> {
  return listByExtension(dir, PALETTE_EXTENSION);
}

export async function deletePaletteFile(filePath: string, logger: Logger = createLogger()): Promise<RemoveResult> {
  try {
    await fs.rm(filePath);
    return { ok: true, filePath };
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { ok: false, error: 'not-found', message: `File not found: ${filePath}`, filePath };
    }
    logger.warn(`failed to delete ${filePath}`, error);
    return { ok: false, error: 'remove-failed', message: `Delete error: ${errorMessage(error)}`, filePath };
  }
}

export async function writeExport(filePath: string, text: string, logger: Logger = createLogger()): Promise<WriteResult> {
  return writeText(filePath, text, logger);
}
