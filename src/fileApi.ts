import type { CustomPalette } from './editor/palette';
import type { Project, ProjectParseError } from './editor/project';

export type ReadError = 'not-found' | 'read-failed';

export type OpenProjectResult =
  | { ok: true; project: Project; filePath: string }
  | { ok: false; error: ReadError | ProjectParseError; message: string; filePath: string };

export type LoadPaletteResult =
  | { ok: true; palette: CustomPalette; filePath: string }
  | { ok: false; error: ReadError | 'invalid-palette'; message: string; filePath: string };

export type WriteResult =
  | { ok: true; filePath: string }
  | { ok: false; error: 'write-failed'; message: string; filePath: string };

export type RemoveResult =
  | { ok: true; filePath: string }
  | { ok: false; error: 'not-found' | 'remove-failed'; message: string; filePath: string };

// File operations the editor UI is given by its host; the UI performs no I/O itself.
export type FileApi = {
  openProject: (filePath: string) => Promise<OpenProjectResult>;
  saveProject: (filePath: string, project: Project) => Promise<WriteResult>;
  writeAutosave: (filePath: string | null, project: Project) => Promise<WriteResult>;
  writeExport: (filePath: string, text: string) => Promise<WriteResult>;
  rememberFile: (filePath: string) => Promise<void>;
  // File names (not paths) in the directory, sorted.
  listProjects: (dir: string) => Promise<string[]>;
  listPalettes: (dir: string) => Promise<string[]>;
  loadPalette: (filePath: string) => Promise<LoadPaletteResult>;
  savePalette: (filePath: string, palette: CustomPalette) => Promise<WriteResult>;
  deletePalette: (filePath: string) => Promise<RemoveResult>;
};
