import { Canvas, clampCanvasSize } from './canvas';
import { GLYPHS, createDefaultCell, isKnownGlyph } from './cell';
import { indexToRgb, parseHexColor, rgbToHex } from './color';
import {
  AUTOSAVE_SUFFIX,
  DEFAULT_BRUSH_COLOR,
  DEFAULT_CANVAS_HEIGHT,
  DEFAULT_CANVAS_WIDTH,
  PROJECT_EXTENSION,
  PROJECT_FORMAT_VERSION
} from './constants';
import type { EditorSession } from './session';
import type { Cell, Rgb, SymmetryMode } from './types';

export type Project = {
  name: string;
  createdAt: string;
  modifiedAt: string;
  color: Rgb | null;
  glyph: string;
  symmetry: SymmetryMode;
  canvas: Canvas;
};

export type ProjectParseError = 'invalid-json' | 'invalid-shape' | 'unsupported-version';

export type ParseResult =
  | { ok: true; project: Project }
  | { ok: false; error: ProjectParseError; message: string };

type SerializedCell = {
  glyph: string;
  fg: string | null;
  bg: string | null;
};

const UNTITLED_FILE = `untitled${PROJECT_EXTENSION}`;
const AUTOSAVE_TAIL = '.autosave';

const SYMMETRY_MODES: readonly SymmetryMode[] = ['off', 'horizontal', 'vertical', 'quad'];

export type CreateProjectOptions = {
  // Kept when re-saving a project that was opened from disk.
  createdAt?: string;
  now?: Date;
};

// Snapshot of the session's document and brush settings.
export function createProject(name: string, session: EditorSession, options: CreateProjectOptions = {}): Project {
  const stamp = (options.now ?? new Date()).toISOString();
  return {
    name,
    createdAt: options.createdAt ?? stamp,
    modifiedAt: stamp,
    color: session.brush.fg ? { ...session.brush.fg } : null,
    glyph: session.brush.glyph,
    symmetry: session.symmetry,
    canvas: session.canvas.clone()
  };
}

// Loads a parsed project into the session, replacing its canvas and history.
export function applyProject(session: EditorSession, project: Project): void {
  session.replaceCanvas(project.canvas.clone());
  session.brush = { ...session.brush, glyph: project.glyph, fg: project.color ? { ...project.color } : null };
  session.symmetry = project.symmetry;
}

function serializeColor(color: Rgb | null): string | null {
  return color ? rgbToHex(color) : null;
}

export function serializeProject(project: Project): string {
  const cells: SerializedCell[][] = project.canvas.rows().map((row) =>
    row.map((cell) => ({ glyph: cell.glyph, fg: serializeColor(cell.fg), bg: serializeColor(cell.bg) }))
  );
  return JSON.stringify(
    {
      version: PROJECT_FORMAT_VERSION,
      name: project.name,
      createdAt: project.createdAt,
      modifiedAt: project.modifiedAt,
      color: serializeColor(project.color),
      glyph: project.glyph,
      symmetry: project.symmetry,
      canvas: { width: project.canvas.width, height: project.canvas.height, cells }
    },
    null,
    2
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Hex strings and legacy palette indices; anything else is transparent.
function parseColor(value: unknown): Rgb | null {
  if (typeof value === 'string') {
    return parseHexColor(value);
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255) {
    return indexToRgb(value);
  }
  return null;
}

function parseGlyph(value: unknown): string {
  if (typeof value !== 'string') {
    return GLYPHS.EMPTY;
  }
  return isKnownGlyph(value) ? value : GLYPHS.FULL;
}

function parseCell(value: unknown): Cell {
  if (!isRecord(value)) {
    return createDefaultCell();
  }
  return { glyph: parseGlyph(value.glyph), fg: parseColor(value.fg), bg: parseColor(value.bg) };
}

function parseDimension(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? clampCanvasSize(value) : fallback;
}

function parseCanvas(value: Record<string, unknown>): Canvas | null {
  if (!Array.isArray(value.cells)) {
    return null;
  }
  const width = parseDimension(value.width, DEFAULT_CANVAS_WIDTH);
  const height = parseDimension(value.height, DEFAULT_CANVAS_HEIGHT);
  const canvas = new Canvas(width, height);

  // Short rows and missing rows keep the default cells the canvas starts with.
  value.cells.slice(0, height).forEach((row: unknown, y: number) => {
    if (!Array.isArray(row)) {
      return;
    }
    row.slice(0, width).forEach((cell: unknown, x: number) => {
      canvas.set(x, y, parseCell(cell));
    });
  });
  return canvas;
}

function isSymmetryMode(value: unknown): value is SymmetryMode {
  return SYMMETRY_MODES.some((mode) => mode === value);
}

function invalidShape(message: string): ParseResult {
  return { ok: false, error: 'invalid-shape', message };
}

// Reads a project document; legacy index colors and unknown glyphs are converted.
export function parseProject(text: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: 'invalid-json', message: `Invalid JSON: ${detail}` };
  }

  if (!isRecord(parsed)) {
    return invalidShape('Project must be a JSON object');
  }
  const { version } = parsed;
  if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
    return invalidShape('Project version is missing');
  }
  if (version > PROJECT_FORMAT_VERSION) {
    return {
      ok: false,
      error: 'unsupported-version',
      message: `File version ${version} is newer than supported (v${PROJECT_FORMAT_VERSION})`
    };
  }
  if (!isRecord(parsed.canvas)) {
    return invalidShape('Project has no canvas');
  }
  const canvas = parseCanvas(parsed.canvas);
  if (!canvas) {
    return invalidShape('Canvas has no cells');
  }

  const glyph = parseGlyph(parsed.glyph);
  const color = parsed.color === null ? null : parseColor(parsed.color) ?? { ...DEFAULT_BRUSH_COLOR };

  return {
    ok: true,
    project: {
      name: typeof parsed.name === 'string' ? parsed.name : 'untitled',
      createdAt: typeof parsed.createdAt === 'string' ? parsed.createdAt : '',
      modifiedAt: typeof parsed.modifiedAt === 'string' ? parsed.modifiedAt : '',
      color,
      glyph: glyph === GLYPHS.EMPTY ? GLYPHS.FULL : glyph,
      symmetry: isSymmetryMode(parsed.symmetry) ? parsed.symmetry : 'off',
      canvas
    }
  };
}

// Autosave file kept beside a project; unsaved documents use "untitled".
export function autosavePath(filePath: string | null): string {
  const base = filePath ?? UNTITLED_FILE;
  return base.endsWith(PROJECT_EXTENSION) ? `${base}${AUTOSAVE_TAIL}` : `${base}${AUTOSAVE_SUFFIX}`;
}

// Project path an autosave file was written for.
export function projectPathFromAutosave(filePath: string): string {
  return filePath.endsWith(AUTOSAVE_TAIL) ? filePath.slice(0, -AUTOSAVE_TAIL.length) : filePath;
}
