import { DEFAULT_FG } from './constants';
import { rgbEquals } from './color';
import type { Cell, ResolvedCell, Rgb } from './types';

// Fixed glyph taxonomy.
export const GLYPHS = {
  EMPTY: ' ',
  FULL: '█',
  UPPER_HALF: '▀',
  LOWER_HALF: '▄',
  LEFT_HALF: '▌',
  RIGHT_HALF: '▐',
  SHADE_LIGHT: '░',
  SHADE_MEDIUM: '▒',
  SHADE_DARK: '▓',
  LOWER_ONE_EIGHTH: '▁',
  LOWER_ONE_QUARTER: '▂',
  LOWER_THREE_EIGHTHS: '▃',
  LOWER_FIVE_EIGHTHS: '▅',
  LOWER_THREE_QUARTERS: '▆',
  LOWER_SEVEN_EIGHTHS: '▇',
  LEFT_ONE_EIGHTH: '▏',
  LEFT_ONE_QUARTER: '▎',
  LEFT_THREE_EIGHTHS: '▍',
  LEFT_FIVE_EIGHTHS: '▋',
  LEFT_THREE_QUARTERS: '▊',
  LEFT_SEVEN_EIGHTHS: '▉'
} as const;

// Drawable glyphs in cycling order (everything except EMPTY).
export const DRAWABLE_GLYPHS: readonly string[] = [
  GLYPHS.FULL,
  GLYPHS.UPPER_HALF,
  GLYPHS.LOWER_HALF,
  GLYPHS.LEFT_HALF,
  GLYPHS.RIGHT_HALF,
  GLYPHS.SHADE_LIGHT,
  GLYPHS.SHADE_MEDIUM,
  GLYPHS.SHADE_DARK,
  GLYPHS.LOWER_ONE_EIGHTH,
  GLYPHS.LOWER_ONE_QUARTER,
  GLYPHS.LOWER_THREE_EIGHTHS,
  GLYPHS.LOWER_FIVE_EIGHTHS,
  GLYPHS.LOWER_THREE_QUARTERS,
  GLYPHS.LOWER_SEVEN_EIGHTHS,
  GLYPHS.LEFT_ONE_EIGHTH,
  GLYPHS.LEFT_ONE_QUARTER,
  GLYPHS.LEFT_THREE_EIGHTHS,
  GLYPHS.LEFT_FIVE_EIGHTHS,
  GLYPHS.LEFT_THREE_QUARTERS,
  GLYPHS.LEFT_SEVEN_EIGHTHS
];

const GLYPH_NAMES = new Map<string, string>(Object.entries(GLYPHS).map(([name, glyph]) => [glyph, name]));

// Blank cell: space, default foreground, transparent background.
export function createDefaultCell(): Cell {
  return { glyph: GLYPHS.EMPTY, fg: { ...DEFAULT_FG }, bg: null };
}

export function cloneCell(cell: Cell): Cell {
  return {
    glyph: cell.glyph,
    fg: cell.fg ? { ...cell.fg } : null,
    bg: cell.bg ? { ...cell.bg } : null
  };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.glyph === b.glyph && rgbEquals(a.fg, b.fg) && rgbEquals(a.bg, b.bg);
}

export function isEmptyCell(cell: Cell): boolean {
  return cell.glyph === GLYPHS.EMPTY;
}

export function isKnownGlyph(glyph: string): boolean {
  return GLYPH_NAMES.has(glyph);
}

export function glyphName(glyph: string): string | null {
  return GLYPH_NAMES.get(glyph) ?? null;
}

export function isHalfBlock(glyph: string): boolean {
  return (
    glyph === GLYPHS.UPPER_HALF ||
    glyph === GLYPHS.LOWER_HALF ||
    glyph === GLYPHS.LEFT_HALF ||
    glyph === GLYPHS.RIGHT_HALF
  );
}

// Next drawable glyph; EMPTY and unknown glyphs start over at FULL.
export function nextGlyph(glyph: string): string {
  const index = DRAWABLE_GLYPHS.indexOf(glyph);
  if (index === -1) {
    return GLYPHS.FULL;
  }
  return DRAWABLE_GLYPHS[(index + 1) % DRAWABLE_GLYPHS.length];
}

function copyColor(color: Rgb | null): Rgb | null {
  return color ? { ...color } : null;
}

// Display form of a half-block cell (null for other glyphs): canonical orientation, opaque half only.
export function resolveCell(cell: Cell): ResolvedCell | null {
  let canonical: string;
  let flipped: string;
  let primary: Rgb | null;
  let secondary: Rgb | null;

  switch (cell.glyph) {
    case GLYPHS.UPPER_HALF:
      canonical = GLYPHS.UPPER_HALF;
      flipped = GLYPHS.LOWER_HALF;
      primary = cell.fg;
      secondary = cell.bg;
      break;
    case GLYPHS.LOWER_HALF:
      canonical = GLYPHS.UPPER_HALF;
      flipped = GLYPHS.LOWER_HALF;
      primary = cell.bg;
      secondary = cell.fg;
      break;
    case GLYPHS.LEFT_HALF:
      canonical = GLYPHS.LEFT_HALF;
      flipped = GLYPHS.RIGHT_HALF;
      primary = cell.fg;
      secondary = cell.bg;
      break;
    case GLYPHS.RIGHT_HALF:
      canonical = GLYPHS.LEFT_HALF;
      flipped = GLYPHS.RIGHT_HALF;
      primary = cell.bg;
      secondary = cell.fg;
      break;
    default:
      return null;
  }

  if (primary && secondary) {
    return { glyph: canonical, fg: copyColor(primary), bg: copyColor(secondary) };
  }
  if (primary) {
    return { glyph: canonical, fg: copyColor(primary), bg: null };
  }
  if (secondary) {
    return { glyph: flipped, fg: copyColor(secondary), bg: null };
  }
  return { glyph: GLYPHS.EMPTY, fg: null, bg: null };
}

// Stamps a glyph over a cell. Nothing of the existing cell survives, so half blocks never merge.
export function composeCell(_existing: Cell, glyph: string, fg: Rgb | null, bg: Rgb | null): Cell {
  return { glyph, fg: copyColor(fg), bg: copyColor(bg) };
}
