import type { Canvas } from './canvas';
import { GLYPHS, resolveCell } from './cell';
import { nearest16, nearest256 } from './color';
import type { Cell, ColorMode, ResolvedCell, Rgb } from './types';

const ESC = '\x1b';
const RESET = `${ESC}[0m`;

export const COLOR_MODES: readonly ColorMode[] = ['truecolor', '256', '16'];

// Glyph and colors as they appear on screen; empty glyphs carry no foreground.
export function displayCell(cell: Cell): ResolvedCell {
  const resolved = resolveCell(cell);
  const shown = resolved ?? { glyph: cell.glyph, fg: cell.fg, bg: cell.bg };
  return shown.glyph === GLYPHS.EMPTY ? { glyph: GLYPHS.EMPTY, fg: null, bg: shown.bg } : shown;
}

// SGR parameters selecting a color for one layer at the given quantization.
export function sgrForColor(color: Rgb | null, mode: ColorMode, layer: 'fg' | 'bg'): string {
  if (!color) {
    return layer === 'fg' ? '39' : '49';
  }
  const base = layer === 'fg' ? 38 : 48;
  switch (mode) {
    case 'truecolor':
      return `${base};2;${color.r};${color.g};${color.b}`;
    case '256':
      return `${base};5;${nearest256(color)}`;
    case '16': {
      const index = nearest16(color);
      const normal = layer === 'fg' ? 30 : 40;
      const bright = layer === 'fg' ? 90 : 100;
      return index < 8 ? String(normal + index) : String(bright + index - 8);
    }
  }
}

function isBlank(cell: ResolvedCell): boolean {
  return cell.glyph === GLYPHS.EMPTY && !cell.bg;
}

function displayRows(canvas: Canvas): ResolvedCell[][] {
  return canvas.rows().map((row: Cell[]) => row.map(displayCell));
}

function lastNonEmptyRow(rows: ResolvedCell[][]): number {
  for (let y = rows.length - 1; y >= 0; y -= 1) {
    if (rows[y].some((cell) => !isBlank(cell))) {
      return y;
    }
  }
  return -1;
}

function visibleLength(cells: ResolvedCell[]): number {
  let length = cells.length;
  while (length > 0 && isBlank(cells[length - 1])) {
    length -= 1;
  }
  return length;
}

// Each cell is written twice so that it renders roughly square.
export function toPlainText(canvas: Canvas): string {
  const rows = displayRows(canvas);
  const last = lastNonEmptyRow(rows);
  const lines: string[] = [];
  for (let y = 0; y <= last; y += 1) {
    lines.push(rows[y].map((cell) => cell.glyph.repeat(2)).join('').trimEnd());
  }
  return lines.join('\n');
}

// ANSI art; a color sequence is written only when (fg, bg) changes within a row.
export function toAnsi(canvas: Canvas, mode: ColorMode): string {
  const rows = displayRows(canvas);
  const last = lastNonEmptyRow(rows);
  const lines: string[] = [];

  for (let y = 0; y <= last; y += 1) {
    const cells = rows[y];
    const length = visibleLength(cells);
    let line = '';
    let previous: string | null = null;
    for (let x = 0; x < length; x += 1) {
      const cell = cells[x];
      const style = `${sgrForColor(cell.fg, mode, 'fg')};${sgrForColor(cell.bg, mode, 'bg')}`;
      if (style !== previous) {
        line += `${ESC}[${style}m`;
        previous = style;
      }
      line += cell.glyph.repeat(2);
    }
    lines.push(line + RESET);
  }

  return lines.join('\n');
}
