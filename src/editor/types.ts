export type Rgb = { r: number; g: number; b: number };

export type Hsl = { h: number; s: number; l: number };

export type Cell = {
  glyph: string;
  fg: Rgb | null;
  bg: Rgb | null;
};

// Display form of a half-block cell after orientation and transparency are resolved.
export type ResolvedCell = {
  glyph: string;
  fg: Rgb | null;
  bg: Rgb | null;
};

export type Point = { x: number; y: number };

export type CellMutation = {
  readonly x: number;
  readonly y: number;
  readonly old: Cell;
  readonly new: Cell;
};

export type Action = {
  readonly mutations: CellMutation[];
};

export type Brush = {
  glyph: string;
  fg: Rgb | null;
  bg: Rgb | null;
};

export type Tool = 'pencil' | 'eraser' | 'line' | 'rectangle' | 'fill' | 'eyedropper';

export type SymmetryMode = 'off' | 'horizontal' | 'vertical' | 'quad';

export type ColorMode = 'truecolor' | '256' | '16';
