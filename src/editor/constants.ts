import type { Rgb } from './types';

// Canvas size on startup and for "new canvas".
export const DEFAULT_CANVAS_WIDTH = 32;
export const DEFAULT_CANVAS_HEIGHT = 32;
// Lower bound for either canvas dimension.
export const MIN_CANVAS_SIZE = 8;
// Upper bound for either canvas dimension.
export const MAX_CANVAS_SIZE = 128;
// Cells added or removed per resize keystroke.
export const CANVAS_RESIZE_STEP = 8;
// Undo history capacity in actions.
export const MAX_UNDO = 256;
// Number of recently used colors kept.
export const MAX_RECENT_COLORS = 8;
// Number of recent files kept in preferences.
export const RECENT_FILES_MAX = 10;

// Foreground of a blank cell.
export const DEFAULT_FG: Rgb = { r: 229, g: 229, b: 229 };
// Initial brush color.
export const DEFAULT_BRUSH_COLOR: Rgb = { r: 255, g: 255, b: 255 };

export const PROJECT_EXTENSION = '.termpix';
export const AUTOSAVE_SUFFIX = `${PROJECT_EXTENSION}.autosave`;
export const PALETTE_EXTENSION = '.palette';
export const PROJECT_FORMAT_VERSION = 1;
export const LOG_PREFIX = '[termpix]';

// Curated starting palette: grays, warm, cool, then skin and accent tones.
export const DEFAULT_PALETTE = [
  '#000000',
  '#303030',
  '#808080',
  '#bcbcbc',
  '#eeeeee',
  '#ffffff',
  '#cd0000',
  '#ff0000',
  '#ff8700',
  '#ffaf00',
  '#ffff00',
  '#ffffaf',
  '#005f00',
  '#00ff00',
  '#008787',
  '#00afff',
  '#0000ff',
  '#5f0087',
  '#ff00d7',
  '#ff87ff',
  '#8700ff',
  '#d7af87',
  '#af875f',
  '#875f00'
];
