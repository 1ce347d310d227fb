import type { Canvas } from './canvas';
import { cellsEqual, composeCell, createDefaultCell } from './cell';
import type { Brush, Cell, CellMutation, Point, Tool } from './types';

export type ToolInfo = {
  tool: Tool;
  name: string;
  key: string;
  icon: string;
};

// Toolbar order, labels and shortcut keys.
export const TOOLS: readonly ToolInfo[] = [
  { tool: 'pencil', name: 'Pencil', key: 'p', icon: '✏' },
  { tool: 'eraser', name: 'Eraser', key: 'e', icon: '◻' },
  { tool: 'line', name: 'Line', key: 'l', icon: '╱' },
  { tool: 'rectangle', name: 'Rect', key: 'r', icon: '▭' },
  { tool: 'fill', name: 'Fill', key: 'f', icon: '◉' },
  { tool: 'eyedropper', name: 'Pick', key: 'i', icon: '◈' }
];

export type ToolRequest =
  | { tool: 'pencil'; x: number; y: number; brush: Brush }
  | { tool: 'eraser'; x: number; y: number }
  | { tool: 'line'; from: Point; to: Point; brush: Brush }
  | { tool: 'rectangle'; from: Point; to: Point; brush: Brush; filled: boolean }
  | { tool: 'fill'; x: number; y: number; brush: Brush };

// Line and rectangle take two clicks; the first corner is held here in between.
export type ToolState = { kind: 'idle' } | { kind: 'awaiting-second-point'; x: number; y: number };

export type ToolStep =
  | { kind: 'pending'; state: ToolState }
  | { kind: 'complete'; from: Point; to: Point; state: ToolState };

export const IDLE_TOOL_STATE: ToolState = { kind: 'idle' };

// Feeds one click into the two-click state machine.
export function advanceToolState(state: ToolState, x: number, y: number): ToolStep {
  if (state.kind === 'idle') {
    return { kind: 'pending', state: { kind: 'awaiting-second-point', x, y } };
  }
  return { kind: 'complete', from: { x: state.x, y: state.y }, to: { x, y }, state: IDLE_TOOL_STATE };
}

function mutationAt(canvas: Canvas, x: number, y: number, next: Cell): CellMutation | null {
  const old = canvas.get(x, y);
  if (!old || cellsEqual(old, next)) {
    return null;
  }
  return { x, y, old, new: next };
}

function stamp(canvas: Canvas, points: Point[], brush: Brush): CellMutation[] {
  const mutations: CellMutation[] = [];
  for (const point of points) {
    const existing = canvas.get(point.x, point.y);
    if (!existing) {
      continue;
    }
    const mutation = mutationAt(canvas, point.x, point.y, composeCell(existing, brush.glyph, brush.fg, brush.bg));
    if (mutation) {
      mutations.push(mutation);
    }
  }
  return mutations;
}

export function pencil(canvas: Canvas, x: number, y: number, brush: Brush): CellMutation[] {
  return stamp(canvas, [{ x, y }], brush);
}

export function eraser(canvas: Canvas, x: number, y: number): CellMutation[] {
  const mutation = mutationAt(canvas, x, y, createDefaultCell());
  return mutation ? [mutation] : [];
}

function bresenham(x0: number, y0: number, x1: number, y1: number): Point[] {
  const points: Point[] = [];
  let cx = x0;
  let cy = y0;
  const dx = Math.abs(x1 - x0);
  const dy = -Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx + dy;

  while (true) {
    points.push({ x: cx, y: cy });
    if (cx === x1 && cy === y1) {
      break;
    }
    const e2 = err * 2;
    if (e2 >= dy) {
      err += dy;
      cx += sx;
    }
    if (e2 <= dx) {
      err += dx;
      cy += sy;
    }
  }

  return points;
}

// Bresenham from the smaller endpoint, so swapped endpoints give the same cells.
export function rasterLinePoints(x0: number, y0: number, x1: number, y1: number): Point[] {
  const ax = Math.round(x0);
  const ay = Math.round(y0);
  const bx = Math.round(x1);
  const by = Math.round(y1);
  if (bx < ax || (bx === ax && by < ay)) {
    return bresenham(bx, by, ax, ay).reverse();
  }
  return bresenham(ax, ay, bx, by);
}

export function line(canvas: Canvas, from: Point, to: Point, brush: Brush): CellMutation[] {
  return stamp(canvas, rasterLinePoints(from.x, from.y, to.x, to.y), brush);
}

// Axis-aligned box between two corners, border only unless filled.
export function rectangle(canvas: Canvas, from: Point, to: Point, brush: Brush, filled: boolean): CellMutation[] {
  const minX = Math.min(from.x, to.x);
  const maxX = Math.max(from.x, to.x);
  const minY = Math.min(from.y, to.y);
  const maxY = Math.max(from.y, to.y);
  const points: Point[] = [];

  for (let y = minY; y <= maxY; y += 1) {
    for (let x = minX; x <= maxX; x += 1) {
      const isBorder = x === minX || x === maxX || y === minY || y === maxY;
      if (filled || isBorder) {
        points.push({ x, y });
      }
    }
  }

  return stamp(canvas, points, brush);
}

// 4-connected flood fill with an explicit stack.
export function floodFill(canvas: Canvas, x: number, y: number, brush: Brush): CellMutation[] {
  const target = canvas.get(x, y);
  if (!target) {
    return [];
  }

  const replacement = composeCell(target, brush.glyph, brush.fg, brush.bg);
  if (cellsEqual(target, replacement)) {
    return [];
  }

  const { width, height } = canvas;
  const visited = new Uint8Array(width * height);
  const mutations: CellMutation[] = [];
  const stack: Point[] = [{ x, y }];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) {
      continue;
    }
    const idx = node.y * width + node.x;
    if (visited[idx]) {
      continue;
    }
    const cell = canvas.get(node.x, node.y);
    if (!cell || !cellsEqual(cell, target)) {
      continue;
    }

    visited[idx] = 1;
    mutations.push({ x: node.x, y: node.y, old: cell, new: composeCell(cell, brush.glyph, brush.fg, brush.bg) });

    if (node.x > 0) {
      stack.push({ x: node.x - 1, y: node.y });
    }
    if (node.x + 1 < width) {
      stack.push({ x: node.x + 1, y: node.y });
    }
    if (node.y > 0) {
      stack.push({ x: node.x, y: node.y - 1 });
    }
    if (node.y + 1 < height) {
      stack.push({ x: node.x, y: node.y + 1 });
    }
  }

  return mutations;
}

// Reads a cell's glyph and colors; never produces mutations.
export function eyedropper(canvas: Canvas, x: number, y: number): Brush | null {
  const cell = canvas.get(x, y);
  if (!cell) {
    return null;
  }
  return { glyph: cell.glyph, fg: cell.fg, bg: cell.bg };
}

export function runTool(canvas: Canvas, request: ToolRequest): CellMutation[] {
  switch (request.tool) {
    case 'pencil':
      return pencil(canvas, request.x, request.y, request.brush);
    case 'eraser':
      return eraser(canvas, request.x, request.y);
    case 'line':
      return line(canvas, request.from, request.to, request.brush);
    case 'rectangle':
      return rectangle(canvas, request.from, request.to, request.brush, request.filled);
    case 'fill':
      return floodFill(canvas, request.x, request.y, request.brush);
  }
}
