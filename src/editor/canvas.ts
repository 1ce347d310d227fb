import { cloneCell, createDefaultCell } from './cell';
import { DEFAULT_CANVAS_HEIGHT, DEFAULT_CANVAS_WIDTH, MAX_CANVAS_SIZE, MIN_CANVAS_SIZE } from './constants';
import type { Cell } from './types';

// Rounds a requested dimension into the supported range.
export function clampCanvasSize(size: number): number {
  const whole = Number.isFinite(size) ? Math.round(size) : MIN_CANVAS_SIZE;
  return Math.max(MIN_CANVAS_SIZE, Math.min(MAX_CANVAS_SIZE, whole));
}

function createEmptyCells(width: number, height: number): Cell[] {
  return Array.from({ length: width * height }, () => createDefaultCell());
}

// Bounded grid of cells stored row-major. Out-of-range access is absorbed.
export class Canvas {
  private cells: Cell[];
  private w: number;
  private h: number;

  constructor(width: number = DEFAULT_CANVAS_WIDTH, height: number = DEFAULT_CANVAS_HEIGHT) {
    this.w = clampCanvasSize(width);
    this.h = clampCanvasSize(height);
    this.cells = createEmptyCells(this.w, this.h);
  }

  get width(): number {
    return this.w;
  }

  get height(): number {
    return this.h;
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.w && y < this.h;
  }

  get(x: number, y: number): Cell | null {
    if (!this.inBounds(x, y)) {
      return null;
    }
    return cloneCell(this.cells[y * this.w + x]);
  }

  set(x: number, y: number, cell: Cell): void {
    if (!this.inBounds(x, y)) {
      return;
    }
    this.cells[y * this.w + x] = cloneCell(cell);
  }

  clear(): void {
    this.cells = createEmptyCells(this.w, this.h);
  }

  // Keeps the overlapping top-left region; exposed cells start blank.
  resize(width: number, height: number): void {
    const nextW = clampCanvasSize(width);
    const nextH = clampCanvasSize(height);
    const next = createEmptyCells(nextW, nextH);
    const copyW = Math.min(nextW, this.w);
    const copyH = Math.min(nextH, this.h);
    for (let y = 0; y < copyH; y += 1) {
      for (let x = 0; x < copyW; x += 1) {
        next[y * nextW + x] = this.cells[y * this.w + x];
      }
    }
    this.cells = next;
    this.w = nextW;
    this.h = nextH;
  }

  clone(): Canvas {
    const copy = new Canvas(this.w, this.h);
    copy.cells = this.cells.map(cloneCell);
    return copy;
  }

  // Snapshot of every row, for renderers and serializers.
  rows(): Cell[][] {
    const rows: Cell[][] = [];
    for (let y = 0; y < this.h; y += 1) {
      rows.push(this.cells.slice(y * this.w, (y + 1) * this.w).map(cloneCell));
    }
    return rows;
  }
}
