import { Canvas } from './canvas';
import { GLYPHS, composeCell, cellsEqual, nextGlyph } from './cell';
import { rgbEquals } from './color';
import { DEFAULT_BRUSH_COLOR, MAX_RECENT_COLORS } from './constants';
import { History } from './history';
import { createLogger } from './logger';
import type { Logger } from './logger';
import { applySymmetry, toggleHorizontal, toggleVertical } from './symmetry';
import { IDLE_TOOL_STATE, advanceToolState, eyedropper, runTool } from './tools';
import type { ToolRequest, ToolState } from './tools';
import type { Brush, CellMutation, Rgb, SymmetryMode, Tool } from './types';

export type ToolOutcome =
  | { kind: 'applied'; count: number }
  | { kind: 'awaiting-second-point'; x: number; y: number }
  | { kind: 'picked'; glyph: string; fg: Rgb | null; bg: Rgb | null }
  | { kind: 'none' };

export type EditorSessionOptions = {
  canvas?: Canvas;
  tool?: Tool;
  brush?: Brush;
  symmetry?: SymmetryMode;
  logger?: Logger;
};

// One open document: canvas, history and tool settings. Every edit goes through commitMutations.
export class EditorSession {
  canvas: Canvas;
  readonly history = new History();
  tool: Tool;
  brush: Brush;
  symmetry: SymmetryMode;
  filledRect = false;
  toolState: ToolState = IDLE_TOOL_STATE;
  recentColors: Rgb[] = [];
  dirty = false;
  private readonly logger: Logger;

  constructor(options: EditorSessionOptions = {}) {
    this.canvas = options.canvas ?? new Canvas();
    this.tool = options.tool ?? 'pencil';
    this.brush = options.brush ?? { glyph: GLYPHS.FULL, fg: { ...DEFAULT_BRUSH_COLOR }, bg: null };
    this.symmetry = options.symmetry ?? 'off';
    this.logger = options.logger ?? createLogger();
  }

  // Rebuilds each mutation against the live cell at its position, then applies and records it.
  commitMutations(mutations: CellMutation[]): CellMutation[] {
    const expanded = applySymmetry(mutations, this.symmetry, this.canvas.width, this.canvas.height);
    const applied: CellMutation[] = [];

    for (const m of expanded) {
      const actualOld = this.canvas.get(m.x, m.y);
      if (!actualOld) {
        continue;
      }
      const next = composeCell(actualOld, m.new.glyph, m.new.fg, m.new.bg);
      if (cellsEqual(actualOld, next)) {
        continue;
      }
      const rebuilt: CellMutation = { x: m.x, y: m.y, old: actualOld, new: next };
      // Written immediately so a repeated position reads the earlier write.
      this.canvas.set(rebuilt.x, rebuilt.y, rebuilt.new);
      applied.push(rebuilt);
    }

    // Inside a stroke the mutations join the stroke's action; otherwise they form one action.
    if (this.history.isStrokeActive()) {
      for (const m of applied) {
        this.history.pushMutation(m);
      }
    } else {
      this.history.commit({ mutations: applied });
    }
    if (applied.length > 0) {
      this.dirty = true;
    }
    return [...applied];
  }

  applyToolAt(x: number, y: number): ToolOutcome {
    if (!this.canvas.inBounds(x, y)) {
      return { kind: 'none' };
    }

    let request: ToolRequest | null = null;
    switch (this.tool) {
      case 'pencil':
        request = { tool: 'pencil', x, y, brush: this.brush };
        break;
      case 'eraser':
        request = { tool: 'eraser', x, y };
        break;
      case 'fill':
        request = { tool: 'fill', x, y, brush: this.brush };
        break;
      case 'eyedropper':
        return this.pick(x, y);
      case 'line':
      case 'rectangle': {
        const step = advanceToolState(this.toolState, x, y);
        this.toolState = step.state;
        if (step.kind === 'pending') {
          return { kind: 'awaiting-second-point', x, y };
        }
        request =
          this.tool === 'line'
            ? { tool: 'line', from: step.from, to: step.to, brush: this.brush }
            : { tool: 'rectangle', from: step.from, to: step.to, brush: this.brush, filled: this.filledRect };
        break;
      }
    }
    if (!request) {
      return { kind: 'none' };
    }

    if (request.tool !== 'eraser') {
      this.trackRecentColor(this.brush.fg);
    }
    const applied = this.commitMutations(runTool(this.canvas, request));
    this.logger.debug(`${request.tool} at ${x},${y}: ${applied.length} cell(s)`);
    return { kind: 'applied', count: applied.length };
  }

  private pick(x: number, y: number): ToolOutcome {
    const picked = eyedropper(this.canvas, x, y);
    if (!picked) {
      return { kind: 'none' };
    }
    this.brush = {
      glyph: picked.glyph === GLYPHS.EMPTY ? this.brush.glyph : picked.glyph,
      fg: picked.fg ?? this.brush.fg,
      bg: picked.bg
    };
    this.trackRecentColor(picked.fg);
    return { kind: 'picked', glyph: picked.glyph, fg: picked.fg, bg: picked.bg };
  }

  private trackRecentColor(color: Rgb | null): void {
    if (!color) {
      return;
    }
    this.recentColors = [color, ...this.recentColors.filter((c) => !rgbEquals(c, color))].slice(0, MAX_RECENT_COLORS);
  }

  beginStroke(): void {
    this.history.beginStroke();
  }

  endStroke(): void {
    this.history.endStroke();
  }

  undo(): boolean {
    const changed = this.history.undo(this.canvas);
    if (changed) {
      this.dirty = true;
    }
    return changed;
  }

  redo(): boolean {
    const changed = this.history.redo(this.canvas);
    if (changed) {
      this.dirty = true;
    }
    return changed;
  }

  setTool(tool: Tool): void {
    this.tool = tool;
    this.toolState = IDLE_TOOL_STATE;
  }

  cancelTool(): void {
    this.toolState = IDLE_TOOL_STATE;
  }

  setColor(color: Rgb): void {
    this.brush = { ...this.brush, fg: { ...color } };
  }

  cycleGlyph(): string {
    this.brush = { ...this.brush, glyph: nextGlyph(this.brush.glyph) };
    return this.brush.glyph;
  }

  toggleHorizontalSymmetry(): SymmetryMode {
    this.symmetry = toggleHorizontal(this.symmetry);
    return this.symmetry;
  }

  toggleVerticalSymmetry(): SymmetryMode {
    this.symmetry = toggleVertical(this.symmetry);
    return this.symmetry;
  }

  toggleFilledRect(): boolean {
    this.filledRect = !this.filledRect;
    return this.filledRect;
  }

  // New canvas or loaded project: history never outlives the canvas it was recorded on.
  replaceCanvas(canvas: Canvas): void {
    this.canvas = canvas;
    this.history.clear();
    this.toolState = IDLE_TOOL_STATE;
    this.dirty = false;
  }

  resizeCanvas(width: number, height: number): void {
    this.canvas.resize(width, height);
    this.history.clear();
    this.toolState = IDLE_TOOL_STATE;
    this.dirty = true;
  }

  markSaved(): void {
    this.dirty = false;
  }
}
