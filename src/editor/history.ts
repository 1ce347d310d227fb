import type { Canvas } from './canvas';
import { MAX_UNDO } from './constants';
import type { Action, CellMutation } from './types';

// Linear undo/redo. Mutations pushed during a stroke become one action.
export class History {
  private undoStack: Action[] = [];
  private redoStack: Action[] = [];
  private pending: CellMutation[] | null = null;

  constructor(private readonly capacity: number = MAX_UNDO) {}

  // Opens a fresh buffer; an unflushed one is dropped.
  beginStroke(): void {
    this.pending = [];
  }

  pushMutation(mutation: CellMutation): void {
    if (this.pending) {
      this.pending.push(mutation);
      return;
    }
    this.commit({ mutations: [mutation] });
  }

  endStroke(): void {
    const mutations = this.pending;
    this.pending = null;
    if (mutations && mutations.length > 0) {
      this.commit({ mutations });
    }
  }

  commit(action: Action): void {
    if (action.mutations.length === 0) {
      return;
    }
    this.redoStack = [];
    this.undoStack.push(action);
    if (this.undoStack.length > this.capacity) {
      this.undoStack.shift();
    }
  }

  undo(canvas: Canvas): boolean {
    const action = this.undoStack.pop();
    if (!action) {
      return false;
    }
    for (let i = action.mutations.length - 1; i >= 0; i -= 1) {
      const m = action.mutations[i];
      canvas.set(m.x, m.y, m.old);
    }
    this.redoStack.push(action);
    return true;
  }

  redo(canvas: Canvas): boolean {
    const action = this.redoStack.pop();
    if (!action) {
      return false;
    }
    for (const m of action.mutations) {
      canvas.set(m.x, m.y, m.new);
    }
    this.undoStack.push(action);
    return true;
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  isStrokeActive(): boolean {
    return this.pending !== null;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.pending = null;
  }
}
