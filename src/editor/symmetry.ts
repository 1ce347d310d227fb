import type { CellMutation, SymmetryMode } from './types';

export function hasHorizontal(mode: SymmetryMode): boolean {
  return mode === 'horizontal' || mode === 'quad';
}

export function hasVertical(mode: SymmetryMode): boolean {
  return mode === 'vertical' || mode === 'quad';
}

function fromFlags(horizontal: boolean, vertical: boolean): SymmetryMode {
  if (horizontal && vertical) {
    return 'quad';
  }
  if (horizontal) {
    return 'horizontal';
  }
  return vertical ? 'vertical' : 'off';
}

export function toggleHorizontal(mode: SymmetryMode): SymmetryMode {
  return fromFlags(!hasHorizontal(mode), hasVertical(mode));
}

export function toggleVertical(mode: SymmetryMode): SymmetryMode {
  return fromFlags(hasHorizontal(mode), !hasVertical(mode));
}

export function symmetryLabel(mode: SymmetryMode): string {
  switch (mode) {
    case 'off':
      return 'Off';
    case 'horizontal':
      return 'Horiz';
    case 'vertical':
      return 'Vert';
    case 'quad':
      return 'Quad';
  }
}

// Source first, then its mirrors. Mirrors keep the source's stale `old`; re-read before applying.
export function applySymmetry(
  mutations: CellMutation[],
  mode: SymmetryMode,
  width: number,
  height: number
): CellMutation[] {
  if (mode === 'off') {
    return mutations;
  }

  const result: CellMutation[] = [];
  for (const m of mutations) {
    result.push(m);
    const mx = width - 1 - m.x;
    const my = height - 1 - m.y;

    if (hasHorizontal(mode) && mx !== m.x) {
      result.push({ ...m, x: mx });
    }
    if (hasVertical(mode) && my !== m.y) {
      result.push({ ...m, y: my });
    }
    if (mode === 'quad' && mx !== m.x && my !== m.y) {
      result.push({ ...m, x: mx, y: my });
    }
  }
  return result;
}
