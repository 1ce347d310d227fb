import { render } from 'ink-testing-library';
import { describe, expect, it } from 'vitest';
import { EditorToolbar } from './EditorToolbar';

describe('EditorToolbar', () => {
  it('lists every tool with its shortcut', () => {
    const { lastFrame, unmount } = render(<EditorToolbar tool="pencil" filledRect={false} />);
    const frame = lastFrame() ?? '';

    expect(frame).toContain('Tools');
    expect(frame).toContain('› p ✏ Pencil');
    expect(frame).toContain('  e ◻ Eraser');
    expect(frame).toContain('  l ╱ Line');
    expect(frame).toContain('  r ▭ Rect');
    expect(frame).toContain('  f ◉ Fill');
    expect(frame).toContain('  i ◈ Pick');
    unmount();
  });

  it('marks the active tool and the filled rectangle mode', () => {
    const { lastFrame, unmount } = render(<EditorToolbar tool="rectangle" filledRect />);
    const frame = lastFrame() ?? '';

    expect(frame).toContain('› r ▭ Rect (filled)');
    expect(frame).toContain('  p ✏ Pencil');
    unmount();
  });
});
