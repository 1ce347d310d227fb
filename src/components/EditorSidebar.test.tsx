import { render } from 'ink-testing-library';
import { describe, expect, it } from 'vitest';
import { EditorSidebar } from './EditorSidebar';

describe('EditorSidebar', () => {
  it('shows the document state', () => {
    const { lastFrame, unmount } = render(
      <EditorSidebar
        brush={{ glyph: '▓', fg: { r: 255, g: 135, b: 0 }, bg: null }}
        paletteSection={{ kind: 'standard', name: 'Standard', colors: ['#000000', '#ffffff'] }}
        paletteSlot={1}
        customPaletteName="Warm"
        recentColors={[]}
        symmetry="quad"
        canvasWidth={40}
        canvasHeight={24}
        colorMode="256"
        currentFilePath="/art/cat.termpix"
        hasUnsavedChanges
        penDown={false}
        undoDepth={2}
        redoDepth={0}
      />
    );
    const frame = lastFrame() ?? '';

    expect(frame).toContain('#ff8700');
    expect(frame).toContain('Pen up');
    expect(frame).toContain('Palette Standard');
    expect(frame).toContain('Custom Warm');
    expect(frame).toContain('Symmetry Quad');
    expect(frame).toContain('Canvas 40x24');
    expect(frame).toContain('Export 256');
    expect(frame).toContain('History 2 undo / 0 redo');
    expect(frame).toContain('cat.termpix *');
    unmount();
  });

  it('names unsaved documents untitled', () => {
    const { lastFrame, unmount } = render(
      <EditorSidebar
        brush={{ glyph: '█', fg: null, bg: null }}
        paletteSection={{ kind: 'grayscale', name: 'Grayscale', colors: [] }}
        paletteSlot={-1}
        customPaletteName={null}
        recentColors={[{ r: 255, g: 0, b: 0 }]}
        symmetry="off"
        canvasWidth={32}
        canvasHeight={32}
        colorMode="truecolor"
        currentFilePath={null}
        hasUnsavedChanges={false}
        penDown
        undoDepth={0}
        redoDepth={0}
      />
    );
    const frame = lastFrame() ?? '';

    expect(frame).toContain('Brush ██ none');
    expect(frame).toContain('Pen down');
    expect(frame).toContain('Palette Grayscale');
    expect(frame).toContain('Custom none');
    expect(frame).toContain('Recent');
    expect(frame).toContain('untitled');
    expect(frame).not.toContain('untitled *');
    unmount();
  });
});
