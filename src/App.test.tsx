import { render } from 'ink-testing-library';
import { describe, expect, it, vi } from 'vitest';
import { App } from './App';
import { Canvas } from './editor/canvas';
import { createDefaultCell } from './editor/cell';
import { DEFAULT_BRUSH_COLOR } from './editor/constants';
import { createProject } from './editor/project';
import { EditorSession } from './editor/session';
import type { FileApi, LoadPaletteResult, OpenProjectResult, RemoveResult, WriteResult } from './fileApi';

const RIGHT = '\u001B[C';
const ENTER = '\r';
const RED = { r: 255, g: 0, b: 0 };

function fakeFiles(overrides: Partial<FileApi> = {}): FileApi {
  return {
    openProject: vi.fn(
      async (filePath: string): Promise<OpenProjectResult> => ({ ok: false, error: 'not-found', message: 'missing', filePath })
    ),
    saveProject: vi.fn(async (filePath: string): Promise<WriteResult> => ({ ok: true, filePath })),
    writeAutosave: vi.fn(async (filePath: string | null): Promise<WriteResult> => ({ ok: true, filePath: filePath ?? '' })),
    writeExport: vi.fn(async (filePath: string): Promise<WriteResult> => ({ ok: true, filePath })),
    rememberFile: vi.fn(async () => {}),
    listProjects: vi.fn(async (): Promise<string[]> => []),
    listPalettes: vi.fn(async (): Promise<string[]> => []),
    loadPalette: vi.fn(
      async (filePath: string): Promise<LoadPaletteResult> => ({ ok: false, error: 'not-found', message: 'missing', filePath })
    ),
    savePalette: vi.fn(async (filePath: string): Promise<WriteResult> => ({ ok: true, filePath })),
    deletePalette: vi.fn(async (filePath: string): Promise<RemoveResult> => ({ ok: true, filePath })),
    ...overrides
  };
}

function paletteFiles(): FileApi {
  return fakeFiles({
    listPalettes: vi.fn(async (): Promise<string[]> => ['warm.palette']),
    loadPalette: vi.fn(
      async (filePath: string): Promise<LoadPaletteResult> => ({
        ok: true,
        palette: { name: 'Warm', colors: ['#ff0000'] },
        filePath
      })
    )
  });
}

function savedProject() {
  const source = new EditorSession({ canvas: new Canvas(8, 8) });
  source.applyToolAt(1, 1);
  return createProject('cat', source, { now: new Date('2026-01-01T00:00:00.000Z') });
}

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// Ink re-subscribes the input handler after each render, so keys are spaced out.
async function press(stdin: { write: (data: string) => void }, ...keys: string[]): Promise<void> {
  for (const key of keys) {
    await delay(20);
    stdin.write(key);
  }
  await delay(20);
}

function newSession(): EditorSession {
  return new EditorSession({ canvas: new Canvas(8, 8) });
}

describe('App', () => {
  it('renders the editor panels', () => {
    const { lastFrame, unmount } = render(<App session={newSession()} files={fakeFiles()} workingDirectory="/art" />);
    const frame = lastFrame() ?? '';

    expect(frame).toContain('Tools');
    expect(frame).toContain('Canvas 8x8');
    expect(frame).toContain('Palette Standard');
    expect(frame).toContain('0,0 Ready');
    unmount();
  });

  it('offers to recover an autosave', () => {
    const { lastFrame, unmount } = render(
      <App
        session={newSession()}
        files={fakeFiles()}
        workingDirectory="/art"
        recoveryPath="/art/cat.termpix.autosave"
      />
    );

    expect(lastFrame()).toContain('Autosave found: cat.termpix.autosave (R to recover)');
    unmount();
  });

  it('records a pen stroke as one undo step and undoes it', async () => {
    const session = newSession();
    const { lastFrame, stdin, unmount } = render(<App session={session} files={fakeFiles()} workingDirectory="/art" />);
    const drawn = { glyph: '█', fg: DEFAULT_BRUSH_COLOR, bg: null };

    await press(stdin, 'd', RIGHT, RIGHT, 'd');
    expect(session.history.undoDepth).toBe(1);
    expect([0, 1, 2].map((x) => session.canvas.get(x, 0))).toEqual([drawn, drawn, drawn]);
    expect(lastFrame()).toContain('History 1 undo / 0 redo');

    await press(stdin, 'u');
    expect(session.canvas.get(1, 0)).toEqual(createDefaultCell());
    expect(session.history.redoDepth).toBe(1);

    await press(stdin, 'U');
    expect(session.canvas.get(1, 0)).toEqual(drawn);
    unmount();
  });

  it('draws a line between two applied points', async () => {
    const session = newSession();
    const { lastFrame, stdin, unmount } = render(<App session={session} files={fakeFiles()} workingDirectory="/art" />);

    await press(stdin, 'l', ' ', RIGHT, RIGHT, RIGHT, ' ');
    expect([0, 1, 2, 3, 4].map((x) => session.canvas.get(x, 0)?.glyph)).toEqual(['█', '█', '█', '█', ' ']);
    expect(session.history.undoDepth).toBe(1);
    expect(lastFrame()).toContain('3,0 Line: 4 cell(s)');
    unmount();
  });

  it('saves to the open file and clears the unsaved marker', async () => {
    const session = newSession();
    const files = fakeFiles();
    const { lastFrame, stdin, unmount } = render(
      <App session={session} files={files} workingDirectory="/art" initialFilePath="/art/cat.termpix" />
    );

    await press(stdin, ' ');
    expect(lastFrame()).toContain('cat.termpix *');

    await press(stdin, 's');
    expect(files.saveProject).toHaveBeenCalledWith('/art/cat.termpix', expect.objectContaining({ name: 'cat' }));
    expect(files.rememberFile).toHaveBeenCalledWith('/art/cat.termpix');
    expect(session.dirty).toBe(false);
    const frame = lastFrame() ?? '';
    expect(frame).toContain('Saved: /art/cat.termpix');
    expect(frame).not.toContain('cat.termpix *');
    unmount();
  });

  it('asks for a name when saving an untitled document', async () => {
    const files = fakeFiles();
    const { lastFrame, stdin, unmount } = render(<App session={newSession()} files={files} workingDirectory="/art" />);

    await press(stdin, 's');
    expect(lastFrame()).toContain('Save as');

    await press(stdin, 'd', 'o', 'g', ENTER);
    expect(files.saveProject).toHaveBeenCalledWith('/art/dog.termpix', expect.objectContaining({ name: 'dog' }));
    expect(lastFrame()).toContain('Saved: /art/dog.termpix');
    unmount();
  });

  it('recovers the autosave it offered', async () => {
    const session = newSession();
    const project = savedProject();
    const files = fakeFiles({
      openProject: vi.fn(async (filePath: string): Promise<OpenProjectResult> => ({ ok: true, project, filePath }))
    });
    const { lastFrame, stdin, unmount } = render(
      <App session={session} files={files} workingDirectory="/art" recoveryPath="/art/cat.termpix.autosave" />
    );

    await press(stdin, 'R');
    expect(files.openProject).toHaveBeenCalledWith('/art/cat.termpix.autosave');
    expect(session.canvas.get(1, 1)).toEqual({ glyph: '█', fg: DEFAULT_BRUSH_COLOR, bg: null });
    expect(session.dirty).toBe(true);
    const frame = lastFrame() ?? '';
    expect(frame).toContain('Recovered from autosave');
    expect(frame).toContain('cat.termpix *');
    unmount();
  });

  it('opens a project picked from the list', async () => {
    const session = newSession();
    const project = savedProject();
    const files = fakeFiles({
      listProjects: vi.fn(async (): Promise<string[]> => ['cat.termpix']),
      openProject: vi.fn(async (filePath: string): Promise<OpenProjectResult> => ({ ok: true, project, filePath }))
    });
    const { lastFrame, stdin, unmount } = render(<App session={session} files={files} workingDirectory="/art" />);

    await press(stdin, 'O');
    expect(files.listProjects).toHaveBeenCalledWith('/art');
    expect(lastFrame()).toContain('› cat.termpix');

    await press(stdin, ENTER);
    expect(files.openProject).toHaveBeenCalledWith('/art/cat.termpix');
    expect(files.rememberFile).toHaveBeenCalledWith('/art/cat.termpix');
    expect(session.canvas.get(1, 1)?.glyph).toBe('█');
    expect(lastFrame()).toContain('Opened: cat.termpix');
    unmount();
  });

  it('reports an empty project list', async () => {
    const { lastFrame, stdin, unmount } = render(<App session={newSession()} files={fakeFiles()} workingDirectory="/art" />);

    await press(stdin, 'O');
    expect(lastFrame()).toContain('No .termpix files found');
    unmount();
  });

  it('sets the brush from a typed hex color', async () => {
    const session = newSession();
    const { lastFrame, stdin, unmount } = render(<App session={session} files={fakeFiles()} workingDirectory="/art" />);

    await press(stdin, 'X');
    expect(lastFrame()).toContain('Hex color (#RRGGBB)');

    await press(stdin, '#', '0', '0', 'f', 'f', '0', '0', ENTER);
    expect(session.brush.fg).toEqual({ r: 0, g: 255, b: 0 });
    const frame = lastFrame() ?? '';
    expect(frame).toContain('Color #00ff00');
    expect(frame).not.toContain('Hex color (#RRGGBB)');
    unmount();
  });

  it('rejects a malformed hex color and keeps the prompt open', async () => {
    const session = newSession();
    const { lastFrame, stdin, unmount } = render(<App session={session} files={fakeFiles()} workingDirectory="/art" />);

    await press(stdin, 'X', 'z', 'z', ENTER);
    expect(session.brush.fg).toEqual(DEFAULT_BRUSH_COLOR);
    const frame = lastFrame() ?? '';
    expect(frame).toContain('Invalid color format');
    expect(frame).toContain('Hex color (#RRGGBB)');
    unmount();
  });

  it('mixes a color with the HSL sliders', async () => {
    const session = newSession();
    session.setColor(RED);
    const { lastFrame, stdin, unmount } = render(<App session={session} files={fakeFiles()} workingDirectory="/art" />);

    await press(stdin, 'H');
    expect(lastFrame()).toContain('› H   0');

    await press(stdin, RIGHT, ENTER);
    expect(session.brush.fg).toEqual({ r: 255, g: 21, b: 0 });
    expect(lastFrame()).toContain('Color #ff1500');
    unmount();
  });

  it('picks curated colors by number and steps through palette sections', async () => {
    const session = newSession();
    const { lastFrame, stdin, unmount } = render(
      <App session={session} files={fakeFiles()} workingDirectory="/art" palette={['#000000', '#00ff00']} />
    );

    await press(stdin, '2');
    expect(session.brush.fg).toEqual({ r: 0, g: 255, b: 0 });

    await press(stdin, ']');
    expect(lastFrame()).toContain('Palette Reds');

    await press(stdin, '9');
    expect(lastFrame()).toContain('No color in slot 9');
    unmount();
  });

  it('loads a custom palette and adds the brush color to it', async () => {
    const session = newSession();
    const files = paletteFiles();
    const { lastFrame, stdin, unmount } = render(
      <App session={session} files={files} workingDirectory="/art" palette={['#000000', '#00ff00']} />
    );

    await press(stdin, 'A');
    expect(lastFrame()).toContain('No palette loaded. Press C to open palettes.');

    await press(stdin, 'C');
    expect(lastFrame()).toContain('› warm.palette');

    await press(stdin, ENTER);
    expect(files.loadPalette).toHaveBeenCalledWith('/art/warm.palette');
    expect(lastFrame()).toContain('Custom Warm');

    await press(stdin, '2', 'A');
    expect(files.savePalette).toHaveBeenCalledWith('/art/warm.palette', { name: 'Warm', colors: ['#ff0000', '#00ff00'] });
    expect(lastFrame()).toContain('Added #00ff00 to Warm');
    unmount();
  });

  it('duplicates, renames and deletes palette files', async () => {
    const files = paletteFiles();
    const { lastFrame, stdin, unmount } = render(<App session={newSession()} files={files} workingDirectory="/art" />);

    await press(stdin, 'C', 'u');
    expect(files.savePalette).toHaveBeenCalledWith('/art/Warm (Copy).palette', { name: 'Warm (Copy)', colors: ['#ff0000'] });
    expect(lastFrame()).toContain('Duplicated: Warm (Copy)');

    await press(stdin, 'r');
    expect(lastFrame()).toContain('> warm');

    await press(stdin, '-', 'h', 'o', 't', ENTER);
    expect(files.savePalette).toHaveBeenCalledWith('/art/warm-hot.palette', { name: 'warm-hot', colors: ['#ff0000'] });
    expect(files.deletePalette).toHaveBeenCalledWith('/art/warm.palette');
    expect(lastFrame()).toContain('Renamed to: warm-hot');

    await press(stdin, 'd');
    expect(files.deletePalette).toHaveBeenCalledTimes(2);
    expect(lastFrame()).toContain('Deleted: warm.palette');
    unmount();
  });
});
