import path from 'node:path';
import { useCallback, useEffect, useMemo, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { Key } from 'ink';
import { CanvasView } from './components/CanvasView';
import { ColorSliders } from './components/ColorSliders';
import { EditorSidebar } from './components/EditorSidebar';
import { EditorToolbar } from './components/EditorToolbar';
import { FileListDialog } from './components/FileListDialog';
import { PromptDialog } from './components/PromptDialog';
import { Canvas } from './editor/canvas';
import { clamp, hslToRgb, parseHexColor, rgbToHex, rgbToHsl } from './editor/color';
import {
  CANVAS_RESIZE_STEP,
  DEFAULT_BRUSH_COLOR,
  DEFAULT_PALETTE,
  PALETTE_EXTENSION,
  PROJECT_EXTENSION
} from './editor/constants';
import { COLOR_MODES, toAnsi, toPlainText } from './editor/export';
import { addPaletteColor, flattenSections, paletteSections } from './editor/palette';
import type { CustomPalette } from './editor/palette';
import { applyProject, createProject, projectPathFromAutosave } from './editor/project';
import type { EditorSession, ToolOutcome } from './editor/session';
import { symmetryLabel } from './editor/symmetry';
import { TOOLS } from './editor/tools';
import type { ColorMode, Hsl, Point, Tool } from './editor/types';
import type { FileApi } from './fileApi';

type AppProps = {
  session: EditorSession;
  files: FileApi;
  // New documents, listings and exports of unsaved documents go here.
  workingDirectory: string;
  initialFilePath?: string | null;
  initialCreatedAt?: string;
  // Autosave found at startup, offered for recovery.
  recoveryPath?: string | null;
  palette?: string[];
  autosaveIntervalMs?: number;
};

type PromptPurpose = 'hex' | 'save-as' | 'palette-name' | 'palette-rename' | 'palette-export';

type Mode =
  | { kind: 'normal' }
  // `target` is the palette file a rename or export applies to.
  | { kind: 'prompt'; purpose: PromptPurpose; text: string; target: string | null }
  | { kind: 'sliders'; hsl: Hsl; active: number }
  | { kind: 'open-project'; files: string[]; selected: number }
  | { kind: 'palettes'; files: string[]; selected: number };

type LoadedPalette = {
  palette: CustomPalette;
  filePath: string;
};

const NORMAL: Mode = { kind: 'normal' };
const AUTOSAVE_INTERVAL_MS = 30_000;
const MAX_INPUT_LENGTH = 64;
const SLIDER_STEP = 5;

const TOOL_KEYS: Record<string, Tool> = {
  p: 'pencil',
  e: 'eraser',
  l: 'line',
  r: 'rectangle',
  f: 'fill',
  i: 'eyedropper'
};

const PROMPT_TITLES: Record<PromptPurpose, string> = {
  hex: 'Hex color (#RRGGBB)',
  'save-as': 'Save as',
  'palette-name': 'New palette name',
  'palette-rename': 'Rename palette',
  'palette-export': 'Export palette to'
};

function toolName(tool: Tool): string {
  return TOOLS.find((info) => info.tool === tool)?.name ?? tool;
}

function projectName(filePath: string): string {
  return path.basename(filePath, PROJECT_EXTENSION);
}

// Export path beside the project: "art.termpix" becomes "art.txt" or "art.ans".
function exportPath(filePath: string, extension: string): string {
  const stem = filePath.endsWith(PROJECT_EXTENSION) ? filePath.slice(0, -PROJECT_EXTENSION.length) : filePath;
  return `${stem}${extension}`;
}

function describeOutcome(tool: Tool, outcome: ToolOutcome): string {
  switch (outcome.kind) {
    case 'applied':
      return outcome.count > 0 ? `${toolName(tool)}: ${outcome.count} cell(s)` : 'Nothing to change';
    case 'awaiting-second-point':
      return `${toolName(tool)} from ${outcome.x},${outcome.y}: pick the second point`;
    case 'picked':
      return `Picked ${outcome.glyph} ${outcome.fg ? rgbToHex(outcome.fg) : 'none'}`;
    case 'none':
      return 'Nothing to change';
  }
}

// Quick-pick keys 1-9 select slots 0-8 of the curated palette, 0 selects slot 9.
function quickPickSlot(input: string): number | null {
  if (input.length !== 1 || input < '0' || input > '9') {
    return null;
  }
  return input === '0' ? 9 : Number(input) - 1;
}

function previewHex(text: string): string | null {
  const rgb = parseHexColor(text);
  return rgb ? rgbToHex(rgb) : null;
}

function adjustSlider(hsl: Hsl, active: number, delta: number): Hsl {
  if (active === 0) {
    return { ...hsl, h: clamp(hsl.h + delta, 0, 359) };
  }
  if (active === 1) {
    return { ...hsl, s: clamp(hsl.s + delta, 0, 100) };
  }
  return { ...hsl, l: clamp(hsl.l + delta, 0, 100) };
}

export function App({
  session,
  files,
  workingDirectory,
  initialFilePath = null,
  initialCreatedAt,
  recoveryPath = null,
  palette = DEFAULT_PALETTE,
  autosaveIntervalMs = AUTOSAVE_INTERVAL_MS
}: AppProps) {
  const { exit } = useApp();
  // The session is mutated in place; bumping this re-renders from it.
  const [, setRevision] = useState(0);
  const [mode, setMode] = useState<Mode>(NORMAL);
  const [cursor, setCursor] = useState<Point>({ x: 0, y: 0 });
  const [penDown, setPenDown] = useState(false);
  const [paletteIndex, setPaletteIndex] = useState(-1);
  const [customPalette, setCustomPalette] = useState<LoadedPalette | null>(null);
  const [colorMode, setColorMode] = useState<ColorMode>('truecolor');
  const [currentFilePath, setCurrentFilePath] = useState<string | null>(initialFilePath);
  const [createdAt, setCreatedAt] = useState<string | undefined>(initialCreatedAt);
  const [pendingRecovery, setPendingRecovery] = useState<string | null>(recoveryPath);
  const [statusText, setStatusText] = useState<string>(
    recoveryPath ? `Autosave found: ${path.basename(recoveryPath)} (R to recover)` : 'Ready'
  );

  const refresh = useCallback(() => setRevision((value) => value + 1), []);
  const targetPath = currentFilePath ?? path.join(workingDirectory, `untitled${PROJECT_EXTENSION}`);

  const sections = useMemo(
    () => paletteSections(palette, customPalette ? customPalette.palette : null),
    [customPalette, palette]
  );
  const entries = useMemo(() => flattenSections(sections), [sections]);

  const snapshot = useCallback(
    (filePath: string) => createProject(projectName(filePath), session, { createdAt }),
    [createdAt, session]
  );

  useEffect(() => {
    const timer = setInterval(() => {
      if (!session.dirty) {
        return;
      }
      void files.writeAutosave(targetPath, snapshot(targetPath)).then((result) => {
        if (!result.ok) {
          setStatusText(result.message);
        }
      });
    }, autosaveIntervalMs);
    return () => clearInterval(timer);
  }, [autosaveIntervalMs, files, session, snapshot, targetPath]);

  const liftPen = useCallback(() => {
    if (penDown) {
      session.endStroke();
      setPenDown(false);
    }
  }, [penDown, session]);

  const applyAt = useCallback(
    (point: Point) => {
      const outcome = session.applyToolAt(point.x, point.y);
      setStatusText(describeOutcome(session.tool, outcome));
      refresh();
    },
    [refresh, session]
  );

  const moveCursor = useCallback(
    (dx: number, dy: number) => {
      const next = {
        x: clamp(cursor.x + dx, 0, session.canvas.width - 1),
        y: clamp(cursor.y + dy, 0, session.canvas.height - 1)
      };
      setCursor(next);
      if (penDown) {
        applyAt(next);
      }
    },
    [applyAt, cursor, penDown, session]
  );

  const togglePen = useCallback(() => {
    if (penDown) {
      liftPen();
      setStatusText('Pen up');
      return;
    }
    if (session.tool !== 'pencil' && session.tool !== 'eraser') {
      setStatusText('Pen works with the pencil and eraser only');
      return;
    }
    session.beginStroke();
    setPenDown(true);
    applyAt(cursor);
  }, [applyAt, cursor, liftPen, penDown, session]);

  const selectTool = useCallback(
    (tool: Tool) => {
      liftPen();
      session.setTool(tool);
      setStatusText(`Tool: ${toolName(tool)}`);
      refresh();
    },
    [liftPen, refresh, session]
  );

  const selectEntry = useCallback(
    (index: number) => {
      const entry = entries[index];
      const rgb = entry ? parseHexColor(entry.color) : null;
      if (!rgb) {
        setStatusText('Invalid color format');
        return;
      }
      session.setColor(rgb);
      setPaletteIndex(index);
      setStatusText(`Color ${rgbToHex(rgb)}`);
      refresh();
    },
    [entries, refresh, session]
  );

  const stepPalette = useCallback(
    (delta: number) => {
      if (entries.length === 0) {
        return;
      }
      const start = paletteIndex < 0 ? (delta > 0 ? -1 : 0) : paletteIndex;
      selectEntry((start + delta + entries.length) % entries.length);
    },
    [entries, paletteIndex, selectEntry]
  );

  const quickPick = useCallback(
    (slot: number) => {
      const index = entries.findIndex((entry) => sections[entry.section].kind === 'standard' && entry.slot === slot);
      if (index < 0) {
        setStatusText(`No color in slot ${slot + 1}`);
        return;
      }
      selectEntry(index);
    },
    [entries, sections, selectEntry]
  );

  // Brush color set outside the palette, e.g. typed or mixed.
  const applyColor = useCallback(
    (hex: string) => {
      const rgb = parseHexColor(hex);
      if (!rgb) {
        setStatusText('Invalid color format');
        return false;
      }
      session.setColor(rgb);
      setPaletteIndex(-1);
      setStatusText(`Color ${rgbToHex(rgb)}`);
      refresh();
      return true;
    },
    [refresh, session]
  );

  const resizeBy = useCallback(
    (delta: number) => {
      liftPen();
      session.resizeCanvas(session.canvas.width + delta, session.canvas.height + delta);
      const { width, height } = session.canvas;
      setCursor((prev) => ({ x: Math.min(prev.x, width - 1), y: Math.min(prev.y, height - 1) }));
      setStatusText(`Canvas ${width}x${height}`);
      refresh();
    },
    [liftPen, refresh, session]
  );

  const newCanvas = useCallback(() => {
    liftPen();
    session.replaceCanvas(new Canvas(session.canvas.width, session.canvas.height));
    setCurrentFilePath(null);
    setCreatedAt(undefined);
    setCursor({ x: 0, y: 0 });
    setStatusText('New canvas');
    refresh();
  }, [liftPen, refresh, session]);

  const saveTo = useCallback(
    async (filePath: string) => {
      const project = snapshot(filePath);
      const result = await files.saveProject(filePath, project);
      if (!result.ok) {
        setStatusText(result.message);
        return;
      }
      session.markSaved();
      setCurrentFilePath(result.filePath);
      setCreatedAt(project.createdAt);
      await files.rememberFile(result.filePath);
      setStatusText(`Saved: ${result.filePath}`);
    },
    [files, session, snapshot]
  );

  const save = useCallback(async () => {
    liftPen();
    if (!currentFilePath) {
      setMode({ kind: 'prompt', purpose: 'save-as', text: '', target: null });
      return;
    }
    await saveTo(currentFilePath);
  }, [currentFilePath, liftPen, saveTo]);

  const saveAs = useCallback(
    async (name: string) => {
      const fileName = name.endsWith(PROJECT_EXTENSION) ? name : `${name}${PROJECT_EXTENSION}`;
      setMode(NORMAL);
      await saveTo(path.resolve(workingDirectory, fileName));
    },
    [saveTo, workingDirectory]
  );

  const exportArt = useCallback(
    async (kind: 'text' | 'ansi') => {
      const filePath = exportPath(targetPath, kind === 'text' ? '.txt' : '.ans');
      const text = kind === 'text' ? toPlainText(session.canvas) : toAnsi(session.canvas, colorMode);
      const result = await files.writeExport(filePath, text);
      setStatusText(result.ok ? `Exported: ${result.filePath}` : result.message);
    },
    [colorMode, files, session, targetPath]
  );

  const recover = useCallback(async () => {
    if (!pendingRecovery) {
      return;
    }
    const result = await files.openProject(pendingRecovery);
    setPendingRecovery(null);
    if (!result.ok) {
      setStatusText(result.message);
      return;
    }
    liftPen();
    applyProject(session, result.project);
    session.dirty = true;
    setCurrentFilePath(projectPathFromAutosave(result.filePath));
    setCreatedAt(result.project.createdAt || undefined);
    setCursor({ x: 0, y: 0 });
    setStatusText('Recovered from autosave');
    refresh();
  }, [files, liftPen, pendingRecovery, refresh, session]);

  const showProjects = useCallback(async () => {
    liftPen();
    const names = await files.listProjects(workingDirectory);
    if (names.length === 0) {
      setStatusText(`No ${PROJECT_EXTENSION} files found`);
      return;
    }
    setMode({ kind: 'open-project', files: names, selected: 0 });
  }, [files, liftPen, workingDirectory]);

  const openProject = useCallback(
    async (fileName: string) => {
      setMode(NORMAL);
      const result = await files.openProject(path.join(workingDirectory, fileName));
      if (!result.ok) {
        setStatusText(result.message);
        return;
      }
      applyProject(session, result.project);
      setCurrentFilePath(result.filePath);
      setCreatedAt(result.project.createdAt || undefined);
      setCursor({ x: 0, y: 0 });
      await files.rememberFile(result.filePath);
      setStatusText(`Opened: ${path.basename(result.filePath)}`);
      refresh();
    },
    [files, refresh, session, workingDirectory]
  );

  const palettePath = useCallback((fileName: string) => path.join(workingDirectory, fileName), [workingDirectory]);

  const showPalettes = useCallback(
    async (selected = 0) => {
      const names = await files.listPalettes(workingDirectory);
      setMode({ kind: 'palettes', files: names, selected: clamp(selected, 0, Math.max(0, names.length - 1)) });
    },
    [files, workingDirectory]
  );

  const switchPalette = useCallback((loaded: LoadedPalette | null) => {
    setCustomPalette(loaded);
    // Entries shift when the custom section changes.
    setPaletteIndex(-1);
  }, []);

  const loadPalette = useCallback(
    async (fileName: string) => {
      const result = await files.loadPalette(palettePath(fileName));
      if (!result.ok) {
        setStatusText(`Load failed: ${result.message}`);
        return;
      }
      switchPalette({ palette: result.palette, filePath: result.filePath });
      setMode(NORMAL);
      setStatusText(`Loaded palette: ${result.palette.name}`);
    },
    [files, palettePath, switchPalette]
  );

  const createPalette = useCallback(
    async (name: string) => {
      const fileName = `${name}${PALETTE_EXTENSION}`;
      const existing = await files.listPalettes(workingDirectory);
      if (existing.includes(fileName)) {
        setStatusText('Palette already exists');
        return;
      }
      const created: CustomPalette = { name, colors: [] };
      const result = await files.savePalette(palettePath(fileName), created);
      setMode(NORMAL);
      if (!result.ok) {
        setStatusText(`Create failed: ${result.message}`);
        return;
      }
      switchPalette({ palette: created, filePath: result.filePath });
      setStatusText(`Created palette: ${name}`);
    },
    [files, palettePath, switchPalette, workingDirectory]
  );

  const renamePalette = useCallback(
    async (fileName: string, name: string) => {
      const nextFileName = `${name}${PALETTE_EXTENSION}`;
      const existing = await files.listPalettes(workingDirectory);
      if (existing.includes(nextFileName)) {
        setStatusText('Palette already exists');
        return;
      }
      const loaded = await files.loadPalette(palettePath(fileName));
      if (!loaded.ok) {
        setStatusText(`Rename failed: ${loaded.message}`);
        await showPalettes();
        return;
      }
      const renamed: CustomPalette = { ...loaded.palette, name };
      const saved = await files.savePalette(palettePath(nextFileName), renamed);
      if (!saved.ok) {
        setStatusText(`Rename failed: ${saved.message}`);
        await showPalettes();
        return;
      }
      const removed = await files.deletePalette(loaded.filePath);
      setStatusText(removed.ok ? `Renamed to: ${name}` : removed.message);
      if (customPalette && customPalette.filePath === loaded.filePath) {
        switchPalette({ palette: renamed, filePath: saved.filePath });
      }
      await showPalettes(existing.indexOf(fileName));
    },
    [customPalette, files, palettePath, showPalettes, switchPalette, workingDirectory]
  );

  const duplicatePalette = useCallback(
    async (fileName: string, selected: number) => {
      const loaded = await files.loadPalette(palettePath(fileName));
      if (!loaded.ok) {
        setStatusText(`Duplicate failed: ${loaded.message}`);
        return;
      }
      const copy: CustomPalette = { ...loaded.palette, name: `${loaded.palette.name} (Copy)` };
      const copyFileName = `${copy.name}${PALETTE_EXTENSION}`;
      const existing = await files.listPalettes(workingDirectory);
      if (existing.includes(copyFileName)) {
        setStatusText('Palette already exists');
        return;
      }
      const saved = await files.savePalette(palettePath(copyFileName), copy);
      setStatusText(saved.ok ? `Duplicated: ${copy.name}` : `Duplicate failed: ${saved.message}`);
      await showPalettes(selected);
    },
    [files, palettePath, showPalettes, workingDirectory]
  );

  const deletePalette = useCallback(
    async (fileName: string, selected: number) => {
      const result = await files.deletePalette(palettePath(fileName));
      if (!result.ok) {
        setStatusText(`Delete failed: ${result.message}`);
        return;
      }
      if (customPalette && customPalette.filePath === result.filePath) {
        switchPalette(null);
      }
      setStatusText(`Deleted: ${fileName}`);
      await showPalettes(selected);
    },
    [customPalette, files, palettePath, showPalettes, switchPalette]
  );

  const exportPalette = useCallback(
    async (fileName: string, destination: string) => {
      const loaded = await files.loadPalette(palettePath(fileName));
      const result = loaded.ok
        ? await files.savePalette(path.resolve(workingDirectory, destination), loaded.palette)
        : loaded;
      setStatusText(result.ok ? `Exported to: ${result.filePath}` : `Export failed: ${result.message}`);
      await showPalettes();
    },
    [files, palettePath, showPalettes, workingDirectory]
  );

  const addColorToPalette = useCallback(async () => {
    if (!customPalette) {
      setStatusText('No palette loaded. Press C to open palettes.');
      return;
    }
    if (!session.brush.fg) {
      setStatusText('Brush has no color');
      return;
    }
    const hex = rgbToHex(session.brush.fg);
    const next = addPaletteColor(customPalette.palette, hex);
    if (!next) {
      setStatusText('Color already in palette');
      return;
    }
    const result = await files.savePalette(customPalette.filePath, next);
    if (!result.ok) {
      setStatusText(result.message);
      return;
    }
    switchPalette({ palette: next, filePath: result.filePath });
    setStatusText(`Added ${hex} to ${next.name}`);
  }, [customPalette, files, session, switchPalette]);

  const closePrompt = useCallback(
    async (purpose: PromptPurpose) => {
      if (purpose === 'palette-name' || purpose === 'palette-rename' || purpose === 'palette-export') {
        await showPalettes();
        return;
      }
      setMode(NORMAL);
    },
    [showPalettes]
  );

  const submitPrompt = useCallback(
    async (prompt: Extract<Mode, { kind: 'prompt' }>) => {
      if (prompt.purpose === 'hex') {
        if (applyColor(prompt.text)) {
          setMode(NORMAL);
        }
        return;
      }
      const name = prompt.text.trim();
      if (name === '') {
        setStatusText('Name cannot be empty');
        return;
      }
      switch (prompt.purpose) {
        case 'save-as':
          await saveAs(name);
          break;
        case 'palette-name':
          await createPalette(name);
          break;
        case 'palette-rename':
          if (prompt.target) {
            await renamePalette(prompt.target, name);
          }
          break;
        case 'palette-export':
          if (prompt.target) {
            await exportPalette(prompt.target, name);
          }
          break;
      }
    },
    [applyColor, createPalette, exportPalette, renamePalette, saveAs]
  );

  const handlePromptKey = (prompt: Extract<Mode, { kind: 'prompt' }>, input: string, key: Key) => {
    if (key.escape) {
      void closePrompt(prompt.purpose);
      return;
    }
    if (key.return) {
      void submitPrompt(prompt);
      return;
    }
    if (key.backspace || key.delete) {
      setMode({ ...prompt, text: prompt.text.slice(0, -1) });
      return;
    }
    if (input && !key.ctrl && !key.meta && !key.tab) {
      setMode({ ...prompt, text: `${prompt.text}${input}`.slice(0, MAX_INPUT_LENGTH) });
    }
  };

  const handleSlidersKey = (sliders: Extract<Mode, { kind: 'sliders' }>, key: Key) => {
    if (key.escape) {
      setMode(NORMAL);
    } else if (key.upArrow) {
      setMode({ ...sliders, active: Math.max(0, sliders.active - 1) });
    } else if (key.downArrow) {
      setMode({ ...sliders, active: Math.min(2, sliders.active + 1) });
    } else if (key.leftArrow) {
      setMode({ ...sliders, hsl: adjustSlider(sliders.hsl, sliders.active, -SLIDER_STEP) });
    } else if (key.rightArrow) {
      setMode({ ...sliders, hsl: adjustSlider(sliders.hsl, sliders.active, SLIDER_STEP) });
    } else if (key.return) {
      applyColor(rgbToHex(hslToRgb(sliders.hsl)));
      setMode(NORMAL);
    }
  };

  const handleOpenProjectKey = (dialog: Extract<Mode, { kind: 'open-project' }>, key: Key) => {
    if (key.escape) {
      setMode(NORMAL);
    } else if (key.upArrow) {
      setMode({ ...dialog, selected: Math.max(0, dialog.selected - 1) });
    } else if (key.downArrow) {
      setMode({ ...dialog, selected: Math.min(dialog.files.length - 1, dialog.selected + 1) });
    } else if (key.return) {
      const fileName = dialog.files[dialog.selected];
      if (fileName) {
        void openProject(fileName);
      }
    }
  };

  const handlePalettesKey = (dialog: Extract<Mode, { kind: 'palettes' }>, input: string, key: Key) => {
    if (key.escape) {
      setMode(NORMAL);
      return;
    }
    if (key.upArrow) {
      setMode({ ...dialog, selected: Math.max(0, dialog.selected - 1) });
      return;
    }
    if (key.downArrow) {
      setMode({ ...dialog, selected: Math.max(0, Math.min(dialog.files.length - 1, dialog.selected + 1)) });
      return;
    }
    if (input === 'n') {
      setMode({ kind: 'prompt', purpose: 'palette-name', text: '', target: null });
      return;
    }

    const fileName = dialog.files[dialog.selected];
    if (!fileName) {
      return;
    }
    if (key.return) {
      void loadPalette(fileName);
    } else if (input === 'r') {
      setMode({ kind: 'prompt', purpose: 'palette-rename', text: path.basename(fileName, PALETTE_EXTENSION), target: fileName });
    } else if (input === 'u') {
      void duplicatePalette(fileName, dialog.selected);
    } else if (input === 'd') {
      void deletePalette(fileName, dialog.selected);
    } else if (input === 'x') {
      setMode({ kind: 'prompt', purpose: 'palette-export', text: fileName, target: fileName });
    }
  };

  useInput((input, key) => {
    switch (mode.kind) {
      case 'prompt':
        handlePromptKey(mode, input, key);
        return;
      case 'sliders':
        handleSlidersKey(mode, key);
        return;
      case 'open-project':
        handleOpenProjectKey(mode, key);
        return;
      case 'palettes':
        handlePalettesKey(mode, input, key);
        return;
      case 'normal':
        break;
    }

    if (key.upArrow) {
      moveCursor(0, -1);
      return;
    }
    if (key.downArrow) {
      moveCursor(0, 1);
      return;
    }
    if (key.leftArrow) {
      moveCursor(-1, 0);
      return;
    }
    if (key.rightArrow) {
      moveCursor(1, 0);
      return;
    }
    if (key.escape) {
      session.cancelTool();
      setStatusText('Cancelled');
      refresh();
      return;
    }
    if (key.return || input === ' ') {
      applyAt(cursor);
      return;
    }

    const tool = TOOL_KEYS[input];
    if (tool) {
      selectTool(tool);
      return;
    }
    const slot = quickPickSlot(input);
    if (slot !== null) {
      quickPick(slot);
      return;
    }

    switch (input) {
      case 'd':
        togglePen();
        break;
      case 'b':
        setStatusText(`Glyph ${session.cycleGlyph()}`);
        refresh();
        break;
      case '[':
        stepPalette(-1);
        break;
      case ']':
        stepPalette(1);
        break;
      case 'X':
        setMode({ kind: 'prompt', purpose: 'hex', text: '', target: null });
        break;
      case 'H':
        setMode({ kind: 'sliders', hsl: rgbToHsl(session.brush.fg ?? DEFAULT_BRUSH_COLOR), active: 0 });
        break;
      case 'C':
        liftPen();
        void showPalettes();
        break;
      case 'A':
        void addColorToPalette();
        break;
      case 'x':
        setStatusText(`Symmetry ${symmetryLabel(session.toggleHorizontalSymmetry())}`);
        refresh();
        break;
      case 'y':
        setStatusText(`Symmetry ${symmetryLabel(session.toggleVerticalSymmetry())}`);
        refresh();
        break;
      case 'o':
        setStatusText(session.toggleFilledRect() ? 'Filled rectangles' : 'Outlined rectangles');
        refresh();
        break;
      case 'u':
        liftPen();
        setStatusText(session.undo() ? 'Undo' : 'Nothing to undo');
        refresh();
        break;
      case 'U':
        liftPen();
        setStatusText(session.redo() ? 'Redo' : 'Nothing to redo');
        refresh();
        break;
      case '+':
        resizeBy(CANVAS_RESIZE_STEP);
        break;
      case '-':
        resizeBy(-CANVAS_RESIZE_STEP);
        break;
      case 'n':
        newCanvas();
        break;
      case 's':
        void save();
        break;
      case 'S':
        liftPen();
        setMode({
          kind: 'prompt',
          purpose: 'save-as',
          text: currentFilePath ? projectName(currentFilePath) : '',
          target: null
        });
        break;
      case 'O':
        void showProjects();
        break;
      case 't':
        void exportArt('text');
        break;
      case 'a':
        void exportArt('ansi');
        break;
      case 'c': {
        const next = COLOR_MODES[(COLOR_MODES.indexOf(colorMode) + 1) % COLOR_MODES.length];
        setColorMode(next);
        setStatusText(`Export colors: ${next}`);
        break;
      }
      case 'R':
        void recover();
        break;
      case 'q':
        liftPen();
        exit();
        break;
      default:
        break;
    }
  });

  const anchor = session.toolState.kind === 'awaiting-second-point' ? { x: session.toolState.x, y: session.toolState.y } : null;
  const selectedEntry = entries[paletteIndex];
  const standardSection = sections.find((section) => section.kind === 'standard') ?? sections[0];
  const shownSection = selectedEntry ? sections[selectedEntry.section] : standardSection;

  return (
    <Box flexDirection="column">
      <Box>
        <EditorSidebar
          brush={session.brush}
          paletteSection={shownSection}
          paletteSlot={selectedEntry ? selectedEntry.slot : -1}
          customPaletteName={customPalette ? customPalette.palette.name : null}
          recentColors={session.recentColors}
          symmetry={session.symmetry}
          canvasWidth={session.canvas.width}
          canvasHeight={session.canvas.height}
          colorMode={colorMode}
          currentFilePath={currentFilePath}
          hasUnsavedChanges={session.dirty}
          penDown={penDown}
          undoDepth={session.history.undoDepth}
          redoDepth={session.history.redoDepth}
        />
        <CanvasView canvas={session.canvas} cursor={cursor} anchor={anchor} />
        <EditorToolbar tool={session.tool} filledRect={session.filledRect} />
      </Box>
      {mode.kind === 'prompt' ? (
        <PromptDialog
          title={PROMPT_TITLES[mode.purpose]}
          text={mode.text}
          preview={mode.purpose === 'hex' ? previewHex(mode.text) : null}
        />
      ) : null}
      {mode.kind === 'sliders' ? <ColorSliders hsl={mode.hsl} active={mode.active} /> : null}
      {mode.kind === 'open-project' ? (
        <FileListDialog
          title="Open project"
          files={mode.files}
          selected={mode.selected}
          emptyText="No projects"
          hint="enter open, esc cancel"
        />
      ) : null}
      {mode.kind === 'palettes' ? (
        <FileListDialog
          title="Custom palettes"
          files={mode.files}
          selected={mode.selected}
          emptyText="No palettes yet"
          hint="enter load, n new, r rename, u duplicate, d delete, x export, esc close"
        />
      ) : null}
      <Text>
        {cursor.x},{cursor.y} {statusText}
      </Text>
      <Text dimColor>
        arrows move, space apply, d pen, u/U undo/redo, s/S save, O open, X hex, H mix, C palettes, 1-0 colors, q quit
      </Text>
    </Box>
  );
}
