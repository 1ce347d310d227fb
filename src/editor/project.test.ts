import { describe, expect, it } from 'vitest';
import { Canvas } from './canvas';
import { DRAWABLE_GLYPHS, createDefaultCell } from './cell';
import {
  applyProject,
  autosavePath,
  createProject,
  parseProject,
  projectPathFromAutosave,
  serializeProject
} from './project';
import { EditorSession } from './session';

const NOW = new Date('2026-01-02T03:04:05.000Z');

function blankDocument(extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ version: 1, canvas: { width: 8, height: 8, cells: [] }, ...extra });
}

describe('project', () => {
  it('captures the session state', () => {
    const session = new EditorSession({ brush: { glyph: '▓', fg: { r: 1, g: 2, b: 3 }, bg: null }, symmetry: 'vertical' });
    const project = createProject('art', session, { now: NOW });

    expect(project.name).toBe('art');
    expect(project.createdAt).toBe('2026-01-02T03:04:05.000Z');
    expect(project.modifiedAt).toBe('2026-01-02T03:04:05.000Z');
    expect(project.glyph).toBe('▓');
    expect(project.color).toEqual({ r: 1, g: 2, b: 3 });
    expect(project.symmetry).toBe('vertical');
    expect(project.canvas).not.toBe(session.canvas);
  });

  it('keeps the original creation time', () => {
    const project = createProject('art', new EditorSession(), { createdAt: '2025-05-05T00:00:00.000Z', now: NOW });
    expect(project.createdAt).toBe('2025-05-05T00:00:00.000Z');
    expect(project.modifiedAt).toBe('2026-01-02T03:04:05.000Z');
  });

  it('round-trips every glyph and arbitrary colors', () => {
    const session = new EditorSession({ canvas: new Canvas(24, 8) });
    DRAWABLE_GLYPHS.forEach((glyph, x) => {
      session.canvas.set(x, 0, { glyph, fg: { r: x * 11, g: 7, b: 250 - x }, bg: x % 2 === 0 ? null : { r: 3, g: x, b: 9 } });
    });

    const result = parseProject(serializeProject(createProject('round', session, { now: NOW })));
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.project.canvas.width).toBe(24);
    expect(result.project.canvas.height).toBe(8);
    expect(result.project.canvas.rows()).toEqual(session.canvas.rows());
    expect(result.project.color).toEqual({ r: 255, g: 255, b: 255 });
    expect(result.project.glyph).toBe('█');
  });

  it('writes colors as hex strings', () => {
    const session = new EditorSession({ canvas: new Canvas(8, 8) });
    session.canvas.set(0, 0, { glyph: '█', fg: { r: 255, g: 135, b: 0 }, bg: null });
    const parsed: unknown = JSON.parse(serializeProject(createProject('hex', session, { now: NOW })));
    expect(parsed).toMatchObject({
      version: 1,
      color: '#ffffff',
      canvas: { width: 8, height: 8 }
    });
    expect(serializeProject(createProject('hex', session, { now: NOW }))).toContain('"fg": "#ff8700"');
  });

  describe('parseProject()', () => {
    it('rejects text that is not JSON', () => {
      const result = parseProject('{nope');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBe('invalid-json');
    });

    it('rejects documents without a version or canvas', () => {
      expect(parseProject('[]')).toMatchObject({ ok: false, error: 'invalid-shape' });
      expect(parseProject('{"canvas": {"cells": []}}')).toMatchObject({ ok: false, error: 'invalid-shape' });
      expect(parseProject('{"version": 1}')).toMatchObject({ ok: false, error: 'invalid-shape' });
      expect(parseProject('{"version": 1, "canvas": {}}')).toMatchObject({ ok: false, error: 'invalid-shape' });
    });

    it('rejects newer format versions', () => {
      expect(parseProject(blankDocument({ version: 2 }))).toEqual({
        ok: false,
        error: 'unsupported-version',
        message: 'File version 2 is newer than supported (v1)'
      });
    });

    it('converts legacy palette indices', () => {
      const text = JSON.stringify({
        version: 1,
        color: 208,
        canvas: { width: 8, height: 8, cells: [[{ glyph: '█', fg: 196, bg: 21 }]] }
      });
      const result = parseProject(text);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.project.color).toEqual({ r: 255, g: 135, b: 0 });
      expect(result.project.canvas.get(0, 0)).toEqual({ glyph: '█', fg: { r: 255, g: 0, b: 0 }, bg: { r: 0, g: 0, b: 255 } });
    });

    it('loads unknown glyphs as full blocks and pads short rows', () => {
      const text = JSON.stringify({
        version: 1,
        canvas: { width: 8, height: 8, cells: [[{ glyph: 'Q', fg: '#010203', bg: null }]] }
      });
      const result = parseProject(text);
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.project.canvas.get(0, 0)).toEqual({ glyph: '█', fg: { r: 1, g: 2, b: 3 }, bg: null });
      expect(result.project.canvas.get(1, 0)).toEqual(createDefaultCell());
      expect(result.project.canvas.get(7, 7)).toEqual(createDefaultCell());
    });

    it('defaults a missing size to 32x32', () => {
      const result = parseProject('{"version": 1, "canvas": {"cells": []}}');
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.project.canvas.width).toBe(32);
      expect(result.project.canvas.height).toBe(32);
      expect(result.project.name).toBe('untitled');
      expect(result.project.symmetry).toBe('off');
    });
  });

  it('loads a project into a session', () => {
    const source = new EditorSession({ canvas: new Canvas(16, 8), symmetry: 'quad' });
    source.applyToolAt(1, 1);
    const project = createProject('load', source, { now: NOW });

    const target = new EditorSession();
    target.applyToolAt(0, 0);
    applyProject(target, project);

    expect(target.canvas.width).toBe(16);
    expect(target.symmetry).toBe('quad');
    expect(target.history.canUndo()).toBe(false);
    expect(target.dirty).toBe(false);
    expect(target.canvas.get(14, 6)).toEqual(source.canvas.get(14, 6));
  });

  it('derives autosave paths', () => {
    expect(autosavePath('/art/cat.termpix')).toBe('/art/cat.termpix.autosave');
    expect(autosavePath('/art/cat')).toBe('/art/cat.termpix.autosave');
    expect(autosavePath(null)).toBe('untitled.termpix.autosave');
    expect(projectPathFromAutosave('/art/cat.termpix.autosave')).toBe('/art/cat.termpix');
  });
});
