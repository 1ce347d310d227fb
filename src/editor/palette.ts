import { indexToRgb, parseHexColor, rgbHue, rgbToHex } from './color';

export type HueGroup = {
  name: string;
  colors: number[];
};

export type CustomPalette = {
  name: string;
  colors: string[];
};

const HUE_GROUP_NAMES = ['Reds', 'Oranges', 'Yellows', 'Greens', 'Cyans', 'Blues', 'Purples', 'Pinks'] as const;

// Index into HUE_GROUP_NAMES for an integer hue in 0-359.
function hueBucket(hue: number): number {
  if (hue < 15 || hue >= 346) return 0;
  if (hue < 40) return 1;
  if (hue < 70) return 2;
  if (hue < 160) return 3;
  if (hue < 200) return 4;
  if (hue < 260) return 5;
  if (hue < 300) return 6;
  return 7;
}

// Buckets the color cube (16-231) by hue; hueless cube grays go to Reds.
export function buildHueGroups(): HueGroup[] {
  const groups: HueGroup[] = HUE_GROUP_NAMES.map((name) => ({ name, colors: [] }));
  const grays: number[] = [];

  for (let index = 16; index <= 231; index += 1) {
    const hue = rgbHue(indexToRgb(index));
    if (hue === null) {
      grays.push(index);
    } else {
      groups[hueBucket(hue)].colors.push(index);
    }
  }

  groups[0].colors.push(...grays);
  return groups;
}

export function grayscaleRamp(): number[] {
  return Array.from({ length: 24 }, (_, i) => 232 + i);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Normalized "#rrggbb" for a hex string or a palette index; null otherwise.
function normalizeEntry(entry: unknown): string | null {
  if (typeof entry === 'string') {
    const rgb = parseHexColor(entry);
    return rgb ? rgbToHex(rgb) : null;
  }
  if (typeof entry === 'number' && Number.isInteger(entry) && entry >= 0 && entry <= 255) {
    return rgbToHex(indexToRgb(entry));
  }
  return null;
}

// Reads a palette document. Entries that are not colors are dropped.
export function parseCustomPalette(text: string): CustomPalette | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.colors)) {
    return null;
  }

  const colors: string[] = [];
  for (const entry of parsed.colors) {
    const hex = normalizeEntry(entry);
    if (hex) {
      colors.push(hex);
    }
  }
  return {
    name: typeof parsed.name === 'string' ? parsed.name : 'Untitled',
    colors
  };
}

export function serializeCustomPalette(palette: CustomPalette): string {
  return JSON.stringify({ name: palette.name, colors: palette.colors }, null, 2);
}

export type PaletteSectionKind = 'custom' | 'standard' | 'hue' | 'grayscale';

export type PaletteSection = {
  kind: PaletteSectionKind;
  name: string;
  colors: string[];
};

// One selectable color; `section` indexes the section list it was flattened from.
export type PaletteEntry = {
  section: number;
  slot: number;
  color: string;
};

function indicesToHex(indices: number[]): string[] {
  return indices.map((index) => rgbToHex(indexToRgb(index)));
}

// Loaded custom palette (when it has colors), curated colors, hue groups, then grayscale.
export function paletteSections(curated: readonly string[], custom: CustomPalette | null): PaletteSection[] {
  const sections: PaletteSection[] = [];
  if (custom && custom.colors.length > 0) {
    sections.push({ kind: 'custom', name: custom.name, colors: [...custom.colors] });
  }
  sections.push({ kind: 'standard', name: 'Standard', colors: [...curated] });
  for (const group of buildHueGroups()) {
    sections.push({ kind: 'hue', name: group.name, colors: indicesToHex(group.colors) });
  }
  sections.push({ kind: 'grayscale', name: 'Grayscale', colors: indicesToHex(grayscaleRamp()) });
  return sections;
}

export function flattenSections(sections: readonly PaletteSection[]): PaletteEntry[] {
  return sections.flatMap((section, sectionIndex) =>
    section.colors.map((color, slot) => ({ section: sectionIndex, slot, color }))
  );
}

// Adds a color to a custom palette; null when it is already there.
export function addPaletteColor(palette: CustomPalette, color: string): CustomPalette | null {
  const hex = color.toLowerCase();
  if (palette.colors.includes(hex)) {
    return null;
  }
  return { ...palette, colors: [...palette.colors, hex] };
}
