import type { Hsl, Rgb } from './types';

// Conventional RGB values of the 16 standard ANSI colors.
export const ANSI_16_RGB: readonly Rgb[] = [
  { r: 0, g: 0, b: 0 },
  { r: 205, g: 0, b: 0 },
  { r: 0, g: 205, b: 0 },
  { r: 205, g: 205, b: 0 },
  { r: 0, g: 0, b: 238 },
  { r: 205, g: 0, b: 205 },
  { r: 0, g: 205, b: 205 },
  { r: 229, g: 229, b: 229 },
  { r: 127, g: 127, b: 127 },
  { r: 255, g: 0, b: 0 },
  { r: 0, g: 255, b: 0 },
  { r: 255, g: 255, b: 0 },
  { r: 92, g: 92, b: 255 },
  { r: 255, g: 0, b: 255 },
  { r: 0, g: 255, b: 255 },
  { r: 255, g: 255, b: 255 }
];

const CUBE_LEVELS = [0, 95, 135, 175, 215, 255] as const;

// Limits a number to the given range.
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// Converts RGB to a lowercase #rrggbb string.
export function rgbToHex({ r, g, b }: Rgb): string {
  return `#${[r, g, b].map((n) => clamp(Math.round(n), 0, 255).toString(16).padStart(2, '0')).join('')}`;
}

// Parses "#RRGGBB" or "RRGGBB" exactly; surrounding whitespace makes it invalid.
export function parseHexColor(text: string): Rgb | null {
  const match = /^#?([0-9a-f]{6})$/i.exec(text);
  if (!match) {
    return null;
  }
  const digits = match[1];
  return {
    r: Number.parseInt(digits.slice(0, 2), 16),
    g: Number.parseInt(digits.slice(2, 4), 16),
    b: Number.parseInt(digits.slice(4, 6), 16)
  };
}

// Compares two optional colors channel by channel.
export function rgbEquals(a: Rgb | null, b: Rgb | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

// RGB (0-255) to HSL (H: 0-359, S/L: 0-100), all rounded to integers.
export function rgbToHsl({ r, g, b }: Rgb): Hsl {
  const rn = clamp(r, 0, 255) / 255;
  const gn = clamp(g, 0, 255) / 255;
  const bn = clamp(b, 0, 255) / 255;

  const max = Math.max(rn, gn, bn);
  const min = Math.min(rn, gn, bn);
  const l = (max + min) / 2;
  const delta = max - min;

  if (delta === 0) {
    return { h: 0, s: 0, l: Math.round(l * 100) };
  }

  const s = l > 0.5 ? delta / (2 - max - min) : delta / (max + min);

  let h: number;
  if (max === rn) {
    h = (gn - bn) / delta;
    if (h < 0) {
      h += 6;
    }
  } else if (max === gn) {
    h = (bn - rn) / delta + 2;
  } else {
    h = (rn - gn) / delta + 4;
  }

  return {
    h: ((Math.round(h * 60) % 360) + 360) % 360,
    s: Math.min(100, Math.round(s * 100)),
    l: Math.min(100, Math.round(l * 100))
  };
}

// HSL (H: any, S/L: 0-100) to RGB (0-255).
export function hslToRgb({ h, s, l }: Hsl): Rgb {
  const hn = ((h % 360) + 360) % 360;
  const sn = clamp(s, 0, 100) / 100;
  const ln = clamp(l, 0, 100) / 100;

  if (sn === 0) {
    const v = Math.round(ln * 255);
    return { r: v, g: v, b: v };
  }

  const c = (1 - Math.abs(2 * ln - 1)) * sn;
  const x = c * (1 - Math.abs(((hn / 60) % 2) - 1));
  const m = ln - c / 2;

  let r1 = 0;
  let g1 = 0;
  let b1 = 0;

  if (hn < 60) {
    r1 = c;
    g1 = x;
  } else if (hn < 120) {
    r1 = x;
    g1 = c;
  } else if (hn < 180) {
    g1 = c;
    b1 = x;
  } else if (hn < 240) {
    g1 = x;
    b1 = c;
  } else if (hn < 300) {
    r1 = x;
    b1 = c;
  } else {
    r1 = c;
    b1 = x;
  }

  return {
    r: Math.round((r1 + m) * 255),
    g: Math.round((g1 + m) * 255),
    b: Math.round((b1 + m) * 255)
  };
}

// xterm palette entry for an index in 0-255.
export function indexToRgb(index: number): Rgb {
  const i = clamp(Math.trunc(index), 0, 255);
  if (i < 16) {
    return { ...ANSI_16_RGB[i] };
  }
  if (i < 232) {
    const cube = i - 16;
    return {
      r: CUBE_LEVELS[Math.floor(cube / 36)],
      g: CUBE_LEVELS[Math.floor((cube % 36) / 6)],
      b: CUBE_LEVELS[cube % 6]
    };
  }
  const gray = 8 + 10 * (i - 232);
  return { r: gray, g: gray, b: gray };
}

function squaredDistance(a: Rgb, b: Rgb): number {
  const dr = a.r - b.r;
  const dg = a.g - b.g;
  const db = a.b - b.b;
  return dr * dr + dg * dg + db * db;
}

function nearestIndex(rgb: Rgb, count: number): number {
  let bestIndex = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (let i = 0; i < count; i += 1) {
    const distance = squaredDistance(rgb, indexToRgb(i));
    // Strict comparison keeps the lowest index on ties.
    if (distance < bestDistance) {
      bestDistance = distance;
      bestIndex = i;
    }
  }
  return bestIndex;
}

// Closest xterm-256 index by squared RGB distance.
export function nearest256(rgb: Rgb): number {
  return nearestIndex(rgb, 256);
}

// Closest of the 16 standard ANSI colors.
export function nearest16(rgb: Rgb): number {
  return nearestIndex(rgb, 16);
}

// Integer hue in degrees, or null for grays.
export function rgbHue({ r, g, b }: Rgb): number | null {
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;
  if (delta < 1) {
    return null;
  }

  let hue: number;
  if (max === r) {
    hue = 60 * (((g - b) / delta) % 6);
  } else if (max === g) {
    hue = 60 * ((b - r) / delta + 2);
  } else {
    hue = 60 * ((r - g) / delta + 4);
  }
  if (hue < 0) {
    hue += 360;
  }
  return Math.trunc(hue) % 360;
}
