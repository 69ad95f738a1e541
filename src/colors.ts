import type { ColorEntry, ColorMapper, Rgb, Sample } from './types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function channel(value: number): number {
  return Math.min(255, Math.max(0, Math.floor(value * 255)));
}

/**
 * 32-bit FNV-1a over the UTF-8 bytes of `key`.
 * Same key gives the same hash on every run and platform.
 */
export function fnv1a32(key: string): number {
  let hash = 0x811c9dc5;
  for (const byte of Buffer.from(key, 'utf8')) {
    hash = Math.imul(hash ^ byte, 0x01000193) >>> 0;
  }
  return hash;
}

/** HSV to RGB with components in 0-1 (same sector layout as colorsys) */
function hsvToRgb(h: number, s: number, v: number): [number, number, number] {
  if (s === 0) return [v, v, v];
  const i = Math.floor(h * 6);
  const f = h * 6 - i;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));
  switch (i % 6) {
    case 0: return [v, t, p];
    case 1: return [q, v, p];
    case 2: return [p, v, t];
    case 3: return [p, q, v];
    case 4: return [t, p, v];
    default: return [v, p, q];
  }
}

// ---------------------------------------------------------------------------
// Mappers
// ---------------------------------------------------------------------------

export const redBlue: ColorMapper = ({ value }) => {
  const v = channel(clampUnit(value));
  return [v, 0, 255 - v];
};

export const blueRed: ColorMapper = ({ value }) => {
  const v = channel(clampUnit(value));
  return [255 - v, 0, v];
};

export const heat: ColorMapper = ({ value }) => {
  const x = clampUnit(value);
  if (x < 0.33) return [channel(x * 3), 0, 0];
  if (x < 0.66) return [255, channel((x - 0.33) * 3), 0];
  return [255, 255, channel((x - 0.66) * 3)];
};

export const grayscale: ColorMapper = ({ value }) => {
  const v = channel(clampUnit(value));
  return [v, v, v];
};

export const greenPurple: ColorMapper = ({ value }) => {
  const v = channel(clampUnit(value));
  return [v, 255 - v, v];
};

export const rainbow: ColorMapper = ({ value }) => {
  const [r, g, b] = hsvToRgb(clampUnit(value), 1, 1);
  return [channel(r), channel(g), channel(b)];
};

/** Stable colour per item identity, independent of its value */
export const randomByKey: ColorMapper = ({ key }: Sample): Rgb => {
  const hash = fnv1a32(key);
  return [(hash >>> 16) & 0xff, (hash >>> 8) & 0xff, hash & 0xff];
};

export const COLOR_MAPPERS: Record<string, ColorEntry> = {
  'red-blue': { mapper: redBlue, description: 'High values = red, low values = blue.' },
  'blue-red': { mapper: blueRed, description: 'High values = blue, low values = red.' },
  heat: { mapper: heat, description: 'Heat map: black -> red -> yellow -> white.' },
  grayscale: { mapper: grayscale, description: 'Simple grayscale gradient.' },
  'green-purple': { mapper: greenPurple, description: 'Low = green, high = purple.' },
  rainbow: { mapper: rainbow, description: 'Cycle through hue spectrum.' },
  random: { mapper: randomByKey, description: 'Consistent random color per unique word or bigram.' },
};

/** Own-property lookup, so names like "constructor" are unknown */
export function lookupColor(name: string): ColorEntry | undefined {
  return Object.hasOwn(COLOR_MAPPERS, name) ? COLOR_MAPPERS[name] : undefined;
}

/**
 * Parse a `#rrggbb` (or `rrggbb`) string.
 * Returns null for anything else.
 */
export function parseHexColor(input: string): Rgb | null {
  const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(input.trim());
  if (!match || match[1] === undefined || match[2] === undefined || match[3] === undefined) {
    return null;
  }
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}
