import COLOR_NAMES from "./color-names.json" with { type: "json" };
import { QrRenderError } from "../render/errors.js";

export type Rgb = readonly [number, number, number];

export const WHITE: Rgb = [255, 255, 255];
export const BLACK: Rgb = [0, 0, 0];

const NAMED_COLORS: Record<string, string> = COLOR_NAMES;

const HEX_PATTERN = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const RGB_PATTERN = /^rgba?\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*(?:,\s*[\d.]+\s*)?\)$/i;
const RGB_PERCENT_PATTERN =
  /^rgb\(\s*(\d{1,3}(?:\.\d+)?)%\s*,\s*(\d{1,3}(?:\.\d+)?)%\s*,\s*(\d{1,3}(?:\.\d+)?)%\s*\)$/i;
const HSL_PATTERN =
  /^hsl\(\s*(\d+(?:\.\d+)?)\s*,\s*(\d+(?:\.\d+)?)%\s*,\s*(\d+(?:\.\d+)?)%\s*\)$/i;

function clampByte(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}

function parseHex(digits: string): Rgb {
  if (digits.length <= 4) {
    const [r, g, b] = [0, 1, 2].map((i) => Number.parseInt(digits.charAt(i), 16) * 17);
    return [r, g, b];
  }
  const [r, g, b] = [0, 2, 4].map((i) => Number.parseInt(digits.slice(i, i + 2), 16));
  return [r, g, b];
}

function hueToChannel(m1: number, m2: number, hue: number): number {
  const h = ((hue % 1) + 1) % 1;
  if (h < 1 / 6) {
    return m1 + (m2 - m1) * h * 6;
  }
  if (h < 0.5) {
    return m2;
  }
  if (h < 2 / 3) {
    return m1 + (m2 - m1) * (2 / 3 - h) * 6;
  }
  return m1;
}

function hslToRgb(hueDeg: number, saturationPct: number, lightnessPct: number): Rgb {
  const h = hueDeg / 360;
  const s = Math.min(1, saturationPct / 100);
  const l = Math.min(1, lightnessPct / 100);
  if (s === 0) {
    const v = clampByte(l * 255);
    return [v, v, v];
  }
  const m2 = l <= 0.5 ? l * (1 + s) : l + s - l * s;
  const m1 = 2 * l - m2;
  return [
    clampByte(hueToChannel(m1, m2, h + 1 / 3) * 255),
    clampByte(hueToChannel(m1, m2, h) * 255),
    clampByte(hueToChannel(m1, m2, h - 1 / 3) * 255),
  ];
}

export function invalidColorError(raw: string): QrRenderError {
  return new QrRenderError(
    "invalid-color",
    `Invalid color format '${raw}'. Use names like 'red' or hex like '#FF0000'.`,
  );
}

/**
 * Parses a color name (`red`), hex (`#f00`, `#ff0000`, alpha digits ignored),
 * `rgb(…)` with integers or percentages, or `hsl(…)` into an RGB triple.
 */
export function parseColor(raw: string): Rgb {
  const value = raw.trim();
  const hex = HEX_PATTERN.exec(value);
  if (hex) {
    return parseHex(hex[1]);
  }

  const rgb = RGB_PATTERN.exec(value);
  if (rgb) {
    const channels = [rgb[1], rgb[2], rgb[3]].map(Number);
    if (channels.every((c) => c <= 255)) {
      return [channels[0], channels[1], channels[2]];
    }
    throw invalidColorError(raw);
  }

  const percent = RGB_PERCENT_PATTERN.exec(value);
  if (percent) {
    const [r, g, b] = [percent[1], percent[2], percent[3]].map((p) =>
      clampByte((Math.min(100, Number(p)) * 255) / 100),
    );
    return [r, g, b];
  }

  const hsl = HSL_PATTERN.exec(value);
  if (hsl) {
    return hslToRgb(Number(hsl[1]), Number(hsl[2]), Number(hsl[3]));
  }

  const name = value.toLowerCase();
  if (Object.hasOwn(NAMED_COLORS, name)) {
    return parseHex(NAMED_COLORS[name].slice(1));
  }
  throw invalidColorError(raw);
}

export function formatRgb(color: Rgb): string {
  return `#${color.map((c) => c.toString(16).padStart(2, "0")).join("")}`;
}
