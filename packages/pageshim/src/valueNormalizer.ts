/**
 * Copyright (c) Microsoft Corporation.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 * http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

const namedColors = new Map<string, string>([
  ['red', '#ff0000'],
  ['green', '#008000'],
  ['blue', '#0000ff'],
  ['black', '#000000'],
  ['white', '#ffffff'],
]);

type RGBA = { r: number, g: number, b: number, a: number };

/**
 * Canonicalizes a CSS color. Hex, rgb(a), hsl(a) and a handful of named
 * colors are understood; opaque colors become `#rrggbb`, translucent ones
 * `rgba(r,g,b,a)`. Anything else is returned lower-cased and trimmed.
 */
export function normalizeColor(value: string): string {
  const color = value.trim().toLowerCase();

  const hex = color.match(/^#([0-9a-f]{3}|[0-9a-f]{6})$/);
  if (hex) {
    const digits = hex[1].length === 3 ? hex[1].split('').map(c => c + c).join('') : hex[1];
    return '#' + digits;
  }

  const rgb = color.match(/^rgba?\(([^)]+)\)$/);
  if (rgb) {
    const parts = splitArguments(rgb[1]);
    return serializeRGBA({
      r: parseInt(parts[0], 10) || 0,
      g: parseInt(parts[1], 10) || 0,
      b: parseInt(parts[2], 10) || 0,
      a: parseAlpha(parts[3]),
    });
  }

  const hsl = color.match(/^hsla?\(([^)]+)\)$/);
  if (hsl) {
    const parts = splitArguments(hsl[1]);
    const h = parseFloat(parts[0]) || 0;
    const s = parseFloat((parts[1] || '0').replace('%', '')) / 100 || 0;
    const l = parseFloat((parts[2] || '0').replace('%', '')) / 100 || 0;
    return serializeRGBA({ ...hslToRGB(h, s, l), a: parseAlpha(parts[3]) });
  }

  return namedColors.get(color) ?? color;
}

/**
 * Formats literal pixel lengths: a bare number gains `px`, everything else
 * only loses its whitespace. No unit conversion is performed.
 */
export function normalizeUnit(value: string): string {
  const unit = value.trim().toLowerCase();
  if (/^[0-9.]+$/.test(unit))
    return unit + 'px';
  return unit.replace(/\s+/g, '');
}

function splitArguments(args: string): string[] {
  return args.split(',').map(part => part.trim());
}

function parseAlpha(part: string | undefined): number {
  if (part === undefined)
    return 1;
  const alpha = parseFloat(part);
  return Number.isNaN(alpha) ? 1 : alpha;
}

function hslToRGB(h: number, s: number, l: number): { r: number, g: number, b: number } {
  if (s === 0) {
    const gray = Math.round(l * 255);
    return { r: gray, g: gray, b: gray };
  }
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  const hue = (h % 360) / 360;
  return {
    r: Math.round(hueToChannel(p, q, hue + 1 / 3) * 255),
    g: Math.round(hueToChannel(p, q, hue) * 255),
    b: Math.round(hueToChannel(p, q, hue - 1 / 3) * 255),
  };
}

function hueToChannel(p: number, q: number, t: number): number {
  if (t < 0)
    t += 1;
  if (t > 1)
    t -= 1;
  if (t < 1 / 6)
    return p + (q - p) * 6 * t;
  if (t < 1 / 2)
    return q;
  if (t < 2 / 3)
    return p + (q - p) * (2 / 3 - t) * 6;
  return p;
}

function serializeRGBA({ r, g, b, a }: RGBA): string {
  // Channels wrap into a byte rather than saturate.
  const channels = [r, g, b].map(n => n & 255);
  if (a >= 1)
    return '#' + channels.map(n => n.toString(16).padStart(2, '0')).join('');
  return `rgba(${channels.join(',')},${a})`;
}
