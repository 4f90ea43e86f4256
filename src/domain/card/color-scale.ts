/**
 * Percentile -> bar color.
 *
 * Linear interpolation in RGB between the scale's low color (percentile 0)
 * and high color (percentile 100). Colors are #rrggbb strings.
 */

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

export interface ColorScale {
  readonly low: string;
  readonly high: string;
}

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

export function isHexColor(value: string): boolean {
  return HEX_COLOR.test(value);
}

export function parseHexColor(hex: string): RgbColor {
  if (!isHexColor(hex)) {
    throw new Error(`Invalid color "${hex}": expected #rrggbb`);
  }
  return {
    r: parseInt(hex.slice(1, 3), 16),
    g: parseInt(hex.slice(3, 5), 16),
    b: parseInt(hex.slice(5, 7), 16),
  };
}

export function toHexColor({ r, g, b }: RgbColor): string {
  const channel = (v: number) => Math.min(255, Math.max(0, Math.round(v))).toString(16).padStart(2, '0');
  return `#${channel(r)}${channel(g)}${channel(b)}`;
}

export function interpolateColor(from: string, to: string, ratio: number): string {
  const t = Math.min(1, Math.max(0, ratio));
  const a = parseHexColor(from);
  const b = parseHexColor(to);
  return toHexColor({
    r: a.r + (b.r - a.r) * t,
    g: a.g + (b.g - a.g) * t,
    b: a.b + (b.b - a.b) * t,
  });
}

export function percentileColor(scale: ColorScale, percentile: number): string {
  return interpolateColor(scale.low, scale.high, percentile / 100);
}
