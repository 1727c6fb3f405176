import { DEFAULT_HABIT_COLOR } from '../domain/habits';

export type RgbaColor = {
  /** 0-255 */
  r: number;
  g: number;
  b: number;
  /** 0-1 */
  a: number;
};

const HEX_DIGITS = /^[0-9a-fA-F]+$/;

/**
 * `RGB`, `RRGGBB` or `AARRGGBB`, with or without `#`. Anything else is null.
 * Note the 8-digit form puts alpha first.
 */
export function parseHexColor(hex: string): RgbaColor | null {
  const raw = hex.trim().replace(/^#/, '');
  if (!HEX_DIGITS.test(raw)) return null;

  const byte = (offset: number) => parseInt(raw.slice(offset, offset + 2), 16);

  switch (raw.length) {
    case 3: {
      const [r, g, b] = raw.split('').map((c) => parseInt(c + c, 16));
      return { r, g, b, a: 1 };
    }
    case 6:
      return { r: byte(0), g: byte(2), b: byte(4), a: 1 };
    case 8:
      return { r: byte(2), g: byte(4), b: byte(6), a: byte(0) / 255 };
    default:
      return null;
  }
}

export function isValidHexColor(hex: string): boolean {
  return parseHexColor(hex) !== null;
}

export function resolveHabitColor(hex: string | null | undefined): string {
  if (hex && isValidHexColor(hex)) return hex.trim();
  return DEFAULT_HABIT_COLOR;
}

export function hexToRgba(hex: string, alpha: number): string {
  const a = Math.max(0, Math.min(1, alpha));
  const parsed = parseHexColor(hex);
  if (!parsed) {
    return `rgba(0,0,0,${a})`;
  }
  return `rgba(${parsed.r},${parsed.g},${parsed.b},${a})`;
}
