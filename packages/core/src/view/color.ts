import { ChainConfigError } from '../errors';
import type { Rgba } from './types';

export type ColorInput = string | Rgba;

const HEX = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

function channel(hex: string): number {
  return parseInt(hex, 16);
}

/** Accepts `#rgb`, `#rrggbb`, `#rrggbbaa` or an `Rgba` object. */
export function parseColor(input: ColorInput): Rgba {
  if (typeof input !== 'string') {
    return {
      r: Math.min(255, Math.max(0, input.r)),
      g: Math.min(255, Math.max(0, input.g)),
      b: Math.min(255, Math.max(0, input.b)),
      a: Math.min(1, Math.max(0, input.a)),
    };
  }

  const match = HEX.exec(input.trim());
  const digits = match?.[1];
  if (digits === undefined) {
    throw new ChainConfigError(
      'INVALID_COLOR',
      `parseColor(): expected #rgb, #rrggbb or #rrggbbaa (got "${input}")`
    );
  }

  if (digits.length === 3) {
    const [r = '0', g = '0', b = '0'] = digits.split('');
    return { r: channel(r + r), g: channel(g + g), b: channel(b + b), a: 1 };
  }

  return {
    r: channel(digits.slice(0, 2)),
    g: channel(digits.slice(2, 4)),
    b: channel(digits.slice(4, 6)),
    a: digits.length === 8 ? channel(digits.slice(6, 8)) / 255 : 1,
  };
}
