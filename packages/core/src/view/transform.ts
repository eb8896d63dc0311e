import type { Affine } from './types';

export type Transform =
  | { kind: 'rotate'; angle: number } // degrees
  | { kind: 'scale'; x: number; y: number }
  | { kind: 'move'; x: number; y: number };

export const IDENTITY: Readonly<Affine> = Object.freeze({
  a: 1,
  b: 0,
  c: 0,
  d: 1,
  tx: 0,
  ty: 0,
});

/** `first` then `second`. */
export function concat(first: Affine, second: Affine): Affine {
  return {
    a: first.a * second.a + first.b * second.c,
    b: first.a * second.b + first.b * second.d,
    c: first.c * second.a + first.d * second.c,
    d: first.c * second.b + first.d * second.d,
    tx: first.tx * second.a + first.ty * second.c + second.tx,
    ty: first.tx * second.b + first.ty * second.d + second.ty,
  };
}

export function toAffine(t: Transform): Affine {
  switch (t.kind) {
    case 'rotate': {
      const rad = (t.angle * Math.PI) / 180;
      const cos = Math.cos(rad);
      const sin = Math.sin(rad);
      return { a: cos, b: sin, c: -sin, d: cos, tx: 0, ty: 0 };
    }
    case 'scale':
      return { a: t.x, b: 0, c: 0, d: t.y, tx: 0, ty: 0 };
    case 'move':
      return { a: 1, b: 0, c: 0, d: 1, tx: t.x, ty: t.y };
  }
}

/**
 * Fold transforms left to right. Each one is applied to points before the
 * ones already accumulated (rotate/scale/translate "by"), so
 * `[move(10, 0), scale(2, 2)]` scales first and then moves.
 *
 * Returns `undefined` for an empty list.
 */
export function composeTransforms(
  transforms: readonly Transform[]
): Affine | undefined {
  let acc: Affine | undefined;
  for (const t of transforms) {
    const m = toAffine(t);
    acc = acc ? concat(m, acc) : m;
  }
  return acc;
}

export const rotateBy = (angle: number): Transform => ({
  kind: 'rotate',
  angle,
});
export const scaleBy = (x: number, y: number): Transform => ({
  kind: 'scale',
  x,
  y,
});
export const moveBy = (x: number, y: number): Transform => ({
  kind: 'move',
  x,
  y,
});
