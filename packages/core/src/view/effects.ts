import { parseColor, type ColorInput } from './color';
import { composeTransforms, type Transform } from './transform';
import type { ViewHandle } from './types';

/**
 * Replace the view's transform with the composition of `transforms`.
 * An empty list leaves the transform as it is.
 */
export function transformed(
  view: ViewHandle,
  transforms: readonly Transform[]
): void {
  const m = composeTransforms(transforms);
  if (!m) return;
  view.write('transform.a', m.a);
  view.write('transform.b', m.b);
  view.write('transform.c', m.c);
  view.write('transform.d', m.d);
  view.write('transform.tx', m.tx);
  view.write('transform.ty', m.ty);
}

export function move(view: ViewHandle, x: number, y: number): void {
  transformed(view, [{ kind: 'move', x, y }]);
}

/** Degrees. */
export function rotate(view: ViewHandle, angle: number): void {
  transformed(view, [{ kind: 'rotate', angle }]);
}

export function scale(view: ViewHandle, x: number, y: number): void {
  transformed(view, [{ kind: 'scale', x, y }]);
}

export function color(view: ViewHandle, value: ColorInput): void {
  const rgba = parseColor(value);
  view.write('backgroundColor.r', rgba.r);
  view.write('backgroundColor.g', rgba.g);
  view.write('backgroundColor.b', rgba.b);
  view.write('backgroundColor.a', rgba.a);
}
