import type { AnimationOptions } from '../anim/adapter';
import type { Ease } from '../anim/easing';
import type { LayerAnimator } from '../anim/layerAnimator';
import { Animate } from '../chain/animate';
import { ChainConfigError } from '../errors';
import { parseColor, type ColorInput } from './color';
import { color, move, rotate, scale, transformed } from './effects';
import type { Transform } from './transform';
import type { ViewHandle } from './types';

export type ViewAnimationTiming = {
  duration: number; // ms
  delay?: number; // ms
  options?: AnimationOptions;
};

/** Extra time a corner wait gives the layer animation to report back. */
export const CORNER_TIMEOUT_SLACK_MS = 100;

function single(
  view: ViewHandle,
  timing: ViewAnimationTiming,
  effect: () => void
): Animate {
  return new Animate().animate(timing, effect, { target: view });
}

export function colorAnimation(
  view: ViewHandle,
  opts: ViewAnimationTiming & { color: ColorInput }
): Animate {
  const value = parseColor(opts.color);
  return single(view, opts, () => color(view, value));
}

export function scaleAnimation(
  view: ViewHandle,
  opts: ViewAnimationTiming & { x: number; y: number }
): Animate {
  return single(view, opts, () => scale(view, opts.x, opts.y));
}

/** `angle` in degrees. */
export function rotateAnimation(
  view: ViewHandle,
  opts: ViewAnimationTiming & { angle: number }
): Animate {
  return single(view, opts, () => rotate(view, opts.angle));
}

export function moveAnimation(
  view: ViewHandle,
  opts: ViewAnimationTiming & { x: number; y: number }
): Animate {
  return single(view, opts, () => move(view, opts.x, opts.y));
}

export function transformAnimation(
  view: ViewHandle,
  opts: ViewAnimationTiming & { transforms: readonly Transform[] }
): Animate {
  const transforms = [...opts.transforms];
  return single(view, opts, () => transformed(view, transforms));
}

export type CornerAnimationOptions = {
  duration: number; // ms
  radius: number;
  easing?: Ease;
  /** Hold the chain until the corner animation ends (default `true`). */
  wait?: boolean;
};

/**
 * Corner radius is animated by the layer animator, outside any host
 * transaction. With `wait` the chain holds on a wait step that the
 * animator's own completion releases; without it the animation is started
 * and the chain moves straight on.
 */
export function cornerAnimation(
  view: ViewHandle,
  opts: CornerAnimationOptions,
  animator: LayerAnimator
): Animate {
  const { duration, radius } = opts;
  if (!Number.isFinite(duration) || duration < 0) {
    throw new ChainConfigError(
      'INVALID_DURATION',
      `cornerAnimation(): duration must be a finite number >= 0 (got ${duration})`
    );
  }
  const easing = opts.easing ?? 'easeInOut';

  const start = (onComplete?: (finished: boolean) => void) =>
    animator.animate(
      view.target,
      'cornerRadius',
      { to: radius, duration, easing },
      onComplete
    );

  if (opts.wait === false) {
    return new Animate().do(
      () => {
        start();
      },
      { target: view }
    );
  }

  return new Animate().wait(
    duration + CORNER_TIMEOUT_SLACK_MS,
    (done) => {
      start(() => done());
    },
    { target: view }
  );
}
