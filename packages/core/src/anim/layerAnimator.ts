import type {
  AnimationTarget,
  CancelTimer,
  FrameScheduler,
  PropertyAdapter,
} from './adapter';
import { DEFAULT_EASE, interpolate, type Ease } from './easing';
import { createFrameScheduler } from './timers';

export interface LayerTween {
  to: number;
  duration: number; // ms
  easing?: Ease;
  /** Starting value. If omitted, the animator captures it from the adapter. */
  from?: number;
}

export interface LayerAnimator {
  /**
   * Tween one property outside any transaction. `onComplete` fires once:
   * `true` at the end, `false` if the target went away first. Cancelling
   * suppresses it.
   */
  animate(
    target: AnimationTarget,
    prop: string,
    tween: LayerTween,
    onComplete?: (finished: boolean) => void
  ): CancelTimer;
}

export function createLayerAnimator(opts: {
  adapter: PropertyAdapter;
  frames?: FrameScheduler;
}): LayerAnimator {
  const { adapter } = opts;
  const frames = opts.frames ?? createFrameScheduler();

  return {
    animate(target, prop, tween, onComplete) {
      const from = tween.from ?? adapter.get(target, prop) ?? tween.to;
      const ease = tween.easing ?? DEFAULT_EASE;
      let startTime: number | null = null;
      let frame: number | null = null;
      let settled = false;

      const finish = (finished: boolean) => {
        if (settled) return;
        settled = true;
        frame = null;
        onComplete?.(finished);
      };

      function tick(now: number) {
        if (!adapter.has(target)) {
          finish(false);
          return;
        }
        if (startTime === null) startTime = now;
        const elapsed = now - startTime;
        const progress = tween.duration <= 0 ? 1 : elapsed / tween.duration;
        adapter.set(target, prop, interpolate(from, tween.to, progress, ease));
        adapter.flush?.();
        if (progress >= 1) {
          finish(true);
          return;
        }
        frame = frames.request(tick);
      }

      frame = frames.request(tick);

      return () => {
        if (settled) return;
        settled = true;
        if (frame !== null) frames.cancel(frame);
        frame = null;
      };
    },
  };
}
