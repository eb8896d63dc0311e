import type { AnimationHost, TimerFacility } from './adapter';
import { createTimerFacility } from './timers';

/**
 * Default host: applies the effect at once and reports completion when
 * `delay + duration` has elapsed on the timer. Completion is never
 * synchronous, not even for a zero-length animation.
 */
export function createTimedHost(opts?: {
  timer?: TimerFacility;
}): AnimationHost {
  const timer = opts?.timer ?? createTimerFacility();

  return {
    animate(timing, effect, done) {
      effect();
      timer.schedule(timing.delay + timing.duration, () => done(true));
    },
  };
}
