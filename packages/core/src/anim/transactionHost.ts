import type {
  AnimationHost,
  FrameScheduler,
  PropertyChange,
  RecordableAdapter,
} from './adapter';
import { DEFAULT_EASE, isEase, interpolate, type Ease } from './easing';
import { createFrameScheduler } from './timers';

function applyAt(
  adapter: RecordableAdapter,
  changes: readonly PropertyChange[],
  local: number,
  duration: number,
  ease: Ease
) {
  const progress = duration <= 0 ? (local >= 0 ? 1 : 0) : local / duration;
  for (const c of changes) {
    // Views removed mid-transaction are skipped; set() ignores them anyway.
    if (!adapter.has(c.target)) continue;
    adapter.set(c.target, c.prop, interpolate(c.from, c.to, progress, ease));
  }
  adapter.flush?.();
}

/**
 * Host that tweens whatever the effect changed.
 *
 * The effect runs against `adapter` in record mode, so it sees (and leaves
 * behind) its final values. Every changed property is rewound to its prior
 * value and then driven frame by frame to the final one.
 */
export function createTransactionHost(opts: {
  adapter: RecordableAdapter;
  frames?: FrameScheduler;
}): AnimationHost {
  const { adapter } = opts;
  const frames = opts.frames ?? createFrameScheduler();

  return {
    animate(timing, effect, done) {
      const changes = adapter.record(effect);
      const ease = isEase(timing.options.easing)
        ? timing.options.easing
        : DEFAULT_EASE;
      const total = timing.delay + timing.duration;

      applyAt(adapter, changes, -1, timing.duration, ease);

      let startTime: number | null = null;

      function tick(now: number) {
        if (startTime === null) startTime = now;
        const elapsed = now - startTime;
        applyAt(
          adapter,
          changes,
          elapsed - timing.delay,
          timing.duration,
          ease
        );
        if (elapsed >= total) {
          done(true);
          return;
        }
        frames.request(tick);
      }

      // First frame only pins the clock; nothing completes synchronously.
      frames.request(tick);
    },
  };
}
