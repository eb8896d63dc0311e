import type { FrameScheduler, TimerFacility } from './adapter';

const FALLBACK_FRAME_MS = 16;

/** Timer over the global `setTimeout`, looked up on every call. */
export function createTimerFacility(): TimerFacility {
  return {
    schedule(ms, callback) {
      const id = setTimeout(callback, Math.max(0, ms));
      return () => clearTimeout(id);
    },
  };
}

/**
 * Frames from `requestAnimationFrame` when the global exists, otherwise a
 * `setTimeout` tick (Node, workers).
 */
export function createFrameScheduler(): FrameScheduler {
  const now = () => performance.now();

  if (typeof globalThis.requestAnimationFrame === 'function') {
    return {
      now,
      request: (cb) => globalThis.requestAnimationFrame(cb),
      cancel: (handle) => globalThis.cancelAnimationFrame(handle),
    };
  }

  let nextHandle = 1;
  const pending = new Map<number, ReturnType<typeof setTimeout>>();

  return {
    now,
    request(cb) {
      const handle = nextHandle++;
      pending.set(
        handle,
        setTimeout(() => {
          pending.delete(handle);
          cb(now());
        }, FALLBACK_FRAME_MS)
      );
      return handle;
    },
    cancel(handle) {
      const id = pending.get(handle);
      if (id === undefined) return;
      clearTimeout(id);
      pending.delete(handle);
    },
  };
}
