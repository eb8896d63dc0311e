import type {
  AnimationHost,
  AnimationTiming,
  FrameScheduler,
} from '../anim/adapter';
import type { LoggerConsole } from '../logger';

export type ManualFrames = FrameScheduler & {
  /** Move the clock forward and run every frame callback queued so far. */
  advance(ms: number): void;
  pending(): number;
};

export function createManualFrames(): ManualFrames {
  let time = 0;
  let nextHandle = 1;
  let queue = new Map<number, (now: number) => void>();

  return {
    now: () => time,
    request(cb) {
      const handle = nextHandle++;
      queue.set(handle, cb);
      return handle;
    },
    cancel(handle) {
      queue.delete(handle);
    },
    advance(ms) {
      time += ms;
      const due = [...queue.values()];
      queue = new Map();
      for (const cb of due) cb(time);
    },
    pending: () => queue.size,
  };
}

export type ManualHost = {
  host: AnimationHost;
  /** Every timing the host was asked to animate, in order. */
  timings: AnimationTiming[];
  pending(): number;
  /** Report completion of the oldest unfinished animation. */
  completeNext(finished?: boolean): void;
};

/** Host that applies effects at once and completes only when told to. */
export function createManualHost(): ManualHost {
  const timings: AnimationTiming[] = [];
  const open: Array<(finished: boolean) => void> = [];

  return {
    host: {
      animate(timing, effect, done) {
        timings.push(timing);
        effect();
        open.push(done);
      },
    },
    timings,
    pending: () => open.length,
    completeNext(finished = true) {
      const done = open.shift();
      done?.(finished);
    },
  };
}

export type RecordingConsole = LoggerConsole & {
  lines: string[];
  warnings: string[];
  errors: unknown[][];
};

export function createRecordingConsole(): RecordingConsole {
  const lines: string[] = [];
  const warnings: string[] = [];
  const errors: unknown[][] = [];
  return {
    lines,
    warnings,
    errors,
    log: (...args) => {
      lines.push(args.map(String).join(' '));
    },
    warn: (...args) => {
      warnings.push(args.map(String).join(' '));
    },
    error: (...args) => {
      errors.push(args);
    },
  };
}
