import type { Ease } from './easing';

/** Targets are addressed as `<kind>:<id>`, e.g. `view:card`. */
export type AnimationTarget = `${string}:${string}`;

export type PropReader = (el: unknown) => number | undefined;
export type PropWriter = (el: unknown, value: number) => void;

export interface PropHandlers {
  get?: PropReader;
  set?: PropWriter;
}

/**
 * Flags forwarded verbatim to the animation host. Core hosts read `easing`;
 * anything else is for custom hosts.
 */
export type AnimationOptions = Readonly<{
  easing?: Ease;
  [flag: string]: unknown;
}>;

export interface AnimationTiming {
  readonly duration: number; // ms
  readonly delay: number; // ms
  readonly options: AnimationOptions;
}

/**
 * Runs an effect inside an animated transaction.
 *
 * `done` must be called once when the transaction ends; `finished` is false
 * when the host cut the transaction short.
 */
export interface AnimationHost {
  animate(
    timing: AnimationTiming,
    effect: () => void,
    done: (finished: boolean) => void
  ): void;
}

export type CancelTimer = () => void;

export interface TimerFacility {
  schedule(ms: number, callback: () => void): CancelTimer;
}

export interface FrameScheduler {
  now(): number;
  request(callback: (now: number) => void): number;
  cancel(handle: number): void;
}

export interface PropertyAdapter {
  get(target: AnimationTarget, prop: string): number | undefined;
  set(target: AnimationTarget, prop: string, value: number): void;
  has(target: AnimationTarget): boolean;

  // called after set()s for a frame (lets host patch views efficiently)
  flush?: () => void;
}

export interface PropertyChange {
  readonly target: AnimationTarget;
  readonly prop: string;
  readonly from: number;
  readonly to: number;
}

export interface RecordableAdapter extends PropertyAdapter {
  /** Runs `effect` and reports every numeric property it changed. */
  record(effect: () => void): PropertyChange[];
}
