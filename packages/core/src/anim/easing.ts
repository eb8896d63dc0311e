export type Ease = 'linear' | 'easeIn' | 'easeOut' | 'easeInOut';

export const DEFAULT_EASE: Ease = 'easeInOut';

export function clamp(v: number, a = 0, b = 1) {
  return Math.max(a, Math.min(b, v));
}

export const easingFns: Record<Ease, (t: number) => number> = {
  linear: (t) => t,
  easeIn: (t) => t * t,
  easeOut: (t) => 1 - (1 - t) * (1 - t),
  easeInOut: (t) => (t < 0.5 ? 2 * t * t : 1 - Math.pow(-2 * t + 2, 2) / 2),
};

export function isEase(value: unknown): value is Ease {
  return typeof value === 'string' && Object.hasOwn(easingFns, value);
}

/** Value at `progress` (0..1, clamped) along an eased path. */
export function interpolate(
  from: number,
  to: number,
  progress: number,
  ease: Ease = 'linear'
): number {
  const p = clamp(progress, 0, 1);
  if (p >= 1) return to;
  return from + (to - from) * easingFns[ease](p);
}
