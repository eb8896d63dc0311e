import type { AnimationOptions } from '../anim/adapter';
import { ChainConfigError } from '../errors';

/** Non-owning reference to whatever a step mutates. */
export interface WeakTarget {
  isAlive(): boolean;
}

export type Effect = () => void;
export type WaitEffect = (done: () => void) => void;
export type Evaluator = () => boolean;

interface StepBase {
  readonly target?: WeakTarget;
}

export interface ActionStep extends StepBase {
  readonly kind: 'action';
  readonly effect: Effect;
}

export interface AnimationStep extends StepBase {
  readonly kind: 'animation';
  readonly duration: number; // ms
  readonly delay: number; // ms
  readonly options: AnimationOptions;
  readonly effect: Effect;
}

export interface WaitStep extends StepBase {
  readonly kind: 'wait';
  readonly timeout: number; // ms
  readonly effect: WaitEffect;
}

export interface DecisionStep extends StepBase {
  readonly kind: 'decision';
  readonly evaluator: Evaluator;
}

export type Step = ActionStep | AnimationStep | WaitStep | DecisionStep;

export type StepKind = Step['kind'];

export interface StepTargetOptions {
  target?: WeakTarget;
}

export type AnimationStepTiming = {
  duration: number; // ms
  delay?: number; // ms
  options?: AnimationOptions;
};

function isNonNegative(v: number): boolean {
  return Number.isFinite(v) && v >= 0;
}

export function actionStep(effect: Effect, target?: WeakTarget): ActionStep {
  return target
    ? { kind: 'action', effect, target }
    : { kind: 'action', effect };
}

export function animationStep(
  timing: AnimationStepTiming,
  effect: Effect,
  target?: WeakTarget
): AnimationStep {
  const delay = timing.delay ?? 0;
  if (!isNonNegative(timing.duration)) {
    throw new ChainConfigError(
      'INVALID_DURATION',
      `animate(): duration must be a finite number >= 0 (got ${timing.duration})`
    );
  }
  if (!isNonNegative(delay)) {
    throw new ChainConfigError(
      'INVALID_DELAY',
      `animate(): delay must be a finite number >= 0 (got ${delay})`
    );
  }

  const step: AnimationStep = {
    kind: 'animation',
    duration: timing.duration,
    delay,
    options: { ...timing.options },
    effect,
  };
  return target ? { ...step, target } : step;
}

export function waitStep(
  timeout: number,
  effect: WaitEffect,
  target?: WeakTarget
): WaitStep {
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new ChainConfigError(
      'INVALID_TIMEOUT',
      `wait(): timeout must be a finite number > 0 (got ${timeout})`
    );
  }
  return target
    ? { kind: 'wait', timeout, effect, target }
    : { kind: 'wait', timeout, effect };
}

export function decisionStep(evaluator: Evaluator): DecisionStep {
  return { kind: 'decision', evaluator };
}
