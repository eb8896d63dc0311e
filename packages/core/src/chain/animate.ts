import { resolveConfig, type AnimateConfig } from '../config';
import { ChainStateError } from '../errors';
import {
  createExecution,
  type ChainOutcome,
  type ChainState,
  type ExecutionHandle,
  type ExecutionHooks,
} from './execution';
import {
  actionStep,
  animationStep,
  decisionStep,
  waitStep,
  type AnimationStepTiming,
  type Effect,
  type Evaluator,
  type Step,
  type StepTargetOptions,
  type WaitEffect,
} from './step';

export type RunCompletion = (interrupted: boolean) => void;

/**
 * Fluent builder for a sequence of steps, and the executor that plays it.
 *
 * - Steps run strictly one after another, in the order they were appended.
 * - Nothing runs until `run()` / `perform()`; a chain runs once.
 *
 * ```ts
 * new Animate()
 *   .do(() => badge.write('opacity', 1))
 *   .animate({ duration: 300 }, () => scale(badge, 1.2, 1.2))
 *   .decide(() => stillVisible)
 *   .then(cornerAnimation(badge, { duration: 200, radius: 12 }, animator))
 *   .run((interrupted) => console.log({ interrupted }));
 * ```
 */
export class Animate {
  private readonly steps: Step[] = [];
  private config: AnimateConfig;
  private current: ChainState = 'idle';
  private execution: ExecutionHandle | null = null;

  constructor(config: AnimateConfig = {}) {
    this.config = { ...config };
  }

  get state(): ChainState {
    return this.current;
  }

  get length(): number {
    return this.steps.length;
  }

  /** Index of the step in flight (or past the end once finished). */
  get cursor(): number {
    return this.execution?.cursor ?? 0;
  }

  /** Merge runtime settings (host, timer, logger, label). */
  configure(config: AnimateConfig): this {
    this.assertIdle('configure');
    this.config = { ...this.config, ...config };
    return this;
  }

  /** Append a synchronous action. */
  do(effect: Effect, opts?: StepTargetOptions): this {
    this.assertIdle('do');
    this.steps.push(actionStep(effect, opts?.target));
    return this;
  }

  /**
   * Append an animation. The host runs `effect` inside an animated
   * transaction; the chain moves on when the host reports completion.
   *
   * Throws `ChainConfigError` for a negative or non-finite duration or delay.
   */
  animate(
    timing: AnimationStepTiming,
    effect: Effect,
    opts?: StepTargetOptions
  ): this {
    this.assertIdle('animate');
    this.steps.push(animationStep(timing, effect, opts?.target));
    return this;
  }

  /**
   * Append a step that finishes when `effect` calls `done`, or after
   * `timeout` ms, whichever comes first. Extra `done` calls are ignored.
   */
  wait(timeout: number, effect: WaitEffect, opts?: StepTargetOptions): this {
    this.assertIdle('wait');
    this.steps.push(waitStep(timeout, effect, opts?.target));
    return this;
  }

  /** Append a check; `false` ends the run as interrupted. */
  decide(evaluator: Evaluator): this {
    this.assertIdle('decide');
    this.steps.push(decisionStep(evaluator));
    return this;
  }

  /** Append a snapshot of another chain's steps. */
  then(other: Animate): this {
    this.assertIdle('then');
    // Snapshot first so `then(this)` appends the current steps once.
    for (const step of [...other.steps]) this.steps.push(step);
    return this;
  }

  /**
   * Start the chain. `completion` fires once with `interrupted` set when a
   * decision stopped it. Throws `ChainStateError` unless the chain is idle.
   */
  run(completion?: RunCompletion): void {
    this.start({
      onFinish: (outcome) => completion?.(outcome === 'interrupted'),
      onFail: () => {
        // re-thrown to the caller by the execution
      },
      propagateErrors: true,
    });
  }

  /** Promise form of `run()`; rejects if an effect throws. */
  perform(): Promise<ChainOutcome> {
    return new Promise<ChainOutcome>((resolve, reject) => {
      this.start({
        onFinish: resolve,
        onFail: reject,
        propagateErrors: false,
      });
    });
  }

  private start(hooks: ExecutionHooks) {
    if (this.current === 'running') {
      throw new ChainStateError(
        'CHAIN_RUNNING',
        'Animate.run(): chain is already running'
      );
    }
    if (this.current !== 'idle') {
      throw new ChainStateError(
        'CHAIN_FINISHED',
        `Animate.run(): chain already ${this.current}; build a new chain (or copy it with new Animate().then(chain))`
      );
    }

    this.current = 'running';
    this.execution = createExecution(
      [...this.steps],
      resolveConfig(this.config),
      {
        onFinish: (outcome) => {
          this.current = outcome;
          hooks.onFinish(outcome);
        },
        onFail: (error) => {
          this.current = 'failed';
          hooks.onFail(error);
        },
        propagateErrors: hooks.propagateErrors,
      }
    );
    this.execution.start();
  }

  private assertIdle(method: string) {
    if (this.current !== 'idle') {
      throw new ChainStateError(
        'CHAIN_LOCKED',
        `Animate.${method}(): chain is ${this.current} and can no longer be changed`
      );
    }
  }
}
