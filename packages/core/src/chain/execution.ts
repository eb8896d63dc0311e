import type { CancelTimer } from '../anim/adapter';
import type { ResolvedAnimateConfig } from '../config';
import type { StepCompletion } from '../logger';
import type { Step } from './step';

export type ChainState =
  | 'idle'
  | 'running'
  | 'completed'
  | 'interrupted'
  | 'failed';

export type ChainOutcome = 'completed' | 'interrupted';

export interface ExecutionHooks {
  onFinish(outcome: ChainOutcome): void;
  onFail(error: unknown): void;
  /**
   * Re-throw effect errors to whoever drove the failing turn (the `run`
   * call, a host callback or a timer).
   */
  readonly propagateErrors: boolean;
}

/** One in-flight run over a fixed step list. */
export interface ExecutionHandle {
  readonly cursor: number;
  readonly finished: boolean;
  start(): void;
}

type Dispatch = 'advance' | 'suspend' | 'stop';

export function createExecution(
  steps: readonly Step[],
  config: ResolvedAnimateConfig,
  hooks: ExecutionHooks
): ExecutionHandle {
  const { host, timer, logger, label } = config;

  let cursor = 0;
  let stepsRun = 0;
  let done = false;
  let started = false;
  let dispatching = false;
  let resumeRequested = false;
  let pendingTimer: CancelTimer | null = null;

  function finish(outcome: ChainOutcome) {
    done = true;
    logger.logRunFinished({ label, outcome, stepsRun });
    hooks.onFinish(outcome);
  }

  function fail(error: unknown) {
    done = true;
    pendingTimer?.();
    pendingTimer = null;
    logger.logError(`${label}: step ${cursor} threw`, error);
    logger.logRunFinished({ label, outcome: 'failed', stepsRun });
    hooks.onFail(error);
  }

  /** Completion signal for the async step at `index`; first call wins. */
  function signalFor(index: number) {
    const step = steps[index];
    let settled = false;
    return (via: StepCompletion, finished?: boolean) => {
      if (settled || done || step === undefined) return;
      settled = true;
      logger.logStepCompleted({ label, index, kind: step.kind, via, finished });
      cursor = index + 1;
      resume();
    };
  }

  function dispatch(step: Step, index: number): Dispatch {
    stepsRun += 1;

    if (step.target && !step.target.isAlive()) {
      logger.logStepCompleted({
        label,
        index,
        kind: step.kind,
        via: 'target-gone',
      });
      return 'advance';
    }

    logger.logStepStarted({ label, index, kind: step.kind });

    switch (step.kind) {
      case 'decision': {
        if (!step.evaluator()) {
          finish('interrupted');
          return 'stop';
        }
        logger.logStepCompleted({
          label,
          index,
          kind: step.kind,
          via: 'effect',
        });
        return 'advance';
      }

      case 'action': {
        step.effect();
        logger.logStepCompleted({
          label,
          index,
          kind: step.kind,
          via: 'effect',
        });
        return 'advance';
      }

      case 'animation': {
        const signal = signalFor(index);
        host.animate(
          { duration: step.duration, delay: step.delay, options: step.options },
          step.effect,
          (finished) => signal('host', finished)
        );
        return 'suspend';
      }

      case 'wait': {
        const signal = signalFor(index);
        const { timeout } = step;
        let cancel: CancelTimer | null = null;
        let timedOut = false;
        let lateReported = false;
        const settle = (via: 'handle' | 'timeout') => {
          if (via === 'handle' && timedOut) {
            if (lateReported) return;
            lateReported = true;
            logger.logWarning(
              `${label}#${index}: wait handle called after its ${timeout} ms timeout`
            );
            return;
          }
          if (via === 'timeout') timedOut = true;
          if (cancel === pendingTimer) pendingTimer = null;
          cancel?.();
          signal(via);
        };
        cancel = timer.schedule(timeout, () => settle('timeout'));
        pendingTimer = cancel;
        step.effect(() => settle('handle'));
        return 'suspend';
      }
    }
  }

  function pump() {
    while (!done) {
      const step = steps[cursor];
      if (step === undefined) {
        finish('completed');
        return;
      }
      const index = cursor;
      const result = dispatch(step, index);
      if (result !== 'advance') return;
      if (cursor === index) cursor = index + 1;
    }
  }

  // Async completions can land while a dispatch is still on the stack (a host
  // that calls back synchronously, a handle fired inside its effect). They
  // only flag a resume; the outer loop picks it up, so the stack stays flat.
  function resume() {
    if (dispatching) {
      resumeRequested = true;
      return;
    }
    dispatching = true;
    try {
      do {
        resumeRequested = false;
        pump();
      } while (resumeRequested && !done);
    } catch (error) {
      if (!done) fail(error);
      if (hooks.propagateErrors) throw error;
    } finally {
      dispatching = false;
    }
  }

  return {
    get cursor() {
      return cursor;
    },
    get finished() {
      return done;
    },
    start() {
      if (started) return;
      started = true;
      logger.logRunStarted({ label, stepCount: steps.length });
      resume();
    },
  };
}
