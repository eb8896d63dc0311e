import type { StepKind } from './chain/step';

export type StepCompletion =
  | 'effect'
  | 'host'
  | 'handle'
  | 'timeout'
  | 'target-gone';

export type RunOutcomeLabel = 'completed' | 'interrupted' | 'failed';

export interface RunStartedLogEntry {
  readonly label: string;
  readonly stepCount: number;
}

export interface StepLogEntry {
  readonly label: string;
  readonly index: number;
  readonly kind: StepKind;
}

export interface StepCompletedLogEntry extends StepLogEntry {
  readonly via: StepCompletion;
  /** Only reported for animation steps, as given by the host. */
  readonly finished?: boolean;
}

export interface RunFinishedLogEntry {
  readonly label: string;
  readonly outcome: RunOutcomeLabel;
  readonly stepsRun: number;
}

/** The subset of `console` the logger writes to (swappable in tests). */
export interface LoggerConsole {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export interface ChainLogger {
  readonly enabled: boolean;
  setEnabled(enabled: boolean): void;
  logRunStarted(entry: RunStartedLogEntry): void;
  logStepStarted(entry: StepLogEntry): void;
  logStepCompleted(entry: StepCompletedLogEntry): void;
  logRunFinished(entry: RunFinishedLogEntry): void;
  logWarning(message: string): void;
  logError(message: string, error: unknown): void;
}

export interface CreateChainLoggerOptions {
  readonly console?: LoggerConsole;
  readonly enabled?: boolean;
}

export function createChainLogger(
  options?: CreateChainLoggerOptions
): ChainLogger {
  const cons: LoggerConsole = options?.console ?? globalThis.console;
  let enabled = options?.enabled ?? false;

  return {
    get enabled(): boolean {
      return enabled;
    },

    setEnabled(value: boolean): void {
      enabled = value;
    },

    logRunStarted(entry: RunStartedLogEntry): void {
      if (!enabled) return;
      cons.log(`[Chain] ${entry.label}: run started (${entry.stepCount} steps)`);
    },

    logStepStarted(entry: StepLogEntry): void {
      if (!enabled) return;
      cons.log(`[Step] ${entry.label}#${entry.index}: ${entry.kind} started`);
    },

    logStepCompleted(entry: StepCompletedLogEntry): void {
      if (!enabled) return;
      const prefix = entry.via === 'timeout' ? '[Wait]' : '[Step]';
      const finished =
        entry.finished === undefined ? '' : `, finished=${entry.finished}`;
      cons.log(
        `${prefix} ${entry.label}#${entry.index}: ${entry.kind} completed via ${entry.via}${finished}`
      );
    },

    logRunFinished(entry: RunFinishedLogEntry): void {
      if (!enabled) return;
      cons.log(
        `[Chain] ${entry.label}: ${entry.outcome} after ${entry.stepsRun} steps`
      );
    },

    logWarning(message: string): void {
      cons.warn(`[Chain] ${message}`);
    },

    logError(message: string, error: unknown): void {
      cons.error(`[Chain] ${message}`, error);
    },
  };
}
