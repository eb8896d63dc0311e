import type { AnimationHost, TimerFacility } from './anim/adapter';
import { createTimedHost } from './anim/timedHost';
import { createTimerFacility } from './anim/timers';
import { createChainLogger, type ChainLogger } from './logger';

export interface AnimateConfig {
  /** Runs animation steps. Defaults to a timed host on `timer`. */
  host?: AnimationHost;
  /** Drives wait-step timeouts (and the default host). */
  timer?: TimerFacility;
  logger?: ChainLogger;
  /** Shown in log lines. */
  label?: string;
}

export interface ResolvedAnimateConfig {
  readonly host: AnimationHost;
  readonly timer: TimerFacility;
  readonly logger: ChainLogger;
  readonly label: string;
}

export const DEFAULT_CHAIN_LABEL = 'chain';

export function resolveConfig(config: AnimateConfig): ResolvedAnimateConfig {
  const timer = config.timer ?? createTimerFacility();
  return {
    timer,
    host: config.host ?? createTimedHost({ timer }),
    logger: config.logger ?? createChainLogger(),
    label: config.label ?? DEFAULT_CHAIN_LABEL,
  };
}
