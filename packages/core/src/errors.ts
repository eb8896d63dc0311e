export type ChainConfigErrorCode =
  | 'INVALID_DURATION'
  | 'INVALID_DELAY'
  | 'INVALID_TIMEOUT'
  | 'INVALID_COLOR';

export type ChainStateErrorCode =
  | 'CHAIN_RUNNING'
  | 'CHAIN_FINISHED'
  | 'CHAIN_LOCKED';

export type ChainErrorCode = ChainConfigErrorCode | ChainStateErrorCode;

export class ChainError extends Error {
  readonly code: ChainErrorCode;

  constructor(code: ChainErrorCode, message: string) {
    super(message);
    this.name = 'ChainError';
    this.code = code;
  }
}

/** Raised at append time for a step whose timing or value is unusable. */
export class ChainConfigError extends ChainError {
  declare readonly code: ChainConfigErrorCode;

  constructor(code: ChainConfigErrorCode, message: string) {
    super(code, message);
    this.name = 'ChainConfigError';
  }
}

/** Raised when a chain is run or modified outside the `idle` state. */
export class ChainStateError extends ChainError {
  declare readonly code: ChainStateErrorCode;

  constructor(code: ChainStateErrorCode, message: string) {
    super(code, message);
    this.name = 'ChainStateError';
  }
}

export function isChainError(err: unknown): err is ChainError {
  return err instanceof ChainError;
}
