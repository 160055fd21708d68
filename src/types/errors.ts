/**
 * Error codes for invariant violations and rejected requests.
 */

export type SimulationErrorCode =
  | 'INVALID_SIDE'
  | 'INVALID_ORDER'
  | 'DUPLICATE_ORDER'
  | 'UNKNOWN_TRADER'
  | 'INVALID_CONFIG'
  | 'RUN_NOT_FOUND'
  | 'RUN_FINISHED'
  | 'RUN_LIMIT_REACHED'
  | 'TICK_LIMIT_EXCEEDED';

export class SimulationError extends Error {
  public readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string) {
    super(message);
    this.name = 'SimulationError';
    this.code = code;
  }
}

export function isSimulationError(error: unknown): error is SimulationError {
  return error instanceof SimulationError;
}

/**
 * Exhaustiveness guard for order sides arriving from untyped input.
 */
export function invalidSide(side: never): never {
  throw new SimulationError('INVALID_SIDE', `Invalid order side: ${String(side)}`);
}
