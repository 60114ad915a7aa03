export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "INSUFFICIENT_HISTORY"; available: number; required: number };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function insufficientHistory<T>(available: number, required: number): Result<T> {
  return { ok: false, reason: "INSUFFICIENT_HISTORY", available, required };
}

/**
 * Operational failures: recovered per asset inside a cycle, never fatal.
 */
export class InvalidPriceError extends Error {
  name = "InvalidPriceError";
  constructor(readonly asset: string, readonly venue: string, readonly price: number) {
    super(`Invalid price ${price} for ${asset} on ${venue}`);
  }
}

export class OutOfOrderSampleError extends Error {
  name = "OutOfOrderSampleError";
  constructor(readonly asset: string, readonly venue: string, readonly timestamp: Date, readonly lastTimestamp: Date) {
    super(
      `Sample for ${asset} on ${venue} at ${timestamp.toISOString()} is older than ${lastTimestamp.toISOString()}`
    );
  }
}

export class InsufficientFundsError extends Error {
  name = "InsufficientFundsError";
  constructor(readonly venue: string, readonly requested: number, readonly available: number) {
    super(`Insufficient cash on ${venue}: requested ${requested}, available ${available}`);
  }
}

export class InsufficientHoldingError extends Error {
  name = "InsufficientHoldingError";
  constructor(readonly venue: string, readonly asset: string, readonly delta: number, readonly available: number) {
    super(`Insufficient ${asset} on ${venue}: delta ${delta}, available ${available}`);
  }
}

/**
 * Raised only on malformed internal calls. Anything extending this halts the bot.
 */
export class ContractViolationError extends Error {
  name = "ContractViolationError";
}

export class InvalidAmountError extends ContractViolationError {
  name = "InvalidAmountError";
  constructor(message: string) {
    super(message);
  }
}

export function isContractViolation(error: unknown): error is ContractViolationError {
  return error instanceof ContractViolationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
