export type SimulatorErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "UNKNOWN_POSITION"
  | "UNKNOWN_POOL"
  | "NOT_OWNER"
  | "DEADLINE_EXPIRED"
  | "INVALID_REQUEST"
  | "NATIVE_TRANSFER_FAILED";

/**
 * A simulated contract call reverted.
 */
export class SimulatorError extends Error {
  public readonly code: SimulatorErrorCode;

  constructor(code: SimulatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SimulatorError";
    this.code = code;
  }
}
