/**
 * Error types for the simulation core.
 *
 * ContractViolation marks programmer error (bad indices, oversize menus, bad
 * weight tables) and is never caught inside the core. GenerationError and
 * SnapshotError describe failures a caller can recover from.
 */

export class ContractViolation extends Error {
  readonly name = "ContractViolation";

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ContractViolation);
    }
  }
}

/** Throw a ContractViolation unless the condition holds. */
export function assertContract(
  condition: boolean,
  message: string,
  details?: Record<string, unknown>,
): asserts condition {
  if (!condition) {
    throw new ContractViolation(message, details);
  }
}

export type GenerationErrorCode = "NO_ROOMS";

export class GenerationError extends Error {
  readonly name = "GenerationError";

  constructor(
    public readonly code: GenerationErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }
}

export type SnapshotErrorCode =
  | "NOT_FOUND"
  | "READ_FAILED"
  | "WRITE_FAILED"
  | "PARSE_FAILED"
  | "VERSION_MISMATCH"
  | "INVALID";

export class SnapshotError extends Error {
  readonly name = "SnapshotError";

  constructor(
    public readonly code: SnapshotErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SnapshotError);
    }
  }
}
