/**
 * Typed errors for the consensus pipeline.
 *
 * GeneratorError           the text generator failed (network, HTTP status, timeout, bad stream)
 * RankingParseError        model output held no usable ranking
 * InvariantViolationError  a caller broke an input contract
 * CancelledError           the run was aborted
 * ElectionImpossibleError  fewer than two candidates or no voters
 * ConsensusFailedError     every group at a recursion level failed
 */

export type GeneratorErrorKind = "connection" | "status" | "timeout" | "protocol";

export class GeneratorError extends Error {
  readonly kind: GeneratorErrorKind;
  readonly status?: number;

  constructor(kind: GeneratorErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "GeneratorError";
    this.kind = kind;
    this.status = options?.status;
  }
}

export type RankingParseFailure =
  | "no_json"
  | "missing_field"
  | "not_a_list"
  | "non_integer"
  | "wrong_length"
  | "invalid_indices";

export class RankingParseError extends Error {
  readonly reason: RankingParseFailure;

  constructor(reason: RankingParseFailure, message: string) {
    super(message);
    this.name = "RankingParseError";
    this.reason = reason;
  }
}

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export class CancelledError extends Error {
  constructor(message = "Consensus run cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export class ElectionImpossibleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ElectionImpossibleError";
  }
}

export class ConsensusFailedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConsensusFailedError";
  }
}

/** Throw a CancelledError when the signal has fired. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError();
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
