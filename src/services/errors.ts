import { isError } from "ethers";

export type ErrorKind = "transient" | "rejection" | "permanent" | "race" | "programming";

export class ResolutionError extends Error {
  readonly kind: ErrorKind;
  /** whether the failure uses up one of the request's bounded attempts */
  readonly consumesAttempt: boolean;

  constructor(message: string, kind: ErrorKind, consumesAttempt = kind !== "transient") {
    super(message);
    this.name = "ResolutionError";
    this.kind = kind;
    this.consumesAttempt = consumesAttempt;
  }
}

export class ClockSyncError extends ResolutionError {
  constructor(message: string) {
    super(message, "transient");
    this.name = "ClockSyncError";
  }
}

export class GenerationError extends ResolutionError {
  constructor(message: string) {
    super(message, "transient");
    this.name = "GenerationError";
  }
}

export class UnusableCodeError extends ResolutionError {
  constructor(message: string) {
    super(message, "rejection");
    this.name = "UnusableCodeError";
  }
}

export class SandboxUnavailableError extends ResolutionError {
  constructor(message: string) {
    super(message, "transient");
    this.name = "SandboxUnavailableError";
  }
}

export class ExecutionTimeoutError extends ResolutionError {
  constructor(timeoutMs: number) {
    super(`Execution timed out after ${timeoutMs}ms`, "transient", true);
    this.name = "ExecutionTimeoutError";
  }
}

export class ExecutionFailedError extends ResolutionError {
  constructor(message: string) {
    super(message, "rejection");
    this.name = "ExecutionFailedError";
  }
}

export class TransientChainError extends ResolutionError {
  constructor(message: string) {
    super(message, "transient");
    this.name = "TransientChainError";
  }
}

export class SettlementRevertedError extends ResolutionError {
  readonly txHash: string | null;

  constructor(message: string, txHash: string | null = null) {
    super(message, "permanent");
    this.name = "SettlementRevertedError";
    this.txHash = txHash;
  }
}

/** Signed settlement bytes that can never be mined because their nonce went to another transaction. */
export class DroppedTransactionError extends ResolutionError {
  readonly txHash: string;

  constructor(txHash: string, message: string) {
    super(`Transaction ${txHash} was dropped: ${message}`, "transient");
    this.name = "DroppedTransactionError";
    this.txHash = txHash;
  }
}

export class UnauthorizedSignerError extends ResolutionError {
  constructor(signer: string) {
    super(`Signer ${signer} is not authorized to settle`, "permanent");
    this.name = "UnauthorizedSignerError";
  }
}

export class IllegalTransitionError extends ResolutionError {
  constructor(requestId: string, from: string, to: string) {
    super(`Illegal transition ${from} → ${to} for request ${requestId}`, "programming");
    this.name = "IllegalTransitionError";
  }
}

export class RequestNotFoundError extends ResolutionError {
  constructor(requestId: string) {
    super(`Request not found: ${requestId}`, "programming");
    this.name = "RequestNotFoundError";
  }
}

export class OverrideConflictError extends ResolutionError {
  constructor(message: string) {
    super(message, "programming");
    this.name = "OverrideConflictError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

const TRANSIENT_RPC_CODES = [
  "NETWORK_ERROR",
  "TIMEOUT",
  "SERVER_ERROR",
  "NONCE_EXPIRED",
  "REPLACEMENT_UNDERPRICED",
  "UNKNOWN_ERROR",
] as const;

/** Maps anything thrown by a collaborator onto the error taxonomy. Unknown faults are transient. */
export function classifyError(e: unknown): ResolutionError {
  if (e instanceof ResolutionError) return e;
  if (isError(e, "CALL_EXCEPTION")) {
    return new SettlementRevertedError(e.shortMessage || e.message);
  }
  for (const code of TRANSIENT_RPC_CODES) {
    if (isError(e, code)) return new TransientChainError(e.shortMessage || e.message);
  }
  if (isError(e, "INSUFFICIENT_FUNDS")) {
    return new ResolutionError(e.shortMessage || e.message, "permanent");
  }
  return new ResolutionError(errorMessage(e), "transient");
}
