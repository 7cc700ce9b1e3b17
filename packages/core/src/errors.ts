import type { ZodIssue } from "zod";

export type AdmissionErrorCode =
  | "INVALID_CONFIGURATION"
  | "STORE_UNAVAILABLE"
  | "IDENTITY_MISSING";

export class AdmissionError extends Error {
  constructor(
    message: string,
    public readonly code: AdmissionErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AdmissionError";
  }
}

/** Thrown at setup time for an empty ladder, an empty rank or a rule with no single mode. */
export class InvalidConfigurationError extends AdmissionError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = [],
  ) {
    super(message, "INVALID_CONFIGURATION");
    this.name = "InvalidConfigurationError";
  }
}

/** Thrown by store implementations when the backend cannot be reached. */
export class StoreUnavailableError extends AdmissionError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Admission store ${operation} failed: ${detail}`, "STORE_UNAVAILABLE", { cause });
    this.name = "StoreUnavailableError";
  }
}

/** Raised by hosts when authentication produced no caller identity. */
export class IdentityMissingError extends AdmissionError {
  constructor(message = "No caller identity could be resolved") {
    super(message, "IDENTITY_MISSING");
    this.name = "IdentityMissingError";
  }
}
