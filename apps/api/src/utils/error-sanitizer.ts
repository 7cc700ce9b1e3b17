import { AdmissionError } from "@rankguard/core";

/**
 * Sanitizes error messages before returning them to API clients.
 * Strips internal details like stack traces, hostnames, connection
 * strings and IP addresses.
 */

const SENSITIVE_PATTERNS = [
  /at\s+\S+\s+\(.*:\d+:\d+\)/, // stack traces
  /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/, // IPv4
  /redis:\/\/|rediss:\/\//i, // connection strings
  /ECONNREFUSED|ENOTFOUND|ETIMEDOUT|ECONNRESET/i, // Node network errors
];

const ADMISSION_STATUS: Record<AdmissionError["code"], number> = {
  IDENTITY_MISSING: 401,
  STORE_UNAVAILABLE: 503,
  INVALID_CONFIGURATION: 500,
};

export function statusCodeForError(err: unknown): number {
  if (err instanceof AdmissionError) {
    return ADMISSION_STATUS[err.code];
  }
  if (err instanceof Error && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return 500;
}

export function sanitizeErrorMessage(err: unknown, statusCode: number): string {
  if (statusCode === 503 && err instanceof AdmissionError) {
    return "Service temporarily unavailable";
  }
  if (statusCode >= 500) {
    return "Internal server error";
  }

  const message = err instanceof Error ? err.message : String(err);

  for (const pattern of SENSITIVE_PATTERNS) {
    if (pattern.test(message)) {
      return "Request failed";
    }
  }

  return message;
}

export function sanitizeHealthError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  // Redact connection URLs and IPs but preserve service status info
  return message
    .replace(/rediss?:\/\/[^\s)]+/gi, "[redacted-url]")
    .replace(/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}(:\d+)?\b/g, "[redacted-ip]");
}
