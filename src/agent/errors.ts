/**
 * Provider failure types and failover classification.
 *
 * Every backend surfaces its failures as a ProviderError carrying a classified
 * reason; the ProviderManager turns a fully exhausted fallback chain into a
 * NoProviderAvailableError listing every candidate it considered.
 */

export type FailoverReason = "auth" | "rate_limit" | "timeout" | "billing" | "format" | "unknown";

export class ProviderError extends Error {
  readonly reason: FailoverReason;
  readonly providerId?: string;
  readonly status?: number;
  readonly code?: string;

  constructor(
    message: string,
    params: {
      reason: FailoverReason;
      providerId?: string;
      status?: number;
      code?: string;
      cause?: unknown;
    }
  ) {
    super(message, { cause: params.cause });
    this.name = "ProviderError";
    this.reason = params.reason;
    this.providerId = params.providerId;
    this.status = params.status;
    this.code = params.code;
  }
}

export function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

export type AttemptOutcome = "missing" | "disabled" | "unsupported" | "unavailable" | "failed";

export interface ProviderAttempt {
  provider: string;
  outcome: AttemptOutcome;
  reason: string;
}

export class NoProviderAvailableError extends Error {
  readonly attempts: ProviderAttempt[];

  constructor(attempts: ProviderAttempt[]) {
    super(describeAttempts(attempts));
    this.name = "NoProviderAvailableError";
    this.attempts = attempts;
  }

  get providers(): string[] {
    return this.attempts.map((a) => a.provider);
  }
}

function describeAttempts(attempts: ProviderAttempt[]): string {
  if (attempts.length === 0) {
    return "No LLM providers available: fallback_order is empty";
  }
  const lines = attempts.map((a) => `  - ${a.provider}: ${a.outcome} (${a.reason})`);
  return `No LLM providers available. Tried:\n${lines.join("\n")}`;
}

export function getStatusCode(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  let candidate: unknown;
  if ("status" in err) candidate = err.status;
  if (candidate === undefined && "statusCode" in err) candidate = err.statusCode;
  if (candidate === undefined && "$metadata" in err && err.$metadata && typeof err.$metadata === "object") {
    candidate = "httpStatusCode" in err.$metadata ? err.$metadata.httpStatusCode : undefined;
  }
  if (typeof candidate === "number") return candidate;
  if (typeof candidate === "string" && /^\d+$/.test(candidate)) {
    return Number(candidate);
  }
  return undefined;
}

function getErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const candidate = (err as { code?: unknown }).code;
  if (typeof candidate !== "string") return undefined;
  const trimmed = candidate.trim();
  return trimmed ? trimmed : undefined;
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  if (err && typeof err === "object") {
    const message = (err as { message?: unknown }).message;
    if (typeof message === "string") return message;
  }
  return String(err);
}

type ErrorPattern = RegExp | string;
const ERROR_PATTERNS = {
  rateLimit: [
    /rate[_ ]limit|too many requests|429/,
    "quota exceeded",
    "throttl",
    "resource has been exhausted",
    "overloaded",
  ],
  timeout: ["timeout", "timed out", "deadline exceeded", "request was aborted"],
  billing: ["payment required", "insufficient credits", "billing", /\b402\b/],
  auth: [
    /invalid[_ ]?api[_ ]?key/,
    "unauthorized",
    "forbidden",
    "access denied",
    "invalid token",
    "security token",
    "no api key",
    "authentication",
    /\b401\b/,
    /\b403\b/,
  ],
  format: [
    "invalid request",
    "invalid_request_error",
    "validationexception",
    "validation error",
    "throughput isn't supported",
    "malformed",
  ],
} as const;

function matchesErrorPatterns(raw: string, patterns: readonly ErrorPattern[]): boolean {
  if (!raw) return false;
  const value = raw.toLowerCase();
  return patterns.some((pattern) =>
    pattern instanceof RegExp ? pattern.test(value) : value.includes(pattern)
  );
}

export function classifyFailoverReason(raw: string): FailoverReason | null {
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.rateLimit)) return "rate_limit";
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.timeout)) return "timeout";
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.billing)) return "billing";
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.auth)) return "auth";
  if (matchesErrorPatterns(raw, ERROR_PATTERNS.format)) return "format";
  return null;
}

function resolveFailoverReasonFromStatus(status: number): FailoverReason | null {
  if (status === 402) return "billing";
  if (status === 429) return "rate_limit";
  if (status === 401 || status === 403) return "auth";
  if (status === 408 || status === 504) return "timeout";
  if (status === 400 || status === 422) return "format";
  return null;
}

export function resolveFailoverReason(err: unknown): FailoverReason {
  if (isProviderError(err)) return err.reason;
  if (err && typeof err === "object" && "name" in err) {
    if (err.name === "TimeoutError" || err.name === "AbortError") return "timeout";
  }
  const status = getStatusCode(err);
  if (status) {
    const fromStatus = resolveFailoverReasonFromStatus(status);
    if (fromStatus) return fromStatus;
  }
  const code = (getErrorCode(err) ?? "").toUpperCase();
  if (["ETIMEDOUT", "ESOCKETTIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(code)) {
    return "timeout";
  }
  const name = err instanceof Error ? err.name : "";
  return classifyFailoverReason(`${name} ${getErrorMessage(err)}`) ?? "unknown";
}

/**
 * Wrap any backend failure in a ProviderError, keeping the original message.
 */
export function toProviderError(err: unknown, providerId: string, prefix: string): ProviderError {
  if (isProviderError(err)) return err;
  return new ProviderError(`${prefix}: ${getErrorMessage(err)}`, {
    reason: resolveFailoverReason(err),
    providerId,
    status: getStatusCode(err),
    code: getErrorCode(err),
    cause: err,
  });
}
