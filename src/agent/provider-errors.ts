import type { ProviderName } from "./types.js";

// ============================================================================
// Provider Error Handling
// ============================================================================

export type ProviderErrorKind =
  | "auth"
  | "rate_limit"
  | "server"
  | "api"
  | "network"
  | "unsupported_model"
  | "no_keys"
  | "invalid_response";

const KIND_PREFIX: Record<ProviderErrorKind, string> = {
  auth: "auth error",
  rate_limit: "rate limit",
  server: "server error",
  api: "api error",
  network: "network error",
  unsupported_model: "unsupported model",
  no_keys: "no keys",
  invalid_response: "invalid response",
};

/**
 * Classified failure from one backend. `message` reads `<provider>: <detail>`.
 */
export class ProviderError extends Error {
  readonly provider: ProviderName;
  readonly kind: ProviderErrorKind;
  readonly status?: number;
  readonly detail: string;

  constructor(
    provider: ProviderName,
    kind: ProviderErrorKind,
    detail: string,
    opts?: { status?: number; cause?: unknown },
  ) {
    super(`${provider}: ${detail}`, { cause: opts?.cause });
    this.name = "ProviderError";
    this.provider = provider;
    this.kind = kind;
    this.detail = detail;
    this.status = opts?.status;
  }
}

export function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

/**
 * Raised by the router for a provider name without an adapter
 */
export class ProviderNotRegisteredError extends Error {
  readonly provider: ProviderName;

  constructor(provider: ProviderName) {
    super(`provider not registered: ${provider}`);
    this.name = "ProviderNotRegisteredError";
    this.provider = provider;
  }
}

const RATE_LIMIT_BODY_RE = /quota|resource_exhausted/i;

/**
 * Maps an HTTP failure to a classified error. Priority: auth, rate limit
 * (status or body), server, generic. The upstream text is kept verbatim.
 */
export function classifyHttpFailure(provider: ProviderName, status: number, body: string): ProviderError {
  const message = body.trim();
  let kind: ProviderErrorKind;
  if (status === 401 || status === 403) {
    kind = "auth";
  } else if (status === 429 || RATE_LIMIT_BODY_RE.test(message)) {
    kind = "rate_limit";
  } else if (status >= 500) {
    kind = "server";
  } else {
    kind = "api";
  }
  return new ProviderError(provider, kind, `${KIND_PREFIX[kind]}: ${message}`, { status });
}

/**
 * Wraps a fetch failure (DNS, reset, timeout, abort) as a network error
 */
export function toNetworkError(provider: ProviderName, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new ProviderError(provider, "network", `${KIND_PREFIX.network}: ${detail}`, { cause: err });
}
