import type { Logger } from "../log.js";
import { ProviderError } from "./provider-errors.js";
import type { LLMResponse, ProviderName } from "./types.js";

/**
 * Round-robin selection over a fixed list of credentials.
 *
 * `next()` reads and advances the counter in one synchronous step, so
 * concurrent async callers each receive a distinct slot within a period.
 */
export class KeyRotator {
  private readonly keys: readonly string[];
  private counter = 0;

  constructor(keys: readonly string[]) {
    this.keys = [...keys];
  }

  next(): string | undefined {
    if (this.keys.length === 0) return undefined;
    const key = this.keys[this.counter % this.keys.length];
    this.counter++;
    return key;
  }

  get size(): number {
    return this.keys.length;
  }
}

/**
 * Shared retry discipline for adapters: one attempt per configured key,
 * first success wins, the last error is rethrown when every key failed.
 */
export async function withKeyRotation(params: {
  provider: ProviderName;
  rotator: KeyRotator;
  logger: Logger;
  signal?: AbortSignal;
  attempt: (apiKey: string) => Promise<LLMResponse>;
}): Promise<LLMResponse> {
  const { provider, rotator, logger, signal } = params;
  const tries = rotator.size;
  if (tries === 0) {
    throw new ProviderError(provider, "no_keys", `no ${provider} API keys configured`);
  }

  let lastError: unknown;
  for (let i = 0; i < tries; i++) {
    if (signal?.aborted) {
      throw new ProviderError(provider, "network", "request aborted", { cause: signal.reason });
    }
    const key = rotator.next();
    if (!key) {
      lastError = new ProviderError(provider, "no_keys", `no ${provider} API keys configured`);
      continue;
    }
    try {
      return await params.attempt(key);
    } catch (err) {
      lastError = err;
      logger.warn(
        {
          provider,
          attempt: i + 1,
          of: tries,
          kind: err instanceof ProviderError ? err.kind : undefined,
          error: err instanceof Error ? err.message : String(err),
        },
        "Provider attempt failed",
      );
    }
  }

  if (lastError instanceof Error) throw lastError;
  throw new ProviderError(provider, "api", "request failed");
}
