import { classifyHttpFailure, ProviderError, toNetworkError } from "../provider-errors.js";
import { isJsonObject, type JSONSchema, type JsonObject, type ProviderName } from "../types.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

/**
 * POSTs a JSON payload and returns the decoded object body. Non-2xx replies
 * become classified ProviderErrors; transport failures become network errors.
 */
export async function postJson(params: {
  provider: ProviderName;
  url: string;
  headers: Record<string, string>;
  payload: JsonObject;
  timeoutMs?: number;
  signal?: AbortSignal;
}): Promise<JsonObject> {
  const { provider } = params;
  const timeout = AbortSignal.timeout(params.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
  const signal = params.signal ? AbortSignal.any([timeout, params.signal]) : timeout;

  let response: Response;
  let body: string;
  try {
    response = await fetch(params.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...params.headers },
      body: JSON.stringify(params.payload),
      signal,
    });
    body = await response.text();
  } catch (err) {
    throw toNetworkError(provider, err);
  }

  if (response.status >= 400) {
    throw classifyHttpFailure(provider, response.status, body);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ProviderError(provider, "invalid_response", "invalid json response", { cause: err });
  }
  if (!isJsonObject(parsed)) {
    throw new ProviderError(provider, "invalid_response", "invalid json response");
  }
  return parsed;
}

export function trimBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

/** Reads `obj[key]` as an array, or an empty one. */
export function arrayField(obj: JsonObject, key: string): JsonObject[] {
  const value = obj[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isJsonObject);
}

export function stringField(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" ? value : undefined;
}

/** Tool parameter schemas as plain JSON; the round-trip drops undefined fields. */
export function schemaToJson(schema: JSONSchema): JsonObject {
  const value: unknown = JSON.parse(JSON.stringify(schema));
  return isJsonObject(value) ? value : {};
}
