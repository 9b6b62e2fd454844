import { TotpError } from "../core/errors";
import { FetchLike } from "../core/fetch";

export const ONE_TIME_CODE_TIMEOUT_MS = 15_000;

const CODE_KEYS = ["code", "totp", "token", "otp"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a one-time code from an endpoint response body: a JSON object carrying one of
 * `code`, `totp`, `token` or `otp`, or else the raw text.
 */
export function parseOneTimeCode(body: string): string {
  const trimmed = body.trim();

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    parsed = undefined;
  }

  if (typeof parsed === "string" && parsed.trim()) {
    return parsed.trim();
  }

  if (isRecord(parsed)) {
    for (const key of CODE_KEYS) {
      const value = parsed[key];
      if (typeof value === "string" && value.trim()) {
        return value.trim();
      }
      if (typeof value === "number") {
        return String(value);
      }
    }
    throw new TotpError(`One-time-code response has none of the keys ${CODE_KEYS.join(", ")}`);
  }

  if (!trimmed) {
    throw new TotpError("One-time-code response was empty");
  }
  return trimmed;
}

export async function fetchOneTimeCode(
  endpoint: string,
  fetchFn: FetchLike,
  timeoutMs = ONE_TIME_CODE_TIMEOUT_MS,
): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchFn(endpoint, {
      method: "GET",
      headers: { accept: "application/json, text/plain;q=0.9, */*;q=0.5" },
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new TotpError(`One-time-code endpoint returned HTTP ${response.status}`);
    }
    return parseOneTimeCode(await response.text());
  } catch (error) {
    if (error instanceof TotpError) {
      throw error;
    }
    throw new TotpError(`One-time-code request failed: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
  }
}
