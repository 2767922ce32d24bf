import { ERROR_CODES } from "./types.js";
import type { ErrorCode, ErrorDetail } from "./types.js";

export type BrowserError = Error & { code: ErrorCode };

export function browserError(code: ErrorCode, message: string): BrowserError {
  return Object.assign(new Error(message), { code });
}

export function isBrowserError(err: unknown, code?: ErrorCode): err is BrowserError {
  if (!(err instanceof Error) || !("code" in err)) return false;
  const actual = err.code;
  if (!ERROR_CODES.some((c) => c === actual)) return false;
  return code === undefined || actual === code;
}

/** Map any thrown value to the detail reported by the tools. */
export function toErrorDetail(err: unknown): ErrorDetail {
  if (isBrowserError(err)) return { code: err.code, message: err.message };
  const message = err instanceof Error ? err.message : String(err);
  return { code: "ACTION_FAILED", message };
}
