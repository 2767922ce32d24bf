// Error codes
export const ERROR_CODES = [
  "CDP_DISCONNECTED",
  "PAGE_CRASHED",
  "NAVIGATION_FAILED",
  "NAVIGATION_IN_PROGRESS",
  "NO_SUCH_ELEMENT",
  "NOT_INTERACTABLE",
  "SCRIPT_ERROR",
  "INVALID_TIMEOUT",
  "WAIT_TIMEOUT",
  "ACTION_FAILED",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export interface ErrorDetail {
  code: ErrorCode;
  message: string;
}

export type UrlMatch = "equals" | "contains" | "startsWith";

export interface UrlCondition {
  match: UrlMatch;
  ignoreCase: boolean;
}

// Tool response schema
export interface WaitResult {
  version: 1;
  action: string;
  ok: boolean;
  url: string;
  errors: ErrorDetail[];
  warnings: string[];
  timingMs: number;
}
