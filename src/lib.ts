export { Waiter, DEFAULT_TIMEOUT_SECONDS, DEFAULT_POLL_INTERVAL_MS } from "./wait/waiter.js";
export type { WaiterOptions } from "./wait/waiter.js";
export { until } from "./wait/until.js";
export type { Condition, UntilOptions } from "./wait/until.js";
export { elementDisplayed, matchesUrl, pageLoadComplete, urlMatches } from "./wait/conditions.js";
export type { Driver, Element } from "./driver/driver.js";
export { CdpDriver, CdpElement } from "./driver/cdp-driver.js";
export { connect, disconnect, ensureConnected, getClient, isConnected, isCrashed } from "./cdp/client.js";
export type { CDPClient, ConnectOptions } from "./cdp/client.js";
export { browserError, isBrowserError, toErrorDetail } from "./errors.js";
export type { BrowserError } from "./errors.js";
export { ERROR_CODES } from "./types.js";
export type { ErrorCode, ErrorDetail, UrlCondition, UrlMatch, WaitResult } from "./types.js";
