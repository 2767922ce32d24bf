import type { Driver, Element } from "../driver/driver.js";
import type { UrlCondition } from "../types.js";
import { browserError } from "../errors.js";
import { elementDisplayed, pageLoadComplete, urlMatches } from "./conditions.js";
import { until } from "./until.js";
import type { Condition } from "./until.js";

export const DEFAULT_TIMEOUT_SECONDS = 30;
export const DEFAULT_POLL_INTERVAL_MS = 500;

export interface WaiterOptions {
  /** Used by every operation called without an explicit timeout. */
  timeoutSeconds?: number;
  pollIntervalMs?: number;
}

const EQUALS: UrlCondition = { match: "equals", ignoreCase: false };
const CONTAINS: UrlCondition = { match: "contains", ignoreCase: false };
const STARTS_WITH: UrlCondition = { match: "startsWith", ignoreCase: false };
const EQUALS_IGNORE_CASE: UrlCondition = { match: "equals", ignoreCase: true };
const CONTAINS_IGNORE_CASE: UrlCondition = { match: "contains", ignoreCase: true };
const STARTS_WITH_IGNORE_CASE: UrlCondition = { match: "startsWith", ignoreCase: true };

function checkTimeout(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw browserError("INVALID_TIMEOUT", `Timeout must be a non-negative number of seconds, got ${seconds}`);
  }
  return seconds;
}

/**
 * Named waits over a borrowed {@link Driver}.
 *
 * Every operation takes an optional timeout in seconds; without one the
 * waiter's default applies. Composite operations give each of their waits the
 * whole timeout. A condition that stays false fails with `WAIT_TIMEOUT`.
 */
export class Waiter {
  readonly timeoutSeconds: number;
  readonly pollIntervalMs: number;

  constructor(options: WaiterOptions = {}) {
    this.timeoutSeconds = checkTimeout(options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS);
    const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new RangeError(`Poll interval must be a positive number of milliseconds, got ${interval}`);
    }
    this.pollIntervalMs = interval;
  }

  // Navigation

  /** Open `url` and wait for the page to load completely. */
  async get(driver: Driver, url: string, timeoutSeconds?: number): Promise<void> {
    const seconds = this.resolveTimeout(timeoutSeconds);
    await driver.get(url);
    await this.waitForPageLoadComplete(driver, seconds);
  }

  /** Open `url`, wait for the page to load, then for `element` to be displayed. */
  async getAndWaitForElementToBeDisplayed(
    driver: Driver,
    url: string,
    element: Element,
    timeoutSeconds?: number,
  ): Promise<void> {
    const seconds = this.resolveTimeout(timeoutSeconds);
    await this.get(driver, url, seconds);
    await this.waitForElementToBeDisplayed(driver, element, seconds);
  }

  /**
   * Open `urlToGet` and wait for the browser to end up on `urlToWaitFor`,
   * e.g. after a client-side redirect, and for that page to load.
   */
  async getUrlAndWaitForUrl(
    driver: Driver,
    urlToGet: string,
    urlToWaitFor: string,
    timeoutSeconds?: number,
  ): Promise<void> {
    const seconds = this.resolveTimeout(timeoutSeconds);
    await driver.get(urlToGet);
    await this.waitForUrl(driver, urlToWaitFor, seconds);
  }

  // Page load

  /** Wait for `document.readyState` to be `"complete"`. */
  async waitForPageLoadComplete(driver: Driver, timeoutSeconds?: number): Promise<void> {
    await this.poll(pageLoadComplete(driver), this.resolveTimeout(timeoutSeconds));
  }

  // Elements

  async waitForElementToBeDisplayed(_driver: Driver, element: Element, timeoutSeconds?: number): Promise<void> {
    await this.poll(elementDisplayed(element), this.resolveTimeout(timeoutSeconds));
  }

  // URL waits. Each also waits for the page to load once the URL matches.

  waitForUrl(driver: Driver, url: string, timeoutSeconds?: number): Promise<void> {
    return this.waitForUrlMatching(driver, url, EQUALS, timeoutSeconds);
  }

  waitForUrlContains(driver: Driver, expected: string, timeoutSeconds?: number): Promise<void> {
    return this.waitForUrlMatching(driver, expected, CONTAINS, timeoutSeconds);
  }

  waitForUrlStartsWith(driver: Driver, expected: string, timeoutSeconds?: number): Promise<void> {
    return this.waitForUrlMatching(driver, expected, STARTS_WITH, timeoutSeconds);
  }

  waitForUrlIgnoreCase(driver: Driver, url: string, timeoutSeconds?: number): Promise<void> {
    return this.waitForUrlMatching(driver, url, EQUALS_IGNORE_CASE, timeoutSeconds);
  }

  waitForUrlContainsIgnoreCase(driver: Driver, expected: string, timeoutSeconds?: number): Promise<void> {
    return this.waitForUrlMatching(driver, expected, CONTAINS_IGNORE_CASE, timeoutSeconds);
  }

  waitForUrlStartsWithIgnoreCase(driver: Driver, expected: string, timeoutSeconds?: number): Promise<void> {
    return this.waitForUrlMatching(driver, expected, STARTS_WITH_IGNORE_CASE, timeoutSeconds);
  }

  async waitForUrlMatching(
    driver: Driver,
    expected: string,
    condition: UrlCondition,
    timeoutSeconds?: number,
  ): Promise<void> {
    const seconds = this.resolveTimeout(timeoutSeconds);
    await this.poll(urlMatches(driver, expected, condition), seconds);
    await this.waitForPageLoadComplete(driver, seconds);
  }

  // Click, then wait for the URL

  clickElementAndWaitForUrl(driver: Driver, element: Element, url: string, timeoutSeconds?: number): Promise<void> {
    return this.clickElementAndWaitForUrlMatching(driver, element, url, EQUALS, timeoutSeconds);
  }

  clickElementAndWaitForUrlContains(
    driver: Driver,
    element: Element,
    expected: string,
    timeoutSeconds?: number,
  ): Promise<void> {
    return this.clickElementAndWaitForUrlMatching(driver, element, expected, CONTAINS, timeoutSeconds);
  }

  clickElementAndWaitForUrlStartsWith(
    driver: Driver,
    element: Element,
    expected: string,
    timeoutSeconds?: number,
  ): Promise<void> {
    return this.clickElementAndWaitForUrlMatching(driver, element, expected, STARTS_WITH, timeoutSeconds);
  }

  clickElementAndWaitForUrlIgnoreCase(
    driver: Driver,
    element: Element,
    url: string,
    timeoutSeconds?: number,
  ): Promise<void> {
    return this.clickElementAndWaitForUrlMatching(driver, element, url, EQUALS_IGNORE_CASE, timeoutSeconds);
  }

  clickElementAndWaitForUrlContainsIgnoreCase(
    driver: Driver,
    element: Element,
    expected: string,
    timeoutSeconds?: number,
  ): Promise<void> {
    return this.clickElementAndWaitForUrlMatching(driver, element, expected, CONTAINS_IGNORE_CASE, timeoutSeconds);
  }

  clickElementAndWaitForUrlStartsWithIgnoreCase(
    driver: Driver,
    element: Element,
    expected: string,
    timeoutSeconds?: number,
  ): Promise<void> {
    return this.clickElementAndWaitForUrlMatching(driver, element, expected, STARTS_WITH_IGNORE_CASE, timeoutSeconds);
  }

  async clickElementAndWaitForUrlMatching(
    driver: Driver,
    element: Element,
    expected: string,
    condition: UrlCondition,
    timeoutSeconds?: number,
  ): Promise<void> {
    const seconds = this.resolveTimeout(timeoutSeconds);
    await element.click();
    await this.waitForUrlMatching(driver, expected, condition, seconds);
  }

  private resolveTimeout(timeoutSeconds: number | undefined): number {
    return timeoutSeconds === undefined ? this.timeoutSeconds : checkTimeout(timeoutSeconds);
  }

  private poll<T>(condition: Condition<T>, seconds: number): Promise<T> {
    return until(condition, { timeoutMs: seconds * 1000, intervalMs: this.pollIntervalMs });
  }
}
