import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Driver } from "../driver/driver.js";
import type { WaitResult } from "../types.js";
import { toErrorDetail } from "../errors.js";
import type { Waiter } from "../wait/waiter.js";

export interface WaitToolsContext {
  waiter: Waiter;
  /** Resolve the driver for a call, reconnecting if needed. */
  getDriver: () => Promise<Driver>;
}

const timeoutArg = z
  .number()
  .nonnegative()
  .optional()
  .describe("Timeout in seconds (default: the server's default timeout)");

const matchArg = z
  .enum(["equals", "contains", "startsWith"])
  .default("equals")
  .describe("How the current URL is compared with the expected value");

const ignoreCaseArg = z.boolean().default(false).describe("Compare lower-cased URLs");

async function runWait(
  action: string,
  ctx: WaitToolsContext,
  fn: (driver: Driver) => Promise<void>,
): Promise<WaitResult> {
  const start = Date.now();
  let driver: Driver;
  try {
    driver = await ctx.getDriver();
    await fn(driver);
  } catch (err) {
    return {
      version: 1, action, ok: false, url: "",
      errors: [toErrorDetail(err)], warnings: [], timingMs: Date.now() - start,
    };
  }

  try {
    const url = await driver.getCurrentUrl();
    return { version: 1, action, ok: true, url, errors: [], warnings: [], timingMs: Date.now() - start };
  } catch (err) {
    return {
      version: 1, action, ok: true, url: "", errors: [],
      warnings: [`Could not read the current url: ${toErrorDetail(err).message}`],
      timingMs: Date.now() - start,
    };
  }
}

function textResult(result: WaitResult) {
  return { content: [{ type: "text" as const, text: JSON.stringify(result) }] };
}

export function registerWaitTools(server: McpServer, ctx: WaitToolsContext): void {
  const { waiter } = ctx;

  server.tool(
    "browser_get",
    "Open a URL and wait for the page to load completely.",
    { url: z.string().describe("URL to open"), timeout: timeoutArg },
    async ({ url, timeout }) =>
      textResult(await runWait(`get ${url}`, ctx, (driver) => waiter.get(driver, url, timeout))),
  );

  server.tool(
    "browser_get_and_wait_for_element",
    "Open a URL, wait for the page to load, then for an element to be displayed.",
    {
      url: z.string().describe("URL to open"),
      selector: z.string().describe("CSS selector of the element to wait for"),
      timeout: timeoutArg,
    },
    async ({ url, selector, timeout }) =>
      textResult(
        await runWait(`get ${url} and wait for ${selector}`, ctx, (driver) =>
          waiter.getAndWaitForElementToBeDisplayed(driver, url, driver.findElement(selector), timeout),
        ),
      ),
  );

  server.tool(
    "browser_get_and_wait_for_url",
    "Open a URL and wait for the browser to reach another URL (e.g. after a redirect), then for it to load.",
    {
      url: z.string().describe("URL to open"),
      expectedUrl: z.string().describe("URL the browser should end up on"),
      timeout: timeoutArg,
    },
    async ({ url, expectedUrl, timeout }) =>
      textResult(
        await runWait(`get ${url} and wait for url ${expectedUrl}`, ctx, (driver) =>
          waiter.getUrlAndWaitForUrl(driver, url, expectedUrl, timeout),
        ),
      ),
  );

  server.tool(
    "browser_wait_for_page_load",
    "Wait for document.readyState to be complete.",
    { timeout: timeoutArg },
    async ({ timeout }) =>
      textResult(
        await runWait("wait for page load", ctx, (driver) => waiter.waitForPageLoadComplete(driver, timeout)),
      ),
  );

  server.tool(
    "browser_wait_for_element",
    "Wait for an element to be displayed.",
    { selector: z.string().describe("CSS selector of the element to wait for"), timeout: timeoutArg },
    async ({ selector, timeout }) =>
      textResult(
        await runWait(`wait for ${selector}`, ctx, (driver) =>
          waiter.waitForElementToBeDisplayed(driver, driver.findElement(selector), timeout),
        ),
      ),
  );

  server.tool(
    "browser_wait_for_url",
    "Wait for the current URL to equal, contain or start with a value, then for the page to load.",
    {
      expected: z.string().describe("Expected URL or URL fragment"),
      match: matchArg,
      ignoreCase: ignoreCaseArg,
      timeout: timeoutArg,
    },
    async ({ expected, match, ignoreCase, timeout }) =>
      textResult(
        await runWait(`wait for url ${match} ${expected}`, ctx, (driver) =>
          waiter.waitForUrlMatching(driver, expected, { match, ignoreCase }, timeout),
        ),
      ),
  );

  server.tool(
    "browser_click_and_wait_for_url",
    "Click an element, then wait for the current URL to match and the page to load.",
    {
      selector: z.string().describe("CSS selector of the element to click"),
      expected: z.string().describe("Expected URL or URL fragment"),
      match: matchArg,
      ignoreCase: ignoreCaseArg,
      timeout: timeoutArg,
    },
    async ({ selector, expected, match, ignoreCase, timeout }) =>
      textResult(
        await runWait(`click ${selector} and wait for url ${match} ${expected}`, ctx, (driver) =>
          waiter.clickElementAndWaitForUrlMatching(
            driver, driver.findElement(selector), expected, { match, ignoreCase }, timeout,
          ),
        ),
      ),
  );
}
