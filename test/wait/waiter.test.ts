import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Waiter, DEFAULT_TIMEOUT_SECONDS } from "../../src/wait/waiter.js";
import { browserError } from "../../src/errors.js";
import { FakeDriver, sequence } from "../helpers/fake-driver.js";

describe("Waiter", () => {
  let driver: FakeDriver;
  let waiter: Waiter;

  beforeEach(() => {
    driver = new FakeDriver();
    waiter = new Waiter({ pollIntervalMs: 5 });
  });

  describe("construction", () => {
    it("defaults to a 30 second timeout and 500ms polling", () => {
      const plain = new Waiter();
      expect(plain.timeoutSeconds).toBe(30);
      expect(DEFAULT_TIMEOUT_SECONDS).toBe(30);
      expect(plain.pollIntervalMs).toBe(500);
    });

    it("rejects a negative default timeout", () => {
      expect(() => new Waiter({ timeoutSeconds: -1 })).toThrow(
        "Timeout must be a non-negative number of seconds, got -1",
      );
    });

    it("rejects a non-positive poll interval", () => {
      expect(() => new Waiter({ pollIntervalMs: 0 })).toThrow(RangeError);
    });
  });

  describe("navigation", () => {
    it("get navigates then polls readyState until complete", async () => {
      driver.nextReadyState = sequence("loading", "interactive", "complete");

      await waiter.get(driver, "https://a.test/");

      expect(driver.log).toEqual([
        "get https://a.test/",
        "readyState loading",
        "readyState interactive",
        "readyState complete",
      ]);
    });

    it("getAndWaitForElementToBeDisplayed waits for load, then the element", async () => {
      const banner = driver.findElement("#banner");
      banner.nextDisplayed = sequence(false, true);

      await waiter.getAndWaitForElementToBeDisplayed(driver, "https://a.test/", banner);

      expect(driver.log).toEqual([
        "get https://a.test/",
        "readyState complete",
        "displayed false",
        "displayed true",
      ]);
    });

    it("getUrlAndWaitForUrl follows a redirect before waiting for load", async () => {
      driver.nextUrl = sequence("https://a.test/start", "https://a.test/home");

      await waiter.getUrlAndWaitForUrl(driver, "https://a.test/start", "https://a.test/home");

      expect(driver.log).toEqual([
        "get https://a.test/start",
        "url https://a.test/start",
        "url https://a.test/home",
        "readyState complete",
      ]);
    });

    it("rejects an invalid timeout before touching the browser", async () => {
      await expect(waiter.get(driver, "https://a.test/", -5)).rejects.toMatchObject({
        code: "INVALID_TIMEOUT",
      });
      await expect(waiter.get(driver, "https://a.test/", Number.NaN)).rejects.toMatchObject({
        code: "INVALID_TIMEOUT",
      });
      expect(driver.log).toEqual([]);
    });
  });

  describe("elements", () => {
    it("keeps polling while the element is missing", async () => {
      const dialog = driver.findElement("#dialog");
      let attempts = 0;
      dialog.nextDisplayed = () => {
        attempts++;
        if (attempts < 3) throw browserError("NO_SUCH_ELEMENT", 'No element matches "#dialog"');
        return true;
      };

      await waiter.waitForElementToBeDisplayed(driver, dialog);

      expect(attempts).toBe(3);
    });

    it("fails with the element in the timeout message", async () => {
      const dialog = driver.findElement("#dialog");
      dialog.nextDisplayed = () => false;

      await expect(waiter.waitForElementToBeDisplayed(driver, dialog, 0)).rejects.toMatchObject({
        code: "WAIT_TIMEOUT",
        message: 'Timed out after 0ms waiting for element "#dialog" to be displayed (polled every 5ms)',
      });
    });

    it("lets other driver errors through", async () => {
      const dialog = driver.findElement("#dialog");
      dialog.nextDisplayed = () => {
        throw browserError("PAGE_CRASHED", "Chrome tab crashed");
      };

      await expect(waiter.waitForElementToBeDisplayed(driver, dialog)).rejects.toMatchObject({
        code: "PAGE_CRASHED",
      });
      expect(driver.log).toEqual([]);
    });
  });

  describe("url waits", () => {
    it("waits for the url, then for page load", async () => {
      driver.nextUrl = sequence("https://a.test/", "https://a.test/done");
      driver.nextReadyState = sequence("loading", "complete");

      await waiter.waitForUrl(driver, "https://a.test/done");

      expect(driver.log).toEqual([
        "url https://a.test/",
        "url https://a.test/done",
        "readyState loading",
        "readyState complete",
      ]);
    });

    it("ignores case only in the IgnoreCase variants", async () => {
      driver.nextUrl = () => "https://Example.com";

      await expect(waiter.waitForUrlIgnoreCase(driver, "https://example.com", 0)).resolves.toBeUndefined();
      await expect(waiter.waitForUrl(driver, "https://example.com", 0)).rejects.toMatchObject({
        code: "WAIT_TIMEOUT",
        message: 'Timed out after 0ms waiting for url to equal "https://example.com" (polled every 5ms)',
      });
    });

    const actual = "https://Shop.test/Cart/Items?id=7";
    type UrlWait =
      | "waitForUrl"
      | "waitForUrlContains"
      | "waitForUrlStartsWith"
      | "waitForUrlIgnoreCase"
      | "waitForUrlContainsIgnoreCase"
      | "waitForUrlStartsWithIgnoreCase";
    const cases: Array<[UrlWait, string, boolean]> = [
      ["waitForUrl", "https://Shop.test/Cart/Items?id=7", true],
      ["waitForUrl", "https://shop.test/cart/items?id=7", false],
      ["waitForUrlIgnoreCase", "https://shop.test/cart/items?id=7", true],
      ["waitForUrlContains", "Cart/Items", true],
      ["waitForUrlContains", "cart/items", false],
      ["waitForUrlContainsIgnoreCase", "cart/items", true],
      ["waitForUrlStartsWith", "https://Shop.test/Cart", true],
      ["waitForUrlStartsWith", "https://shop.test/cart", false],
      ["waitForUrlStartsWith", "Cart", false],
      ["waitForUrlStartsWithIgnoreCase", "https://shop.test/cart", true],
      ["waitForUrlStartsWithIgnoreCase", "cart", false],
    ];

    it.each(cases)("%s(%s) matches: %s", async (method, expected, matches) => {
      driver.nextUrl = () => actual;
      const wait = waiter[method](driver, expected, 0);

      if (matches) {
        await expect(wait).resolves.toBeUndefined();
      } else {
        await expect(wait).rejects.toMatchObject({ code: "WAIT_TIMEOUT" });
      }
    });
  });

  describe("click then wait", () => {
    type ClickWait =
      | "clickElementAndWaitForUrl"
      | "clickElementAndWaitForUrlContains"
      | "clickElementAndWaitForUrlStartsWith"
      | "clickElementAndWaitForUrlIgnoreCase"
      | "clickElementAndWaitForUrlContainsIgnoreCase"
      | "clickElementAndWaitForUrlStartsWithIgnoreCase";
    const cases: Array<[ClickWait, string]> = [
      ["clickElementAndWaitForUrl", "https://a.test/next"],
      ["clickElementAndWaitForUrlContains", "/next"],
      ["clickElementAndWaitForUrlStartsWith", "https://a.test/n"],
      ["clickElementAndWaitForUrlIgnoreCase", "HTTPS://A.TEST/NEXT"],
      ["clickElementAndWaitForUrlContainsIgnoreCase", "/NEXT"],
      ["clickElementAndWaitForUrlStartsWithIgnoreCase", "HTTPS://A.TEST/N"],
    ];

    it.each(cases)("%s clicks exactly once before polling", async (method, expected) => {
      const next = driver.findElement("a.next");
      driver.nextUrl = sequence("https://a.test/", "https://a.test/", "https://a.test/next");

      await waiter[method](driver, next, expected);

      expect(next.clicks).toBe(1);
      expect(driver.log).toEqual([
        "click a.next",
        "url https://a.test/",
        "url https://a.test/",
        "url https://a.test/next",
        "readyState complete",
      ]);
    });

    it("does not click again when the wait times out", async () => {
      const next = driver.findElement("a.next");
      driver.nextUrl = () => "https://a.test/";

      await expect(
        waiter.clickElementAndWaitForUrlMatching(driver, next, "/next", { match: "contains", ignoreCase: false }, 0),
      ).rejects.toMatchObject({ code: "WAIT_TIMEOUT" });
      expect(next.clicks).toBe(1);
    });
  });

  describe("timeouts", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    async function expectTimeoutAt(ms: number, wait: Promise<void>): Promise<void> {
      let settled = false;
      wait.then(
        () => { settled = true; },
        () => { settled = true; },
      );
      const assertion = expect(wait).rejects.toMatchObject({ code: "WAIT_TIMEOUT" });

      await vi.advanceTimersByTimeAsync(ms - 1);
      expect(settled).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await assertion;
    }

    it("uses 30 seconds when no timeout is given", async () => {
      driver.nextUrl = () => "https://a.test/";
      await expectTimeoutAt(30_000, new Waiter().waitForUrl(driver, "https://b.test/"));
    });

    it("behaves the same when 30 is passed explicitly", async () => {
      driver.nextUrl = () => "https://a.test/";
      await expectTimeoutAt(30_000, new Waiter().waitForUrl(driver, "https://b.test/", 30));
    });

    it("uses the configured default", async () => {
      const hidden = driver.findElement("#x");
      hidden.nextDisplayed = () => false;
      await expectTimeoutAt(2_000, new Waiter({ timeoutSeconds: 2 }).waitForElementToBeDisplayed(driver, hidden));
    });

    it("lets an explicit timeout override the default", async () => {
      driver.nextReadyState = () => "loading";
      await expectTimeoutAt(5_000, new Waiter().waitForPageLoadComplete(driver, 5));
    });

    it("gives each step of a composite wait the whole timeout", async () => {
      let ready = false;
      driver.nextReadyState = () => (ready ? "complete" : "loading");
      const banner = driver.findElement("#banner");
      banner.nextDisplayed = () => false;

      const wait = new Waiter().getAndWaitForElementToBeDisplayed(driver, "https://a.test/", banner, 10);
      let settled = false;
      wait.then(
        () => { settled = true; },
        () => { settled = true; },
      );
      const assertion = expect(wait).rejects.toMatchObject({
        message: 'Timed out after 10000ms waiting for element "#banner" to be displayed (polled every 500ms)',
      });

      // Page load takes 8 of the 10 seconds; the element wait still gets all 10.
      await vi.advanceTimersByTimeAsync(7_600);
      ready = true;
      await vi.advanceTimersByTimeAsync(400);
      await vi.advanceTimersByTimeAsync(9_999);
      expect(settled).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await assertion;
    });
  });
});
