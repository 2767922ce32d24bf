import type { Driver, Element } from "../driver/driver.js";
import type { UrlCondition, UrlMatch } from "../types.js";
import type { Condition } from "./until.js";

export function pageLoadComplete(driver: Driver): Condition<boolean> {
  return {
    description: "page load complete",
    evaluate: async () => String(await driver.evaluate("document.readyState")) === "complete",
  };
}

export function elementDisplayed(element: Element): Condition<boolean> {
  return {
    description: `${element.description} to be displayed`,
    evaluate: () => element.isDisplayed(),
  };
}

const MATCH_VERBS: Record<UrlMatch, string> = {
  equals: "equal",
  contains: "contain",
  startsWith: "start with",
};

export function matchesUrl(actual: string, expected: string, condition: UrlCondition): boolean {
  const a = condition.ignoreCase ? actual.toLowerCase() : actual;
  const e = condition.ignoreCase ? expected.toLowerCase() : expected;
  switch (condition.match) {
    case "equals":
      return a === e;
    case "contains":
      return a.includes(e);
    case "startsWith":
      return a.startsWith(e);
  }
}

export function urlMatches(driver: Driver, expected: string, condition: UrlCondition): Condition<boolean> {
  const verb = MATCH_VERBS[condition.match];
  return {
    description: `url to ${verb} "${expected}"${condition.ignoreCase ? " (ignoring case)" : ""}`,
    evaluate: async () => matchesUrl(await driver.getCurrentUrl(), expected, condition),
  };
}
