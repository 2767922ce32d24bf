/**
 * A controlled browser session. The waiter borrows one per call and never
 * keeps it.
 */
export interface Driver {
  /** Start navigating the top-level frame to `url`. */
  get(url: string): Promise<void>;
  getCurrentUrl(): Promise<string>;
  /** Evaluate a JavaScript expression in the page and return its value. */
  evaluate(expression: string): Promise<unknown>;
  findElement(selector: string): Element;
}

/**
 * A handle to a node in the rendered page. Handles may locate their node
 * lazily, in which case a missing node fails with `NO_SUCH_ELEMENT`.
 */
export interface Element {
  readonly description: string;
  isDisplayed(): Promise<boolean>;
  click(): Promise<void>;
}
