import { z } from "zod";
import type { CDPClient, CommandName, CommandParams } from "../cdp/client.js";
import { browserError, isBrowserError } from "../errors.js";
import type { Driver, Element } from "./driver.js";

// Response shapes, reduced to the fields read here
const NavigateResponse = z.object({ errorText: z.string().optional() });

const RemoteObjectResponse = z.object({
  result: z.object({ value: z.unknown().optional() }),
  exceptionDetails: z
    .object({
      text: z.string(),
      exception: z.object({ description: z.string().optional() }).optional(),
    })
    .optional(),
});

const DocumentResponse = z.object({ root: z.object({ nodeId: z.number() }) });
const NodeIdResponse = z.object({ nodeId: z.number() });
const ResolveNodeResponse = z.object({ object: z.object({ objectId: z.string() }) });
const BoxModelResponse = z.object({ model: z.object({ content: z.array(z.number()).min(8) }) });
const LayoutMetricsResponse = z.object({
  cssVisualViewport: z.object({ clientWidth: z.number(), clientHeight: z.number() }),
});

// Mirrors what a user can see: rendered, not hidden, not transparent, non-empty box.
const IS_DISPLAYED_FN = `function() {
  if (!this.isConnected) return false;
  for (var cur = this; cur; cur = cur.parentElement) {
    if (getComputedStyle(cur).display === "none") return false;
  }
  var style = getComputedStyle(this);
  if (style.visibility === "hidden" || style.visibility === "collapse") return false;
  if (parseFloat(style.opacity) === 0) return false;
  var rect = this.getBoundingClientRect();
  return rect.width > 0 && rect.height > 0;
}`;

// Chrome's answers while the page under a call is being replaced by a navigation
const NAVIGATION_ERRORS = [
  "Execution context was destroyed",
  "Cannot find default execution context",
  "Cannot find context with specified id",
  "Could not find node with given id",
  "No node with given id found",
  "Inspected target navigated or closed",
];

/** Send a command, reporting errors caused by an in-flight navigation as `NAVIGATION_IN_PROGRESS`. */
async function send(cdp: CDPClient, method: CommandName, params?: CommandParams): Promise<unknown> {
  try {
    return await cdp.send(method, params);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (NAVIGATION_ERRORS.some((text) => message.includes(text))) {
      throw browserError("NAVIGATION_IN_PROGRESS", `${method} interrupted by navigation: ${message}`);
    }
    throw err;
  }
}

function scriptError(details: { text: string; exception?: { description?: string } }): Error {
  return browserError("SCRIPT_ERROR", details.exception?.description ?? details.text);
}

/**
 * Driver over a CDP session. Navigation, script evaluation and input go
 * straight to the protocol; elements are selector locators resolved on use.
 */
export class CdpDriver implements Driver {
  constructor(private readonly cdp: CDPClient) {}

  async get(url: string): Promise<void> {
    const result = NavigateResponse.parse(await send(this.cdp, "Page.navigate", { url }));
    if (result.errorText) {
      throw browserError("NAVIGATION_FAILED", `Navigate to ${url} failed: ${result.errorText}`);
    }
  }

  async getCurrentUrl(): Promise<string> {
    const href = await this.evaluate("location.href");
    if (typeof href !== "string") {
      throw browserError("SCRIPT_ERROR", `location.href evaluated to ${typeof href}`);
    }
    return href;
  }

  async evaluate(expression: string): Promise<unknown> {
    const response = RemoteObjectResponse.parse(
      await send(this.cdp, "Runtime.evaluate", { expression, returnByValue: true }),
    );
    if (response.exceptionDetails) throw scriptError(response.exceptionDetails);
    return response.result.value;
  }

  findElement(selector: string): CdpElement {
    return new CdpElement(this.cdp, selector);
  }
}

export class CdpElement implements Element {
  readonly description: string;

  constructor(
    private readonly cdp: CDPClient,
    readonly selector: string,
  ) {
    this.description = `element "${selector}"`;
  }

  async isDisplayed(): Promise<boolean> {
    const objectId = await this.resolveObject(await this.locate());
    const response = RemoteObjectResponse.parse(
      await send(this.cdp, "Runtime.callFunctionOn", {
        objectId,
        functionDeclaration: IS_DISPLAYED_FN,
        returnByValue: true,
      }),
    );
    if (response.exceptionDetails) throw scriptError(response.exceptionDetails);
    return response.result.value === true;
  }

  async click(): Promise<void> {
    const nodeId = await this.locate();
    let { x, y } = await this.center(nodeId);

    const layout = LayoutMetricsResponse.parse(await send(this.cdp, "Page.getLayoutMetrics"));
    const vp = layout.cssVisualViewport;
    if (x < 0 || x > vp.clientWidth || y < 0 || y > vp.clientHeight) {
      const objectId = await this.resolveObject(nodeId);
      await send(this.cdp, "Runtime.callFunctionOn", {
        objectId,
        functionDeclaration: "function() { this.scrollIntoViewIfNeeded(); }",
      });
      ({ x, y } = await this.center(nodeId));
    }

    await send(this.cdp, "Input.dispatchMouseEvent", { type: "mouseMoved", x, y });
    await send(this.cdp, "Input.dispatchMouseEvent", {
      type: "mousePressed", x, y, button: "left", clickCount: 1,
    });
    await send(this.cdp, "Input.dispatchMouseEvent", {
      type: "mouseReleased", x, y, button: "left", clickCount: 1,
    });
  }

  /** Resolve the selector against the current document. */
  private async locate(): Promise<number> {
    const doc = DocumentResponse.parse(await send(this.cdp, "DOM.getDocument", { depth: 0 }));
    const found = NodeIdResponse.parse(
      await send(this.cdp, "DOM.querySelector", { nodeId: doc.root.nodeId, selector: this.selector }),
    );
    if (found.nodeId === 0) {
      throw browserError("NO_SUCH_ELEMENT", `No element matches "${this.selector}"`);
    }
    return found.nodeId;
  }

  private async resolveObject(nodeId: number): Promise<string> {
    const response = ResolveNodeResponse.parse(await send(this.cdp, "DOM.resolveNode", { nodeId }));
    return response.object.objectId;
  }

  private async center(nodeId: number): Promise<{ x: number; y: number }> {
    let box: z.infer<typeof BoxModelResponse>;
    try {
      box = BoxModelResponse.parse(await send(this.cdp, "DOM.getBoxModel", { nodeId }));
    } catch (err) {
      if (isBrowserError(err)) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw browserError("NOT_INTERACTABLE", `No box model for ${this.description} (hidden or zero-size): ${reason}`);
    }
    const content = box.model.content;
    return { x: (content[0] + content[4]) / 2, y: (content[1] + content[5]) / 2 };
  }
}
