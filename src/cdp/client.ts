import CDP from "chrome-remote-interface";
import { launch } from "chrome-launcher";
import type { LaunchedChrome } from "chrome-launcher";
import { browserError } from "../errors.js";

type SendArgs = Parameters<CDP.Client["send"]>;

export type CommandName = SendArgs[0];
export type CommandParams = SendArgs[1];

export interface CDPClient {
  send: (method: CommandName, params?: CommandParams) => Promise<unknown>;
  close: () => Promise<void>;
}

export interface ConnectOptions {
  cdpUrl?: string;
  headless?: boolean;
}

let chrome: LaunchedChrome | null = null;
let client: CDPClient | null = null;
let crashed = false;
let lastOptions: ConnectOptions = {};

export function isCrashed(): boolean {
  return crashed;
}

export function isConnected(): boolean {
  return client !== null && !crashed;
}

export async function connect(options: ConnectOptions = {}): Promise<CDPClient> {
  if (client) return client;
  lastOptions = options;

  let port: number;

  if (options.cdpUrl) {
    // Parse port from CDP URL like ws://127.0.0.1:9222/...
    const url = new URL(options.cdpUrl);
    port = parseInt(url.port, 10);
  } else {
    const chromeFlags = [
      "--no-first-run",
      "--no-default-browser-check",
      "--window-size=1280,960",
    ];
    if (options.headless) chromeFlags.push("--headless=new");
    chrome = await launch({ chromeFlags });
    port = chrome.port;
  }

  const raw = await CDP({ port });

  const wrapped: CDPClient = {
    send: (method, params) => raw.send(method, params),
    close: async () => {
      await raw.close();
      client = null;
    },
  };

  try {
    await Promise.all([
      wrapped.send("Page.enable"),
      wrapped.send("DOM.enable"),
      wrapped.send("Runtime.enable"),
      wrapped.send("Inspector.enable"),
    ]);
  } catch (err) {
    await raw.close().catch((closeErr: unknown) => {
      console.error("[page-waiter] Error closing CDP session:", closeErr);
    });
    if (chrome) {
      await chrome.kill();
      chrome = null;
    }
    throw err;
  }

  // Crash detection
  raw.on("Inspector.targetCrashed", () => {
    crashed = true;
  });
  raw.on("disconnect", () => {
    if (client === wrapped) client = null;
  });

  client = wrapped;
  return client;
}

export async function disconnect(): Promise<void> {
  if (client) {
    try {
      await client.close();
    } catch (err) {
      // The socket may already be gone
      console.error("[page-waiter] Error closing CDP session:", err);
    }
    client = null;
  }
  if (chrome) {
    await chrome.kill();
    chrome = null;
  }
  crashed = false;
}

/** Reconnect with the last options when the session was lost or the tab crashed. */
export async function ensureConnected(): Promise<CDPClient> {
  if (isConnected()) return getClient();
  await disconnect();
  return connect(lastOptions);
}

export function getClient(): CDPClient {
  if (!client || crashed) {
    throw browserError(
      crashed ? "PAGE_CRASHED" : "CDP_DISCONNECTED",
      crashed ? "Chrome tab crashed" : "CDP connection lost",
    );
  }
  return client;
}
