import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_TIMEOUT_SECONDS } from "./wait/waiter.js";

export interface Config {
  cdpUrl?: string;
  headless: boolean;
  timeoutSeconds: number;
  pollIntervalMs: number;
}

function numberArg(flag: string, raw: string | undefined, min: number): number {
  const n = raw === undefined ? NaN : Number(raw);
  if (!Number.isFinite(n) || n < min) {
    throw new Error(`Invalid ${flag}: "${raw ?? ""}"`);
  }
  return n;
}

export function parseArgs(args: string[]): Config {
  const config: Config = {
    headless: false,
    timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  };
  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case "--cdp-url":
        if (args[i + 1]) config.cdpUrl = args[++i];
        break;
      case "--timeout":
        config.timeoutSeconds = numberArg("--timeout", args[++i], 0);
        break;
      case "--poll-interval":
        config.pollIntervalMs = numberArg("--poll-interval", args[++i], 1);
        break;
      case "--headless":
        config.headless = true;
        break;
    }
  }
  return config;
}
