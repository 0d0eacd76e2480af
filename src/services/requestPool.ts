import type { Dispatcher } from "undici";
import { ProxyAgent } from "undici";

import { logInfo, logWarn } from "../utils/logger.js";
import { RateLimiter } from "../utils/rateLimiter.js";

export type RequestScheduler = {
  schedule<T>(task: (dispatcher?: Dispatcher) => Promise<T>): Promise<T>;
};

type RequestSlot = {
  dispatcher?: Dispatcher;
  limiter: RateLimiter;
  label: string;
};

type CreateRequestPoolOptions = {
  proxies?: string[];
  requestDelayMs: number;
};

export class RequestPool implements RequestScheduler {
  private slots: RequestSlot[];
  private nextIndex = 0;

  constructor(slots: RequestSlot[]) {
    if (slots.length === 0) {
      throw new Error("RequestPool must include at least one slot.");
    }
    this.slots = slots;
  }

  size() {
    return this.slots.length;
  }

  labels(): string[] {
    return this.slots.map((slot) => slot.label);
  }

  schedule<T>(task: (dispatcher?: Dispatcher) => Promise<T>): Promise<T> {
    const slot = this.slots[this.nextIndex];
    this.nextIndex = (this.nextIndex + 1) % this.slots.length;
    return slot.limiter.schedule(() => task(slot.dispatcher));
  }

  async close(): Promise<void> {
    await Promise.all(
      this.slots.map((slot) => (slot.dispatcher ? slot.dispatcher.close() : Promise.resolve()))
    );
  }
}

type ProxyDefinition = {
  host: string;
  port: string;
  username?: string;
  password?: string;
};

export function parseProxyEntry(entry: string): ProxyDefinition | null {
  const parts = entry.split(":").map((part) => part.trim());
  if (parts.length !== 2 && parts.length !== 4) {
    return null;
  }
  const [host, port, username, password] = parts;
  if (!host || !/^\d+$/.test(port)) {
    return null;
  }
  return { host, port, username, password };
}

function buildProxyAgent(proxy: ProxyDefinition): ProxyAgent {
  const auth =
    proxy.username && proxy.password
      ? `Basic ${Buffer.from(`${proxy.username}:${proxy.password}`).toString("base64")}`
      : undefined;
  return new ProxyAgent({
    uri: `http://${proxy.host}:${proxy.port}`,
    token: auth,
  });
}

/** One direct slot plus one slot per usable proxy entry, each with its own limiter. */
export function createRequestPool(options: CreateRequestPoolOptions): RequestPool {
  const slots: RequestSlot[] = [
    {
      label: "direct",
      limiter: new RateLimiter(options.requestDelayMs),
    },
  ];

  for (const entry of options.proxies ?? []) {
    const proxy = parseProxyEntry(entry);
    if (!proxy) {
      logWarn("Skipping invalid proxy entry.", { entry });
      continue;
    }
    slots.push({
      label: `${proxy.host}:${proxy.port}`,
      dispatcher: buildProxyAgent(proxy),
      limiter: new RateLimiter(options.requestDelayMs),
    });
  }

  if (slots.length > 1) {
    logInfo("Proxy pool initialized.", { proxies: slots.length - 1, totalSlots: slots.length });
  }
  return new RequestPool(slots);
}
