/**
 * Remote adapters for a bridge that runs apart from the node.
 *
 * HttpNodeClient submits fulfillments through the node's REST API and
 * reads its notification feed. PollingEventSource turns that feed into
 * a NotificationSource.
 */

import { z } from "zod";
import { isDomainEvent } from "@tracebound/types";
import type { Bytes32, DomainEvent, Hex, IdentityId } from "@tracebound/types";
import type { EventHandler, StoredEvent, Subscription } from "@tracebound/event-store";
import type { ReviewOutcome } from "@tracebound/workflow";
import { BridgeError } from "./errors.js";
import type { ApprovalTarget, NotificationSource, ReviewTarget } from "./ports.js";

// =============================================================================
// Wire shapes
// =============================================================================

const StoredEventSchema = z.object({
  event: z.custom<DomainEvent>(isDomainEvent, { message: "Expected a domain event" }),
  streamId: z.string(),
  version: z.number().int().positive(),
  globalPosition: z.number().int().positive(),
  appendedAt: z.string(),
  hash: z.string(),
  previousHash: z.string(),
});

const EventPageSchema = z.object({
  data: z.array(StoredEventSchema),
});

const ErrorEnvelopeSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.unknown().optional(),
  }),
});

export interface HttpNodeClientConfig {
  /** Node base URL, e.g. http://localhost:3000 */
  readonly baseUrl: string;

  /** Sent as X-Api-Key; resolves to the bridge's wallet principal */
  readonly apiKey?: string | undefined;

  /** Default: 10000 */
  readonly timeoutMs?: number;
  readonly fetchFn?: typeof fetch;
}

export interface EventFeed {
  readEvents(fromPosition: number, maxCount: number): Promise<readonly StoredEvent[]>;
}

// =============================================================================
// HTTP client
// =============================================================================

export class HttpNodeClient implements ReviewTarget, ApprovalTarget, EventFeed {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpNodeClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 10000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async fulfillReview(
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    outcome: ReviewOutcome,
  ): Promise<void> {
    await this.request("POST", `/api/v1/reviews/${requestId}/fulfill`, {
      identityId,
      domainKey,
      summary: outcome.summary,
      comments: outcome.comments,
      approved: outcome.approved,
    });
  }

  async approve(identityId: IdentityId, requestId: Bytes32, domainKey: string, reason: Hex): Promise<void> {
    await this.request("POST", `/api/v1/approvals/${requestId}/approve`, {
      identityId,
      domainKey,
      reason,
    });
  }

  async needsRevision(
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    reason: Hex,
    unresolvedBlockers: Hex,
  ): Promise<void> {
    await this.request("POST", `/api/v1/approvals/${requestId}/needs-revision`, {
      identityId,
      domainKey,
      reason,
      unresolvedBlockers,
    });
  }

  async reject(identityId: IdentityId, requestId: Bytes32, domainKey: string, reason: Hex): Promise<void> {
    await this.request("POST", `/api/v1/approvals/${requestId}/reject`, {
      identityId,
      domainKey,
      reason,
    });
  }

  async readEvents(fromPosition: number, maxCount: number): Promise<readonly StoredEvent[]> {
    const body = await this.request(
      "GET",
      `/api/v1/events?fromPosition=${fromPosition}&maxCount=${maxCount}`,
    );
    const page = EventPageSchema.safeParse(body);
    if (!page.success) {
      throw new BridgeError("INVALID_NODE_RESPONSE", "Event feed returned an unexpected shape");
    }
    return page.data.data;
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
    };
    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    }

    const init: RequestInit = { method, headers };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const response = await this.fetchWithTimeout(`${this.baseUrl}${path}`, init);
    const text = await response.text();
    const parsed = parseJson(text);

    if (response.ok) return parsed;

    const envelope = ErrorEnvelopeSchema.safeParse(parsed);
    if (envelope.success) {
      throw new BridgeError(
        envelope.data.error.code,
        envelope.data.error.message,
        response.status,
        envelope.data.error.details,
      );
    }
    throw new BridgeError(
      response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR",
      `HTTP ${response.status}`,
      response.status,
    );
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new BridgeError("TIMEOUT", `Request timed out after ${this.timeoutMs}ms`);
      }
      throw new BridgeError("NETWORK_ERROR", error instanceof Error ? error.message : "Network error");
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function parseJson(text: string): unknown {
  if (text.length === 0) return {};
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

// =============================================================================
// Polling source
// =============================================================================

export interface PollingEventSourceOptions {
  readonly feed: EventFeed;

  /** Delay between polls when caught up. Default: 1000 */
  readonly intervalMs?: number;

  /** Events requested per poll. Default: 100 */
  readonly batchSize?: number;

  /** First global position to deliver. Default: 1 */
  readonly fromPosition?: number;

  /** Poll failures land here; polling continues. */
  readonly onError?: (err: unknown) => void;
}

export class PollingEventSource implements NotificationSource {
  private readonly feed: EventFeed;
  private readonly intervalMs: number;
  private readonly batchSize: number;
  private readonly onError: (err: unknown) => void;
  private readonly handlers = new Set<EventHandler>();
  private position: number;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private ticking = false;

  constructor(options: PollingEventSourceOptions) {
    this.feed = options.feed;
    this.intervalMs = options.intervalMs ?? 1000;
    this.batchSize = options.batchSize ?? 100;
    this.position = options.fromPosition ?? 1;
    this.onError = options.onError ?? (() => undefined);
  }

  /** Next global position this source will ask for */
  get nextPosition(): number {
    return this.position;
  }

  subscribe(handler: EventHandler): Subscription {
    this.handlers.add(handler);
    if (this.timer === undefined && !this.ticking) this.schedule(0);

    return {
      unsubscribe: () => {
        this.handlers.delete(handler);
        if (this.handlers.size === 0 && this.timer !== undefined) {
          clearTimeout(this.timer);
          this.timer = undefined;
        }
      },
    };
  }

  /**
   * Fetch one batch and deliver it to current handlers.
   *
   * @returns Number of events delivered
   */
  async poll(): Promise<number> {
    const events = await this.feed.readEvents(this.position, this.batchSize);
    let delivered = 0;

    for (const event of events) {
      if (event.globalPosition < this.position) continue;
      this.position = event.globalPosition + 1;
      delivered++;
      for (const handler of this.handlers) {
        handler(event);
      }
    }
    return delivered;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    let delivered = 0;
    this.ticking = true;
    try {
      delivered = await this.poll();
    } catch (err) {
      this.onError(err);
    } finally {
      this.ticking = false;
    }
    if (this.handlers.size > 0) {
      // A full batch means more is waiting
      this.schedule(delivered >= this.batchSize ? 0 : this.intervalMs);
    }
  }
}
