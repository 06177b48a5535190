/**
 * Bridges: watch for requests addressed to one engine instance, ask an
 * agent provider for a verdict, and submit the fulfillment as the
 * bridge's identity.
 *
 * Delivery is at-least-once. A request id is claimed on receipt and
 * released again if the attempt fails, so a redelivery can retry it;
 * a submission that loses the race comes back as INVALID_STATE and is
 * logged as already handled. A claim is dropped once the request's
 * fulfillment or cancellation notification arrives. Requests closed
 * later in the same notification batch never reach the provider.
 */

import type { Logger } from "pino";
import { PROTOCOL_EVENTS } from "@tracebound/event-store";
import type { StoredEvent, Subscription } from "@tracebound/event-store";
import { protocolErrorCode } from "@tracebound/types";
import type { Address, IdentityId } from "@tracebound/types";
import {
  ApprovalParamsSchema,
  RequestCancelledSchema,
  RequestCreatedSchema,
  ResultRecordedSchema,
  ReviewParamsSchema,
  encodeJson,
} from "@tracebound/workflow";
import type {
  ApprovalParams,
  RequestCreatedPayload,
  ReviewParams,
  WorkflowKind,
} from "@tracebound/workflow";
import type { EndpointPool } from "./endpoint-pool.js";
import type { ApprovalTarget, NotificationSource, ReviewTarget } from "./ports.js";
import type { ApprovalVerdict, ProviderClient, ReviewVerdict } from "./provider-client.js";
import { DEFAULT_RETRY_CONFIG, isRetryable, sleep, withRetry } from "./retry.js";
import type { RetryConfig } from "./retry.js";

export interface WorkflowBridgeOptions {
  readonly source: NotificationSource;

  /** Engine instance whose requests this bridge serves */
  readonly authority: Address;

  /** Identity the bridge fulfills as; its verified wallet is the caller */
  readonly identityId: IdentityId;
  readonly provider: ProviderClient;
  readonly endpoints: EndpointPool;
  readonly logger: Logger;
  readonly retry?: RetryConfig;
  readonly sleepFn?: (ms: number) => Promise<void>;
}

/** Notifications after which a request can no longer be fulfilled */
const CLOSING_EVENTS: Readonly<Record<WorkflowKind, readonly string[]>> = {
  review: [PROTOCOL_EVENTS.REVIEW_FULFILLED, PROTOCOL_EVENTS.REQUEST_CANCELLED],
  approval: [
    PROTOCOL_EVENTS.APPROVAL_APPROVED,
    PROTOCOL_EVENTS.APPROVAL_NEEDS_REVISION,
    PROTOCOL_EVENTS.APPROVAL_REJECTED,
    PROTOCOL_EVENTS.REQUEST_CANCELLED,
  ],
};

interface Claim {
  closed: boolean;
}

// =============================================================================
// Base
// =============================================================================

export abstract class WorkflowBridge<TParams, TVerdict> {
  protected readonly provider: ProviderClient;
  protected readonly identityId: IdentityId;
  private readonly source: NotificationSource;
  private readonly authority: string;
  private readonly endpoints: EndpointPool;
  private readonly logger: Logger;
  private readonly retryConfig: RetryConfig;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly claimed = new Map<string, Claim>();
  private readonly inFlight = new Set<Promise<void>>();
  private subscription: Subscription | undefined;

  protected constructor(
    private readonly kind: WorkflowKind,
    options: WorkflowBridgeOptions,
  ) {
    this.source = options.source;
    this.authority = options.authority.toLowerCase();
    this.identityId = options.identityId;
    this.provider = options.provider;
    this.endpoints = options.endpoints;
    this.logger = options.logger.child({ bridge: kind, identityId: options.identityId });
    this.retryConfig = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.sleepFn = options.sleepFn ?? sleep;
  }

  get running(): boolean {
    return this.subscription !== undefined;
  }

  /** Requests currently being worked on */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Requests claimed and not yet seen closing */
  get claimedCount(): number {
    return this.claimed.size;
  }

  start(): void {
    if (this.subscription !== undefined) return;
    this.subscription = this.source.subscribe((event) => this.receive(event));
    this.logger.info({ authority: this.authority }, "Bridge watching for requests");
  }

  stop(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
  }

  /** Resolves once every accepted request has been fully handled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /**
   * Consider one notification. Requests created on this bridge's engine
   * are worked on; closing notifications for them drop the claim.
   * Anything else is ignored.
   */
  receive(stored: StoredEvent): void {
    if (stored.event.type === PROTOCOL_EVENTS.REQUEST_CREATED) {
      this.receiveCreated(stored);
    } else if (CLOSING_EVENTS[this.kind].includes(stored.event.type)) {
      this.receiveClosing(stored);
    }
  }

  private receiveCreated(stored: StoredEvent): void {
    const parsed = RequestCreatedSchema.safeParse(stored.event.payload);
    if (!parsed.success) {
      this.logger.warn(
        { globalPosition: stored.globalPosition, issues: parsed.error.issues },
        "Ignoring malformed request notification",
      );
      return;
    }

    const request = parsed.data;
    if (request.kind !== this.kind || !this.serves(request.authority)) {
      return;
    }

    const key = request.requestId.toLowerCase();
    if (this.claimed.has(key)) {
      this.logger.debug({ requestId: request.requestId }, "Duplicate delivery ignored");
      return;
    }
    const claim: Claim = { closed: false };
    this.claimed.set(key, claim);

    const task = this.process(request, claim).finally(() => {
      this.inFlight.delete(task);
    });
    this.inFlight.add(task);
  }

  private receiveClosing(stored: StoredEvent): void {
    const parsed =
      stored.event.type === PROTOCOL_EVENTS.REQUEST_CANCELLED
        ? RequestCancelledSchema.safeParse(stored.event.payload)
        : ResultRecordedSchema.safeParse(stored.event.payload);
    if (!parsed.success || !this.serves(parsed.data.authority)) return;

    const key = parsed.data.requestId.toLowerCase();
    const claim = this.claimed.get(key);
    if (claim === undefined) return;
    claim.closed = true;
    this.claimed.delete(key);
  }

  private serves(authority: string): boolean {
    return authority.toLowerCase() === this.authority;
  }

  // ─── Per-kind behaviour ──────────────────────────────────────────────

  protected abstract parseParams(params: Record<string, unknown>): TParams;

  protected abstract invoke(
    endpoint: string,
    request: RequestCreatedPayload,
    params: TParams,
  ): Promise<TVerdict>;

  /** @returns Fields describing the verdict, for logging */
  protected abstract summarize(verdict: TVerdict): Record<string, unknown>;

  protected abstract submit(request: RequestCreatedPayload, verdict: TVerdict): Promise<void>;

  // ─── Pipeline ────────────────────────────────────────────────────────

  private async process(request: RequestCreatedPayload, claim: Claim): Promise<void> {
    const log = this.logger.child({
      correlationToken: request.correlationToken,
      requestId: request.requestId,
      domainKey: request.domainKey,
    });
    log.info({ requester: request.requester }, "Request received");

    // Let the rest of the current batch arrive before calling out
    await Promise.resolve();
    if (claim.closed) {
      log.info("Request closed before it was picked up");
      return;
    }

    let verdict: TVerdict;
    try {
      const params = this.parseParams(request.params);
      const endpoint = this.endpoints.next();
      log.info({ endpoint }, "Routing to provider");
      verdict = await withRetry(() => this.invoke(endpoint, request, params), {
        config: this.retryConfig,
        shouldRetry: isRetryable,
        sleepFn: this.sleepFn,
        onRetry: (err, attempt, delayMs) =>
          log.warn({ err, attempt, delayMs }, "Provider call failed, retrying"),
      });
    } catch (err) {
      this.release(request, claim);
      log.error({ err }, "Provider invocation failed; request left pending");
      return;
    }

    log.info(this.summarize(verdict), "Provider decision");

    try {
      await withRetry(() => this.submit(request, verdict), {
        config: this.retryConfig,
        shouldRetry: isRetryable,
        sleepFn: this.sleepFn,
        onRetry: (err, attempt, delayMs) =>
          log.warn({ err, attempt, delayMs }, "Submission failed, retrying"),
      });
    } catch (err) {
      this.release(request, claim);
      if (protocolErrorCode(err) === "INVALID_STATE") {
        log.info("Request already handled");
        return;
      }
      log.error({ err }, "Submission failed; request left pending");
      return;
    }

    log.info("Fulfillment submitted");
  }

  private release(request: RequestCreatedPayload, claim: Claim): void {
    const key = request.requestId.toLowerCase();
    if (this.claimed.get(key) === claim) this.claimed.delete(key);
  }
}

// =============================================================================
// Review
// =============================================================================

export interface ReviewBridgeOptions extends WorkflowBridgeOptions {
  readonly target: ReviewTarget;
}

export class ReviewBridge extends WorkflowBridge<ReviewParams, ReviewVerdict> {
  private readonly target: ReviewTarget;

  constructor(options: ReviewBridgeOptions) {
    super("review", options);
    this.target = options.target;
  }

  protected parseParams(params: Record<string, unknown>): ReviewParams {
    return ReviewParamsSchema.parse(params);
  }

  protected invoke(
    endpoint: string,
    request: RequestCreatedPayload,
    params: ReviewParams,
  ): Promise<ReviewVerdict> {
    return this.provider.reviewPr(endpoint, {
      prId: request.domainKey,
      traceId: request.correlationToken,
      focus: params.focus,
    });
  }

  protected summarize(verdict: ReviewVerdict): Record<string, unknown> {
    return { approved: verdict.approved, commentCount: verdict.comments.length };
  }

  protected submit(request: RequestCreatedPayload, verdict: ReviewVerdict): Promise<void> {
    return this.target.fulfillReview(this.identityId, request.requestId, request.domainKey, {
      summary: encodeJson(verdict.summary),
      comments: encodeJson(verdict.comments),
      approved: verdict.approved,
    });
  }
}

// =============================================================================
// Approval
// =============================================================================

export interface ApprovalBridgeOptions extends WorkflowBridgeOptions {
  readonly target: ApprovalTarget;
}

export class ApprovalBridge extends WorkflowBridge<ApprovalParams, ApprovalVerdict> {
  private readonly target: ApprovalTarget;

  constructor(options: ApprovalBridgeOptions) {
    super("approval", options);
    this.target = options.target;
  }

  protected parseParams(params: Record<string, unknown>): ApprovalParams {
    return ApprovalParamsSchema.parse(params);
  }

  protected invoke(
    endpoint: string,
    request: RequestCreatedPayload,
    params: ApprovalParams,
  ): Promise<ApprovalVerdict> {
    return this.provider.approvePr(endpoint, {
      prId: request.domainKey,
      traceId: request.correlationToken,
      reviewerAgent: params.reviewerEndpoint,
    });
  }

  protected summarize(verdict: ApprovalVerdict): Record<string, unknown> {
    return {
      decision: verdict.decision,
      blockerCount: verdict.unresolved_blockers.length,
    };
  }

  protected submit(request: RequestCreatedPayload, verdict: ApprovalVerdict): Promise<void> {
    const { requestId, domainKey } = request;
    const reason = encodeJson(verdict.reason);

    switch (verdict.decision) {
      case "approved":
        return this.target.approve(this.identityId, requestId, domainKey, reason);
      case "needs_revision":
        return this.target.needsRevision(
          this.identityId,
          requestId,
          domainKey,
          reason,
          encodeJson(verdict.unresolved_blockers),
        );
      case "rejected":
        return this.target.reject(this.identityId, requestId, domainKey, reason);
    }
  }
}
