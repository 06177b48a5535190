/**
 * Workflow Engine: request → fulfillment state machine.
 *
 * One engine instance owns its requests and results under a single
 * authority handle. Fulfillment is authorized only through the identity
 * provider: the caller must be the identity's verified wallet and the
 * identity must be bound to this engine's authority.
 *
 * Every operation runs its guards, appends its notification, then
 * applies the transition and records a trace hop. A failed guard leaves
 * nothing behind.
 */

import type { z } from "zod";
import { getAddress, isAddress } from "viem";
import type {
  Address,
  Bytes32,
  Clock,
  DomainEvent,
  IdentityId,
  IdentityProvider,
  TraceRecorder,
} from "@tracebound/types";
import {
  ZERO_BYTES32,
  isBytes32,
  isZeroAddress,
  isZeroBytes32,
  systemClock,
} from "@tracebound/types";
import type {
  EventStore,
  ProtocolEventType,
  StoredEvent,
} from "@tracebound/event-store";
import {
  EventStoreError,
  PROTOCOL_EVENTS,
  createDomainEvent,
  requestStream,
} from "@tracebound/event-store";
import { NoopTraceRecorder } from "@tracebound/trace";
import { WorkflowError } from "./errors.js";
import {
  RequestCancelledSchema,
  RequestCreatedSchema,
  ResultRecordedSchema,
} from "./events.js";
import type {
  RequestCancelledPayload,
  RequestCreatedPayload,
  ResultRecordedPayload,
} from "./events.js";
import { computeRequestId, deterministicToken } from "./token.js";
import type { CorrelationTokenStrategy } from "./token.js";
import type {
  CreateRequestInput,
  WorkflowEngineOptions,
  WorkflowKind,
  WorkflowRequest,
  WorkflowResult,
  WorkflowStatus,
} from "./types.js";

/** Attempts at deriving a token no pending request carries. */
const MAX_TOKEN_ATTEMPTS = 16;

// =============================================================================
// Definition
// =============================================================================

/**
 * A terminal transition: the status it reaches, the notification it
 * appends and the hop action it records.
 */
export interface Transition<TTerminal extends string> {
  readonly status: TTerminal;
  readonly event: ProtocolEventType;
  readonly action: string;
}

export interface WorkflowDefinition<TTerminal extends string, TParams, TOutcome> {
  readonly kind: WorkflowKind;
  readonly validTransitions: Readonly<
    Record<WorkflowStatus<TTerminal>, readonly WorkflowStatus<TTerminal>[]>
  >;
  readonly results: readonly Transition<TTerminal>[];
  readonly paramsSchema: z.ZodType<TParams, z.ZodTypeDef, unknown>;
  readonly outcomeSchema: z.ZodType<TOutcome, z.ZodTypeDef, unknown>;
}

// =============================================================================
// Engine
// =============================================================================

export abstract class WorkflowEngine<
  TTerminal extends string,
  TParams extends object,
  TOutcome extends object,
> {
  private readonly requests = new Map<
    Bytes32,
    WorkflowRequest<WorkflowStatus<TTerminal>, TParams>
  >();
  private readonly results = new Map<Bytes32, WorkflowResult<TTerminal, TOutcome>>();

  /** domainKey → requestId of the most recent result */
  private readonly latestByDomainKey = new Map<string, Bytes32>();

  private sequence = 0;

  private readonly _authority: Address;
  private readonly store: EventStore;
  private readonly identities: IdentityProvider;
  private readonly trace: TraceRecorder;
  private readonly tokenStrategy: CorrelationTokenStrategy;
  private readonly clock: Clock;
  private readonly definition: WorkflowDefinition<TTerminal, TParams, TOutcome>;

  protected constructor(
    options: WorkflowEngineOptions,
    definition: WorkflowDefinition<TTerminal, TParams, TOutcome>,
  ) {
    if (!isAddress(options.authority, { strict: false }) || isZeroAddress(options.authority)) {
      throw new WorkflowError(
        "EMPTY_HANDLE",
        `Engine authority must be a non-zero address, got ${options.authority}`,
      );
    }
    this._authority = getAddress(options.authority);
    this.store = options.store;
    this.identities = options.identities;
    this.trace = options.trace ?? new NoopTraceRecorder();
    this.tokenStrategy = options.tokenStrategy ?? deterministicToken;
    this.clock = options.clock ?? systemClock;
    this.definition = definition;
  }

  get authority(): Address {
    return this._authority;
  }

  get kind(): WorkflowKind {
    return this.definition.kind;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open a request. Without a correlation token (or with the zero token)
   * the request starts a new workflow and a token is derived for it.
   */
  createRequest(
    caller: Address,
    input: CreateRequestInput<TParams>,
  ): WorkflowRequest<WorkflowStatus<TTerminal>, TParams> {
    const requester = requireCaller(caller);
    if (input.domainKey.length === 0) {
      throw new WorkflowError("EMPTY_HANDLE", "Domain key must not be empty");
    }
    const params = parseInput(this.definition.paramsSchema, input.params, "params");

    const now = this.clock();
    const timeMs = now.getTime();
    let sequence = this.sequence + 1;
    let correlationToken: Bytes32;

    if (input.correlationToken !== undefined && !isZeroBytes32(input.correlationToken)) {
      correlationToken = toBytes32(input.correlationToken, "correlationToken");
    } else {
      const strategy = input.tokenStrategy ?? this.tokenStrategy;
      const derive = (): Bytes32 =>
        toBytes32(
          strategy({ requester, domainKey: input.domainKey, timeMs, sequence }),
          "derived correlationToken",
        );

      correlationToken = derive();
      let attempts = 1;
      while (this.isCarriedByPending(correlationToken)) {
        if (attempts >= MAX_TOKEN_ATTEMPTS) {
          throw new WorkflowError(
            "INVALID_STATE",
            `Could not derive a correlation token unused by pending requests after ${attempts} attempts`,
          );
        }
        sequence += 1;
        attempts += 1;
        correlationToken = derive();
      }
    }

    const requestId = computeRequestId(
      this._authority,
      requester,
      input.domainKey,
      timeMs,
      sequence,
    );
    const payload: RequestCreatedPayload = {
      authority: this._authority,
      kind: this.definition.kind,
      requestId,
      requester,
      domainKey: input.domainKey,
      correlationToken,
      params: toRecord(params),
      sequence,
      createdAt: now.toISOString(),
    };

    this.append(
      requestId,
      requester,
      correlationToken,
      PROTOCOL_EVENTS.REQUEST_CREATED,
      payload,
      "no_stream",
    );
    this.applyCreated(payload, params);
    this.trace.recordHop(
      this._authority,
      correlationToken,
      0,
      `${this.definition.kind}Requested`,
    );

    return this.requireRequest(requestId);
  }

  /**
   * Cancel a pending request. Only its requester may cancel.
   */
  cancel(
    caller: Address,
    requestId: Bytes32,
  ): WorkflowRequest<WorkflowStatus<TTerminal>, TParams> {
    const request = this.requireRequest(requestId);
    if (!sameAddress(caller, request.requester)) {
      throw new WorkflowError(
        "UNAUTHORIZED",
        `Only the requester ${request.requester} may cancel request ${request.requestId}`,
      );
    }
    this.assertTransition(request, "cancelled");

    const payload: RequestCancelledPayload = {
      authority: this._authority,
      requestId: request.requestId,
      cancelledAt: this.clock().toISOString(),
    };
    this.append(
      request.requestId,
      request.requester,
      request.correlationToken,
      PROTOCOL_EVENTS.REQUEST_CANCELLED,
      payload,
      1,
    );
    this.applyCancelled(payload);
    this.trace.recordHop(
      this._authority,
      request.correlationToken,
      0,
      `${this.definition.kind}Cancelled`,
    );

    return this.requireRequest(request.requestId);
  }

  /**
   * Complete a pending request as `identityId`.
   *
   * Guard order: caller is the identity's verified wallet, the identity
   * is bound to this engine, the request exists, it is pending, and the
   * domain key matches.
   */
  protected fulfill(
    caller: Address,
    identityId: IdentityId,
    requestId: Bytes32,
    domainKey: string,
    transition: Transition<TTerminal>,
    outcome: TOutcome,
  ): WorkflowResult<TTerminal, TOutcome> {
    this.requireFulfiller(caller, identityId);
    const request = this.requireRequest(requestId);
    this.assertTransition(request, transition.status);
    if (request.domainKey !== domainKey) {
      throw new WorkflowError(
        "DOMAIN_KEY_MISMATCH",
        `Request ${request.requestId} is for "${request.domainKey}", not "${domainKey}"`,
      );
    }
    const checked = parseInput(this.definition.outcomeSchema, outcome, "outcome");

    const payload: ResultRecordedPayload = {
      authority: this._authority,
      requestId: request.requestId,
      correlationToken: request.correlationToken,
      domainKey: request.domainKey,
      outcome: toRecord(checked),
      fulfillingIdentityId: identityId,
      fulfilledAt: this.clock().toISOString(),
    };
    this.append(
      request.requestId,
      getAddress(caller),
      request.correlationToken,
      transition.event,
      payload,
      1,
    );
    this.applyResult(transition, payload, checked);
    this.trace.recordHop(
      this._authority,
      request.correlationToken,
      identityId,
      transition.action,
    );

    return this.requireResult(request.requestId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getRequest(requestId: Bytes32): WorkflowRequest<WorkflowStatus<TTerminal>, TParams> {
    return this.requireRequest(requestId);
  }

  /** The result of a request, or undefined while it has none. */
  getResult(requestId: Bytes32): WorkflowResult<TTerminal, TOutcome> | undefined {
    const request = this.requireRequest(requestId);
    return this.results.get(request.requestId);
  }

  /** The most recent result recorded for `domainKey`. */
  getLatestOutcome(domainKey: string): WorkflowResult<TTerminal, TOutcome> | undefined {
    const requestId = this.latestByDomainKey.get(domainKey);
    return requestId !== undefined ? this.results.get(requestId) : undefined;
  }

  /** Requests in creation order, optionally filtered by status. */
  listRequests(
    status?: WorkflowStatus<TTerminal>,
  ): readonly WorkflowRequest<WorkflowStatus<TTerminal>, TParams>[] {
    const all = [...this.requests.values()];
    return status !== undefined ? all.filter((r) => r.status === status) : all;
  }

  listByCorrelationToken(
    correlationToken: Bytes32,
  ): readonly WorkflowRequest<WorkflowStatus<TTerminal>, TParams>[] {
    const token = correlationToken.toLowerCase();
    return [...this.requests.values()].filter((r) => r.correlationToken === token);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Replay
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Rebuild state from stored events in global order. Events of other
   * engines and components are skipped.
   */
  replay(events: readonly StoredEvent[]): void {
    for (const stored of events) {
      try {
        this.replayOne(stored.event);
      } catch (error: unknown) {
        if (error instanceof WorkflowError) {
          throw error;
        }
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Invalid ${stored.event.type} payload at position ${stored.globalPosition}: ${String(error)}`,
          stored.streamId,
        );
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private replayOne(event: DomainEvent): void {
    if (event.type === PROTOCOL_EVENTS.REQUEST_CREATED) {
      const payload = RequestCreatedSchema.parse(event.payload);
      if (this.owns(payload.authority) && payload.kind === this.definition.kind) {
        this.applyCreated(payload, this.definition.paramsSchema.parse(payload.params));
      }
      return;
    }

    if (event.type === PROTOCOL_EVENTS.REQUEST_CANCELLED) {
      const payload = RequestCancelledSchema.parse(event.payload);
      if (this.owns(payload.authority)) {
        this.applyCancelled(payload);
      }
      return;
    }

    const transition = this.definition.results.find((t) => t.event === event.type);
    if (transition !== undefined) {
      const payload = ResultRecordedSchema.parse(event.payload);
      if (this.owns(payload.authority)) {
        this.applyResult(
          transition,
          payload,
          this.definition.outcomeSchema.parse(payload.outcome),
        );
      }
    }
  }

  private applyCreated(payload: RequestCreatedPayload, params: TParams): void {
    const requestId = normalizeBytes32(payload.requestId);
    this.requests.set(requestId, {
      requestId,
      authority: this._authority,
      kind: this.definition.kind,
      requester: getAddress(payload.requester),
      domainKey: payload.domainKey,
      correlationToken: normalizeBytes32(payload.correlationToken),
      params,
      createdAt: payload.createdAt,
      sequence: payload.sequence,
      status: "pending",
    });
    this.sequence = Math.max(this.sequence, payload.sequence);
  }

  private applyCancelled(payload: RequestCancelledPayload): void {
    const request = this.requireRequest(payload.requestId);
    this.requests.set(request.requestId, { ...request, status: "cancelled" });
  }

  private applyResult(
    transition: Transition<TTerminal>,
    payload: ResultRecordedPayload,
    outcome: TOutcome,
  ): void {
    const request = this.requireRequest(payload.requestId);
    this.requests.set(request.requestId, { ...request, status: transition.status });
    this.results.set(request.requestId, {
      requestId: request.requestId,
      correlationToken: request.correlationToken,
      domainKey: request.domainKey,
      status: transition.status,
      outcome,
      fulfillingIdentityId: payload.fulfillingIdentityId,
      fulfilledAt: payload.fulfilledAt,
    });
    this.latestByDomainKey.set(request.domainKey, request.requestId);
  }

  private append(
    requestId: Bytes32,
    actor: Address,
    correlationToken: Bytes32,
    type: ProtocolEventType,
    payload: Readonly<Record<string, unknown>>,
    expectedVersion: number | "no_stream",
  ): void {
    this.store.append(
      requestStream(this._authority, requestId),
      [
        createDomainEvent(type, payload, {
          actor,
          correlationId: correlationToken,
          source: this.definition.kind,
          clock: this.clock,
        }),
      ],
      { expectedVersion },
    );
  }

  private requireFulfiller(caller: Address, identityId: IdentityId): void {
    const wallet = this.identities.getVerifiedWallet(identityId);
    if (isZeroAddress(wallet) || !sameAddress(caller, wallet)) {
      throw new WorkflowError(
        "UNAUTHORIZED",
        `${caller} is not the verified wallet of identity ${identityId}`,
      );
    }
    const bound = this.identities.getBoundAuthority(identityId);
    if (!sameAddress(bound, this._authority)) {
      throw new WorkflowError(
        "UNAUTHORIZED",
        `Identity ${identityId} is bound to ${bound}, not ${this._authority}`,
      );
    }
  }

  private requireRequest(
    requestId: string,
  ): WorkflowRequest<WorkflowStatus<TTerminal>, TParams> {
    const request = this.requests.get(normalizeBytes32(requestId));
    if (request === undefined) {
      throw new WorkflowError("UNKNOWN_ENTITY", `Request ${requestId} not found`);
    }
    return request;
  }

  private requireResult(requestId: Bytes32): WorkflowResult<TTerminal, TOutcome> {
    const result = this.results.get(requestId);
    if (result === undefined) {
      throw new WorkflowError("UNKNOWN_ENTITY", `Request ${requestId} has no result`);
    }
    return result;
  }

  private assertTransition(
    request: WorkflowRequest<WorkflowStatus<TTerminal>, TParams>,
    to: WorkflowStatus<TTerminal>,
  ): void {
    const allowed = this.definition.validTransitions[request.status] ?? [];
    if (!allowed.includes(to)) {
      throw new WorkflowError(
        "INVALID_STATE",
        `Cannot transition request ${request.requestId} from '${request.status}' to '${to}'`,
      );
    }
  }

  private isCarriedByPending(correlationToken: Bytes32): boolean {
    for (const request of this.requests.values()) {
      if (request.status === "pending" && request.correlationToken === correlationToken) {
        return true;
      }
    }
    return false;
  }

  private owns(authority: Address): boolean {
    return sameAddress(authority, this._authority);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function requireCaller(caller: string): Address {
  if (!isAddress(caller, { strict: false }) || isZeroAddress(caller)) {
    throw new WorkflowError("EMPTY_HANDLE", `Caller must be a non-zero address, got ${caller}`);
  }
  return getAddress(caller);
}

function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Lowercase a 32-byte handle; unknown shapes map to the zero handle. */
function normalizeBytes32(value: string): Bytes32 {
  const lower = value.toLowerCase();
  return isBytes32(lower) ? lower : ZERO_BYTES32;
}

function toBytes32(value: string, label: string): Bytes32 {
  const lower = value.toLowerCase();
  if (!isBytes32(lower) || isZeroBytes32(lower)) {
    throw new WorkflowError("EMPTY_HANDLE", `${label} must be a non-zero 32-byte value, got ${value}`);
  }
  return lower;
}

function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${[label, ...issue.path].join(".")}: ${issue.message}`)
      .join("; ");
    throw new WorkflowError("INVALID_INPUT", `Invalid ${label}: ${issues}`);
  }
  return parsed.data;
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}
