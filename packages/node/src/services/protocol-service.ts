/**
 * ProtocolService: Composition root for the domain packages.
 *
 * Route handlers delegate to this service. One event store carries
 * identity changes, workflow notifications and trace hops; on startup
 * every component replays it, so a node restarted on the same DATA_DIR
 * comes back with the same state.
 */

import { join } from "node:path";
import { InMemoryEventStore, JsonlEventStore } from "@tracebound/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@tracebound/event-store";
import { IdentityRegistry } from "@tracebound/identity";
import type { DelegatedSignatureValidator, IdentityRegistryOptions } from "@tracebound/identity";
import { ExecutionTraceLedger, NoopTraceRecorder } from "@tracebound/trace";
import {
  ApprovalEngine,
  ReviewEngine,
  deterministicToken,
  randomToken,
} from "@tracebound/workflow";
import type { CorrelationTokenStrategy, WorkflowEngineOptions } from "@tracebound/workflow";
import type { Address, Clock, TraceRecorder } from "@tracebound/types";

// =============================================================================
// Configuration
// =============================================================================

export interface ProtocolServiceConfig {
  readonly chainId: number;
  readonly registryAddress: Address;
  readonly reviewAuthority: Address;
  readonly approvalAuthority: Address;

  /** Default: true */
  readonly traceEnabled?: boolean;
  readonly maxDeadlineDelaySeconds?: number;

  /** Directory for events.jsonl. Ignored when `store` is given. */
  readonly dataDir?: string | undefined;
  readonly store?: EventStore;
  readonly signatureValidator?: DelegatedSignatureValidator;
  readonly clock?: Clock;
}

export type TokenStrategyName = "deterministic" | "random";

const TOKEN_STRATEGIES: Record<TokenStrategyName, CorrelationTokenStrategy> = {
  deterministic: deterministicToken,
  random: randomToken,
};

// =============================================================================
// Service
// =============================================================================

export class ProtocolService {
  readonly store: EventStore;
  readonly identities: IdentityRegistry;
  readonly traces: ExecutionTraceLedger;
  readonly reviews: ReviewEngine;
  readonly approvals: ApprovalEngine;
  readonly traceEnabled: boolean;

  /** Events replayed at startup */
  readonly replayedEvents: number;

  constructor(config: ProtocolServiceConfig) {
    const clockOption = config.clock !== undefined ? { clock: config.clock } : {};

    this.store =
      config.store ??
      (config.dataDir !== undefined
        ? new JsonlEventStore({ filePath: join(config.dataDir, "events.jsonl"), ...clockOption })
        : new InMemoryEventStore(clockOption));

    const registryOptions: IdentityRegistryOptions = {
      store: this.store,
      chainId: config.chainId,
      registryAddress: config.registryAddress,
      ...clockOption,
      ...(config.maxDeadlineDelaySeconds !== undefined
        ? { maxDeadlineDelaySeconds: config.maxDeadlineDelaySeconds }
        : {}),
      ...(config.signatureValidator !== undefined
        ? { signatureValidator: config.signatureValidator }
        : {}),
    };
    this.identities = new IdentityRegistry(registryOptions);

    // The ledger always serves reads; engines only write to it when enabled.
    this.traces = new ExecutionTraceLedger({ store: this.store, ...clockOption });
    this.traceEnabled = config.traceEnabled !== false;
    const recorder: TraceRecorder = this.traceEnabled ? this.traces : new NoopTraceRecorder();

    const engineOptions = (authority: Address): WorkflowEngineOptions => ({
      authority,
      store: this.store,
      identities: this.identities,
      trace: recorder,
      ...clockOption,
    });
    this.reviews = new ReviewEngine(engineOptions(config.reviewAuthority));
    this.approvals = new ApprovalEngine(engineOptions(config.approvalAuthority));

    const history = this.store.readAll();
    this.identities.replay(history);
    this.reviews.replay(history);
    this.approvals.replay(history);
    this.replayedEvents = history.length;
  }

  tokenStrategy(name: TokenStrategyName | undefined): CorrelationTokenStrategy | undefined {
    return name !== undefined ? TOKEN_STRATEGIES[name] : undefined;
  }

  readEvents(options: ReadAllOptions): readonly StoredEvent[] {
    return this.store.readAll(options);
  }

  checkEventStore(): EventStoreIntegrityResult {
    return this.store.verifyIntegrity();
  }
}
