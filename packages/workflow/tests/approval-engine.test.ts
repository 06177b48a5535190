/**
 * Tests for ApprovalEngine's three-way decision.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryEventStore } from "@tracebound/event-store";
import { ExecutionTraceLedger } from "@tracebound/trace";
import { ApprovalEngine } from "../src/approval-engine.js";
import { decodeJson, decodeText, encodeJson, encodeText } from "../src/codec.js";
import type { ApprovalRequest } from "../src/types.js";
import {
  APPROVAL_AUTHORITY,
  REQUESTER,
  REVIEW_AUTHORITY,
  StubIdentityProvider,
  WALLET,
  clock,
  thrownBy,
} from "./helpers.js";

describe("ApprovalEngine", () => {
  let store: InMemoryEventStore;
  let ledger: ExecutionTraceLedger;
  let identities: StubIdentityProvider;
  let engine: ApprovalEngine;
  let pending: ApprovalRequest;

  beforeEach(() => {
    store = new InMemoryEventStore({ clock });
    ledger = new ExecutionTraceLedger({ store, clock });
    identities = new StubIdentityProvider();
    identities.set(1, WALLET, APPROVAL_AUTHORITY);
    engine = new ApprovalEngine({
      authority: APPROVAL_AUTHORITY,
      store,
      identities,
      trace: ledger,
      clock,
    });
    pending = engine.requestApproval(REQUESTER, {
      domainKey: "PR-42",
      params: { reviewerEndpoint: "http://reviewer.test" },
    });
  });

  function lastEventType(): string | undefined {
    return store.readAll().filter((e) => e.event.metadata.source === "approval").at(-1)
      ?.event.type;
  }

  it("approves with empty blockers", () => {
    const result = engine.approve(WALLET, 1, pending.requestId, "PR-42", encodeText("ship it"));

    expect(result.status).toBe("approved");
    expect(decodeText(result.outcome.reason)).toBe("ship it");
    expect(result.outcome.unresolvedBlockers).toBe("0x");
    expect(lastEventType()).toBe("workflow.approval.approved");
    expect(ledger.getTrace(pending.correlationToken).at(-1)?.action).toBe("approvalGranted");
  });

  it("requests revision with blockers kept verbatim", () => {
    const blockers = ["missing tests", "unchecked input"];
    engine.needsRevision(
      WALLET,
      1,
      pending.requestId,
      "PR-42",
      encodeText("two blockers"),
      encodeJson(blockers),
    );

    const result = engine.getResult(pending.requestId);
    if (result === undefined) throw new Error("missing result");
    expect(result.status).toBe("needs_revision");
    expect(decodeJson(result.outcome.unresolvedBlockers)).toEqual(blockers);
    expect(lastEventType()).toBe("workflow.approval.needs_revision");
    expect(ledger.getTrace(pending.correlationToken).at(-1)?.action).toBe("revisionRequested");
  });

  it("rejects with empty blockers", () => {
    const result = engine.reject(WALLET, 1, pending.requestId, "PR-42", encodeText("no"));

    expect(result.status).toBe("rejected");
    expect(result.outcome.unresolvedBlockers).toBe("0x");
    expect(lastEventType()).toBe("workflow.approval.rejected");
    expect(ledger.getTrace(pending.correlationToken).at(-1)?.action).toBe("approvalRejected");
  });

  it("shares one guard across all three decisions", () => {
    identities.rebind(1, REVIEW_AUTHORITY);
    const reason = encodeText("x");

    for (const decide of [
      () => engine.approve(WALLET, 1, pending.requestId, "PR-42", reason),
      () => engine.needsRevision(WALLET, 1, pending.requestId, "PR-42", reason, "0x"),
      () => engine.reject(WALLET, 1, pending.requestId, "PR-42", reason),
    ]) {
      expect(thrownBy(decide)).toMatchObject({ code: "UNAUTHORIZED" });
    }
    expect(engine.getRequest(pending.requestId).status).toBe("pending");
  });

  it("allows only the first decision", () => {
    engine.reject(WALLET, 1, pending.requestId, "PR-42", encodeText("no"));
    expect(
      thrownBy(() => engine.approve(WALLET, 1, pending.requestId, "PR-42", "0x")),
    ).toMatchObject({ code: "INVALID_STATE" });
  });

  it("records cancellation hops under the approval kind", () => {
    engine.cancel(REQUESTER, pending.requestId);
    expect(ledger.getTrace(pending.correlationToken).map((h) => h.action)).toEqual([
      "approvalRequested",
      "approvalCancelled",
    ]);
  });

  it("replays each decision type", () => {
    const second = engine.requestApproval(REQUESTER, { domainKey: "PR-43", params: {} });
    engine.needsRevision(WALLET, 1, pending.requestId, "PR-42", "0x01", encodeJson(["a"]));
    engine.approve(WALLET, 1, second.requestId, "PR-43", "0x02");

    const restored = new ApprovalEngine({
      authority: APPROVAL_AUTHORITY,
      store,
      identities,
    });
    restored.replay(store.readAll());

    expect(restored.getRequest(pending.requestId).status).toBe("needs_revision");
    expect(restored.getRequest(second.requestId).status).toBe("approved");
    expect(restored.getRequest(pending.requestId).params).toEqual({
      reviewerEndpoint: "http://reviewer.test",
    });
  });
});
