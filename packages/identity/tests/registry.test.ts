/**
 * Tests for IdentityRegistry.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { privateKeyToAccount } from "viem/accounts";
import type { Address, Hex } from "@tracebound/types";
import { ZERO_ADDRESS } from "@tracebound/types";
import { InMemoryEventStore } from "@tracebound/event-store";
import { IdentityRegistry } from "../src/registry.js";
import { IdentityError } from "../src/errors.js";
import { signWalletProof, walletProofDigest } from "../src/proof.js";
import type { DelegatedSignatureValidator } from "../src/proof.js";

const OWNER: Address = "0x1000000000000000000000000000000000000001";
const OTHER: Address = "0x2000000000000000000000000000000000000002";
const STRANGER: Address = "0x3000000000000000000000000000000000000003";
const ENGINE: Address = "0x4000000000000000000000000000000000000004";
const REGISTRY: Address = "0x9000000000000000000000000000000000000009";

const clock = (): Date => new Date("2026-01-01T00:00:00.000Z");
const NOW = Math.floor(clock().getTime() / 1000);

const wallet = privateKeyToAccount(`0x${"11".repeat(32)}`);
const impostor = privateKeyToAccount(`0x${"22".repeat(32)}`);

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  return undefined;
}

describe("IdentityRegistry", () => {
  let store: InMemoryEventStore;
  let registry: IdentityRegistry;

  function createRegistry(validator?: DelegatedSignatureValidator): IdentityRegistry {
    return new IdentityRegistry({
      store,
      chainId: 31337,
      registryAddress: REGISTRY,
      clock,
      ...(validator !== undefined ? { signatureValidator: validator } : {}),
    });
  }

  beforeEach(() => {
    store = new InMemoryEventStore({ clock });
    registry = createRegistry();
  });

  // ─── Register ───────────────────────────────────────────────────────

  describe("register", () => {
    it("assigns ids from 1 and makes the caller owner and wallet", () => {
      const first = registry.register(OWNER);
      const second = registry.register(OTHER, { cardReference: "ipfs://card" });

      expect(first.identityId).toBe(1);
      expect(first.owner).toBe(OWNER);
      expect(first.verifiedWallet).toBe(OWNER);
      expect(first.boundAuthority).toBe(ZERO_ADDRESS);
      expect(first.registeredAt).toBe("2026-01-01T00:00:00.000Z");
      expect(second.identityId).toBe(2);
      expect(second.cardReference).toBe("ipfs://card");
      expect(registry.count()).toBe(2);
    });

    it("applies authority and metadata in one event", () => {
      const identity = registry.register(OWNER, {
        boundAuthority: ENGINE,
        metadata: { model: "0x01" },
      });

      expect(identity.boundAuthority).toBe(ENGINE);
      expect(registry.getMetadata(1, "model")).toBe("0x01");

      const events = store.read("identity:1");
      expect(events).toHaveLength(1);
      expect(events[0]?.event.type).toBe("identity.registered");
      expect(events[0]?.event.metadata.source).toBe("identity");
    });

    it("rejects a reserved metadata key and writes nothing", () => {
      const err = thrownBy(() =>
        registry.register(OWNER, { metadata: { boundAuthority: "0x01" } }),
      );

      expect(err).toBeInstanceOf(IdentityError);
      expect(err).toMatchObject({ code: "RESERVED_KEY_VIOLATION" });
      expect(registry.count()).toBe(0);
      expect(store.globalPosition()).toBe(0);
    });

    it("rejects the zero caller", () => {
      expect(thrownBy(() => registry.register(ZERO_ADDRESS))).toMatchObject({
        code: "EMPTY_HANDLE",
      });
    });
  });

  // ─── Reads ──────────────────────────────────────────────────────────

  describe("reads", () => {
    it("fails with UNKNOWN_ENTITY for an unregistered identity", () => {
      expect(thrownBy(() => registry.ownerOf(1))).toMatchObject({
        code: "UNKNOWN_ENTITY",
      });
      expect(thrownBy(() => registry.getVerifiedWallet(0))).toMatchObject({
        code: "UNKNOWN_ENTITY",
      });
      expect(registry.exists(1)).toBe(false);
    });

    it("reads unset metadata as empty bytes", () => {
      registry.register(OWNER);
      expect(registry.getMetadata(1, "missing")).toBe("0x");
    });

    it("reads reserved keys from the typed fields", () => {
      registry.register(OWNER);
      expect(registry.getMetadata(1, "verifiedWallet")).toBe(OWNER);
      expect(registry.getMetadata(1, "boundAuthority")).toBe("0x");

      registry.setBoundAuthority(OWNER, 1, ENGINE);
      expect(registry.getMetadata(1, "boundAuthority")).toBe(ENGINE);
    });
  });

  // ─── Metadata ───────────────────────────────────────────────────────

  describe("setMetadata", () => {
    beforeEach(() => {
      registry.register(OWNER);
    });

    it("writes an open key", () => {
      registry.setMetadata(OWNER, 1, "endpoint", "0xabcd");
      expect(registry.getIdentity(1).metadata).toEqual({ endpoint: "0xabcd" });
    });

    it("rejects reserved keys before checking the caller", () => {
      for (const key of ["verifiedWallet", "boundAuthority"]) {
        expect(
          thrownBy(() => registry.setMetadata(STRANGER, 1, key, "0x01")),
        ).toMatchObject({ code: "RESERVED_KEY_VIOLATION" });
      }
      expect(registry.getVerifiedWallet(1)).toBe(OWNER);
    });

    it("rejects an empty key", () => {
      expect(thrownBy(() => registry.setMetadata(OWNER, 1, "", "0x01"))).toMatchObject({
        code: "EMPTY_HANDLE",
      });
    });

    it("rejects a stranger", () => {
      expect(
        thrownBy(() => registry.setMetadata(STRANGER, 1, "endpoint", "0x01")),
      ).toMatchObject({ code: "UNAUTHORIZED" });
    });
  });

  // ─── Authority & card ───────────────────────────────────────────────

  describe("setBoundAuthority", () => {
    beforeEach(() => {
      registry.register(OWNER);
    });

    it("binds and unbinds", () => {
      registry.setBoundAuthority(OWNER, 1, ENGINE);
      expect(registry.getBoundAuthority(1)).toBe(ENGINE);

      registry.setBoundAuthority(OWNER, 1, ZERO_ADDRESS);
      expect(registry.getBoundAuthority(1)).toBe(ZERO_ADDRESS);
    });

    it("rejects a stranger and leaves no event", () => {
      const before = store.globalPosition();
      expect(
        thrownBy(() => registry.setBoundAuthority(STRANGER, 1, ENGINE)),
      ).toMatchObject({ code: "UNAUTHORIZED" });
      expect(store.globalPosition()).toBe(before);
    });

    it("updates the card reference", () => {
      registry.setCardReference(OWNER, 1, "https://agents.test/card.json");
      expect(registry.getIdentity(1).cardReference).toBe(
        "https://agents.test/card.json",
      );
    });
  });

  // ─── Verified wallet ────────────────────────────────────────────────

  describe("setVerifiedWallet", () => {
    beforeEach(() => {
      registry.register(OWNER);
    });

    function sign(
      signer = wallet,
      deadline = NOW + 60,
      owner: Address = OWNER,
    ): Promise<Hex> {
      return signWalletProof(signer, registry.proofDomain, {
        identityId: 1,
        newWallet: wallet.address,
        owner,
        deadline,
      });
    }

    it("accepts a signature from the new wallet", async () => {
      const signature = await sign();
      const identity = await registry.setVerifiedWallet(
        OWNER,
        1,
        wallet.address,
        NOW + 60,
        signature,
      );

      expect(identity.verifiedWallet).toBe(wallet.address);
      expect(store.read("identity:1").at(-1)?.event.type).toBe("identity.wallet.set");
    });

    it("rejects a signature from another key", async () => {
      const signature = await sign(impostor);
      await expect(
        registry.setVerifiedWallet(OWNER, 1, wallet.address, NOW + 60, signature),
      ).rejects.toMatchObject({ code: "EXPIRED_OR_INVALID_PROOF" });
      expect(registry.getVerifiedWallet(1)).toBe(OWNER);
    });

    it("rejects a passed deadline", async () => {
      const signature = await sign(wallet, NOW - 1);
      await expect(
        registry.setVerifiedWallet(OWNER, 1, wallet.address, NOW - 1, signature),
      ).rejects.toThrow(/has passed/);
    });

    it("rejects a deadline too far ahead", async () => {
      const signature = await sign(wallet, NOW + 301);
      await expect(
        registry.setVerifiedWallet(OWNER, 1, wallet.address, NOW + 301, signature),
      ).rejects.toMatchObject({ code: "EXPIRED_OR_INVALID_PROOF" });
    });

    it("accepts a deadline exactly at the limit", async () => {
      const signature = await sign(wallet, NOW + 300);
      const identity = await registry.setVerifiedWallet(
        OWNER,
        1,
        wallet.address,
        NOW + 300,
        signature,
      );
      expect(identity.verifiedWallet).toBe(wallet.address);
    });

    it("rejects a proof signed for a different owner", async () => {
      const signature = await sign(wallet, NOW + 60, OTHER);
      await expect(
        registry.setVerifiedWallet(OWNER, 1, wallet.address, NOW + 60, signature),
      ).rejects.toMatchObject({ code: "EXPIRED_OR_INVALID_PROOF" });
    });

    it("rejects a caller who is not owner or delegate", async () => {
      const signature = await sign();
      await expect(
        registry.setVerifiedWallet(STRANGER, 1, wallet.address, NOW + 60, signature),
      ).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    });

    it("falls back to the delegated validator", async () => {
      const isValidSignature = vi.fn(async () => true);
      registry = createRegistry({ isValidSignature });
      registry.register(OWNER);

      const identity = await registry.setVerifiedWallet(
        OWNER,
        1,
        wallet.address,
        NOW + 60,
        "0x1234",
      );

      expect(identity.verifiedWallet).toBe(wallet.address);
      expect(isValidSignature).toHaveBeenCalledWith(
        wallet.address,
        walletProofDigest(registry.proofDomain, {
          identityId: 1,
          newWallet: wallet.address,
          owner: OWNER,
          deadline: NOW + 60,
        }),
        "0x1234",
      );
    });

    it("rejects when the validator declines", async () => {
      registry = createRegistry({ isValidSignature: async () => false });
      registry.register(OWNER);

      await expect(
        registry.setVerifiedWallet(OWNER, 1, wallet.address, NOW + 60, "0x1234"),
      ).rejects.toMatchObject({ code: "EXPIRED_OR_INVALID_PROOF" });
    });

    it("rejects when ownership changes during verification", async () => {
      registry = createRegistry({
        isValidSignature: async () => {
          registry.transferFrom(OWNER, OWNER, OTHER, 1);
          return true;
        },
      });
      registry.register(OWNER);

      await expect(
        registry.setVerifiedWallet(OWNER, 1, wallet.address, NOW + 60, "0x1234"),
      ).rejects.toThrow(/changed owner/);
      expect(registry.getVerifiedWallet(1)).toBe(ZERO_ADDRESS);
      expect(registry.ownerOf(1)).toBe(OTHER);
    });

    it("clears the wallet", () => {
      registry.clearVerifiedWallet(OWNER, 1);
      expect(registry.getVerifiedWallet(1)).toBe(ZERO_ADDRESS);
    });
  });

  // ─── Delegates ──────────────────────────────────────────────────────

  describe("delegates", () => {
    beforeEach(() => {
      registry.register(OWNER);
    });

    it("lets an approved spender manage the identity", () => {
      registry.approve(OWNER, OTHER, 1);
      expect(registry.getApproved(1)).toBe(OTHER);

      registry.setBoundAuthority(OTHER, 1, ENGINE);
      expect(registry.getBoundAuthority(1)).toBe(ENGINE);
    });

    it("does not let a spender approve others", () => {
      registry.approve(OWNER, OTHER, 1);
      expect(thrownBy(() => registry.approve(OTHER, STRANGER, 1))).toMatchObject({
        code: "UNAUTHORIZED",
      });
    });

    it("lets an operator approve and manage", () => {
      registry.setApprovalForAll(OWNER, OTHER, true);
      expect(registry.isApprovedForAll(OWNER, OTHER)).toBe(true);

      registry.approve(OTHER, STRANGER, 1);
      expect(registry.getApproved(1)).toBe(STRANGER);
    });

    it("revokes an operator", () => {
      registry.setApprovalForAll(OWNER, OTHER, true);
      registry.setApprovalForAll(OWNER, OTHER, false);

      expect(registry.isApprovedForAll(OWNER, OTHER)).toBe(false);
      expect(
        thrownBy(() => registry.setCardReference(OTHER, 1, "x")),
      ).toMatchObject({ code: "UNAUTHORIZED" });
    });

    it("refuses to make an owner its own operator", () => {
      expect(
        thrownBy(() => registry.setApprovalForAll(OWNER, OWNER, true)),
      ).toMatchObject({ code: "INVALID_STATE" });
    });
  });

  // ─── Transfer ───────────────────────────────────────────────────────

  describe("transferFrom", () => {
    beforeEach(() => {
      registry.register(OWNER, { boundAuthority: ENGINE });
      registry.approve(OWNER, STRANGER, 1);
    });

    it("clears wallet, authority and approval with the owner change", () => {
      const position = store.globalPosition();
      const identity = registry.transferFrom(OWNER, OWNER, OTHER, 1);

      expect(identity.owner).toBe(OTHER);
      expect(identity.verifiedWallet).toBe(ZERO_ADDRESS);
      expect(identity.boundAuthority).toBe(ZERO_ADDRESS);
      expect(identity.approved).toBe(ZERO_ADDRESS);
      expect(store.globalPosition()).toBe(position + 1);
    });

    it("keeps metadata across transfer", () => {
      registry.setMetadata(OWNER, 1, "model", "0x02");
      registry.transferFrom(OWNER, OWNER, OTHER, 1);
      expect(registry.getMetadata(1, "model")).toBe("0x02");
    });

    it("lets the approved spender transfer", () => {
      registry.transferFrom(STRANGER, OWNER, OTHER, 1);
      expect(registry.ownerOf(1)).toBe(OTHER);
    });

    it("rejects a wrong from address", () => {
      expect(
        thrownBy(() => registry.transferFrom(OWNER, OTHER, STRANGER, 1)),
      ).toMatchObject({ code: "INVALID_STATE" });
    });

    it("rejects the zero recipient", () => {
      expect(
        thrownBy(() => registry.transferFrom(OWNER, OWNER, ZERO_ADDRESS, 1)),
      ).toMatchObject({ code: "EMPTY_HANDLE" });
    });

    it("locks out the previous owner", () => {
      registry.transferFrom(OWNER, OWNER, OTHER, 1);
      expect(
        thrownBy(() => registry.setBoundAuthority(OWNER, 1, ENGINE)),
      ).toMatchObject({ code: "UNAUTHORIZED" });
    });
  });

  // ─── Replay ─────────────────────────────────────────────────────────

  describe("replay", () => {
    it("rebuilds identical state from the log", () => {
      registry.register(OWNER, { metadata: { model: "0x01" } });
      registry.register(OTHER);
      registry.setBoundAuthority(OWNER, 1, ENGINE);
      registry.setApprovalForAll(OTHER, OWNER, true);
      registry.transferFrom(OWNER, OTHER, STRANGER, 2);

      const restored = createRegistry();
      restored.replay(store.readAll());

      expect(restored.count()).toBe(2);
      expect(restored.getIdentity(1)).toEqual(registry.getIdentity(1));
      expect(restored.getIdentity(2)).toEqual(registry.getIdentity(2));
      expect(restored.isApprovedForAll(OTHER, OWNER)).toBe(true);
    });

    it("continues numbering after replay", () => {
      registry.register(OWNER);
      const restored = createRegistry();
      restored.replay(store.readAll());

      expect(restored.register(OTHER).identityId).toBe(2);
    });

    it("skips events of other components", () => {
      store.append("trace:0x01", [
        {
          type: "trace.hop.recorded",
          metadata: {
            eventId: "e-1",
            timestamp: "2026-01-01T00:00:00.000Z",
            actor: ENGINE,
            correlationId: "0x01",
            source: "trace",
          },
          payload: {},
        },
      ]);
      registry.replay(store.readAll());
      expect(registry.count()).toBe(0);
    });

    it("refuses a malformed identity payload", () => {
      store.append("identity:1", [
        {
          type: "identity.registered",
          metadata: {
            eventId: "e-1",
            timestamp: "2026-01-01T00:00:00.000Z",
            actor: OWNER,
            correlationId: "1",
            source: "identity",
          },
          payload: { identityId: 1, owner: "nobody" },
        },
      ]);

      expect(thrownBy(() => registry.replay(store.readAll()))).toMatchObject({
        code: "CORRUPT_LOG",
      });
    });
  });
});
