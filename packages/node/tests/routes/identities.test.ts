/**
 * Tests for the identity registry routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { privateKeyToAccount } from "viem/accounts";
import { signWalletProof } from "@tracebound/identity";
import { ZERO_ADDRESS } from "@tracebound/types";
import type { AppInstance } from "../../src/app.js";
import {
  APPROVER,
  NOW,
  REGISTRY,
  REQUESTER,
  REVIEW_AUTHORITY,
  STRANGER,
  createTestApp,
  dataOf,
  send,
} from "../setup.js";

const OWNER = REQUESTER;
const wallet = privateKeyToAccount(`0x${"11".repeat(32)}`);

const IdentityBody = z.object({
  identityId: z.number(),
  owner: z.string(),
  verifiedWallet: z.string(),
  boundAuthority: z.string(),
  cardReference: z.string(),
  approved: z.string(),
  metadata: z.record(z.string()),
});

describe("identity routes", () => {
  let instance: AppInstance;

  beforeEach(async () => {
    instance = createTestApp();
    const res = await send(instance, "POST", "/api/v1/identities", {
      as: OWNER,
      body: { cardReference: "ipfs://card", metadata: { model: "0x01" } },
    });
    expect(res.status).toBe(201);
  });

  // ─── Register & read ────────────────────────────────────────────────

  describe("POST /api/v1/identities", () => {
    it("registers with the caller as owner and verified wallet", async () => {
      const res = await send(instance, "POST", "/api/v1/identities", {
        as: APPROVER,
        body: { boundAuthority: REVIEW_AUTHORITY },
      });

      expect(res.status).toBe(201);
      expect(dataOf(IdentityBody, res)).toEqual({
        identityId: 2,
        owner: APPROVER,
        verifiedWallet: APPROVER,
        boundAuthority: REVIEW_AUTHORITY,
        cardReference: "",
        approved: ZERO_ADDRESS,
        metadata: {},
      });
    });

    it("requires a caller", async () => {
      const res = await send(instance, "POST", "/api/v1/identities", { body: {} });

      expect(res.status).toBe(401);
      expect(res.body).toMatchObject({ error: { code: "AUTHENTICATION_REQUIRED" } });
    });

    it("rejects metadata that is not hex", async () => {
      const res = await send(instance, "POST", "/api/v1/identities", {
        as: OWNER,
        body: { metadata: { model: "gpt" } },
      });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({
        error: {
          code: "VALIDATION_ERROR",
          details: { issues: [{ path: "metadata.model", message: "Expected 0x-prefixed hex bytes" }] },
        },
      });
    });
  });

  describe("GET /api/v1/identities/:id", () => {
    it("returns the identity", async () => {
      const res = await send(instance, "GET", "/api/v1/identities/1");

      expect(res.status).toBe(200);
      expect(dataOf(IdentityBody, res)).toMatchObject({
        identityId: 1,
        owner: OWNER,
        cardReference: "ipfs://card",
        metadata: { model: "0x01" },
      });
    });

    it("returns 404 for an unknown identity", async () => {
      const res = await send(instance, "GET", "/api/v1/identities/7");

      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: { code: "UNKNOWN_ENTITY" } });
    });

    it("returns 400 for a malformed id", async () => {
      const res = await send(instance, "GET", "/api/v1/identities/first");

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: { code: "VALIDATION_ERROR", message: '"first" is not an identity id' },
      });
    });
  });

  // ─── Metadata ───────────────────────────────────────────────────────

  describe("metadata", () => {
    it("writes and reads an open entry", async () => {
      const put = await send(instance, "PUT", "/api/v1/identities/1/metadata/region", {
        as: OWNER,
        body: { value: "0xbeef" },
      });
      const get = await send(instance, "GET", "/api/v1/identities/1/metadata/region");

      expect(put.status).toBe(200);
      expect(get.body).toEqual({ data: { key: "region", value: "0xbeef" } });
    });

    it("reads an unset key as empty bytes", async () => {
      const res = await send(instance, "GET", "/api/v1/identities/1/metadata/unset");

      expect(res.body).toEqual({ data: { key: "unset", value: "0x" } });
    });

    it("rejects writes to reserved keys", async () => {
      const res = await send(instance, "PUT", "/api/v1/identities/1/metadata/boundAuthority", {
        as: OWNER,
        body: { value: `0x${"44".repeat(20)}` },
      });

      expect(res.status).toBe(422);
      expect(res.body).toMatchObject({ error: { code: "RESERVED_KEY_VIOLATION" } });
    });

    it("rejects writes from a stranger", async () => {
      const res = await send(instance, "PUT", "/api/v1/identities/1/metadata/region", {
        as: STRANGER,
        body: { value: "0x01" },
      });

      expect(res.status).toBe(403);
      expect(res.body).toMatchObject({ error: { code: "UNAUTHORIZED" } });
    });
  });

  // ─── Typed fields ───────────────────────────────────────────────────

  describe("verified wallet", () => {
    it("publishes the proof domain", async () => {
      const res = await send(instance, "GET", "/api/v1/identities/proof-domain");

      expect(res.body).toEqual({ data: { chainId: 31337, registryAddress: REGISTRY } });
    });

    it("accepts a proof signed by the new wallet", async () => {
      const signature = await signWalletProof(
        wallet,
        { chainId: 31337, registryAddress: REGISTRY },
        { identityId: 1, newWallet: wallet.address, owner: OWNER, deadline: NOW + 60 },
      );

      const res = await send(instance, "PUT", "/api/v1/identities/1/wallet", {
        as: OWNER,
        body: { wallet: wallet.address, deadline: NOW + 60, signature },
      });

      expect(res.status).toBe(200);
      expect(dataOf(IdentityBody, res).verifiedWallet).toBe(wallet.address);
    });

    it("rejects a proof with a passed deadline", async () => {
      const signature = await signWalletProof(
        wallet,
        { chainId: 31337, registryAddress: REGISTRY },
        { identityId: 1, newWallet: wallet.address, owner: OWNER, deadline: NOW - 1 },
      );

      const res = await send(instance, "PUT", "/api/v1/identities/1/wallet", {
        as: OWNER,
        body: { wallet: wallet.address, deadline: NOW - 1, signature },
      });

      expect(res.status).toBe(422);
      expect(res.body).toMatchObject({ error: { code: "EXPIRED_OR_INVALID_PROOF" } });
    });

    it("clears the wallet", async () => {
      const res = await send(instance, "DELETE", "/api/v1/identities/1/wallet", { as: OWNER });

      expect(dataOf(IdentityBody, res).verifiedWallet).toBe(ZERO_ADDRESS);
    });
  });

  it("binds an authority and updates the card", async () => {
    await send(instance, "PUT", "/api/v1/identities/1/authority", {
      as: OWNER,
      body: { authority: REVIEW_AUTHORITY },
    });
    const res = await send(instance, "PUT", "/api/v1/identities/1/card", {
      as: OWNER,
      body: { cardReference: "https://agents.test/card.json" },
    });

    expect(dataOf(IdentityBody, res)).toMatchObject({
      boundAuthority: REVIEW_AUTHORITY,
      cardReference: "https://agents.test/card.json",
    });
  });

  // ─── Delegation & ownership ─────────────────────────────────────────

  describe("delegation", () => {
    it("lets an approved spender transfer, which clears authorization", async () => {
      await send(instance, "PUT", "/api/v1/identities/1/authority", {
        as: OWNER,
        body: { authority: REVIEW_AUTHORITY },
      });
      const approved = await send(instance, "POST", "/api/v1/identities/1/approve", {
        as: OWNER,
        body: { spender: STRANGER },
      });
      const transferred = await send(instance, "POST", "/api/v1/identities/1/transfer", {
        as: STRANGER,
        body: { from: OWNER, to: APPROVER },
      });

      expect(dataOf(IdentityBody, approved).approved).toBe(STRANGER);
      expect(transferred.status).toBe(200);
      expect(dataOf(IdentityBody, transferred)).toMatchObject({
        owner: APPROVER,
        verifiedWallet: ZERO_ADDRESS,
        boundAuthority: ZERO_ADDRESS,
        approved: ZERO_ADDRESS,
      });
    });

    it("rejects a transfer naming the wrong current owner", async () => {
      const res = await send(instance, "POST", "/api/v1/identities/1/transfer", {
        as: OWNER,
        body: { from: STRANGER, to: APPROVER },
      });

      expect(res.status).toBe(409);
      expect(res.body).toMatchObject({ error: { code: "INVALID_STATE" } });
    });

    it("lets an operator act for the owner", async () => {
      const granted = await send(instance, "PUT", `/api/v1/operators/${STRANGER}`, {
        as: OWNER,
        body: { approved: true },
      });
      const res = await send(instance, "PUT", "/api/v1/identities/1/card", {
        as: STRANGER,
        body: { cardReference: "ipfs://operator" },
      });

      expect(granted.body).toEqual({ data: { owner: OWNER, operator: STRANGER, approved: true } });
      expect(res.status).toBe(200);
    });

    it("rejects an owner naming itself as operator", async () => {
      const res = await send(instance, "PUT", `/api/v1/operators/${OWNER}`, {
        as: OWNER,
        body: { approved: true },
      });

      expect(res.status).toBe(409);
    });
  });
});
