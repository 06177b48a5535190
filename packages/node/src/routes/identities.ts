/**
 * Identity registry routes.
 *
 * POST   /api/v1/identities                      : Register an identity
 * GET    /api/v1/identities/proof-domain         : Typed-data domain for wallet proofs
 * GET    /api/v1/identities/:id                  : Get one identity
 * GET    /api/v1/identities/:id/metadata/:key    : Read a metadata entry
 * PUT    /api/v1/identities/:id/metadata/:key    : Write a metadata entry
 * PUT    /api/v1/identities/:id/wallet           : Set the verified wallet (signed proof)
 * DELETE /api/v1/identities/:id/wallet           : Clear the verified wallet
 * PUT    /api/v1/identities/:id/authority        : Bind to an engine authority
 * PUT    /api/v1/identities/:id/card             : Update the card reference
 * POST   /api/v1/identities/:id/approve          : Approve a spender
 * POST   /api/v1/identities/:id/transfer         : Transfer ownership
 * PUT    /api/v1/operators/:operator             : Grant or revoke an operator
 */

import { Hono } from "hono";
import type { RegisterInput } from "@tracebound/identity";
import type { AppEnv } from "../types/api-contract.js";
import {
  ApproveSpenderSchema,
  RegisterIdentitySchema,
  SetAuthoritySchema,
  SetCardSchema,
  SetMetadataSchema,
  SetOperatorSchema,
  SetWalletSchema,
  TransferIdentitySchema,
} from "../types/dto.js";
import type { RegisterIdentityDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { callerOf } from "../middleware/auth.js";
import { addressParam, identityIdParam } from "./params.js";

export function createIdentityRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RegisterIdentitySchema), (c) => {
    const { identities } = c.get("service");
    const identity = identities.register(callerOf(c), toRegisterInput(c.req.valid("json")));
    return c.json({ data: identity }, 201);
  });

  routes.get("/proof-domain", (c) => {
    const { identities } = c.get("service");
    return c.json({ data: identities.proofDomain });
  });

  routes.get("/:id", (c) => {
    const { identities } = c.get("service");
    return c.json({ data: identities.getIdentity(identityIdParam(c.req.param("id"))) });
  });

  // ─── Metadata ───────────────────────────────────────────────────

  routes.get("/:id/metadata/:key", (c) => {
    const { identities } = c.get("service");
    const key = c.req.param("key");
    const value = identities.getMetadata(identityIdParam(c.req.param("id")), key);
    return c.json({ data: { key, value } });
  });

  routes.put("/:id/metadata/:key", validateBody(SetMetadataSchema), (c) => {
    const { identities } = c.get("service");
    const identity = identities.setMetadata(
      callerOf(c),
      identityIdParam(c.req.param("id")),
      c.req.param("key"),
      c.req.valid("json").value,
    );
    return c.json({ data: identity });
  });

  // ─── Typed fields ───────────────────────────────────────────────

  routes.put("/:id/wallet", validateBody(SetWalletSchema), async (c) => {
    const { identities } = c.get("service");
    const body = c.req.valid("json");
    const identity = await identities.setVerifiedWallet(
      callerOf(c),
      identityIdParam(c.req.param("id")),
      body.wallet,
      body.deadline,
      body.signature,
    );
    return c.json({ data: identity });
  });

  routes.delete("/:id/wallet", (c) => {
    const { identities } = c.get("service");
    const identity = identities.clearVerifiedWallet(callerOf(c), identityIdParam(c.req.param("id")));
    return c.json({ data: identity });
  });

  routes.put("/:id/authority", validateBody(SetAuthoritySchema), (c) => {
    const { identities } = c.get("service");
    const identity = identities.setBoundAuthority(
      callerOf(c),
      identityIdParam(c.req.param("id")),
      c.req.valid("json").authority,
    );
    return c.json({ data: identity });
  });

  routes.put("/:id/card", validateBody(SetCardSchema), (c) => {
    const { identities } = c.get("service");
    const identity = identities.setCardReference(
      callerOf(c),
      identityIdParam(c.req.param("id")),
      c.req.valid("json").cardReference,
    );
    return c.json({ data: identity });
  });

  // ─── Delegation & ownership ─────────────────────────────────────

  routes.post("/:id/approve", validateBody(ApproveSpenderSchema), (c) => {
    const { identities } = c.get("service");
    const identity = identities.approve(
      callerOf(c),
      c.req.valid("json").spender,
      identityIdParam(c.req.param("id")),
    );
    return c.json({ data: identity });
  });

  routes.post("/:id/transfer", validateBody(TransferIdentitySchema), (c) => {
    const { identities } = c.get("service");
    const body = c.req.valid("json");
    const identity = identities.transferFrom(
      callerOf(c),
      body.from,
      body.to,
      identityIdParam(c.req.param("id")),
    );
    return c.json({ data: identity });
  });

  return routes;
}

export function createOperatorRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.put("/:operator", validateBody(SetOperatorSchema), (c) => {
    const { identities } = c.get("service");
    const owner = callerOf(c);
    const operator = addressParam(c.req.param("operator"), "operator");
    const { approved } = c.req.valid("json");

    identities.setApprovalForAll(owner, operator, approved);
    return c.json({ data: { owner, operator, approved: identities.isApprovedForAll(owner, operator) } });
  });

  return routes;
}

function toRegisterInput(body: RegisterIdentityDto): RegisterInput {
  return {
    ...(body.cardReference !== undefined ? { cardReference: body.cardReference } : {}),
    ...(body.metadata !== undefined ? { metadata: body.metadata } : {}),
    ...(body.boundAuthority !== undefined ? { boundAuthority: body.boundAuthority } : {}),
  };
}
