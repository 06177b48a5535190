/**
 * Identity Registry: agent identities and who may act as them.
 *
 * Each identity has an owner, a verified wallet (the principal trusted to
 * act as the identity), a bound authority (the single engine instance it
 * may fulfill for) and an open metadata map.
 *
 * Rules:
 * - Every mutation is appended to the event store before state changes
 * - Identity records are never deleted
 * - `verifiedWallet` and `boundAuthority` are typed fields; the generic
 *   metadata path rejects their keys
 * - A transfer clears the wallet, the authority and the per-identity
 *   delegate in the same event that changes the owner
 */

import { getAddress, isAddress } from "viem";
import type {
  Address,
  Clock,
  Hex,
  IdentityId,
  IdentityProvider,
} from "@tracebound/types";
import {
  EMPTY_BYTES,
  RESERVED_METADATA_KEYS,
  ZERO_ADDRESS,
  systemClock,
} from "@tracebound/types";
import type { EventStore, StoredEvent } from "@tracebound/event-store";
import {
  EventStoreError,
  PROTOCOL_EVENTS,
  createDomainEvent,
  identityStream,
  operatorStream,
} from "@tracebound/event-store";
import type { ProtocolEventType } from "@tracebound/event-store";
import { IdentityError } from "./errors.js";
import { parseIdentityEvent } from "./events.js";
import type {
  ApprovalSetPayload,
  AuthoritySetPayload,
  CardSetPayload,
  IdentityEvent,
  IdentityRegisteredPayload,
  MetadataSetPayload,
  OperatorSetPayload,
  TransferredPayload,
  WalletSetPayload,
} from "./events.js";
import type { DelegatedSignatureValidator, WalletProofDomain } from "./proof.js";
import { verifyWalletProof } from "./proof.js";
import type {
  AgentIdentity,
  IdentityRegistryOptions,
  RegisterInput,
} from "./types.js";

const DEFAULT_MAX_DEADLINE_DELAY_SECONDS = 300;

/** Accept any letter case; checksums are applied on the way in. */
const LENIENT = { strict: false } as const;

interface IdentityRecord {
  readonly identityId: IdentityId;
  owner: Address;
  verifiedWallet: Address;
  boundAuthority: Address;
  cardReference: string;
  approved: Address;
  readonly metadata: Map<string, Hex>;
  readonly registeredAt: string;
}

export class IdentityRegistry implements IdentityProvider {
  private readonly identities = new Map<IdentityId, IdentityRecord>();

  /** owner → operators */
  private readonly operators = new Map<Address, Set<Address>>();

  private readonly store: EventStore;
  private readonly domain: WalletProofDomain;
  private readonly maxDeadlineDelaySeconds: number;
  private readonly signatureValidator: DelegatedSignatureValidator | undefined;
  private readonly clock: Clock;

  constructor(options: IdentityRegistryOptions) {
    this.store = options.store;
    this.domain = {
      chainId: options.chainId,
      registryAddress: getAddress(options.registryAddress),
    };
    this.maxDeadlineDelaySeconds =
      options.maxDeadlineDelaySeconds ?? DEFAULT_MAX_DEADLINE_DELAY_SECONDS;
    this.signatureValidator = options.signatureValidator;
    this.clock = options.clock ?? systemClock;
  }

  /** Domain wallets sign verified-wallet proofs in. */
  get proofDomain(): WalletProofDomain {
    return this.domain;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Registration
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Register a new identity owned by `caller`. The caller also becomes
   * the verified wallet.
   */
  register(caller: Address, input: RegisterInput = {}): AgentIdentity {
    const owner = requireHandle(caller, "caller");
    const metadata = input.metadata ?? {};
    for (const key of Object.keys(metadata)) {
      requireWritableKey(key);
    }
    const boundAuthority =
      input.boundAuthority !== undefined
        ? requireAddress(input.boundAuthority, "boundAuthority")
        : ZERO_ADDRESS;

    const identityId = this.identities.size + 1;
    const payload: IdentityRegisteredPayload = {
      identityId,
      owner,
      boundAuthority,
      cardReference: input.cardReference ?? "",
      metadata: { ...metadata },
      registeredAt: this.clock().toISOString(),
    };

    this.commit(identityStream(identityId), owner, String(identityId), {
      type: PROTOCOL_EVENTS.IDENTITY_REGISTERED,
      payload,
    }, "no_stream");
    return this.getIdentity(identityId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Verified wallet
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Set the verified wallet, given the wallet's signed consent.
   *
   * Guards run before and again after the proof check, so an ownership
   * change while the proof is being verified invalidates it.
   */
  async setVerifiedWallet(
    caller: Address,
    identityId: IdentityId,
    newWallet: Address,
    deadline: number,
    signature: Hex,
  ): Promise<AgentIdentity> {
    const wallet = requireHandle(newWallet, "newWallet");
    const record = this.requireIdentity(identityId);
    this.requireOwnerOrDelegate(caller, record);
    this.requireLiveDeadline(deadline);

    const owner = record.owner;
    const valid = await verifyWalletProof(
      this.domain,
      { identityId, newWallet: wallet, owner, deadline },
      signature,
      this.signatureValidator,
    );
    if (!valid) {
      throw new IdentityError(
        "EXPIRED_OR_INVALID_PROOF",
        `Signature does not prove consent of ${wallet} for identity ${identityId}`,
      );
    }

    const current = this.requireIdentity(identityId);
    if (current.owner !== owner) {
      throw new IdentityError(
        "EXPIRED_OR_INVALID_PROOF",
        `Identity ${identityId} changed owner while the proof was verified`,
      );
    }
    this.requireOwnerOrDelegate(caller, current);
    this.requireLiveDeadline(deadline);

    const payload: WalletSetPayload = { identityId, wallet };
    this.commitToIdentity(caller, { type: PROTOCOL_EVENTS.IDENTITY_WALLET_SET, payload });
    return this.getIdentity(identityId);
  }

  clearVerifiedWallet(caller: Address, identityId: IdentityId): AgentIdentity {
    const record = this.requireIdentity(identityId);
    this.requireOwnerOrDelegate(caller, record);

    const payload: WalletSetPayload = { identityId, wallet: ZERO_ADDRESS };
    this.commitToIdentity(caller, { type: PROTOCOL_EVENTS.IDENTITY_WALLET_SET, payload });
    return this.getIdentity(identityId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Authority, metadata, card
  // ───────────────────────────────────────────────────────────────────────

  /** Bind the identity to one engine authority. Zero unbinds. */
  setBoundAuthority(
    caller: Address,
    identityId: IdentityId,
    authority: Address,
  ): AgentIdentity {
    const normalized = requireAddress(authority, "authority");
    const record = this.requireIdentity(identityId);
    this.requireOwnerOrDelegate(caller, record);

    const payload: AuthoritySetPayload = { identityId, authority: normalized };
    this.commitToIdentity(caller, { type: PROTOCOL_EVENTS.IDENTITY_AUTHORITY_SET, payload });
    return this.getIdentity(identityId);
  }

  /**
   * Write an open metadata entry. Reserved keys are rejected before
   * the caller is even considered.
   */
  setMetadata(
    caller: Address,
    identityId: IdentityId,
    key: string,
    value: Hex,
  ): AgentIdentity {
    requireWritableKey(key);
    const record = this.requireIdentity(identityId);
    this.requireOwnerOrDelegate(caller, record);

    const payload: MetadataSetPayload = { identityId, key, value };
    this.commitToIdentity(caller, { type: PROTOCOL_EVENTS.IDENTITY_METADATA_SET, payload });
    return this.getIdentity(identityId);
  }

  setCardReference(
    caller: Address,
    identityId: IdentityId,
    cardReference: string,
  ): AgentIdentity {
    const record = this.requireIdentity(identityId);
    this.requireOwnerOrDelegate(caller, record);

    const payload: CardSetPayload = { identityId, cardReference };
    this.commitToIdentity(caller, { type: PROTOCOL_EVENTS.IDENTITY_CARD_SET, payload });
    return this.getIdentity(identityId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Delegates & transfer
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Approve `spender` to manage one identity. Zero clears the approval.
   * Only the owner or one of the owner's operators may approve.
   */
  approve(caller: Address, spender: Address, identityId: IdentityId): AgentIdentity {
    const normalized = requireAddress(spender, "spender");
    const record = this.requireIdentity(identityId);
    const actor = requireAddress(caller, "caller");
    if (actor !== record.owner && !this.isApprovedForAll(record.owner, actor)) {
      throw new IdentityError(
        "UNAUTHORIZED",
        `${actor} is neither owner nor operator of identity ${identityId}`,
      );
    }

    const payload: ApprovalSetPayload = { identityId, spender: normalized };
    this.commitToIdentity(caller, { type: PROTOCOL_EVENTS.IDENTITY_APPROVAL_SET, payload });
    return this.getIdentity(identityId);
  }

  /** Grant or revoke `operator` control over every identity `caller` owns. */
  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    const owner = requireHandle(caller, "caller");
    const normalized = requireHandle(operator, "operator");
    if (normalized === owner) {
      throw new IdentityError("INVALID_STATE", "An owner cannot be its own operator");
    }

    const payload: OperatorSetPayload = { owner, operator: normalized, approved };
    this.commit(operatorStream(owner), owner, owner, {
      type: PROTOCOL_EVENTS.IDENTITY_OPERATOR_SET,
      payload,
    });
  }

  /**
   * Transfer ownership. Authorization never survives a change of control:
   * wallet, authority and per-identity delegate are cleared.
   */
  transferFrom(
    caller: Address,
    from: Address,
    to: Address,
    identityId: IdentityId,
  ): AgentIdentity {
    const fromOwner = requireAddress(from, "from");
    const toOwner = requireHandle(to, "to");
    const record = this.requireIdentity(identityId);
    this.requireOwnerOrDelegate(caller, record);
    if (record.owner !== fromOwner) {
      throw new IdentityError(
        "INVALID_STATE",
        `Identity ${identityId} is owned by ${record.owner}, not ${fromOwner}`,
      );
    }

    const payload: TransferredPayload = { identityId, from: fromOwner, to: toOwner };
    this.commitToIdentity(caller, { type: PROTOCOL_EVENTS.IDENTITY_TRANSFERRED, payload });
    return this.getIdentity(identityId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  ownerOf(identityId: IdentityId): Address {
    return this.requireIdentity(identityId).owner;
  }

  getVerifiedWallet(identityId: IdentityId): Address {
    return this.requireIdentity(identityId).verifiedWallet;
  }

  getBoundAuthority(identityId: IdentityId): Address {
    return this.requireIdentity(identityId).boundAuthority;
  }

  /**
   * Metadata bytes for `key`, `0x` when unset. Reserved keys read the
   * typed field as 20 address bytes.
   */
  getMetadata(identityId: IdentityId, key: string): Hex {
    const record = this.requireIdentity(identityId);
    if (key === "verifiedWallet") return addressBytes(record.verifiedWallet);
    if (key === "boundAuthority") return addressBytes(record.boundAuthority);
    return record.metadata.get(key) ?? EMPTY_BYTES;
  }

  getApproved(identityId: IdentityId): Address {
    return this.requireIdentity(identityId).approved;
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    if (!isAddress(owner, LENIENT) || !isAddress(operator, LENIENT)) return false;
    return this.operators.get(getAddress(owner))?.has(getAddress(operator)) ?? false;
  }

  getIdentity(identityId: IdentityId): AgentIdentity {
    const record = this.requireIdentity(identityId);
    return {
      identityId: record.identityId,
      owner: record.owner,
      verifiedWallet: record.verifiedWallet,
      boundAuthority: record.boundAuthority,
      cardReference: record.cardReference,
      approved: record.approved,
      metadata: Object.fromEntries(record.metadata),
      registeredAt: record.registeredAt,
    };
  }

  exists(identityId: IdentityId): boolean {
    return this.identities.has(identityId);
  }

  count(): number {
    return this.identities.size;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Replay
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Rebuild state from stored events in global order. Events of other
   * components are skipped.
   */
  replay(events: readonly StoredEvent[]): void {
    for (const stored of events) {
      let parsed: IdentityEvent | undefined;
      try {
        parsed = parseIdentityEvent(stored.event.type, stored.event.payload);
      } catch (error: unknown) {
        throw new EventStoreError(
          "CORRUPT_LOG",
          `Invalid ${stored.event.type} payload at position ${stored.globalPosition}: ${String(error)}`,
          stored.streamId,
        );
      }
      if (parsed !== undefined) {
        this.apply(parsed);
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireIdentity(identityId: IdentityId): IdentityRecord {
    const record = this.identities.get(identityId);
    if (record === undefined) {
      throw new IdentityError("UNKNOWN_ENTITY", `Identity ${identityId} not found`);
    }
    return record;
  }

  private requireOwnerOrDelegate(caller: Address, record: IdentityRecord): void {
    const actor = isAddress(caller, LENIENT) ? getAddress(caller) : undefined;
    const allowed =
      actor !== undefined &&
      actor !== ZERO_ADDRESS &&
      (actor === record.owner ||
        actor === record.approved ||
        this.isApprovedForAll(record.owner, actor));
    if (!allowed) {
      throw new IdentityError(
        "UNAUTHORIZED",
        `${caller} may not manage identity ${record.identityId}`,
      );
    }
  }

  private requireLiveDeadline(deadline: number): void {
    const now = Math.floor(this.clock().getTime() / 1000);
    if (deadline < now) {
      throw new IdentityError(
        "EXPIRED_OR_INVALID_PROOF",
        `Proof deadline ${deadline} has passed (now ${now})`,
      );
    }
    if (deadline > now + this.maxDeadlineDelaySeconds) {
      throw new IdentityError(
        "EXPIRED_OR_INVALID_PROOF",
        `Proof deadline ${deadline} is more than ${this.maxDeadlineDelaySeconds}s ahead`,
      );
    }
  }

  private commitToIdentity(
    caller: Address,
    event: IdentityEvent & { readonly payload: { readonly identityId: IdentityId } },
  ): void {
    const identityId = event.payload.identityId;
    const stream = identityStream(identityId);
    this.commit(stream, caller, String(identityId), event, this.store.streamVersion(stream));
  }

  /** Persist, then apply. */
  private commit(
    streamId: string,
    actor: Address,
    correlationId: string,
    event: IdentityEvent,
    expectedVersion?: number | "no_stream",
  ): void {
    const type: ProtocolEventType = event.type;
    this.store.append(
      streamId,
      [
        createDomainEvent(type, event.payload, {
          actor,
          correlationId,
          source: "identity",
          clock: this.clock,
        }),
      ],
      expectedVersion !== undefined ? { expectedVersion } : undefined,
    );
    this.apply(event);
  }

  private apply(event: IdentityEvent): void {
    switch (event.type) {
      case PROTOCOL_EVENTS.IDENTITY_REGISTERED: {
        const p = event.payload;
        this.identities.set(p.identityId, {
          identityId: p.identityId,
          owner: getAddress(p.owner),
          verifiedWallet: getAddress(p.owner),
          boundAuthority: getAddress(p.boundAuthority),
          cardReference: p.cardReference,
          approved: ZERO_ADDRESS,
          metadata: new Map(Object.entries(p.metadata)),
          registeredAt: p.registeredAt,
        });
        return;
      }
      case PROTOCOL_EVENTS.IDENTITY_WALLET_SET:
        this.requireIdentity(event.payload.identityId).verifiedWallet =
          getAddress(event.payload.wallet);
        return;
      case PROTOCOL_EVENTS.IDENTITY_AUTHORITY_SET:
        this.requireIdentity(event.payload.identityId).boundAuthority =
          getAddress(event.payload.authority);
        return;
      case PROTOCOL_EVENTS.IDENTITY_METADATA_SET:
        this.requireIdentity(event.payload.identityId).metadata.set(
          event.payload.key,
          event.payload.value,
        );
        return;
      case PROTOCOL_EVENTS.IDENTITY_CARD_SET:
        this.requireIdentity(event.payload.identityId).cardReference =
          event.payload.cardReference;
        return;
      case PROTOCOL_EVENTS.IDENTITY_APPROVAL_SET:
        this.requireIdentity(event.payload.identityId).approved =
          getAddress(event.payload.spender);
        return;
      case PROTOCOL_EVENTS.IDENTITY_OPERATOR_SET: {
        const owner = getAddress(event.payload.owner);
        const operator = getAddress(event.payload.operator);
        let granted = this.operators.get(owner);
        if (granted === undefined) {
          granted = new Set();
          this.operators.set(owner, granted);
        }
        if (event.payload.approved) {
          granted.add(operator);
        } else {
          granted.delete(operator);
        }
        return;
      }
      case PROTOCOL_EVENTS.IDENTITY_TRANSFERRED: {
        const record = this.requireIdentity(event.payload.identityId);
        record.owner = getAddress(event.payload.to);
        record.verifiedWallet = ZERO_ADDRESS;
        record.boundAuthority = ZERO_ADDRESS;
        record.approved = ZERO_ADDRESS;
        return;
      }
    }
  }
}

// =============================================================================
// Input helpers
// =============================================================================

function requireAddress(value: string, label: string): Address {
  if (!isAddress(value, LENIENT)) {
    throw new IdentityError("EMPTY_HANDLE", `${label} is not a valid address: ${value}`);
  }
  return getAddress(value);
}

/** A non-zero address. */
function requireHandle(value: string, label: string): Address {
  const address = requireAddress(value, label);
  if (address === ZERO_ADDRESS) {
    throw new IdentityError("EMPTY_HANDLE", `${label} must not be the zero address`);
  }
  return address;
}

function requireWritableKey(key: string): void {
  if (RESERVED_METADATA_KEYS.has(key)) {
    throw new IdentityError(
      "RESERVED_KEY_VIOLATION",
      `Metadata key "${key}" is reserved; use its dedicated operation`,
    );
  }
  if (key.length === 0) {
    throw new IdentityError("EMPTY_HANDLE", "Metadata key must not be empty");
  }
}

function addressBytes(address: Address): Hex {
  return address === ZERO_ADDRESS ? EMPTY_BYTES : address;
}
