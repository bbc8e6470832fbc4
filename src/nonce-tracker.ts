/**
 * Replay protection for contract authorizations.
 *
 * Nonces are scoped to (address, contract), where the contract is the root
 * invocation's contract. The tracker only reads: advancing a nonce is the
 * ledger's job after it applies an operation, modelled here by `observe`.
 * Callers building transactions concurrently must serialize next()/observe()
 * per (address, contract).
 *
 * @packageDocumentation
 */

import { NonceConflictError, NonceMismatchError } from "./errors";
import type { NonceStore } from "./types";
import { addressContractKey, addressToString } from "./utils";
import type { ContractAuth, LedgerKey, ScAddress } from "./xdr/types";

/**
 * The ledger key holding the nonce of `address` for `contractId`.
 */
export function nonceLedgerKey(address: ScAddress, contractId: Buffer): LedgerKey {
  return {
    tag: "ContractData",
    contractId,
    key: { tag: "LedgerKeyNonce", address },
  };
}

/**
 * Reject an operation whose entries reuse a nonce for the same
 * (address, contract).
 *
 * @throws {NonceConflictError}
 */
export function checkNonceConflicts(auths: readonly ContractAuth[]): void {
  const used = new Set<string>();
  for (const auth of auths) {
    if (!auth.addressWithNonce) continue;
    const { address, nonce } = auth.addressWithNonce;
    const contractId = auth.rootInvocation.contractId;
    const key = `${addressContractKey(address, contractId)}:${nonce}`;
    if (used.has(key)) {
      throw new NonceConflictError(nonce, {
        address: addressToString(address),
        contractId: contractId.toString("hex"),
      });
    }
    used.add(key);
  }
}

/** An applied entry's (address, contract, nonce) */
export interface AddressedAuth {
  address: ScAddress;
  contractId: Buffer;
  nonce: bigint;
}

export class NonceTracker {
  constructor(private readonly store: NonceStore) {}

  /**
   * The nonce to embed in the next AddressWithNonce for this pair.
   * Absent state reads as 0. Never increments.
   */
  async next(address: ScAddress, contractId: Buffer): Promise<bigint> {
    return (await this.store.get(contractId, address)) ?? 0n;
  }

  /**
   * Record that the ledger applied an authorization using `usedNonce`.
   *
   * @throws {NonceMismatchError} If `usedNonce` is not the current value
   */
  async observe(address: ScAddress, contractId: Buffer, usedNonce: bigint): Promise<void> {
    const expected = await this.next(address, contractId);
    if (usedNonce !== expected) {
      throw new NonceMismatchError(expected, usedNonce, {
        address: addressToString(address),
        contractId: contractId.toString("hex"),
      });
    }
    await this.store.set(contractId, address, usedNonce + 1n);
  }

  /**
   * Record that the ledger applied every addressed entry of one operation.
   * All nonces are checked before any is stored, so a stale entry leaves
   * the whole set unchanged. Entries for the same pair are taken in order.
   *
   * @returns The entries that carried an address, in order
   * @throws {NonceMismatchError} If any entry's nonce is not the current value
   */
  async observeAll(auths: readonly ContractAuth[]): Promise<AddressedAuth[]> {
    const pending = new Map<string, { address: ScAddress; contractId: Buffer; next: bigint }>();
    const observed: AddressedAuth[] = [];
    for (const auth of auths) {
      if (!auth.addressWithNonce) continue;
      const { address, nonce } = auth.addressWithNonce;
      const contractId = auth.rootInvocation.contractId;
      const key = addressContractKey(address, contractId);
      const expected = pending.get(key)?.next ?? (await this.next(address, contractId));
      if (nonce !== expected) {
        throw new NonceMismatchError(expected, nonce, {
          address: addressToString(address),
          contractId: contractId.toString("hex"),
        });
      }
      pending.set(key, { address, contractId, next: nonce + 1n });
      observed.push({ address, contractId, nonce });
    }
    for (const { address, contractId, next } of pending.values()) {
      await this.store.set(contractId, address, next);
    }
    return observed;
  }

  /**
   * Check an entry's nonce against the stored value. Source-account entries
   * carry no nonce and always pass.
   *
   * @throws {NonceMismatchError}
   */
  async expect(auth: ContractAuth): Promise<void> {
    if (!auth.addressWithNonce) return;
    const { address, nonce } = auth.addressWithNonce;
    const contractId = auth.rootInvocation.contractId;
    const expected = await this.next(address, contractId);
    if (nonce !== expected) {
      throw new NonceMismatchError(expected, nonce, {
        address: addressToString(address),
        contractId: contractId.toString("hex"),
      });
    }
  }
}
