/**
 * In-Memory Nonce Store
 *
 * Simple in-memory nonce storage. Useful for testing or for callers that
 * mirror ledger state themselves.
 *
 * WARNING: Data is lost when the application restarts.
 */

import type { NonceStore } from "../types";
import { addressContractKey } from "../utils";
import type { ScAddress } from "../xdr/types";

export class MemoryNonceStore implements NonceStore {
  private nonces: Map<string, bigint> = new Map();

  async get(contractId: Buffer, address: ScAddress): Promise<bigint | null> {
    return this.nonces.get(addressContractKey(address, contractId)) ?? null;
  }

  async set(contractId: Buffer, address: ScAddress, nonce: bigint): Promise<void> {
    this.nonces.set(addressContractKey(address, contractId), nonce);
  }

  async clear(): Promise<void> {
    this.nonces.clear();
  }

  /** Number of stored (address, contract) entries */
  get size(): number {
    return this.nonces.size;
  }
}
