/**
 * Storage Adapters for Nonce State
 *
 * Nonce state lives in the ledger; these adapters let callers supply it.
 */

export { MemoryNonceStore } from "./memory";

export type { NonceStore } from "../types";
