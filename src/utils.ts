/**
 * Utility functions for soroban-auth-core.
 *
 * Contains hashing helpers, address conversion and validation functions.
 *
 * @packageDocumentation
 */

import { StrKey, hash } from "@stellar/stellar-sdk";

import { HASH_SIZE } from "./constants";
import { SorobanAuthErrorCode, ValidationError } from "./errors";
import type { ScAddress } from "./xdr/types";

// ============================================================================
// Hashing
// ============================================================================

/**
 * SHA-256 of the given bytes.
 */
export function sha256(data: Buffer): Buffer {
  return hash(data);
}

/**
 * The network ID: SHA-256 of the network passphrase.
 *
 * @example
 * ```ts
 * const id = networkId(Networks.TESTNET);
 * ```
 */
export function networkId(networkPassphrase: string): Buffer {
  return hash(Buffer.from(networkPassphrase));
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid Stellar address (G... or C...).
 *
 * Uses stellar-sdk's StrKey methods for proper checksum validation.
 *
 * @param address - The address to validate
 * @param fieldName - Name of the field for error messages
 * @throws {ValidationError} If the address is invalid
 */
export function validateAddress(address: string, fieldName: string = "address"): void {
  if (!address || typeof address !== "string") {
    throw new ValidationError(
      `${fieldName} is required`,
      SorobanAuthErrorCode.INVALID_ADDRESS,
      { field: fieldName }
    );
  }

  const isValidAccount = StrKey.isValidEd25519PublicKey(address);
  const isValidContract = StrKey.isValidContract(address);

  if (!isValidAccount && !isValidContract) {
    throw new ValidationError(
      `Invalid ${fieldName}: must be a valid Stellar account (G...) or contract (C...) address`,
      SorobanAuthErrorCode.INVALID_ADDRESS,
      { field: fieldName, value: address.slice(0, 10) + "..." }
    );
  }
}

/**
 * Validate that a value is a 32-byte hash, key or salt.
 *
 * @throws {ValidationError} If the length is wrong
 */
export function validateHash32(value: Buffer, fieldName: string): void {
  if (value.length !== HASH_SIZE) {
    throw new ValidationError(
      `${fieldName} must be ${HASH_SIZE} bytes`,
      SorobanAuthErrorCode.INVALID_INPUT,
      { field: fieldName, actualLength: value.length }
    );
  }
}

// ============================================================================
// Address Helpers
// ============================================================================

/**
 * Parse a G... or C... strkey into an ScAddress.
 */
export function addressFromString(address: string): ScAddress {
  validateAddress(address);
  if (StrKey.isValidEd25519PublicKey(address)) {
    return { tag: "Account", accountId: StrKey.decodeEd25519PublicKey(address) };
  }
  return { tag: "Contract", contractId: StrKey.decodeContract(address) };
}

/**
 * Render an ScAddress as its strkey.
 */
export function addressToString(address: ScAddress): string {
  return address.tag === "Account"
    ? StrKey.encodeEd25519PublicKey(address.accountId)
    : StrKey.encodeContract(address.contractId);
}

/**
 * Encode a raw 32-byte contract ID as a C... address.
 */
export function contractIdToAddress(contractId: Buffer): string {
  validateHash32(contractId, "contractId");
  return StrKey.encodeContract(contractId);
}

/**
 * Decode a C... address into its raw 32-byte contract ID.
 */
export function contractIdFromAddress(address: string): Buffer {
  if (!StrKey.isValidContract(address)) {
    throw new ValidationError(
      "Invalid contract address. Must be a valid C... strkey.",
      SorobanAuthErrorCode.INVALID_ADDRESS,
      { value: address.slice(0, 10) + "..." }
    );
  }
  return StrKey.decodeContract(address);
}

/**
 * Stable map key for an (address, contract) pair.
 */
export function addressContractKey(address: ScAddress, contractId: Buffer): string {
  return `${addressToString(address)}:${contractId.toString("hex")}`;
}

// ============================================================================
// Byte Helpers
// ============================================================================

/**
 * Lexicographic byte comparison, usable as an Array#sort comparator.
 */
export function compareBytes(a: Buffer, b: Buffer): number {
  return Buffer.compare(a, b);
}
