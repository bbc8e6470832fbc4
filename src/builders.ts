/**
 * Builder utilities for soroban-auth-core
 *
 * Type-safe constructors for values, addresses, assets and host functions.
 * These helpers validate their inputs so that every built structure encodes.
 *
 * @packageDocumentation
 */

import { StrKey } from "@stellar/stellar-sdk";
import { HASH_SIZE, SCSYMBOL_LIMIT } from "./constants";
import { MalformedInputError, SorobanAuthErrorCode, ValidationError } from "./errors";
import { addressFromString, compareBytes, contractIdFromAddress, validateHash32 } from "./utils";
import type {
  Asset,
  ContractAuth,
  CreateContractArgs,
  HostFunction,
  ScAddress,
  ScMapEntry,
  ScVal,
} from "./xdr/types";

// ============================================================================
// Value Builders
// ============================================================================

export function scvBool(value: boolean): ScVal {
  return { tag: "Bool", value };
}

export function scvVoid(): ScVal {
  return { tag: "Void" };
}

export function scvU32(value: number): ScVal {
  return { tag: "U32", value };
}

export function scvI32(value: number): ScVal {
  return { tag: "I32", value };
}

export function scvU64(value: bigint): ScVal {
  return { tag: "U64", value };
}

export function scvI64(value: bigint): ScVal {
  return { tag: "I64", value };
}

export function scvU128(value: bigint): ScVal {
  return { tag: "U128", value };
}

export function scvI128(value: bigint): ScVal {
  return { tag: "I128", value };
}

export function scvBytes(value: Buffer | Uint8Array): ScVal {
  return { tag: "Bytes", value: Buffer.from(value) };
}

export function scvString(value: string): ScVal {
  return { tag: "String", value };
}

/**
 * Create a symbol value.
 *
 * @throws {ValidationError} If the symbol is too long or has characters
 * outside `[a-zA-Z0-9_]`
 */
export function scvSymbol(value: string): ScVal {
  validateSymbol(value);
  return { tag: "Symbol", value };
}

export function scvVec(values: ScVal[]): ScVal {
  return { tag: "Vec", value: values };
}

export function scvMap(entries: ScMapEntry[]): ScVal {
  return { tag: "Map", value: entries };
}

export function scvAddress(address: ScAddress | string): ScVal {
  return {
    tag: "Address",
    value: typeof address === "string" ? addressFromString(address) : address,
  };
}

/**
 * Encode a contract struct: a map keyed by field-name symbols.
 *
 * Fields must be in alphabetical order for Soroban ScMap serialization, so
 * they are sorted here.
 *
 * @example
 * ```typescript
 * const sig = scvStruct({
 *   public_key: scvBytes(publicKey),
 *   signature: scvBytes(signature),
 * });
 * ```
 */
export function scvStruct(fields: Record<string, ScVal>): ScVal {
  const names = Object.keys(fields).sort((a, b) =>
    compareBytes(Buffer.from(a), Buffer.from(b))
  );
  return scvMap(
    names.map((name) => ({ key: scvSymbol(name), val: fields[name] }))
  );
}

export function validateSymbol(value: string, fieldName: string = "symbol"): void {
  if (value.length > SCSYMBOL_LIMIT || !/^[a-zA-Z0-9_]*$/.test(value)) {
    throw new ValidationError(
      `Invalid ${fieldName} "${value}". Must be at most ${SCSYMBOL_LIMIT} characters of [a-zA-Z0-9_].`,
      SorobanAuthErrorCode.INVALID_INPUT,
      { field: fieldName, value }
    );
  }
}

// ============================================================================
// Address Builders
// ============================================================================

/**
 * Create an account address from a G... public key.
 */
export function createAccountAddress(publicKey: string): ScAddress {
  if (!StrKey.isValidEd25519PublicKey(publicKey)) {
    throw new ValidationError(
      "Invalid Stellar account address. Must be a valid G... public key.",
      SorobanAuthErrorCode.INVALID_ADDRESS,
      { publicKey }
    );
  }
  return { tag: "Account", accountId: StrKey.decodeEd25519PublicKey(publicKey) };
}

/**
 * Create a contract address from a C... address or raw 32-byte ID.
 */
export function createContractAddress(contract: string | Buffer): ScAddress {
  if (typeof contract === "string") {
    return { tag: "Contract", contractId: contractIdFromAddress(contract) };
  }
  validateHash32(contract, "contractId");
  return { tag: "Contract", contractId: Buffer.from(contract) };
}

// ============================================================================
// Asset Builders
// ============================================================================

export function createNativeAsset(): Asset {
  return { tag: "Native" };
}

/**
 * Create a credit asset, choosing the 4- or 12-character variant by code
 * length.
 *
 * @param code - Asset code, 1-12 alphanumeric characters
 * @param issuer - Issuer account (G...)
 */
export function createCreditAsset(code: string, issuer: string): Asset {
  if (!/^[a-zA-Z0-9]{1,12}$/.test(code)) {
    throw new ValidationError(
      "Asset code must be 1-12 alphanumeric characters",
      SorobanAuthErrorCode.INVALID_INPUT,
      { code }
    );
  }
  if (!StrKey.isValidEd25519PublicKey(issuer)) {
    throw new ValidationError(
      "Asset issuer must be a valid G... public key",
      SorobanAuthErrorCode.INVALID_ADDRESS,
      { issuer }
    );
  }
  const issuerKey = StrKey.decodeEd25519PublicKey(issuer);
  return code.length <= 4
    ? { tag: "CreditAlphanum4", code, issuer: issuerKey }
    : { tag: "CreditAlphanum12", code, issuer: issuerKey };
}

// ============================================================================
// Host Function Builders
// ============================================================================

/**
 * Build an InvokeContract host function.
 *
 * The call is encoded as `[Bytes(contractId), Symbol(functionName), ...args]`.
 *
 * @example
 * ```typescript
 * const fn = invokeContractFunction(swapId, "swap", [scvAddress(a), scvAddress(b)], [authA, authB]);
 * ```
 */
export function invokeContractFunction(
  contractId: Buffer,
  functionName: string,
  args: ScVal[],
  auth: ContractAuth[] = []
): HostFunction {
  validateHash32(contractId, "contractId");
  return {
    args: {
      tag: "InvokeContract",
      args: [scvBytes(contractId), scvSymbol(functionName), ...args],
    },
    auth,
  };
}

/**
 * Build a CreateContract host function.
 */
export function createContractFunction(
  createContract: CreateContractArgs,
  auth: ContractAuth[] = []
): HostFunction {
  return { args: { tag: "CreateContract", createContract }, auth };
}

/**
 * Build an UploadContractWasm host function.
 */
export function uploadWasmFunction(code: Buffer): HostFunction {
  return { args: { tag: "UploadContractWasm", code: Buffer.from(code) }, auth: [] };
}

/**
 * Split InvokeContract arguments into the target contract, function name
 * and call arguments.
 *
 * @throws {MalformedInputError} If the leading contract ID or symbol is missing
 */
export function parseInvokeContractArgs(args: ScVal[]): {
  contractId: Buffer;
  functionName: string;
  args: ScVal[];
} {
  const [target, fn, ...rest] = args;
  if (!target || target.tag !== "Bytes" || target.value.length !== HASH_SIZE) {
    throw new MalformedInputError("InvokeContract args must start with a 32-byte contract ID");
  }
  if (!fn || fn.tag !== "Symbol") {
    throw new MalformedInputError("InvokeContract args must have a function symbol second");
  }
  return { contractId: target.value, functionName: fn.value, args: rest };
}
