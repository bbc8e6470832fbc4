/**
 * Contract ID derivation.
 *
 * A contract ID is the SHA-256 of a HashIDPreimage selected by the
 * creation scheme. All three schemes bind the network ID, so the same
 * inputs give different IDs on different networks.
 *
 * @packageDocumentation
 */

import { Keypair, StrKey } from "@stellar/stellar-sdk";

import { ED25519_SIGNATURE_SIZE } from "./constants";
import {
  SchemeMismatchError,
  SignatureInvalidError,
  SorobanAuthErrorCode,
  ValidationError,
} from "./errors";
import { networkId, sha256, validateHash32 } from "./utils";
import { HashIdPreimageXdr } from "./xdr/codec";
import { toXDR } from "./xdr/io";
import type { CreateContractArgs, HashIdPreimage, SCContractCode } from "./xdr/types";

export interface ContractIdContext {
  networkPassphrase: string;
  /** Invoking account (G... or raw 32-byte key); required for FromSourceAccount */
  sourceAccount?: string | Buffer;
}

/**
 * Reject illegal pairings of ID scheme and contract code.
 *
 * The built-in token may only be created from an asset, and an asset
 * contract may only run the built-in token.
 *
 * @throws {SchemeMismatchError}
 */
export function assertSchemeMatchesCode(args: CreateContractArgs): void {
  const isAsset = args.contractId.tag === "FromAsset";
  const isToken = args.code.tag === "Token";
  if (isAsset !== isToken) {
    throw new SchemeMismatchError(args.contractId.tag, args.code.tag);
  }
}

function resolveSourceAccount(source: string | Buffer | undefined): Buffer {
  if (source === undefined) {
    throw new ValidationError(
      "FromSourceAccount contract IDs require the invoking source account",
      SorobanAuthErrorCode.INVALID_INPUT,
      { field: "sourceAccount" }
    );
  }
  if (typeof source === "string") {
    if (!StrKey.isValidEd25519PublicKey(source)) {
      throw new ValidationError(
        "sourceAccount must be a valid G... public key",
        SorobanAuthErrorCode.INVALID_ADDRESS,
        { field: "sourceAccount" }
      );
    }
    return StrKey.decodeEd25519PublicKey(source);
  }
  validateHash32(source, "sourceAccount");
  return source;
}

/**
 * The signing payload for FromEd25519PublicKey: SHA-256 of the
 * CREATE_CONTRACT_ARGS preimage over the code and salt.
 */
export function createContractArgsPayload(
  code: SCContractCode,
  salt: Buffer,
  networkPassphrase: string
): Buffer {
  const preimage: HashIdPreimage = {
    tag: "CreateContractArgs",
    networkId: networkId(networkPassphrase),
    code,
    salt,
  };
  return sha256(toXDR(HashIdPreimageXdr, preimage));
}

/**
 * Build the ID preimage for a create-contract call without checking the
 * Ed25519 signature.
 */
export function contractIdPreimage(
  args: CreateContractArgs,
  context: ContractIdContext
): HashIdPreimage {
  assertSchemeMatchesCode(args);
  const network = networkId(context.networkPassphrase);
  const scheme = args.contractId;

  switch (scheme.tag) {
    case "FromSourceAccount":
      return {
        tag: "ContractIdFromSourceAccount",
        networkId: network,
        sourceAccount: resolveSourceAccount(context.sourceAccount),
        salt: scheme.salt,
      };
    case "FromEd25519PublicKey":
      return {
        tag: "ContractIdFromEd25519",
        networkId: network,
        ed25519: scheme.key,
        salt: scheme.salt,
      };
    case "FromAsset":
      return { tag: "ContractIdFromAsset", networkId: network, asset: scheme.asset };
  }
}

/**
 * Verify the key-control proof carried by a FromEd25519PublicKey scheme.
 *
 * @throws {SignatureInvalidError}
 */
export function verifyEd25519ContractId(
  args: CreateContractArgs,
  networkPassphrase: string
): void {
  const scheme = args.contractId;
  if (scheme.tag !== "FromEd25519PublicKey") return;

  validateHash32(scheme.key, "key");
  if (scheme.signature.length !== ED25519_SIGNATURE_SIZE) {
    throw new SignatureInvalidError("Ed25519 contract ID signature must be 64 bytes", {
      actualLength: scheme.signature.length,
    });
  }

  const payload = createContractArgsPayload(args.code, scheme.salt, networkPassphrase);
  let valid: boolean;
  try {
    valid = Keypair.fromPublicKey(StrKey.encodeEd25519PublicKey(scheme.key)).verify(
      payload,
      scheme.signature
    );
  } catch (err) {
    throw new SignatureInvalidError("Ed25519 contract ID key is not a valid public key", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  if (!valid) {
    throw new SignatureInvalidError("Ed25519 contract ID signature does not verify", {
      key: StrKey.encodeEd25519PublicKey(scheme.key),
    });
  }
}

/**
 * Derive the 32-byte contract ID for a create-contract call.
 *
 * Pure: identical inputs always give identical IDs.
 *
 * @throws {SchemeMismatchError} For illegal scheme/code pairings
 * @throws {SignatureInvalidError} If an Ed25519 scheme's signature fails
 * @throws {ValidationError} If FromSourceAccount has no source account
 *
 * @example
 * ```typescript
 * const id = deriveContractId(
 *   { contractId: { tag: "FromSourceAccount", salt }, code: { tag: "WasmRef", hash: wasmHash } },
 *   { networkPassphrase: Networks.TESTNET, sourceAccount: "G..." }
 * );
 * ```
 */
export function deriveContractId(args: CreateContractArgs, context: ContractIdContext): Buffer {
  const preimage = contractIdPreimage(args, context);
  verifyEd25519ContractId(args, context.networkPassphrase);
  return sha256(toXDR(HashIdPreimageXdr, preimage));
}

/**
 * Build FromEd25519PublicKey create-contract args, signing the
 * create-contract payload with the keypair.
 */
export function signCreateContractArgs(
  keypair: Keypair,
  code: SCContractCode,
  salt: Buffer,
  networkPassphrase: string
): CreateContractArgs {
  validateHash32(salt, "salt");
  const payload = createContractArgsPayload(code, salt, networkPassphrase);
  return {
    contractId: {
      tag: "FromEd25519PublicKey",
      key: keypair.rawPublicKey(),
      signature: keypair.sign(payload),
      salt,
    },
    code,
  };
}
