/**
 * Authorization builder and verifier.
 *
 * A ContractAuth binds an address and nonce to an invocation tree. The
 * signing payload is SHA-256 of the CONTRACT_AUTH HashIDPreimage
 * `{ networkId, nonce, invocation }`; the signature format depends on the
 * kind of the authorizing address.
 *
 * @packageDocumentation
 */

import { Keypair, StrKey } from "@stellar/stellar-sdk";

import { scvBytes, scvStruct, scvVec } from "./builders";
import {
  ACCOUNT_SIGNATURE_PUBLIC_KEY,
  ACCOUNT_SIGNATURE_SIGNATURE,
  ED25519_SIGNATURE_SIZE,
  HASH_SIZE,
} from "./constants";
import {
  MalformedInputError,
  SignatureInvalidError,
  SignerError,
  SorobanAuthError,
  SorobanAuthErrorCode,
  UnsupportedAddressKindError,
  ValidationError,
} from "./errors";
import { validateInvocation, type InvocationLimits } from "./invocation";
import type { NonceTracker } from "./nonce-tracker";
import type {
  AccountAuthSigner,
  AccountSignature,
  AccountSignersResolver,
  AuthSigner,
  ContractAuthSigner,
  CustomAccountVerifierResolver,
} from "./types";
import { addressToString, compareBytes, networkId, sha256 } from "./utils";
import { ContractAuthXdr, HashIdPreimageXdr } from "./xdr/codec";
import { toXDR } from "./xdr/io";
import type {
  AddressWithNonce,
  AuthorizedInvocation,
  ContractAuth,
  HashIdPreimage,
  ScVal,
} from "./xdr/types";

// ============================================================================
// Payload
// ============================================================================

export function contractAuthPreimage(
  addressWithNonce: AddressWithNonce,
  rootInvocation: AuthorizedInvocation,
  networkPassphrase: string
): HashIdPreimage {
  return {
    tag: "ContractAuth",
    networkId: networkId(networkPassphrase),
    nonce: addressWithNonce.nonce,
    invocation: rootInvocation,
  };
}

/**
 * The 32-byte payload an authorizing address signs.
 */
export function contractAuthPayload(
  addressWithNonce: AddressWithNonce,
  rootInvocation: AuthorizedInvocation,
  networkPassphrase: string
): Buffer {
  const preimage = contractAuthPreimage(addressWithNonce, rootInvocation, networkPassphrase);
  return sha256(toXDR(HashIdPreimageXdr, preimage));
}

// ============================================================================
// Account Signature Encoding
// ============================================================================

/**
 * Encode account signatures as signatureArgs:
 * `[Vec([Map{public_key, signature}, ...])]`, sorted by public key.
 */
export function encodeAccountSignatures(signatures: AccountSignature[]): ScVal[] {
  const sorted = [...signatures].sort((a, b) => compareBytes(a.publicKey, b.publicKey));
  return [
    scvVec(
      sorted.map((sig) =>
        scvStruct({
          [ACCOUNT_SIGNATURE_PUBLIC_KEY]: scvBytes(sig.publicKey),
          [ACCOUNT_SIGNATURE_SIGNATURE]: scvBytes(sig.signature),
        })
      )
    ),
  ];
}

function readBytesField(entry: ScVal, name: string): Buffer | undefined {
  if (entry.tag !== "Map" || !entry.value) return undefined;
  for (const { key, val } of entry.value) {
    if (key.tag === "Symbol" && key.value === name) {
      return val.tag === "Bytes" ? val.value : undefined;
    }
  }
  return undefined;
}

/**
 * Decode account signatureArgs.
 *
 * @throws {SignatureInvalidError} If the arguments do not have the account
 * signature shape
 */
export function decodeAccountSignatures(signatureArgs: ScVal[]): AccountSignature[] {
  const [list] = signatureArgs;
  if (signatureArgs.length !== 1 || list.tag !== "Vec" || !list.value) {
    throw new SignatureInvalidError("Account signatureArgs must be a single vector of signatures");
  }
  return list.value.map((entry, index) => {
    if (entry.tag !== "Map" || !entry.value || entry.value.length !== 2) {
      throw new SignatureInvalidError("Account signature must be a two-field map", { index });
    }
    const publicKey = readBytesField(entry, ACCOUNT_SIGNATURE_PUBLIC_KEY);
    const signature = readBytesField(entry, ACCOUNT_SIGNATURE_SIGNATURE);
    if (!publicKey || publicKey.length !== HASH_SIZE) {
      throw new SignatureInvalidError("Account signature has no 32-byte public_key", { index });
    }
    if (!signature || signature.length !== ED25519_SIGNATURE_SIZE) {
      throw new SignatureInvalidError("Account signature has no 64-byte signature", { index });
    }
    return { publicKey, signature };
  });
}

// ============================================================================
// Builder
// ============================================================================

export interface BuildContractAuthOptions {
  networkPassphrase: string;
  limits?: InvocationLimits;
}

function accountSigners(signers: AuthSigner[]): AccountAuthSigner[] {
  return signers.map((signer) => {
    if (signer.kind !== "account") {
      throw new UnsupportedAddressKindError("account", `sign with a ${signer.kind} signer`);
    }
    return signer;
  });
}

function contractSigner(signers: AuthSigner[]): ContractAuthSigner {
  const [signer] = signers;
  if (signers.length !== 1) {
    throw new ValidationError(
      "Custom account authorization takes exactly one signer",
      SorobanAuthErrorCode.INVALID_INPUT,
      { signers: signers.length }
    );
  }
  if (signer.kind !== "contract") {
    throw new UnsupportedAddressKindError("contract", `sign with a ${signer.kind} signer`);
  }
  return signer;
}

async function callSigner<T>(sign: () => Promise<T>): Promise<T> {
  try {
    return await sign();
  } catch (err) {
    if (err instanceof SorobanAuthError) throw err;
    throw new SignerError(
      `Signer failed: ${err instanceof Error ? err.message : String(err)}`,
      err instanceof Error ? err : undefined
    );
  }
}

/**
 * Build and sign a ContractAuth.
 *
 * Without an address the transaction source account authorizes implicitly:
 * no signer is called and signatureArgs stays empty.
 *
 * @throws {UnsupportedAddressKindError} If a signer does not match the address kind
 * @throws {SignerError} If a signer capability fails
 * @throws {LimitExceededError} If the tree or arguments exceed their bounds
 *
 * @example
 * ```typescript
 * const auth = await buildContractAuth(
 *   { address: createAccountAddress(alice.publicKey()), nonce: 0n },
 *   tree,
 *   new KeypairAuthSigner(alice),
 *   { networkPassphrase: Networks.TESTNET }
 * );
 * ```
 */
export async function buildContractAuth(
  addressWithNonce: AddressWithNonce | null,
  rootInvocation: AuthorizedInvocation,
  signers: AuthSigner | AuthSigner[] | undefined,
  options: BuildContractAuthOptions
): Promise<ContractAuth> {
  validateInvocation(rootInvocation, options.limits);
  const signerList = signers === undefined ? [] : Array.isArray(signers) ? signers : [signers];

  let signatureArgs: ScVal[] = [];
  if (addressWithNonce) {
    const payload = contractAuthPayload(addressWithNonce, rootInvocation, options.networkPassphrase);
    const { address } = addressWithNonce;

    if (address.tag === "Account") {
      const accounts = accountSigners(signerList);
      if (accounts.length === 0) {
        throw new ValidationError(
          `No signer supplied for ${addressToString(address)}`,
          SorobanAuthErrorCode.INVALID_INPUT
        );
      }
      const signatures: AccountSignature[] = [];
      for (const signer of accounts) {
        signatures.push(await callSigner(() => signer.sign(payload)));
      }
      signatureArgs = encodeAccountSignatures(signatures);
    } else {
      const signer = contractSigner(signerList);
      signatureArgs = await callSigner(() => signer.sign(payload));
    }
  }

  const auth: ContractAuth = { addressWithNonce, rootInvocation, signatureArgs };
  // Surface bound violations at build time rather than at submission
  toXDR(ContractAuthXdr, auth, "raw", { limits: options.limits?.codec });
  return auth;
}

// ============================================================================
// Verifier
// ============================================================================

export interface AuthVerifierOptions {
  networkPassphrase: string;
  /** When supplied, every entry's nonce must equal the tracker's value */
  nonceTracker?: NonceTracker;
  accountSigners?: AccountSignersResolver;
  customAccountVerifiers?: CustomAccountVerifierResolver;
}

/**
 * Recomputes an entry's payload and checks its signature against the
 * format implied by the address kind.
 */
export class AuthVerifier {
  constructor(private readonly options: AuthVerifierOptions) {}

  /**
   * @throws {MalformedInputError} If signatureArgs are present without an address
   * @throws {NonceMismatchError} If the nonce is not the tracker's expected value
   * @throws {SignatureInvalidError} If a signature does not verify
   * @throws {UnsupportedAddressKindError} If no verifier exists for a custom account
   */
  async verify(auth: ContractAuth): Promise<void> {
    if (!auth.addressWithNonce) {
      if (auth.signatureArgs.length > 0) {
        throw new MalformedInputError("signatureArgs must be empty without addressWithNonce");
      }
      return;
    }

    if (this.options.nonceTracker) {
      await this.options.nonceTracker.expect(auth);
    }

    const payload = contractAuthPayload(
      auth.addressWithNonce,
      auth.rootInvocation,
      this.options.networkPassphrase
    );
    const { address } = auth.addressWithNonce;

    if (address.tag === "Account") {
      await this.verifyAccount(address.accountId, payload, auth.signatureArgs);
      return;
    }

    const verifier = this.options.customAccountVerifiers?.(address.contractId);
    if (!verifier) {
      throw new UnsupportedAddressKindError("contract", `verify ${addressToString(address)}`);
    }
    let valid: boolean;
    try {
      valid = await verifier.verify(payload, auth.signatureArgs, address.contractId);
    } catch (err) {
      throw new SignatureInvalidError("Custom account verifier rejected the signature", {
        address: addressToString(address),
        reason: err instanceof Error ? err.message : String(err),
      });
    }
    if (!valid) {
      throw new SignatureInvalidError("Custom account signature does not verify", {
        address: addressToString(address),
      });
    }
  }

  private async verifyAccount(accountId: Buffer, payload: Buffer, signatureArgs: ScVal[]): Promise<void> {
    const account = StrKey.encodeEd25519PublicKey(accountId);
    const signatures = decodeAccountSignatures(signatureArgs);
    if (signatures.length === 0) {
      throw new SignatureInvalidError("Account authorization carries no signatures", { account });
    }

    const allowed = this.options.accountSigners
      ? await this.options.accountSigners(accountId)
      : [accountId];

    for (let i = 0; i < signatures.length; i++) {
      const { publicKey, signature } = signatures[i];
      if (i > 0 && compareBytes(signatures[i - 1].publicKey, publicKey) >= 0) {
        throw new SignatureInvalidError("Account signatures must be sorted by unique public key", {
          account,
          index: i,
        });
      }
      if (!allowed.some((key) => key.equals(publicKey))) {
        throw new SignatureInvalidError("Signature key is not a signer of the account", {
          account,
          signer: StrKey.encodeEd25519PublicKey(publicKey),
        });
      }
      const signer = StrKey.encodeEd25519PublicKey(publicKey);
      let valid: boolean;
      try {
        valid = Keypair.fromPublicKey(signer).verify(payload, signature);
      } catch (err) {
        throw new SignatureInvalidError("Account signature could not be checked", {
          account,
          signer,
          reason: err instanceof Error ? err.message : String(err),
        });
      }
      if (!valid) {
        throw new SignatureInvalidError("Account signature does not verify", { account, signer });
      }
    }
  }
}
