/**
 * Collaborator interfaces and configuration types.
 *
 * @packageDocumentation
 */

import type { Logger } from "./logging";
import type { SignerRegistry } from "./signers";
import type { CodecLimits } from "./xdr/io";
import type {
  LedgerFootprint,
  ScAddress,
  ScVal,
  SorobanResources,
} from "./xdr/types";

// ============================================================================
// Nonce Storage
// ============================================================================

/**
 * External nonce state, logically the ledger entry
 * `CONTRACT_DATA{contractId, LedgerKeyNonce(address)}`.
 *
 * `get` returns null for an absent entry, which reads as nonce 0.
 */
export interface NonceStore {
  get(contractId: Buffer, address: ScAddress): Promise<bigint | null>;
  set(contractId: Buffer, address: ScAddress, nonce: bigint): Promise<void>;
}

// ============================================================================
// Signer Capabilities
// ============================================================================

/** One Ed25519 signature by a Stellar account signer */
export interface AccountSignature {
  publicKey: Buffer;
  signature: Buffer;
}

/**
 * Signs for a Stellar account (G...) address.
 *
 * May be slow (hardware signer, remote wallet); any timeout policy belongs to
 * the implementation.
 */
export interface AccountAuthSigner {
  readonly kind: "account";
  sign(payload: Buffer): Promise<AccountSignature>;
}

/**
 * Signs for a custom account contract (C...) address, producing the opaque
 * signature arguments that contract's `__check_auth` expects.
 */
export interface ContractAuthSigner {
  readonly kind: "contract";
  sign(payload: Buffer): Promise<ScVal[]>;
}

export type AuthSigner = AccountAuthSigner | ContractAuthSigner;

// ============================================================================
// Verifier Collaborators
// ============================================================================

/**
 * Resolves the Ed25519 keys allowed to sign for an account. Defaults to the
 * account's own key.
 */
export type AccountSignersResolver = (accountId: Buffer) => Promise<Buffer[]>;

/**
 * Verifies a custom account's opaque signature arguments against a payload.
 * Resolves to false (or rejects) when the signature is invalid.
 */
export interface CustomAccountVerifier {
  verify(payload: Buffer, signatureArgs: ScVal[], contractId: Buffer): Promise<boolean>;
}

export type CustomAccountVerifierResolver = (
  contractId: Buffer
) => CustomAccountVerifier | undefined;

// ============================================================================
// Resources
// ============================================================================

/**
 * External fee formula: minimum refundable fee (stroops) for the given
 * extended metadata size.
 */
export type MinimumFeeFormula = (extendedMetaDataSizeBytes: number) => bigint;

/** Resource limits requested alongside a footprint */
export type ResourceLimits = Omit<SorobanResources, "footprint">;

/**
 * Output of a simulation ("preflight") collaborator. A starting point only;
 * it is merged with the computed footprint and validated, never trusted.
 */
export interface ResourceSuggestion {
  footprint: LedgerFootprint;
  resources: ResourceLimits;
  refundableFee?: bigint;
}

// ============================================================================
// Configuration
// ============================================================================

export interface AssemblerLimits extends Partial<CodecLimits> {
  /** Network limit on nodes per authorization tree */
  maxInvocations?: number;
  /** Network limit on authorization tree depth */
  maxInvocationDepth?: number;
}

/**
 * Configuration for {@link TransactionAssembler}.
 */
export interface AssemblerConfig {
  /** Network passphrase (e.g. Networks.TESTNET) */
  networkPassphrase: string;

  /** Minimum refundable fee formula supplied by the fee collaborator */
  minimumFeeFor: MinimumFeeFormula;

  /** Nonce state (default: in-memory store) */
  nonceStore?: NonceStore;

  /** Codec and invocation bounds */
  limits?: AssemblerLimits;

  /** Signer set of Stellar accounts (default: master key only) */
  accountSigners?: AccountSignersResolver;

  /** Keypair signers used when `authorize` is called without signers */
  signerRegistry?: SignerRegistry;

  /** Verifiers for custom account contracts */
  customAccountVerifiers?: CustomAccountVerifierResolver;

  /** Logger (default: console with prefix) */
  logger?: Logger;
}
