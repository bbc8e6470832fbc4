/**
 * Constants used throughout soroban-auth-core.
 *
 * Network-specific invocation limits are supplied through configuration.
 *
 * @packageDocumentation
 */

// ============================================================================
// XDR Bounds
// ============================================================================

/** Maximum number of host functions in one InvokeHostFunctionOp */
export const MAX_OPS_PER_TX = 100;

/** Bound on SCVec/SCMap lengths and SCBytes/SCString sizes */
export const SCVAL_LIMIT = 256_000;

/** Maximum length of an SCSymbol */
export const SCSYMBOL_LIMIT = 32;

/** Maximum size of a Signature (opaque<64>) */
export const SIGNATURE_MAX_SIZE = 64;

/** Default nesting bound for recursive ScVal and invocation decoding */
export const DEFAULT_MAX_DEPTH = 256;

// ============================================================================
// Hash Preimage Discriminators (EnvelopeType)
// ============================================================================

export const ENVELOPE_TYPE_CONTRACT_ID_FROM_ED25519 = 8;
export const ENVELOPE_TYPE_CONTRACT_ID_FROM_CONTRACT = 9;
export const ENVELOPE_TYPE_CONTRACT_ID_FROM_ASSET = 10;
export const ENVELOPE_TYPE_CONTRACT_ID_FROM_SOURCE_ACCOUNT = 11;
export const ENVELOPE_TYPE_CREATE_CONTRACT_ARGS = 12;
export const ENVELOPE_TYPE_CONTRACT_AUTH = 13;

// ============================================================================
// Cryptographic Constants
// ============================================================================

/** Size of a SHA-256 hash, contract ID or Ed25519 public key in bytes */
export const HASH_SIZE = 32;

/** Size of an Ed25519 signature in bytes */
export const ED25519_SIGNATURE_SIZE = 64;

// ============================================================================
// Account Signature Encoding
// ============================================================================

/** Map key holding the signer's public key in an account signature */
export const ACCOUNT_SIGNATURE_PUBLIC_KEY = "public_key";

/** Map key holding the Ed25519 signature in an account signature */
export const ACCOUNT_SIGNATURE_SIGNATURE = "signature";

// ============================================================================
// Logging
// ============================================================================

/** Prefix attached to every message of the default logger */
export const LOG_PREFIX = "[SorobanAuth]";
