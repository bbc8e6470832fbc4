/**
 * Custom error classes for soroban-auth-core.
 *
 * Every failure is local and non-retryable. Operations throw (or reject,
 * when an async collaborator is involved) one of these classes; callers
 * adjust their inputs and rebuild.
 *
 * @packageDocumentation
 */

/**
 * Error codes for soroban-auth-core operations.
 */
export enum SorobanAuthErrorCode {
  // Codec errors (1xxx)
  MALFORMED_INPUT = 1001,
  LIMIT_EXCEEDED = 1002,

  // Contract ID derivation errors (2xxx)
  SCHEME_MISMATCH = 2001,

  // Signature errors (3xxx)
  SIGNATURE_INVALID = 3001,
  UNSUPPORTED_ADDRESS_KIND = 3002,
  SIGNER_FAILED = 3003,

  // Replay protection errors (4xxx)
  NONCE_MISMATCH = 4001,
  NONCE_CONFLICT = 4002,

  // Resource errors (5xxx)
  FOOTPRINT_INSUFFICIENT = 5001,
  FEE_INSUFFICIENT = 5002,

  // Validation errors (6xxx)
  INVALID_CONFIG = 6001,
  INVALID_ADDRESS = 6002,
  INVALID_INPUT = 6003,
}

/**
 * Base error class for all soroban-auth-core errors.
 */
export class SorobanAuthError extends Error {
  /** Error code for programmatic error handling */
  readonly code: SorobanAuthErrorCode;

  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  /** Original error that caused this error */
  readonly cause?: Error;

  constructor(
    message: string,
    code: SorobanAuthErrorCode,
    options?: {
      context?: Record<string, unknown>;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = "SorobanAuthError";
    this.code = code;
    this.context = options?.context;
    this.cause = options?.cause;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SorobanAuthError);
    }
  }

  /**
   * Create a formatted error message with code and context.
   */
  toDetailedString(): string {
    let msg = `[${this.code}] ${this.message}`;
    if (this.context) {
      msg += `\nContext: ${JSON.stringify(this.context, null, 2)}`;
    }
    if (this.cause) {
      msg += `\nCaused by: ${this.cause.message}`;
    }
    return msg;
  }
}

/**
 * Thrown when bytes or an in-memory value do not have the expected shape.
 */
export class MalformedInputError extends SorobanAuthError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SorobanAuthErrorCode.MALFORMED_INPUT, { context });
    this.name = "MalformedInputError";
  }
}

/**
 * Thrown when a bounded sequence, tree or value exceeds its bound.
 */
export class LimitExceededError extends SorobanAuthError {
  constructor(what: string, limit: number, actual: number) {
    super(
      `${what} exceeds limit of ${limit} (got ${actual})`,
      SorobanAuthErrorCode.LIMIT_EXCEEDED,
      { context: { what, limit, actual } }
    );
    this.name = "LimitExceededError";
  }
}

/**
 * Thrown when a contract ID scheme is paired with an incompatible code kind.
 */
export class SchemeMismatchError extends SorobanAuthError {
  constructor(scheme: string, code: string) {
    super(
      `Contract ID scheme ${scheme} cannot be used with ${code} contract code`,
      SorobanAuthErrorCode.SCHEME_MISMATCH,
      { context: { scheme, code } }
    );
    this.name = "SchemeMismatchError";
  }
}

/**
 * Thrown when a signature does not verify against its payload.
 */
export class SignatureInvalidError extends SorobanAuthError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, SorobanAuthErrorCode.SIGNATURE_INVALID, { context });
    this.name = "SignatureInvalidError";
  }
}

/**
 * Thrown when no signer or verifier exists for an address kind.
 */
export class UnsupportedAddressKindError extends SorobanAuthError {
  constructor(kind: string, operation: string) {
    super(
      `Cannot ${operation} for ${kind} address`,
      SorobanAuthErrorCode.UNSUPPORTED_ADDRESS_KIND,
      { context: { kind, operation } }
    );
    this.name = "UnsupportedAddressKindError";
  }
}

/**
 * Thrown when a signer capability fails to produce a signature.
 */
export class SignerError extends SorobanAuthError {
  constructor(message: string, cause?: Error) {
    super(message, SorobanAuthErrorCode.SIGNER_FAILED, { cause });
    this.name = "SignerError";
  }
}

/**
 * Thrown when an entry's nonce differs from the tracker's expected value.
 */
export class NonceMismatchError extends SorobanAuthError {
  constructor(expected: bigint, actual: bigint, context?: Record<string, unknown>) {
    super(
      `Nonce mismatch: expected ${expected}, got ${actual}`,
      SorobanAuthErrorCode.NONCE_MISMATCH,
      { context: { expected: expected.toString(), actual: actual.toString(), ...context } }
    );
    this.name = "NonceMismatchError";
  }
}

/**
 * Thrown when two entries in one operation reuse an (address, contract, nonce).
 */
export class NonceConflictError extends SorobanAuthError {
  constructor(nonce: bigint, context?: Record<string, unknown>) {
    super(
      `Nonce ${nonce} is used by more than one authorization for the same address and contract`,
      SorobanAuthErrorCode.NONCE_CONFLICT,
      { context: { nonce: nonce.toString(), ...context } }
    );
    this.name = "NonceConflictError";
  }
}

/**
 * Thrown when a declared footprint does not cover the computed one.
 */
export class FootprintInsufficientError extends SorobanAuthError {
  /** Keys missing from the declaration, hex-encoded XDR */
  readonly missingReadOnly: string[];
  readonly missingReadWrite: string[];

  constructor(missingReadOnly: string[], missingReadWrite: string[]) {
    super(
      `Declared footprint is missing ${missingReadOnly.length} read-only and ${missingReadWrite.length} read-write keys`,
      SorobanAuthErrorCode.FOOTPRINT_INSUFFICIENT,
      { context: { missingReadOnly, missingReadWrite } }
    );
    this.name = "FootprintInsufficientError";
    this.missingReadOnly = missingReadOnly;
    this.missingReadWrite = missingReadWrite;
  }
}

/**
 * Thrown when the refundable fee is below the metadata-derived minimum.
 */
export class FeeInsufficientError extends SorobanAuthError {
  constructor(minimum: bigint, actual: bigint) {
    super(
      `Refundable fee ${actual} is below the minimum of ${minimum}`,
      SorobanAuthErrorCode.FEE_INSUFFICIENT,
      { context: { minimum: minimum.toString(), actual: actual.toString() } }
    );
    this.name = "FeeInsufficientError";
  }
}

/**
 * Error thrown when input or configuration validation fails.
 */
export class ValidationError extends SorobanAuthError {
  constructor(
    message: string,
    code:
      | SorobanAuthErrorCode.INVALID_CONFIG
      | SorobanAuthErrorCode.INVALID_ADDRESS
      | SorobanAuthErrorCode.INVALID_INPUT = SorobanAuthErrorCode.INVALID_INPUT,
    context?: Record<string, unknown>
  ) {
    super(message, code, { context });
    this.name = "ValidationError";
  }
}

/**
 * Helper to wrap unknown errors in SorobanAuthError.
 */
export function wrapError(
  err: unknown,
  defaultCode: SorobanAuthErrorCode = SorobanAuthErrorCode.INVALID_INPUT
): SorobanAuthError {
  if (err instanceof SorobanAuthError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  const cause = err instanceof Error ? err : undefined;

  return new SorobanAuthError(message, defaultCode, { cause });
}
