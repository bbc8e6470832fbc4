/**
 * TransactionAssembler - authorization and resource pipeline for one
 * InvokeHostFunction operation.
 *
 * Derive contract IDs, build invocation trees, assign nonces, sign, compute
 * resources and encode. Submission and simulation stay with the caller.
 *
 * @packageDocumentation
 */

import { AuthVerifier, buildContractAuth } from "./auth";
import { deriveContractId } from "./contract-id";
import { SorobanAuthErrorCode, ValidationError } from "./errors";
import { SorobanAuthEventEmitter } from "./events";
import { validateInvocation, type InvocationLimits } from "./invocation";
import { consoleLogger, type Logger } from "./logging";
import { checkNonceConflicts, NonceTracker } from "./nonce-tracker";
import {
  buildFootprint,
  buildTransactionData,
  mergeSuggestion,
  validateTransactionData,
} from "./resources";
import { MemoryNonceStore } from "./storage";
import type {
  AssemblerConfig,
  AuthSigner,
  ResourceLimits,
  ResourceSuggestion,
} from "./types";
import { addressToString } from "./utils";
import { InvokeHostFunctionOpXdr, SorobanTransactionDataXdr } from "./xdr/codec";
import { resolveLimits, toXDR, type CodecLimits } from "./xdr/io";
import type {
  AddressWithNonce,
  AuthorizedInvocation,
  ContractAuth,
  CreateContractArgs,
  HostFunction,
  InvokeHostFunctionOp,
  LedgerFootprint,
  ScAddress,
  SorobanResources,
  SorobanTransactionData,
} from "./xdr/types";

export interface AuthorizeOptions {
  /** Authorizing address, or null for the transaction source account */
  address: ScAddress | null;
  invocation: AuthorizedInvocation;
  /** Defaults to the configured signer registry's signers for `address` */
  signers?: AuthSigner | AuthSigner[];
}

export interface AssembleOptions {
  /** Resource limits; taken from `suggestion` when omitted */
  resources?: ResourceLimits;
  /** Defaults to the suggestion's fee, then to the formula's minimum */
  refundableFee?: bigint;
  suggestion?: ResourceSuggestion;
  /** Needed when a function creates a contract from the source account */
  sourceAccount?: string | Buffer;
}

export interface AssembledOperation {
  operation: InvokeHostFunctionOp;
  transactionData: SorobanTransactionData;
  /** Base64 XDR of the operation */
  operationXdr: string;
  /** Base64 XDR of the transaction data */
  transactionDataXdr: string;
}

function isPositiveInteger(value: number | undefined): boolean {
  return value === undefined || (Number.isInteger(value) && value > 0);
}

function validateConfig(config: AssemblerConfig): void {
  if (!config.networkPassphrase || typeof config.networkPassphrase !== "string") {
    throw new ValidationError(
      "networkPassphrase is required",
      SorobanAuthErrorCode.INVALID_CONFIG,
      { field: "networkPassphrase" }
    );
  }
  if (typeof config.minimumFeeFor !== "function") {
    throw new ValidationError(
      "minimumFeeFor is required",
      SorobanAuthErrorCode.INVALID_CONFIG,
      { field: "minimumFeeFor" }
    );
  }
  const limits = config.limits ?? {};
  for (const [field, value] of Object.entries(limits)) {
    if (!isPositiveInteger(value)) {
      throw new ValidationError(
        `limits.${field} must be a positive integer`,
        SorobanAuthErrorCode.INVALID_CONFIG,
        { field: `limits.${field}`, value }
      );
    }
  }
}

/**
 * One configured pipeline per network.
 *
 * @example
 * ```typescript
 * const assembler = new TransactionAssembler({
 *   networkPassphrase: Networks.TESTNET,
 *   minimumFeeFor: metadataFeeFormula(100n),
 * });
 *
 * const authA = await assembler.authorize({
 *   address: createAccountAddress(alice.publicKey()),
 *   invocation: tree,
 *   signers: new KeypairAuthSigner(alice),
 * });
 * const { operationXdr, transactionDataXdr } = await assembler.assemble(
 *   [invokeContractFunction(swapId, "swap", args, [authA, authB])],
 *   { resources, refundableFee: 10_000n }
 * );
 * ```
 */
export class TransactionAssembler {
  readonly events: SorobanAuthEventEmitter;
  readonly nonces: NonceTracker;

  private readonly networkPassphrase: string;
  private readonly logger: Logger;
  private readonly codecLimits: CodecLimits;
  private readonly invocationLimits: InvocationLimits;
  private readonly verifier: AuthVerifier;

  constructor(private readonly config: AssemblerConfig) {
    validateConfig(config);

    this.networkPassphrase = config.networkPassphrase;
    this.logger = config.logger ?? consoleLogger;
    this.events = new SorobanAuthEventEmitter(this.logger);
    this.nonces = new NonceTracker(config.nonceStore ?? new MemoryNonceStore());

    const { maxInvocations, maxInvocationDepth, ...codec } = config.limits ?? {};
    this.codecLimits = resolveLimits(codec);
    this.invocationLimits = {
      maxInvocations,
      maxDepth: maxInvocationDepth,
      codec: this.codecLimits,
    };

    this.verifier = new AuthVerifier({
      networkPassphrase: this.networkPassphrase,
      nonceTracker: this.nonces,
      accountSigners: config.accountSigners,
      customAccountVerifiers: config.customAccountVerifiers,
    });
  }

  /**
   * Contract ID the network will assign to a CreateContract call.
   */
  deriveContractId(args: CreateContractArgs, sourceAccount?: string | Buffer): Buffer {
    return deriveContractId(args, { networkPassphrase: this.networkPassphrase, sourceAccount });
  }

  /**
   * Build and sign a ContractAuth for `invocation`, embedding the current
   * nonce of (address, root contract). The nonce is not advanced; that
   * happens in {@link recordApplied}.
   */
  async authorize(options: AuthorizeOptions): Promise<ContractAuth> {
    const { address, invocation } = options;
    const contractId = invocation.contractId.toString("hex");

    let addressWithNonce: AddressWithNonce | null = null;
    let signers = options.signers;
    if (address) {
      const nonce = await this.nonces.next(address, invocation.contractId);
      addressWithNonce = { address, nonce };
      signers ??= this.config.signerRegistry?.signersFor(address);
    }

    const auth = await buildContractAuth(addressWithNonce, invocation, signers, {
      networkPassphrase: this.networkPassphrase,
      limits: this.invocationLimits,
    });

    this.logger.debug(
      `Signed authorization for ${address ? addressToString(address) : "source account"} on ${contractId}`
    );
    this.events.emit("authorizationSigned", {
      address: address ? addressToString(address) : null,
      contractId,
      nonce: addressWithNonce ? addressWithNonce.nonce : null,
    });
    return auth;
  }

  /**
   * Validate, verify and encode an operation with its transaction data.
   *
   * @throws {LimitExceededError} If the operation or a tree is out of bounds
   * @throws {NonceConflictError} If two entries share a nonce
   * @throws {NonceMismatchError} If an entry's nonce is stale
   * @throws {SignatureInvalidError} If an entry does not verify
   * @throws {FootprintInsufficientError} If the declared footprint misses a key
   * @throws {FeeInsufficientError} If the refundable fee is too low
   */
  async assemble(functions: HostFunction[], options: AssembleOptions = {}): Promise<AssembledOperation> {
    const operation: InvokeHostFunctionOp = { functions };
    // Encoding enforces the operation and sequence bounds before any signature work
    toXDR(InvokeHostFunctionOpXdr, operation, "raw", { limits: this.codecLimits });

    const auths = functions.flatMap((fn) => fn.auth);
    for (const auth of auths) {
      validateInvocation(auth.rootInvocation, this.invocationLimits);
    }
    checkNonceConflicts(auths);

    for (const auth of auths) {
      await this.verifier.verify(auth);
      this.events.emit("authorizationVerified", {
        address: auth.addressWithNonce ? addressToString(auth.addressWithNonce.address) : null,
        contractId: auth.rootInvocation.contractId.toString("hex"),
      });
    }

    const computed = buildFootprint(functions, auths, {
      networkPassphrase: this.networkPassphrase,
      sourceAccount: options.sourceAccount,
    });
    this.logger.debug(
      `Computed footprint: ${computed.readOnly.length} read-only, ${computed.readWrite.length} read-write`
    );

    const resources = this.resolveResources(computed, options);
    const refundableFee =
      options.refundableFee ??
      options.suggestion?.refundableFee ??
      this.config.minimumFeeFor(resources.extendedMetaDataSizeBytes);

    const transactionData = buildTransactionData(resources.footprint, resources, refundableFee);
    validateTransactionData(transactionData, computed, this.config.minimumFeeFor);

    const assembled: AssembledOperation = {
      operation,
      transactionData,
      operationXdr: toXDR(InvokeHostFunctionOpXdr, operation, "base64", { limits: this.codecLimits }),
      transactionDataXdr: toXDR(SorobanTransactionDataXdr, transactionData, "base64", {
        limits: this.codecLimits,
      }),
    };

    this.logger.debug(`Assembled ${functions.length} host functions with ${auths.length} authorizations`);
    this.events.emit("operationAssembled", {
      functions: functions.length,
      authorizations: auths.length,
      refundableFee,
    });
    return assembled;
  }

  /**
   * Record that the ledger applied `operation`: every addressed entry's
   * nonce is consumed, or none is.
   *
   * @throws {NonceMismatchError} If an entry's nonce is not the current one
   */
  async recordApplied(operation: InvokeHostFunctionOp): Promise<void> {
    const observed = await this.nonces.observeAll(operation.functions.flatMap((fn) => fn.auth));
    for (const { address, contractId, nonce } of observed) {
      this.events.emit("nonceObserved", {
        address: addressToString(address),
        contractId: contractId.toString("hex"),
        nonce,
      });
    }
  }

  private resolveResources(
    computed: LedgerFootprint,
    options: AssembleOptions
  ): SorobanResources {
    if (options.suggestion) {
      const merged = mergeSuggestion(computed, options.suggestion, this.logger);
      return options.resources ? { ...merged, ...options.resources } : merged;
    }
    if (!options.resources) {
      throw new ValidationError(
        "assemble requires resources or a suggestion",
        SorobanAuthErrorCode.INVALID_INPUT,
        { field: "resources" }
      );
    }
    return { footprint: computed, ...options.resources };
  }
}
