/**
 * soroban-auth-core
 *
 * Contract authorization for Soroban host functions: deterministic contract
 * IDs, signed invocation trees with replay-protecting nonces, and the
 * transaction resource footprint, all over an exact XDR codec.
 *
 * @packageDocumentation
 */

// Main pipeline
export {
  TransactionAssembler,
  type AuthorizeOptions,
  type AssembleOptions,
  type AssembledOperation,
} from "./assembler";

// Wire types
export type {
  ScAddress,
  Asset,
  SCContractCode,
  ScMapEntry,
  ScVal,
  ScValTag,
  LedgerKey,
  LedgerFootprint,
  ContractIdPreimage,
  CreateContractArgs,
  HostFunctionArgs,
  HostFunction,
  InvokeHostFunctionOp,
  AddressWithNonce,
  AuthorizedInvocation,
  ContractAuth,
  SorobanResources,
  ExtensionPoint,
  SorobanTransactionData,
  HashIdPreimage,
} from "./xdr/types";

// Codec
export {
  XdrWriter,
  XdrReader,
  toXDR,
  fromXDR,
  xdrEquals,
  resolveLimits,
  DEFAULT_CODEC_LIMITS,
  type XdrType,
  type XdrFormat,
  type CodecLimits,
  type CodecOptions,
} from "./xdr/io";
export * from "./xdr/codec";

// Collaborator and configuration types
export type {
  NonceStore,
  AccountSignature,
  AccountAuthSigner,
  ContractAuthSigner,
  AuthSigner,
  AccountSignersResolver,
  CustomAccountVerifier,
  CustomAccountVerifierResolver,
  MinimumFeeFormula,
  ResourceLimits,
  ResourceSuggestion,
  AssemblerLimits,
  AssemblerConfig,
} from "./types";

// Constants
export {
  MAX_OPS_PER_TX,
  SCVAL_LIMIT,
  SCSYMBOL_LIMIT,
  SIGNATURE_MAX_SIZE,
  DEFAULT_MAX_DEPTH,
  ENVELOPE_TYPE_CONTRACT_ID_FROM_ED25519,
  ENVELOPE_TYPE_CONTRACT_ID_FROM_CONTRACT,
  ENVELOPE_TYPE_CONTRACT_ID_FROM_ASSET,
  ENVELOPE_TYPE_CONTRACT_ID_FROM_SOURCE_ACCOUNT,
  ENVELOPE_TYPE_CREATE_CONTRACT_ARGS,
  ENVELOPE_TYPE_CONTRACT_AUTH,
} from "./constants";

// Errors
export {
  SorobanAuthError,
  SorobanAuthErrorCode,
  MalformedInputError,
  LimitExceededError,
  SchemeMismatchError,
  SignatureInvalidError,
  UnsupportedAddressKindError,
  SignerError,
  NonceMismatchError,
  NonceConflictError,
  FootprintInsufficientError,
  FeeInsufficientError,
  ValidationError,
  wrapError,
} from "./errors";

// Events
export {
  SorobanAuthEventEmitter,
  type SorobanAuthEventMap,
  type SorobanAuthEvent,
  type EventListener,
} from "./events";

// Logging
export { consoleLogger, silentLogger, type Logger } from "./logging";

// Utilities
export {
  sha256,
  networkId,
  validateAddress,
  addressFromString,
  addressToString,
  contractIdToAddress,
  contractIdFromAddress,
} from "./utils";

// Value and function builders
export {
  scvBool,
  scvVoid,
  scvU32,
  scvI32,
  scvU64,
  scvI64,
  scvU128,
  scvI128,
  scvBytes,
  scvString,
  scvSymbol,
  scvVec,
  scvMap,
  scvAddress,
  scvStruct,
  validateSymbol,
  createAccountAddress,
  createContractAddress,
  createNativeAsset,
  createCreditAsset,
  invokeContractFunction,
  createContractFunction,
  uploadWasmFunction,
  parseInvokeContractArgs,
} from "./builders";

// Contract IDs
export {
  deriveContractId,
  contractIdPreimage,
  createContractArgsPayload,
  verifyEd25519ContractId,
  signCreateContractArgs,
  assertSchemeMatchesCode,
  type ContractIdContext,
} from "./contract-id";

// Invocation trees
export {
  InvocationBuilder,
  walkInvocations,
  countInvocations,
  invocationFromFunction,
  validateInvocation,
  type InvocationLimits,
} from "./invocation";

// Nonces
export { NonceTracker, nonceLedgerKey, checkNonceConflicts } from "./nonce-tracker";
export type { AddressedAuth } from "./nonce-tracker";
export { MemoryNonceStore } from "./storage";

// Authorization
export {
  AuthVerifier,
  buildContractAuth,
  contractAuthPayload,
  contractAuthPreimage,
  encodeAccountSignatures,
  decodeAccountSignatures,
  type AuthVerifierOptions,
  type BuildContractAuthOptions,
} from "./auth";
export { KeypairAuthSigner, CustomAccountAuthSigner, SignerRegistry } from "./signers";

// Resources
export {
  buildFootprint,
  buildTransactionData,
  validateTransactionData,
  mergeSuggestion,
  footprintContains,
  contractExecutableKey,
  metadataFeeFormula,
} from "./resources";
