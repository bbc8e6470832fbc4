/**
 * In-memory model of the contract invocation and authorization structures.
 *
 * Every union is closed and discriminated on `tag`; the variant sets are
 * fixed by the wire format. Byte strings are Buffers, 64-bit integers are
 * bigints and 32-bit integers are numbers.
 *
 * @packageDocumentation
 */

// ============================================================================
// Addresses and Assets
// ============================================================================

/** A Stellar account (ed25519 key) or a contract (32-byte ID) */
export type ScAddress =
  | { tag: "Account"; accountId: Buffer }
  | { tag: "Contract"; contractId: Buffer };

export type Asset =
  | { tag: "Native" }
  | { tag: "CreditAlphanum4"; code: string; issuer: Buffer }
  | { tag: "CreditAlphanum12"; code: string; issuer: Buffer };

// ============================================================================
// Contract Code
// ============================================================================

/** Reference to uploaded Wasm, or the built-in token implementation */
export type SCContractCode =
  | { tag: "WasmRef"; hash: Buffer }
  | { tag: "Token" };

// ============================================================================
// Values
// ============================================================================

export interface ScMapEntry {
  key: ScVal;
  val: ScVal;
}

export type ScVal =
  | { tag: "Bool"; value: boolean }
  | { tag: "Void" }
  | { tag: "U32"; value: number }
  | { tag: "I32"; value: number }
  | { tag: "U64"; value: bigint }
  | { tag: "I64"; value: bigint }
  | { tag: "Timepoint"; value: bigint }
  | { tag: "Duration"; value: bigint }
  | { tag: "U128"; value: bigint }
  | { tag: "I128"; value: bigint }
  | { tag: "Bytes"; value: Buffer }
  | { tag: "String"; value: string }
  | { tag: "Symbol"; value: string }
  | { tag: "Vec"; value: ScVal[] | null }
  | { tag: "Map"; value: ScMapEntry[] | null }
  | { tag: "ContractExecutable"; value: SCContractCode }
  | { tag: "Address"; value: ScAddress }
  | { tag: "LedgerKeyContractExecutable" }
  | { tag: "LedgerKeyNonce"; address: ScAddress };

export type ScValTag = ScVal["tag"];

// ============================================================================
// Ledger Keys
// ============================================================================

export type LedgerKey =
  | { tag: "Account"; accountId: Buffer }
  | { tag: "Trustline"; accountId: Buffer; asset: Asset }
  | { tag: "ContractData"; contractId: Buffer; key: ScVal }
  | { tag: "ContractCode"; hash: Buffer };

/** Ordered sets of ledger keys a transaction may read or write */
export interface LedgerFootprint {
  readOnly: LedgerKey[];
  readWrite: LedgerKey[];
}

// ============================================================================
// Contract Creation
// ============================================================================

/**
 * The three mutually exclusive contract ID derivation schemes.
 */
export type ContractIdPreimage =
  | { tag: "FromSourceAccount"; salt: Buffer }
  | { tag: "FromEd25519PublicKey"; key: Buffer; signature: Buffer; salt: Buffer }
  | { tag: "FromAsset"; asset: Asset };

export interface CreateContractArgs {
  contractId: ContractIdPreimage;
  code: SCContractCode;
}

// ============================================================================
// Host Functions
// ============================================================================

export type HostFunctionArgs =
  | { tag: "InvokeContract"; args: ScVal[] }
  | { tag: "CreateContract"; createContract: CreateContractArgs }
  | { tag: "UploadContractWasm"; code: Buffer };

export interface HostFunction {
  args: HostFunctionArgs;
  auth: ContractAuth[];
}

export interface InvokeHostFunctionOp {
  functions: HostFunction[];
}

// ============================================================================
// Authorization
// ============================================================================

export interface AddressWithNonce {
  address: ScAddress;
  nonce: bigint;
}

/**
 * One authorization-checked call; children are calls made by that
 * invocation context. Strictly a tree.
 */
export interface AuthorizedInvocation {
  contractId: Buffer;
  functionName: string;
  args: ScVal[];
  subInvocations: AuthorizedInvocation[];
}

/**
 * A signed (or source-account) authorization. `signatureArgs` is empty when
 * `addressWithNonce` is null.
 */
export interface ContractAuth {
  addressWithNonce: AddressWithNonce | null;
  rootInvocation: AuthorizedInvocation;
  signatureArgs: ScVal[];
}

// ============================================================================
// Resources
// ============================================================================

export interface SorobanResources {
  footprint: LedgerFootprint;
  instructions: number;
  readBytes: number;
  writeBytes: number;
  extendedMetaDataSizeBytes: number;
}

/** Reserved extension point; only version 0 exists */
export interface ExtensionPoint {
  v: 0;
}

export interface SorobanTransactionData {
  resources: SorobanResources;
  refundableFee: bigint;
  ext: ExtensionPoint;
}

// ============================================================================
// Hash Preimages
// ============================================================================

export type HashIdPreimage =
  | { tag: "ContractIdFromEd25519"; networkId: Buffer; ed25519: Buffer; salt: Buffer }
  | { tag: "ContractIdFromContract"; networkId: Buffer; contractId: Buffer; salt: Buffer }
  | { tag: "ContractIdFromAsset"; networkId: Buffer; asset: Asset }
  | { tag: "ContractIdFromSourceAccount"; networkId: Buffer; sourceAccount: Buffer; salt: Buffer }
  | { tag: "CreateContractArgs"; networkId: Buffer; code: SCContractCode; salt: Buffer }
  | { tag: "ContractAuth"; networkId: Buffer; nonce: bigint; invocation: AuthorizedInvocation };
