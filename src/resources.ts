/**
 * Resource accounting: the footprint implied by a set of host functions and
 * authorization trees, and validation of declared resources against it.
 *
 * Pure set and arithmetic logic; the fee formula is supplied by the caller.
 *
 * @packageDocumentation
 */

import { parseInvokeContractArgs } from "./builders";
import { deriveContractId, type ContractIdContext } from "./contract-id";
import {
  FeeInsufficientError,
  FootprintInsufficientError,
  SorobanAuthErrorCode,
  ValidationError,
} from "./errors";
import { walkInvocations } from "./invocation";
import type { Logger } from "./logging";
import { nonceLedgerKey } from "./nonce-tracker";
import type { MinimumFeeFormula, ResourceLimits, ResourceSuggestion } from "./types";
import { sha256 } from "./utils";
import { LedgerKeyXdr } from "./xdr/codec";
import { toXDR } from "./xdr/io";
import type {
  ContractAuth,
  HostFunction,
  LedgerFootprint,
  LedgerKey,
  SorobanResources,
  SorobanTransactionData,
} from "./xdr/types";

const UINT32_MAX = 0xffffffff;
const INT64_MAX = (1n << 63n) - 1n;

// ============================================================================
// Ledger Keys
// ============================================================================

/**
 * The ledger key holding a contract's executable reference.
 */
export function contractExecutableKey(contractId: Buffer): LedgerKey {
  return {
    tag: "ContractData",
    contractId,
    key: { tag: "LedgerKeyContractExecutable" },
  };
}

function keyId(key: LedgerKey): string {
  return toXDR(LedgerKeyXdr, key, "hex");
}

/**
 * Accumulates ledger keys, keeping each key once and preferring read-write
 * access when a key is needed both ways.
 */
class FootprintSet {
  private readOnly = new Map<string, LedgerKey>();
  private readWrite = new Map<string, LedgerKey>();

  addReadOnly(key: LedgerKey): void {
    const id = keyId(key);
    if (!this.readWrite.has(id)) this.readOnly.set(id, key);
  }

  addReadWrite(key: LedgerKey): void {
    const id = keyId(key);
    this.readOnly.delete(id);
    this.readWrite.set(id, key);
  }

  add(footprint: LedgerFootprint): void {
    footprint.readOnly.forEach((key) => this.addReadOnly(key));
    footprint.readWrite.forEach((key) => this.addReadWrite(key));
  }

  /** Keys ordered by their XDR encoding */
  toFootprint(): LedgerFootprint {
    const sorted = (keys: Map<string, LedgerKey>) =>
      [...keys.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, key]) => key);
    return { readOnly: sorted(this.readOnly), readWrite: sorted(this.readWrite) };
  }
}

// ============================================================================
// Footprint Computation
// ============================================================================

/**
 * Compute the minimal footprint implied by host functions and authorization
 * entries.
 *
 * - every invoked contract and every node of every tree: read-only
 *   executable key
 * - every authorizing address: read-write nonce key under the root contract,
 *   plus its account entry (Stellar accounts) or executable key (custom
 *   accounts), read-only
 * - created contracts: read-write executable key of the derived ID, and the
 *   referenced Wasm, read-only
 * - uploaded Wasm: read-write code key
 *
 * @param auths - Authorization entries; defaults to those of `functions`
 * @param context - Needed when a function creates a contract
 */
export function buildFootprint(
  functions: HostFunction[],
  auths: ContractAuth[] = functions.flatMap((fn) => fn.auth),
  context?: ContractIdContext
): LedgerFootprint {
  const set = new FootprintSet();

  for (const fn of functions) {
    const args = fn.args;
    switch (args.tag) {
      case "InvokeContract": {
        const { contractId } = parseInvokeContractArgs(args.args);
        set.addReadOnly(contractExecutableKey(contractId));
        break;
      }
      case "CreateContract": {
        if (!context) {
          throw new ValidationError(
            "Computing the footprint of a contract creation requires a network context",
            SorobanAuthErrorCode.INVALID_INPUT
          );
        }
        const contractId = deriveContractId(args.createContract, context);
        set.addReadWrite(contractExecutableKey(contractId));
        if (args.createContract.code.tag === "WasmRef") {
          set.addReadOnly({ tag: "ContractCode", hash: args.createContract.code.hash });
        }
        break;
      }
      case "UploadContractWasm":
        set.addReadWrite({ tag: "ContractCode", hash: sha256(args.code) });
        break;
    }
  }

  for (const auth of auths) {
    for (const { node } of walkInvocations(auth.rootInvocation)) {
      set.addReadOnly(contractExecutableKey(node.contractId));
    }
    if (!auth.addressWithNonce) continue;

    const { address } = auth.addressWithNonce;
    set.addReadWrite(nonceLedgerKey(address, auth.rootInvocation.contractId));
    if (address.tag === "Account") {
      set.addReadOnly({ tag: "Account", accountId: address.accountId });
    } else {
      set.addReadOnly(contractExecutableKey(address.contractId));
    }
  }

  return set.toFootprint();
}

/**
 * Whether `footprint` grants the requested access to `key`. Read-only access
 * is also granted by the read-write set.
 */
export function footprintContains(
  footprint: LedgerFootprint,
  key: LedgerKey,
  access: "readOnly" | "readWrite"
): boolean {
  const id = keyId(key);
  const inReadWrite = footprint.readWrite.some((k) => keyId(k) === id);
  if (access === "readWrite") return inReadWrite;
  return inReadWrite || footprint.readOnly.some((k) => keyId(k) === id);
}

/**
 * Union of the computed footprint with a simulator's suggestion. Resource
 * numbers come from the suggestion.
 */
export function mergeSuggestion(
  computed: LedgerFootprint,
  suggestion: ResourceSuggestion,
  logger?: Logger
): SorobanResources {
  const set = new FootprintSet();
  set.add(suggestion.footprint);

  const missing = [...computed.readOnly, ...computed.readWrite].filter(
    (key, i) => !footprintContains(suggestion.footprint, key, i < computed.readOnly.length ? "readOnly" : "readWrite")
  ).length;
  if (missing > 0) {
    logger?.warn(`Simulated footprint omitted ${missing} computed keys; adding them`);
  }

  set.add(computed);
  return { footprint: set.toFootprint(), ...suggestion.resources };
}

// ============================================================================
// Transaction Data
// ============================================================================

function checkUint32(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > UINT32_MAX) {
    throw new ValidationError(
      `${field} must be a uint32`,
      SorobanAuthErrorCode.INVALID_INPUT,
      { field, value }
    );
  }
}

/**
 * Package a footprint and resource limits into SorobanTransactionData.
 *
 * @throws {ValidationError} If a limit is not a uint32 or the fee is not a
 * non-negative int64
 */
export function buildTransactionData(
  footprint: LedgerFootprint,
  limits: ResourceLimits,
  refundableFee: bigint
): SorobanTransactionData {
  checkUint32(limits.instructions, "instructions");
  checkUint32(limits.readBytes, "readBytes");
  checkUint32(limits.writeBytes, "writeBytes");
  checkUint32(limits.extendedMetaDataSizeBytes, "extendedMetaDataSizeBytes");
  if (refundableFee < 0n || refundableFee > INT64_MAX) {
    throw new ValidationError(
      "refundableFee must be a non-negative int64",
      SorobanAuthErrorCode.INVALID_INPUT,
      { refundableFee: refundableFee.toString() }
    );
  }

  return {
    resources: {
      footprint: {
        readOnly: [...footprint.readOnly],
        readWrite: [...footprint.readWrite],
      },
      instructions: limits.instructions,
      readBytes: limits.readBytes,
      writeBytes: limits.writeBytes,
      extendedMetaDataSizeBytes: limits.extendedMetaDataSizeBytes,
    },
    refundableFee,
    ext: { v: 0 },
  };
}

/**
 * Check declared transaction data against the computed footprint and the
 * external fee formula. A declared footprint may be a strict superset.
 *
 * @throws {FootprintInsufficientError} If a computed key is not covered
 * @throws {FeeInsufficientError} If the refundable fee is below the minimum
 */
export function validateTransactionData(
  data: SorobanTransactionData,
  computed: LedgerFootprint,
  minimumFeeFor: MinimumFeeFormula
): void {
  const declared = data.resources.footprint;
  const missingReadOnly = computed.readOnly
    .filter((key) => !footprintContains(declared, key, "readOnly"))
    .map(keyId);
  const missingReadWrite = computed.readWrite
    .filter((key) => !footprintContains(declared, key, "readWrite"))
    .map(keyId);

  if (missingReadOnly.length > 0 || missingReadWrite.length > 0) {
    throw new FootprintInsufficientError(missingReadOnly, missingReadWrite);
  }

  const minimum = minimumFeeFor(data.resources.extendedMetaDataSizeBytes);
  if (data.refundableFee < minimum) {
    throw new FeeInsufficientError(minimum, data.refundableFee);
  }
}

/**
 * A per-kilobyte metadata fee formula, rounded up:
 * `ceil(bytes * feePer1KB / 1024)`.
 */
export function metadataFeeFormula(feePer1KB: bigint): MinimumFeeFormula {
  return (bytes) => (BigInt(bytes) * feePer1KB + 1023n) / 1024n;
}
