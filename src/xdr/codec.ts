/**
 * XDR descriptors for the invocation, authorization and resource
 * structures. Layouts follow the network's transaction XDR: big-endian,
 * 4-byte aligned, length-prefixed variable arrays, 32-bit union tags.
 *
 * Only the arms these structures use are modelled. `SCVal` has no Status
 * (2), U256 (11) or I256 (12) arm, and `LedgerKey` covers Account,
 * Trustline, ContractData and ContractCode. Any other discriminant, on a
 * value a simulator or a custom account hands back included, fails to
 * decode with `MalformedInputError`.
 *
 * @packageDocumentation
 */

import {
  ENVELOPE_TYPE_CONTRACT_AUTH,
  ENVELOPE_TYPE_CONTRACT_ID_FROM_ASSET,
  ENVELOPE_TYPE_CONTRACT_ID_FROM_CONTRACT,
  ENVELOPE_TYPE_CONTRACT_ID_FROM_ED25519,
  ENVELOPE_TYPE_CONTRACT_ID_FROM_SOURCE_ACCOUNT,
  ENVELOPE_TYPE_CREATE_CONTRACT_ARGS,
  HASH_SIZE,
  SCSYMBOL_LIMIT,
  SIGNATURE_MAX_SIZE,
} from "../constants";
import { LimitExceededError, MalformedInputError } from "../errors";
import type { XdrReader, XdrType, XdrWriter } from "./io";
import type {
  AddressWithNonce,
  Asset,
  AuthorizedInvocation,
  ContractAuth,
  ContractIdPreimage,
  CreateContractArgs,
  ExtensionPoint,
  HashIdPreimage,
  HostFunction,
  HostFunctionArgs,
  InvokeHostFunctionOp,
  LedgerFootprint,
  LedgerKey,
  SCContractCode,
  ScAddress,
  ScMapEntry,
  ScVal,
  SorobanResources,
  SorobanTransactionData,
} from "./types";

/** Bound of an XDR array declared as `T<>` */
const UNBOUNDED = 0xffffffff;

const UINT64_MAX = (1n << 64n) - 1n;
const UINT128_MAX = (1n << 128n) - 1n;
const INT128_MIN = -(1n << 127n);
const INT128_MAX = (1n << 127n) - 1n;

const SYMBOL_PATTERN = /^[a-zA-Z0-9_]*$/;
const ASSET_CODE_PATTERN = /^[a-zA-Z0-9]+$/;

function define<T>(
  name: string,
  write: (value: T, writer: XdrWriter) => void,
  read: (reader: XdrReader) => T
): XdrType<T> {
  return { name, write, read };
}

function unknownDiscriminant(type: string, value: number): never {
  throw new MalformedInputError(`Unknown ${type} discriminant ${value}`, { type, value });
}

function assertNever(value: never, type: string): never {
  throw new MalformedInputError(`Unknown ${type} variant`, { value: String(value) });
}

// ============================================================================
// Primitives
// ============================================================================

export const HashXdr = define<Buffer>(
  "Hash",
  (value, w) => w.writeFixedOpaque(value, HASH_SIZE, "Hash"),
  (r) => r.readFixedOpaque(HASH_SIZE)
);

export const SymbolXdr = define<string>(
  "SCSymbol",
  (value, w) => {
    if (!SYMBOL_PATTERN.test(value)) {
      throw new MalformedInputError(`Invalid symbol "${value}"`);
    }
    w.writeString(value, SCSYMBOL_LIMIT, "SCSymbol");
  },
  (r) => {
    const value = r.readString(SCSYMBOL_LIMIT, "SCSymbol");
    if (!SYMBOL_PATTERN.test(value)) {
      throw new MalformedInputError(`Invalid symbol "${value}"`);
    }
    return value;
  }
);

/** AccountID: PublicKey union with the single ed25519 arm */
export const AccountIdXdr = define<Buffer>(
  "AccountID",
  (value, w) => {
    w.writeInt32(0);
    w.writeFixedOpaque(value, HASH_SIZE, "AccountID");
  },
  (r) => {
    const type = r.readInt32();
    if (type !== 0) unknownDiscriminant("PublicKeyType", type);
    return r.readFixedOpaque(HASH_SIZE);
  }
);

// ============================================================================
// Addresses and Assets
// ============================================================================

export const ScAddressXdr = define<ScAddress>(
  "SCAddress",
  (value, w) => {
    switch (value.tag) {
      case "Account":
        w.writeInt32(0);
        AccountIdXdr.write(value.accountId, w);
        return;
      case "Contract":
        w.writeInt32(1);
        HashXdr.write(value.contractId, w);
        return;
      default:
        assertNever(value, "SCAddress");
    }
  },
  (r) => {
    const type = r.readInt32();
    switch (type) {
      case 0:
        return { tag: "Account", accountId: AccountIdXdr.read(r) };
      case 1:
        return { tag: "Contract", contractId: HashXdr.read(r) };
      default:
        return unknownDiscriminant("SCAddressType", type);
    }
  }
);

/** AlphaNum4 codes are 1-4 characters, AlphaNum12 codes 5-12 */
function checkAssetCode(code: string, width: 4 | 12): void {
  if (code.length > width) {
    throw new LimitExceededError(`AssetCode${width}`, width, code.length);
  }
  const minLength = width === 4 ? 1 : 5;
  if (code.length < minLength || !ASSET_CODE_PATTERN.test(code)) {
    throw new MalformedInputError(`Invalid asset code "${code}" for a ${width}-byte code`);
  }
}

function writeAssetCode(code: string, width: 4 | 12, w: XdrWriter): void {
  checkAssetCode(code, width);
  const bytes = Buffer.alloc(width);
  bytes.write(code, "ascii");
  w.writeFixedOpaque(bytes, width, "AssetCode");
}

function readAssetCode(width: 4 | 12, r: XdrReader): string {
  const bytes = r.readFixedOpaque(width);
  const end = bytes.indexOf(0);
  const length = end === -1 ? width : end;
  if (bytes.subarray(length).some((byte) => byte !== 0)) {
    throw new MalformedInputError(`Asset code bytes ${bytes.toString("hex")} continue after padding`);
  }
  const code = bytes.subarray(0, length).toString("ascii");
  checkAssetCode(code, width);
  return code;
}

export const AssetXdr = define<Asset>(
  "Asset",
  (value, w) => {
    switch (value.tag) {
      case "Native":
        w.writeInt32(0);
        return;
      case "CreditAlphanum4":
        w.writeInt32(1);
        writeAssetCode(value.code, 4, w);
        AccountIdXdr.write(value.issuer, w);
        return;
      case "CreditAlphanum12":
        w.writeInt32(2);
        writeAssetCode(value.code, 12, w);
        AccountIdXdr.write(value.issuer, w);
        return;
      default:
        assertNever(value, "Asset");
    }
  },
  (r) => {
    const type = r.readInt32();
    switch (type) {
      case 0:
        return { tag: "Native" };
      case 1: {
        const code = readAssetCode(4, r);
        return { tag: "CreditAlphanum4", code, issuer: AccountIdXdr.read(r) };
      }
      case 2: {
        const code = readAssetCode(12, r);
        return { tag: "CreditAlphanum12", code, issuer: AccountIdXdr.read(r) };
      }
      default:
        return unknownDiscriminant("AssetType", type);
    }
  }
);

export const SCContractCodeXdr = define<SCContractCode>(
  "SCContractCode",
  (value, w) => {
    switch (value.tag) {
      case "WasmRef":
        w.writeInt32(0);
        HashXdr.write(value.hash, w);
        return;
      case "Token":
        w.writeInt32(1);
        return;
      default:
        assertNever(value, "SCContractCode");
    }
  },
  (r) => {
    const type = r.readInt32();
    switch (type) {
      case 0:
        return { tag: "WasmRef", hash: HashXdr.read(r) };
      case 1:
        return { tag: "Token" };
      default:
        return unknownDiscriminant("SCContractCodeType", type);
    }
  }
);

// ============================================================================
// Values
// ============================================================================

/** SCValType discriminants */
const SCV = {
  Bool: 0,
  Void: 1,
  U32: 3,
  I32: 4,
  U64: 5,
  I64: 6,
  Timepoint: 7,
  Duration: 8,
  U128: 9,
  I128: 10,
  Bytes: 13,
  String: 14,
  Symbol: 15,
  Vec: 16,
  Map: 17,
  ContractExecutable: 18,
  Address: 19,
  LedgerKeyContractExecutable: 20,
  LedgerKeyNonce: 21,
} as const;

function writeU128(value: bigint, w: XdrWriter): void {
  if (value < 0n || value > UINT128_MAX) {
    throw new MalformedInputError(`Value ${value} is not a u128`);
  }
  w.writeUint64(value >> 64n);
  w.writeUint64(value & UINT64_MAX);
}

function writeI128(value: bigint, w: XdrWriter): void {
  if (value < INT128_MIN || value > INT128_MAX) {
    throw new MalformedInputError(`Value ${value} is not an i128`);
  }
  w.writeInt64(value >> 64n);
  w.writeUint64(value & UINT64_MAX);
}

export const ScValXdr: XdrType<ScVal> = define<ScVal>(
  "SCVal",
  (value, w) =>
    w.nested("SCVal", () => {
      w.writeInt32(SCV[value.tag]);
      switch (value.tag) {
        case "Bool":
          w.writeBool(value.value);
          return;
        case "Void":
        case "LedgerKeyContractExecutable":
          return;
        case "U32":
          w.writeUint32(value.value);
          return;
        case "I32":
          w.writeInt32(value.value);
          return;
        case "U64":
        case "Timepoint":
        case "Duration":
          w.writeUint64(value.value);
          return;
        case "I64":
          w.writeInt64(value.value);
          return;
        case "U128":
          writeU128(value.value, w);
          return;
        case "I128":
          writeI128(value.value, w);
          return;
        case "Bytes":
          w.writeVarOpaque(value.value, w.limits.scValLimit, "SCBytes");
          return;
        case "String":
          w.writeString(value.value, w.limits.scValLimit, "SCString");
          return;
        case "Symbol":
          SymbolXdr.write(value.value, w);
          return;
        case "Vec":
          w.writeOptional(value.value, ScVecXdr);
          return;
        case "Map":
          w.writeOptional(value.value, ScMapXdr);
          return;
        case "ContractExecutable":
          SCContractCodeXdr.write(value.value, w);
          return;
        case "Address":
          ScAddressXdr.write(value.value, w);
          return;
        case "LedgerKeyNonce":
          ScAddressXdr.write(value.address, w);
          return;
        default:
          assertNever(value, "SCVal");
      }
    }),
  (r) =>
    r.nested("SCVal", (): ScVal => {
      const type = r.readInt32();
      switch (type) {
        case SCV.Bool:
          return { tag: "Bool", value: r.readBool() };
        case SCV.Void:
          return { tag: "Void" };
        case SCV.U32:
          return { tag: "U32", value: r.readUint32() };
        case SCV.I32:
          return { tag: "I32", value: r.readInt32() };
        case SCV.U64:
          return { tag: "U64", value: r.readUint64() };
        case SCV.I64:
          return { tag: "I64", value: r.readInt64() };
        case SCV.Timepoint:
          return { tag: "Timepoint", value: r.readUint64() };
        case SCV.Duration:
          return { tag: "Duration", value: r.readUint64() };
        case SCV.U128: {
          const hi = r.readUint64();
          const lo = r.readUint64();
          return { tag: "U128", value: (hi << 64n) | lo };
        }
        case SCV.I128: {
          const hi = r.readInt64();
          const lo = r.readUint64();
          return { tag: "I128", value: (hi << 64n) | lo };
        }
        case SCV.Bytes:
          return { tag: "Bytes", value: r.readVarOpaque(r.limits.scValLimit, "SCBytes") };
        case SCV.String:
          return { tag: "String", value: r.readString(r.limits.scValLimit, "SCString") };
        case SCV.Symbol:
          return { tag: "Symbol", value: SymbolXdr.read(r) };
        case SCV.Vec:
          return { tag: "Vec", value: r.readOptional(ScVecXdr) };
        case SCV.Map:
          return { tag: "Map", value: r.readOptional(ScMapXdr) };
        case SCV.ContractExecutable:
          return { tag: "ContractExecutable", value: SCContractCodeXdr.read(r) };
        case SCV.Address:
          return { tag: "Address", value: ScAddressXdr.read(r) };
        case SCV.LedgerKeyContractExecutable:
          return { tag: "LedgerKeyContractExecutable" };
        case SCV.LedgerKeyNonce:
          return { tag: "LedgerKeyNonce", address: ScAddressXdr.read(r) };
        default:
          return unknownDiscriminant("SCValType", type);
      }
    })
);

/** SCVec: SCVal<SCVAL_LIMIT> */
export const ScVecXdr: XdrType<ScVal[]> = define<ScVal[]>(
  "SCVec",
  (value, w) => w.writeArray(value, w.limits.scValLimit, "SCVec", ScValXdr),
  (r) => r.readArray(r.limits.scValLimit, "SCVec", ScValXdr)
);

const ScMapEntryXdr = define<ScMapEntry>(
  "SCMapEntry",
  (value, w) => {
    ScValXdr.write(value.key, w);
    ScValXdr.write(value.val, w);
  },
  (r) => ({ key: ScValXdr.read(r), val: ScValXdr.read(r) })
);

/** SCMap: SCMapEntry<SCVAL_LIMIT> */
export const ScMapXdr: XdrType<ScMapEntry[]> = define<ScMapEntry[]>(
  "SCMap",
  (value, w) => w.writeArray(value, w.limits.scValLimit, "SCMap", ScMapEntryXdr),
  (r) => r.readArray(r.limits.scValLimit, "SCMap", ScMapEntryXdr)
);

// ============================================================================
// Ledger Keys
// ============================================================================

export const LedgerKeyXdr = define<LedgerKey>(
  "LedgerKey",
  (value, w) => {
    switch (value.tag) {
      case "Account":
        w.writeInt32(0);
        AccountIdXdr.write(value.accountId, w);
        return;
      case "Trustline":
        w.writeInt32(1);
        AccountIdXdr.write(value.accountId, w);
        AssetXdr.write(value.asset, w);
        return;
      case "ContractData":
        w.writeInt32(6);
        HashXdr.write(value.contractId, w);
        ScValXdr.write(value.key, w);
        return;
      case "ContractCode":
        w.writeInt32(7);
        HashXdr.write(value.hash, w);
        return;
      default:
        assertNever(value, "LedgerKey");
    }
  },
  (r) => {
    const type = r.readInt32();
    switch (type) {
      case 0:
        return { tag: "Account", accountId: AccountIdXdr.read(r) };
      case 1: {
        const accountId = AccountIdXdr.read(r);
        return { tag: "Trustline", accountId, asset: AssetXdr.read(r) };
      }
      case 6: {
        const contractId = HashXdr.read(r);
        return { tag: "ContractData", contractId, key: ScValXdr.read(r) };
      }
      case 7:
        return { tag: "ContractCode", hash: HashXdr.read(r) };
      default:
        return unknownDiscriminant("LedgerEntryType", type);
    }
  }
);

export const LedgerFootprintXdr = define<LedgerFootprint>(
  "LedgerFootprint",
  (value, w) => {
    w.writeArray(value.readOnly, UNBOUNDED, "LedgerFootprint.readOnly", LedgerKeyXdr);
    w.writeArray(value.readWrite, UNBOUNDED, "LedgerFootprint.readWrite", LedgerKeyXdr);
  },
  (r) => {
    const readOnly = r.readArray(UNBOUNDED, "LedgerFootprint.readOnly", LedgerKeyXdr);
    const readWrite = r.readArray(UNBOUNDED, "LedgerFootprint.readWrite", LedgerKeyXdr);
    return { readOnly, readWrite };
  }
);

// ============================================================================
// Contract Creation
// ============================================================================

export const ContractIdPreimageXdr = define<ContractIdPreimage>(
  "ContractID",
  (value, w) => {
    switch (value.tag) {
      case "FromSourceAccount":
        w.writeInt32(0);
        HashXdr.write(value.salt, w);
        return;
      case "FromEd25519PublicKey":
        w.writeInt32(1);
        HashXdr.write(value.key, w);
        w.writeVarOpaque(value.signature, SIGNATURE_MAX_SIZE, "Signature");
        HashXdr.write(value.salt, w);
        return;
      case "FromAsset":
        w.writeInt32(2);
        AssetXdr.write(value.asset, w);
        return;
      default:
        assertNever(value, "ContractID");
    }
  },
  (r) => {
    const type = r.readInt32();
    switch (type) {
      case 0:
        return { tag: "FromSourceAccount", salt: HashXdr.read(r) };
      case 1: {
        const key = HashXdr.read(r);
        const signature = r.readVarOpaque(SIGNATURE_MAX_SIZE, "Signature");
        return { tag: "FromEd25519PublicKey", key, signature, salt: HashXdr.read(r) };
      }
      case 2:
        return { tag: "FromAsset", asset: AssetXdr.read(r) };
      default:
        return unknownDiscriminant("ContractIDType", type);
    }
  }
);

export const CreateContractArgsXdr = define<CreateContractArgs>(
  "CreateContractArgs",
  (value, w) => {
    ContractIdPreimageXdr.write(value.contractId, w);
    SCContractCodeXdr.write(value.code, w);
  },
  (r) => {
    const contractId = ContractIdPreimageXdr.read(r);
    return { contractId, code: SCContractCodeXdr.read(r) };
  }
);

// ============================================================================
// Authorization
// ============================================================================

export const AddressWithNonceXdr = define<AddressWithNonce>(
  "AddressWithNonce",
  (value, w) => {
    ScAddressXdr.write(value.address, w);
    w.writeUint64(value.nonce);
  },
  (r) => {
    const address = ScAddressXdr.read(r);
    return { address, nonce: r.readUint64() };
  }
);

export const AuthorizedInvocationXdr: XdrType<AuthorizedInvocation> = define<AuthorizedInvocation>(
  "AuthorizedInvocation",
  (value, w) =>
    w.nested("AuthorizedInvocation", () => {
      HashXdr.write(value.contractId, w);
      SymbolXdr.write(value.functionName, w);
      ScVecXdr.write(value.args, w);
      w.writeArray(
        value.subInvocations,
        UNBOUNDED,
        "AuthorizedInvocation.subInvocations",
        AuthorizedInvocationXdr
      );
    }),
  (r) =>
    r.nested("AuthorizedInvocation", () => {
      const contractId = HashXdr.read(r);
      const functionName = SymbolXdr.read(r);
      const args = ScVecXdr.read(r);
      const subInvocations = r.readArray(
        UNBOUNDED,
        "AuthorizedInvocation.subInvocations",
        AuthorizedInvocationXdr
      );
      return { contractId, functionName, args, subInvocations };
    })
);

export const ContractAuthXdr = define<ContractAuth>(
  "ContractAuth",
  (value, w) => {
    if (value.addressWithNonce === null && value.signatureArgs.length > 0) {
      throw new MalformedInputError("signatureArgs must be empty without addressWithNonce");
    }
    w.writeOptional(value.addressWithNonce, AddressWithNonceXdr);
    AuthorizedInvocationXdr.write(value.rootInvocation, w);
    ScVecXdr.write(value.signatureArgs, w);
  },
  (r) => {
    const addressWithNonce = r.readOptional(AddressWithNonceXdr);
    const rootInvocation = AuthorizedInvocationXdr.read(r);
    const signatureArgs = ScVecXdr.read(r);
    if (addressWithNonce === null && signatureArgs.length > 0) {
      throw new MalformedInputError("signatureArgs must be empty without addressWithNonce");
    }
    return { addressWithNonce, rootInvocation, signatureArgs };
  }
);

// ============================================================================
// Host Functions
// ============================================================================

export const HostFunctionArgsXdr = define<HostFunctionArgs>(
  "HostFunctionArgs",
  (value, w) => {
    switch (value.tag) {
      case "InvokeContract":
        w.writeInt32(0);
        ScVecXdr.write(value.args, w);
        return;
      case "CreateContract":
        w.writeInt32(1);
        CreateContractArgsXdr.write(value.createContract, w);
        return;
      case "UploadContractWasm":
        w.writeInt32(2);
        w.writeVarOpaque(value.code, w.limits.scValLimit, "UploadContractWasmArgs.code");
        return;
      default:
        assertNever(value, "HostFunctionArgs");
    }
  },
  (r) => {
    const type = r.readInt32();
    switch (type) {
      case 0:
        return { tag: "InvokeContract", args: ScVecXdr.read(r) };
      case 1:
        return { tag: "CreateContract", createContract: CreateContractArgsXdr.read(r) };
      case 2:
        return {
          tag: "UploadContractWasm",
          code: r.readVarOpaque(r.limits.scValLimit, "UploadContractWasmArgs.code"),
        };
      default:
        return unknownDiscriminant("HostFunctionType", type);
    }
  }
);

export const HostFunctionXdr = define<HostFunction>(
  "HostFunction",
  (value, w) => {
    HostFunctionArgsXdr.write(value.args, w);
    w.writeArray(value.auth, UNBOUNDED, "HostFunction.auth", ContractAuthXdr);
  },
  (r) => {
    const args = HostFunctionArgsXdr.read(r);
    return { args, auth: r.readArray(UNBOUNDED, "HostFunction.auth", ContractAuthXdr) };
  }
);

export const InvokeHostFunctionOpXdr = define<InvokeHostFunctionOp>(
  "InvokeHostFunctionOp",
  (value, w) =>
    w.writeArray(value.functions, w.limits.maxOpsPerTx, "InvokeHostFunctionOp.functions", HostFunctionXdr),
  (r) => ({
    functions: r.readArray(r.limits.maxOpsPerTx, "InvokeHostFunctionOp.functions", HostFunctionXdr),
  })
);

// ============================================================================
// Resources
// ============================================================================

export const SorobanResourcesXdr = define<SorobanResources>(
  "SorobanResources",
  (value, w) => {
    LedgerFootprintXdr.write(value.footprint, w);
    w.writeUint32(value.instructions);
    w.writeUint32(value.readBytes);
    w.writeUint32(value.writeBytes);
    w.writeUint32(value.extendedMetaDataSizeBytes);
  },
  (r) => {
    const footprint = LedgerFootprintXdr.read(r);
    const instructions = r.readUint32();
    const readBytes = r.readUint32();
    const writeBytes = r.readUint32();
    const extendedMetaDataSizeBytes = r.readUint32();
    return { footprint, instructions, readBytes, writeBytes, extendedMetaDataSizeBytes };
  }
);

export const ExtensionPointXdr = define<ExtensionPoint>(
  "ExtensionPoint",
  (value, w) => w.writeInt32(value.v),
  (r) => {
    const v = r.readInt32();
    if (v !== 0) unknownDiscriminant("ExtensionPoint", v);
    return { v: 0 };
  }
);

export const SorobanTransactionDataXdr = define<SorobanTransactionData>(
  "SorobanTransactionData",
  (value, w) => {
    SorobanResourcesXdr.write(value.resources, w);
    w.writeInt64(value.refundableFee);
    ExtensionPointXdr.write(value.ext, w);
  },
  (r) => {
    const resources = SorobanResourcesXdr.read(r);
    const refundableFee = r.readInt64();
    return { resources, refundableFee, ext: ExtensionPointXdr.read(r) };
  }
);

// ============================================================================
// Hash Preimages
// ============================================================================

export const HashIdPreimageXdr = define<HashIdPreimage>(
  "HashIDPreimage",
  (value, w) => {
    switch (value.tag) {
      case "ContractIdFromEd25519":
        w.writeInt32(ENVELOPE_TYPE_CONTRACT_ID_FROM_ED25519);
        HashXdr.write(value.networkId, w);
        HashXdr.write(value.ed25519, w);
        HashXdr.write(value.salt, w);
        return;
      case "ContractIdFromContract":
        w.writeInt32(ENVELOPE_TYPE_CONTRACT_ID_FROM_CONTRACT);
        HashXdr.write(value.networkId, w);
        HashXdr.write(value.contractId, w);
        HashXdr.write(value.salt, w);
        return;
      case "ContractIdFromAsset":
        w.writeInt32(ENVELOPE_TYPE_CONTRACT_ID_FROM_ASSET);
        HashXdr.write(value.networkId, w);
        AssetXdr.write(value.asset, w);
        return;
      case "ContractIdFromSourceAccount":
        w.writeInt32(ENVELOPE_TYPE_CONTRACT_ID_FROM_SOURCE_ACCOUNT);
        HashXdr.write(value.networkId, w);
        AccountIdXdr.write(value.sourceAccount, w);
        HashXdr.write(value.salt, w);
        return;
      case "CreateContractArgs":
        w.writeInt32(ENVELOPE_TYPE_CREATE_CONTRACT_ARGS);
        HashXdr.write(value.networkId, w);
        SCContractCodeXdr.write(value.code, w);
        HashXdr.write(value.salt, w);
        return;
      case "ContractAuth":
        w.writeInt32(ENVELOPE_TYPE_CONTRACT_AUTH);
        HashXdr.write(value.networkId, w);
        w.writeUint64(value.nonce);
        AuthorizedInvocationXdr.write(value.invocation, w);
        return;
      default:
        assertNever(value, "HashIDPreimage");
    }
  },
  (r) => {
    const type = r.readInt32();
    switch (type) {
      case ENVELOPE_TYPE_CONTRACT_ID_FROM_ED25519: {
        const networkId = HashXdr.read(r);
        const ed25519 = HashXdr.read(r);
        return { tag: "ContractIdFromEd25519", networkId, ed25519, salt: HashXdr.read(r) };
      }
      case ENVELOPE_TYPE_CONTRACT_ID_FROM_CONTRACT: {
        const networkId = HashXdr.read(r);
        const contractId = HashXdr.read(r);
        return { tag: "ContractIdFromContract", networkId, contractId, salt: HashXdr.read(r) };
      }
      case ENVELOPE_TYPE_CONTRACT_ID_FROM_ASSET: {
        const networkId = HashXdr.read(r);
        return { tag: "ContractIdFromAsset", networkId, asset: AssetXdr.read(r) };
      }
      case ENVELOPE_TYPE_CONTRACT_ID_FROM_SOURCE_ACCOUNT: {
        const networkId = HashXdr.read(r);
        const sourceAccount = AccountIdXdr.read(r);
        return { tag: "ContractIdFromSourceAccount", networkId, sourceAccount, salt: HashXdr.read(r) };
      }
      case ENVELOPE_TYPE_CREATE_CONTRACT_ARGS: {
        const networkId = HashXdr.read(r);
        const code = SCContractCodeXdr.read(r);
        return { tag: "CreateContractArgs", networkId, code, salt: HashXdr.read(r) };
      }
      case ENVELOPE_TYPE_CONTRACT_AUTH: {
        const networkId = HashXdr.read(r);
        const nonce = r.readUint64();
        return { tag: "ContractAuth", networkId, nonce, invocation: AuthorizedInvocationXdr.read(r) };
      }
      default:
        return unknownDiscriminant("EnvelopeType", type);
    }
  }
);
