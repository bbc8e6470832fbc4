import { Keypair, StrKey } from "@stellar/stellar-sdk";
import { describe, expect, it } from "vitest";

import { scvStruct, scvSymbol, scvU32 } from "./builders";
import { SorobanAuthError, SorobanAuthErrorCode, ValidationError, wrapError } from "./errors";
import {
  addressFromString,
  addressToString,
  contractIdFromAddress,
  contractIdToAddress,
  validateAddress,
} from "./utils";

const account = Keypair.fromRawEd25519Seed(Buffer.alloc(32, 1));
const contractId = Buffer.alloc(32, 0x42);

describe("address helpers", () => {
  it("round-trips account and contract strkeys", () => {
    const contract = StrKey.encodeContract(contractId);
    expect(addressToString(addressFromString(account.publicKey()))).toBe(account.publicKey());
    expect(addressFromString(contract)).toEqual({ tag: "Contract", contractId });
    expect(contractIdToAddress(contractId)).toBe(contract);
    expect(contractIdFromAddress(contract)).toEqual(contractId);
  });

  it("rejects invalid addresses", () => {
    expect(() => validateAddress("GNOTANADDRESS")).toThrow(ValidationError);
    expect(() => contractIdFromAddress(account.publicKey())).toThrow(ValidationError);
  });
});

describe("scvStruct", () => {
  it("orders fields by name", () => {
    expect(scvStruct({ signature: scvU32(2), public_key: scvU32(1) })).toEqual({
      tag: "Map",
      value: [
        { key: scvSymbol("public_key"), val: scvU32(1) },
        { key: scvSymbol("signature"), val: scvU32(2) },
      ],
    });
  });
});

describe("wrapError", () => {
  it("keeps library errors and wraps others", () => {
    const known = new ValidationError("bad input");
    expect(wrapError(known)).toBe(known);

    const wrapped = wrapError(new Error("boom"), SorobanAuthErrorCode.SIGNER_FAILED);
    expect(wrapped).toBeInstanceOf(SorobanAuthError);
    expect(wrapped.code).toBe(SorobanAuthErrorCode.SIGNER_FAILED);
    expect(wrapped.toDetailedString()).toBe("[3003] boom\nCaused by: boom");
  });
});
