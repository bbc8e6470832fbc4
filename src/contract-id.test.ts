import { Keypair, Networks, hash } from "@stellar/stellar-sdk";
import { describe, expect, it } from "vitest";

import { createCreditAsset, createNativeAsset } from "./builders";
import { deriveContractId, signCreateContractArgs } from "./contract-id";
import { SchemeMismatchError, SignatureInvalidError, ValidationError } from "./errors";
import type { CreateContractArgs, SCContractCode } from "./xdr/types";

const deployer = Keypair.fromRawEd25519Seed(Buffer.alloc(32, 1));
const wasm: SCContractCode = { tag: "WasmRef", hash: Buffer.alloc(32, 9) };
const salt = Buffer.alloc(32, 3);

function int32(value: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeInt32BE(value);
  return buf;
}

function fromSource(saltBytes: Buffer = salt): CreateContractArgs {
  return { contractId: { tag: "FromSourceAccount", salt: saltBytes }, code: wasm };
}

describe("deriveContractId", () => {
  const context = { networkPassphrase: Networks.TESTNET, sourceAccount: deployer.publicKey() };

  it("hashes the source-account preimage", () => {
    const expected = hash(
      Buffer.concat([
        int32(11),
        hash(Buffer.from(Networks.TESTNET)),
        int32(0),
        deployer.rawPublicKey(),
        salt,
      ])
    );
    expect(deriveContractId(fromSource(), context).toString("hex")).toBe(expected.toString("hex"));
  });

  it("is deterministic", () => {
    expect(deriveContractId(fromSource(), context)).toEqual(deriveContractId(fromSource(), context));
  });

  it("accepts the source account as raw key bytes", () => {
    const raw = { networkPassphrase: Networks.TESTNET, sourceAccount: deployer.rawPublicKey() };
    expect(deriveContractId(fromSource(), raw)).toEqual(deriveContractId(fromSource(), context));
  });

  it("changes with the salt", () => {
    const other = deriveContractId(fromSource(Buffer.alloc(32, 4)), context);
    expect(other.equals(deriveContractId(fromSource(), context))).toBe(false);
  });

  it("changes with the network", () => {
    const pubnet = { ...context, networkPassphrase: Networks.PUBLIC };
    expect(deriveContractId(fromSource(), pubnet).equals(deriveContractId(fromSource(), context))).toBe(
      false
    );
  });

  it("requires a source account for the source-account scheme", () => {
    expect(() => deriveContractId(fromSource(), { networkPassphrase: Networks.TESTNET })).toThrow(
      ValidationError
    );
  });

  it("derives asset contract IDs from the asset alone", () => {
    const asset = createCreditAsset("USD", deployer.publicKey());
    const args: CreateContractArgs = {
      contractId: { tag: "FromAsset", asset },
      code: { tag: "Token" },
    };
    const id = deriveContractId(args, { networkPassphrase: Networks.TESTNET });
    const native = deriveContractId(
      { contractId: { tag: "FromAsset", asset: createNativeAsset() }, code: { tag: "Token" } },
      { networkPassphrase: Networks.TESTNET }
    );
    expect(id).toHaveLength(32);
    expect(id.equals(native)).toBe(false);
  });

  it("rejects the token with a non-asset scheme", () => {
    const args: CreateContractArgs = {
      contractId: { tag: "FromSourceAccount", salt },
      code: { tag: "Token" },
    };
    expect(() => deriveContractId(args, context)).toThrow(SchemeMismatchError);
  });

  it("rejects the asset scheme with uploaded Wasm", () => {
    const args: CreateContractArgs = {
      contractId: { tag: "FromAsset", asset: createNativeAsset() },
      code: wasm,
    };
    expect(() => deriveContractId(args, context)).toThrow(SchemeMismatchError);
  });
});

describe("Ed25519 contract IDs", () => {
  const networkPassphrase = Networks.TESTNET;

  it("hashes the key and salt once the signature verifies", () => {
    const args = signCreateContractArgs(deployer, wasm, salt, networkPassphrase);
    const expected = hash(
      Buffer.concat([int32(8), hash(Buffer.from(networkPassphrase)), deployer.rawPublicKey(), salt])
    );
    expect(deriveContractId(args, { networkPassphrase }).toString("hex")).toBe(
      expected.toString("hex")
    );
  });

  it("rejects a tampered signature", () => {
    const args = signCreateContractArgs(deployer, wasm, salt, networkPassphrase);
    if (args.contractId.tag !== "FromEd25519PublicKey") throw new Error("unexpected scheme");
    const signature = Buffer.from(args.contractId.signature);
    signature[0] ^= 0xff;
    const tampered: CreateContractArgs = {
      ...args,
      contractId: { ...args.contractId, signature },
    };
    expect(() => deriveContractId(tampered, { networkPassphrase })).toThrow(SignatureInvalidError);
  });

  it("binds the signature to the contract code", () => {
    const args = signCreateContractArgs(deployer, wasm, salt, networkPassphrase);
    const swapped: CreateContractArgs = {
      ...args,
      code: { tag: "WasmRef", hash: Buffer.alloc(32, 10) },
    };
    expect(() => deriveContractId(swapped, { networkPassphrase })).toThrow(SignatureInvalidError);
  });

  it("binds the signature to the network", () => {
    const args = signCreateContractArgs(deployer, wasm, salt, networkPassphrase);
    expect(() => deriveContractId(args, { networkPassphrase: Networks.PUBLIC })).toThrow(
      SignatureInvalidError
    );
  });

  it("rejects a signature from another key", () => {
    const other = Keypair.fromRawEd25519Seed(Buffer.alloc(32, 2));
    const args = signCreateContractArgs(other, wasm, salt, networkPassphrase);
    if (args.contractId.tag !== "FromEd25519PublicKey") throw new Error("unexpected scheme");
    const forged: CreateContractArgs = {
      ...args,
      contractId: { ...args.contractId, key: deployer.rawPublicKey() },
    };
    expect(() => deriveContractId(forged, { networkPassphrase })).toThrow(SignatureInvalidError);
  });
});
