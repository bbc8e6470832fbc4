import { Keypair, Networks } from "@stellar/stellar-sdk";
import { beforeEach, describe, expect, it } from "vitest";

import { TransactionAssembler } from "./assembler";
import {
  createAccountAddress,
  createContractAddress,
  invokeContractFunction,
  scvAddress,
  scvI128,
  uploadWasmFunction,
} from "./builders";
import { deriveContractId } from "./contract-id";
import {
  FeeInsufficientError,
  LimitExceededError,
  NonceConflictError,
  NonceMismatchError,
  SignatureInvalidError,
  ValidationError,
} from "./errors";
import { InvocationBuilder } from "./invocation";
import { silentLogger } from "./logging";
import { nonceLedgerKey } from "./nonce-tracker";
import { contractExecutableKey, footprintContains, metadataFeeFormula } from "./resources";
import { KeypairAuthSigner, SignerRegistry } from "./signers";
import type { ResourceLimits } from "./types";
import { InvokeHostFunctionOpXdr, SorobanTransactionDataXdr } from "./xdr/codec";
import { fromXDR } from "./xdr/io";
import type { AuthorizedInvocation, CreateContractArgs, ScAddress } from "./xdr/types";

const networkPassphrase = Networks.TESTNET;
const alice = Keypair.fromRawEd25519Seed(Buffer.alloc(32, 1));
const bob = Keypair.fromRawEd25519Seed(Buffer.alloc(32, 2));
const aliceAddress = createAccountAddress(alice.publicKey());
const bobAddress = createAccountAddress(bob.publicKey());

const swapId = Buffer.alloc(32, 0x10);
const tokenA = Buffer.alloc(32, 0x20);
const tokenB = Buffer.alloc(32, 0x30);
const swapAddress = createContractAddress(swapId);

const limits: ResourceLimits = {
  instructions: 2_000_000,
  readBytes: 20_000,
  writeBytes: 4_000,
  extendedMetaDataSizeBytes: 1_500,
};

const swapArgs = [
  scvAddress(aliceAddress),
  scvAddress(bobAddress),
  scvAddress(createContractAddress(tokenA)),
  scvAddress(createContractAddress(tokenB)),
  scvI128(1_000n),
  scvI128(4_500n),
];

/** One party's tree: swap, then an allowance on the token it gives up */
function swapTree(party: ScAddress, token: Buffer, amount: bigint): AuthorizedInvocation {
  const root = new InvocationBuilder(swapId, "swap", swapArgs);
  root.addSubInvocation(token, "increase_allowance", [
    scvAddress(party),
    scvAddress(swapAddress),
    scvI128(amount),
  ]);
  return root.build();
}

describe("TransactionAssembler", () => {
  let assembler: TransactionAssembler;

  beforeEach(() => {
    assembler = new TransactionAssembler({
      networkPassphrase,
      minimumFeeFor: metadataFeeFormula(100n),
      logger: silentLogger,
    });
  });

  async function authorizeSwap() {
    const authA = await assembler.authorize({
      address: aliceAddress,
      invocation: swapTree(aliceAddress, tokenA, 1_000n),
      signers: new KeypairAuthSigner(alice),
    });
    const authB = await assembler.authorize({
      address: bobAddress,
      invocation: swapTree(bobAddress, tokenB, 4_500n),
      signers: new KeypairAuthSigner(bob),
    });
    return invokeContractFunction(swapId, "swap", swapArgs, [authA, authB]);
  }

  describe("two-party swap", () => {
    it("assembles both authorizations with a covering footprint", async () => {
      const fn = await authorizeSwap();
      const result = await assembler.assemble([fn], { resources: limits, refundableFee: 10_000n });

      const footprint = result.transactionData.resources.footprint;
      expect(footprint.readWrite).toHaveLength(2);
      expect(footprintContains(footprint, nonceLedgerKey(aliceAddress, swapId), "readWrite")).toBe(true);
      expect(footprintContains(footprint, nonceLedgerKey(bobAddress, swapId), "readWrite")).toBe(true);

      expect(footprint.readOnly).toHaveLength(5);
      for (const id of [swapId, tokenA, tokenB]) {
        expect(footprintContains(footprint, contractExecutableKey(id), "readOnly")).toBe(true);
      }
      expect(
        footprintContains(footprint, { tag: "Account", accountId: alice.rawPublicKey() }, "readOnly")
      ).toBe(true);
      expect(result.transactionData.refundableFee).toBe(10_000n);
    });

    it("embeds the current nonce of each party", async () => {
      const fn = await authorizeSwap();
      expect(fn.auth.map((a) => a.addressWithNonce?.nonce)).toEqual([0n, 0n]);
    });

    it("produces XDR that decodes to the same values", async () => {
      const result = await assembler.assemble([await authorizeSwap()], { resources: limits });
      expect(fromXDR(InvokeHostFunctionOpXdr, result.operationXdr, "base64")).toEqual(
        result.operation
      );
      expect(fromXDR(SorobanTransactionDataXdr, result.transactionDataXdr, "base64")).toEqual(
        result.transactionData
      );
    });

    it("consumes each nonce exactly once", async () => {
      const fn = await authorizeSwap();
      const { operation } = await assembler.assemble([fn], { resources: limits });
      await assembler.recordApplied(operation);

      expect(await assembler.nonces.next(aliceAddress, swapId)).toBe(1n);
      expect(await assembler.nonces.next(bobAddress, swapId)).toBe(1n);
      await expect(assembler.assemble([fn], { resources: limits })).rejects.toThrow(NonceMismatchError);
      await expect(assembler.recordApplied(operation)).rejects.toThrow(NonceMismatchError);
    });

    it("records nothing when one entry of the operation is stale", async () => {
      const fn = await authorizeSwap();
      const [authA, authB] = fn.auth;
      const staleB = { ...authB, addressWithNonce: { address: bobAddress, nonce: 7n } };
      const observed: bigint[] = [];
      assembler.events.on("nonceObserved", ({ nonce }) => observed.push(nonce));

      await expect(
        assembler.recordApplied({ functions: [{ ...fn, auth: [authA, staleB] }] })
      ).rejects.toThrow(NonceMismatchError);
      expect(await assembler.nonces.next(aliceAddress, swapId)).toBe(0n);
      expect(await assembler.nonces.next(bobAddress, swapId)).toBe(0n);
      expect(observed).toEqual([]);
    });

    it("issues the next nonce after application", async () => {
      const { operation } = await assembler.assemble([await authorizeSwap()], { resources: limits });
      await assembler.recordApplied(operation);
      const fn = await authorizeSwap();
      expect(fn.auth.map((a) => a.addressWithNonce?.nonce)).toEqual([1n, 1n]);
    });

    it("rejects a tampered allowance amount", async () => {
      const fn = await authorizeSwap();
      const [authA, authB] = fn.auth;
      const tampered = {
        ...fn,
        auth: [
          { ...authA, rootInvocation: swapTree(aliceAddress, tokenA, 999_999n) },
          authB,
        ],
      };
      await expect(assembler.assemble([tampered], { resources: limits })).rejects.toThrow(
        SignatureInvalidError
      );
    });

    it("emits lifecycle events", async () => {
      const seen: string[] = [];
      assembler.events.on("authorizationSigned", ({ nonce }) => seen.push(`signed:${nonce}`));
      assembler.events.on("authorizationVerified", () => seen.push("verified"));
      assembler.events.on("operationAssembled", ({ authorizations, refundableFee }) =>
        seen.push(`assembled:${authorizations}:${refundableFee}`)
      );
      assembler.events.on("nonceObserved", ({ nonce }) => seen.push(`observed:${nonce}`));

      const { operation } = await assembler.assemble([await authorizeSwap()], {
        resources: limits,
        refundableFee: 500n,
      });
      await assembler.recordApplied(operation);

      expect(seen).toEqual([
        "signed:0",
        "signed:0",
        "verified",
        "verified",
        "assembled:2:500",
        "observed:0",
        "observed:0",
      ]);
    });
  });

  describe("assemble", () => {
    it("rejects two entries sharing a nonce", async () => {
      const tree = swapTree(aliceAddress, tokenA, 1_000n);
      const signers = new KeypairAuthSigner(alice);
      const first = await assembler.authorize({ address: aliceAddress, invocation: tree, signers });
      const second = await assembler.authorize({ address: aliceAddress, invocation: tree, signers });
      const fn = invokeContractFunction(swapId, "swap", swapArgs, [first, second]);

      await expect(assembler.assemble([fn], { resources: limits })).rejects.toThrow(
        NonceConflictError
      );
    });

    it("rejects more than 100 host functions", async () => {
      const functions = Array.from({ length: 101 }, () => uploadWasmFunction(Buffer.from([1])));
      await expect(assembler.assemble(functions, { resources: limits })).rejects.toThrow(
        LimitExceededError
      );
    });

    it("defaults the refundable fee to the formula's minimum", async () => {
      const result = await assembler.assemble([await authorizeSwap()], { resources: limits });
      expect(result.transactionData.refundableFee).toBe(147n);
    });

    it("rejects a fee below the minimum", async () => {
      await expect(
        assembler.assemble([await authorizeSwap()], { resources: limits, refundableFee: 1n })
      ).rejects.toThrow(FeeInsufficientError);
    });

    it("completes a simulator suggestion that misses keys", async () => {
      const result = await assembler.assemble([await authorizeSwap()], {
        suggestion: {
          footprint: { readOnly: [contractExecutableKey(swapId)], readWrite: [] },
          resources: { ...limits, instructions: 3_000_000 },
          refundableFee: 800n,
        },
      });
      const { resources, refundableFee } = result.transactionData;
      expect(resources.instructions).toBe(3_000_000);
      expect(resources.footprint.readWrite).toHaveLength(2);
      expect(resources.footprint.readOnly).toHaveLength(5);
      expect(refundableFee).toBe(800n);
    });

    it("requires resources or a suggestion", async () => {
      await expect(assembler.assemble([await authorizeSwap()])).rejects.toThrow(ValidationError);
    });
  });

  describe("authorize", () => {
    it("falls back to the signer registry", async () => {
      const registry = new SignerRegistry();
      registry.addKeypair(alice);
      const withRegistry = new TransactionAssembler({
        networkPassphrase,
        minimumFeeFor: metadataFeeFormula(100n),
        signerRegistry: registry,
        logger: silentLogger,
      });

      const auth = await withRegistry.authorize({
        address: aliceAddress,
        invocation: swapTree(aliceAddress, tokenA, 1_000n),
      });
      const fn = invokeContractFunction(swapId, "swap", swapArgs, [auth]);
      await expect(withRegistry.assemble([fn], { resources: limits })).resolves.toBeDefined();
    });

    it("applies the configured invocation limit", async () => {
      const limited = new TransactionAssembler({
        networkPassphrase,
        minimumFeeFor: metadataFeeFormula(100n),
        limits: { maxInvocations: 1 },
        logger: silentLogger,
      });
      await expect(
        limited.authorize({
          address: aliceAddress,
          invocation: swapTree(aliceAddress, tokenA, 1_000n),
          signers: new KeypairAuthSigner(alice),
        })
      ).rejects.toThrow(LimitExceededError);
    });

    it("authorizes as the source account without a nonce", async () => {
      const auth = await assembler.authorize({
        address: null,
        invocation: swapTree(aliceAddress, tokenA, 1_000n),
      });
      expect(auth.addressWithNonce).toBeNull();
      expect(auth.signatureArgs).toEqual([]);
    });
  });

  describe("configuration", () => {
    it("requires a network passphrase", () => {
      expect(
        () => new TransactionAssembler({ networkPassphrase: "", minimumFeeFor: metadataFeeFormula(1n) })
      ).toThrow(ValidationError);
    });

    it("rejects non-positive limits", () => {
      expect(
        () =>
          new TransactionAssembler({
            networkPassphrase,
            minimumFeeFor: metadataFeeFormula(1n),
            limits: { maxOpsPerTx: 0 },
          })
      ).toThrow(ValidationError);
    });

    it("derives contract IDs for its network", () => {
      const args: CreateContractArgs = {
        contractId: { tag: "FromSourceAccount", salt: Buffer.alloc(32, 6) },
        code: { tag: "WasmRef", hash: Buffer.alloc(32, 7) },
      };
      expect(assembler.deriveContractId(args, alice.publicKey())).toEqual(
        deriveContractId(args, { networkPassphrase, sourceAccount: alice.publicKey() })
      );
    });
  });
});
