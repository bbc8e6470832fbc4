import { Keypair, Networks } from "@stellar/stellar-sdk";
import { describe, expect, it, vi } from "vitest";

import {
  AuthVerifier,
  buildContractAuth,
  contractAuthPayload,
  decodeAccountSignatures,
  encodeAccountSignatures,
} from "./auth";
import { createAccountAddress, createContractAddress, scvBytes, scvI128, scvVec } from "./builders";
import {
  MalformedInputError,
  NonceMismatchError,
  SignatureInvalidError,
  SignerError,
  UnsupportedAddressKindError,
  ValidationError,
} from "./errors";
import { InvocationBuilder } from "./invocation";
import { NonceTracker } from "./nonce-tracker";
import { CustomAccountAuthSigner, KeypairAuthSigner } from "./signers";
import { MemoryNonceStore } from "./storage";
import type { AccountAuthSigner, CustomAccountVerifier } from "./types";
import type { ContractAuth } from "./xdr/types";

const networkPassphrase = Networks.TESTNET;
const alice = Keypair.fromRawEd25519Seed(Buffer.alloc(32, 1));
const cosigner = Keypair.fromRawEd25519Seed(Buffer.alloc(32, 2));
const aliceAddress = createAccountAddress(alice.publicKey());
const walletId = Buffer.alloc(32, 0x77);
const walletAddress = createContractAddress(walletId);

const tree = (() => {
  const root = new InvocationBuilder(Buffer.alloc(32, 0x10), "swap", [scvI128(100n)]);
  root.addSubInvocation(Buffer.alloc(32, 0x20), "increase_allowance", [scvI128(100n)]);
  return root.build();
})();

describe("contractAuthPayload", () => {
  it("depends on nonce, tree and network", () => {
    const base = contractAuthPayload({ address: aliceAddress, nonce: 0n }, tree, networkPassphrase);
    expect(base).toHaveLength(32);
    expect(
      contractAuthPayload({ address: aliceAddress, nonce: 1n }, tree, networkPassphrase).equals(base)
    ).toBe(false);
    expect(
      contractAuthPayload({ address: aliceAddress, nonce: 0n }, tree, Networks.PUBLIC).equals(base)
    ).toBe(false);
  });
});

describe("account signatures", () => {
  it("encodes signatures sorted by public key", () => {
    const signatures = [
      { publicKey: Buffer.alloc(32, 9), signature: Buffer.alloc(64, 1) },
      { publicKey: Buffer.alloc(32, 3), signature: Buffer.alloc(64, 2) },
    ];
    const decoded = decodeAccountSignatures(encodeAccountSignatures(signatures));
    expect(decoded.map((s) => s.publicKey[0])).toEqual([3, 9]);
    expect(decoded[0].signature).toEqual(Buffer.alloc(64, 2));
  });

  it("rejects arguments of the wrong shape", () => {
    expect(() => decodeAccountSignatures([])).toThrow(SignatureInvalidError);
    expect(() => decodeAccountSignatures([scvVec([scvBytes(Buffer.alloc(32))])])).toThrow(
      SignatureInvalidError
    );
  });
});

describe("buildContractAuth", () => {
  it("signs for an account and verifies", async () => {
    const auth = await buildContractAuth(
      { address: aliceAddress, nonce: 0n },
      tree,
      new KeypairAuthSigner(alice),
      { networkPassphrase }
    );
    const [signature] = decodeAccountSignatures(auth.signatureArgs);
    expect(signature.publicKey).toEqual(alice.rawPublicKey());

    await expect(new AuthVerifier({ networkPassphrase }).verify(auth)).resolves.toBeUndefined();
  });

  it("calls no signer for the source account", async () => {
    const sign = vi.fn(async () => ({ publicKey: Buffer.alloc(32), signature: Buffer.alloc(64) }));
    const signer: AccountAuthSigner = { kind: "account", sign };
    const auth = await buildContractAuth(null, tree, signer, { networkPassphrase });

    expect(sign).not.toHaveBeenCalled();
    expect(auth.signatureArgs).toEqual([]);
    await expect(new AuthVerifier({ networkPassphrase }).verify(auth)).resolves.toBeUndefined();
  });

  it("requires a signer for an account address", async () => {
    await expect(
      buildContractAuth({ address: aliceAddress, nonce: 0n }, tree, [], { networkPassphrase })
    ).rejects.toThrow(ValidationError);
  });

  it("rejects a signer of the wrong kind", async () => {
    const custom = new CustomAccountAuthSigner(async () => []);
    await expect(
      buildContractAuth({ address: aliceAddress, nonce: 0n }, tree, custom, { networkPassphrase })
    ).rejects.toThrow(UnsupportedAddressKindError);
    await expect(
      buildContractAuth({ address: walletAddress, nonce: 0n }, tree, new KeypairAuthSigner(alice), {
        networkPassphrase,
      })
    ).rejects.toThrow(UnsupportedAddressKindError);
  });

  it("wraps signer failures", async () => {
    const signer: AccountAuthSigner = {
      kind: "account",
      sign: async () => {
        throw new Error("device unplugged");
      },
    };
    await expect(
      buildContractAuth({ address: aliceAddress, nonce: 0n }, tree, signer, { networkPassphrase })
    ).rejects.toThrow(SignerError);
  });

  it("refuses keypairs without a secret", () => {
    expect(() => new KeypairAuthSigner(Keypair.fromPublicKey(alice.publicKey()))).toThrow(
      ValidationError
    );
  });
});

describe("AuthVerifier", () => {
  async function signedByAlice(nonce = 0n): Promise<ContractAuth> {
    return buildContractAuth({ address: aliceAddress, nonce }, tree, new KeypairAuthSigner(alice), {
      networkPassphrase,
    });
  }

  it("rejects an altered invocation argument", async () => {
    const auth = await signedByAlice();
    const altered: ContractAuth = {
      ...auth,
      rootInvocation: { ...auth.rootInvocation, args: [scvI128(101n)] },
    };
    await expect(new AuthVerifier({ networkPassphrase }).verify(altered)).rejects.toThrow(
      SignatureInvalidError
    );
  });

  it("rejects an altered nonce", async () => {
    const auth = await signedByAlice();
    const altered: ContractAuth = {
      ...auth,
      addressWithNonce: { address: aliceAddress, nonce: 1n },
    };
    await expect(new AuthVerifier({ networkPassphrase }).verify(altered)).rejects.toThrow(
      SignatureInvalidError
    );
  });

  it("rejects a signature made for another network", async () => {
    const auth = await signedByAlice();
    await expect(
      new AuthVerifier({ networkPassphrase: Networks.PUBLIC }).verify(auth)
    ).rejects.toThrow(SignatureInvalidError);
  });

  it("checks the nonce when a tracker is supplied", async () => {
    const verifier = new AuthVerifier({
      networkPassphrase,
      nonceTracker: new NonceTracker(new MemoryNonceStore()),
    });
    await expect(verifier.verify(await signedByAlice(0n))).resolves.toBeUndefined();
    await expect(verifier.verify(await signedByAlice(1n))).rejects.toThrow(NonceMismatchError);
  });

  it("rejects signature arguments without an address", async () => {
    const auth: ContractAuth = {
      addressWithNonce: null,
      rootInvocation: tree,
      signatureArgs: [scvVec([])],
    };
    await expect(new AuthVerifier({ networkPassphrase }).verify(auth)).rejects.toThrow(
      MalformedInputError
    );
  });

  it("accepts additional signers allowed by the resolver", async () => {
    const auth = await buildContractAuth(
      { address: aliceAddress, nonce: 0n },
      tree,
      [new KeypairAuthSigner(cosigner), new KeypairAuthSigner(alice)],
      { networkPassphrase }
    );
    const resolver = async () => [alice.rawPublicKey(), cosigner.rawPublicKey()];

    await expect(
      new AuthVerifier({ networkPassphrase, accountSigners: resolver }).verify(auth)
    ).resolves.toBeUndefined();
    await expect(new AuthVerifier({ networkPassphrase }).verify(auth)).rejects.toThrow(
      SignatureInvalidError
    );
  });

  it("rejects unsorted signatures", async () => {
    const payload = contractAuthPayload({ address: aliceAddress, nonce: 0n }, tree, networkPassphrase);
    const signatures = [alice, cosigner].map((kp) => ({
      publicKey: kp.rawPublicKey(),
      signature: kp.sign(payload),
    }));
    const [sorted] = encodeAccountSignatures(signatures);
    if (sorted.tag !== "Vec" || !sorted.value) throw new Error("unexpected encoding");
    const auth: ContractAuth = {
      addressWithNonce: { address: aliceAddress, nonce: 0n },
      rootInvocation: tree,
      signatureArgs: [scvVec([...sorted.value].reverse())],
    };
    const resolver = async () => [alice.rawPublicKey(), cosigner.rawPublicKey()];

    await expect(
      new AuthVerifier({ networkPassphrase, accountSigners: resolver }).verify(auth)
    ).rejects.toThrow(SignatureInvalidError);
  });

  describe("custom accounts", () => {
    const echoSigner = new CustomAccountAuthSigner(async (payload) => [scvBytes(payload)]);
    const echoVerifier: CustomAccountVerifier = {
      verify: async (payload, signatureArgs) => {
        const [arg] = signatureArgs;
        return arg !== undefined && arg.tag === "Bytes" && arg.value.equals(payload);
      },
    };

    it("verifies through the resolved verifier", async () => {
      const auth = await buildContractAuth({ address: walletAddress, nonce: 0n }, tree, echoSigner, {
        networkPassphrase,
      });
      const verifier = new AuthVerifier({
        networkPassphrase,
        customAccountVerifiers: (id) => (id.equals(walletId) ? echoVerifier : undefined),
      });
      await expect(verifier.verify(auth)).resolves.toBeUndefined();
    });

    it("rejects a payload the verifier refuses", async () => {
      const auth = await buildContractAuth({ address: walletAddress, nonce: 0n }, tree, echoSigner, {
        networkPassphrase,
      });
      const altered: ContractAuth = { ...auth, signatureArgs: [scvBytes(Buffer.alloc(32))] };
      const verifier = new AuthVerifier({
        networkPassphrase,
        customAccountVerifiers: () => echoVerifier,
      });
      await expect(verifier.verify(altered)).rejects.toThrow(SignatureInvalidError);
    });

    it("fails without a verifier for the contract", async () => {
      const auth = await buildContractAuth({ address: walletAddress, nonce: 0n }, tree, echoSigner, {
        networkPassphrase,
      });
      await expect(new AuthVerifier({ networkPassphrase }).verify(auth)).rejects.toThrow(
        UnsupportedAddressKindError
      );
    });

    it("wraps a failing custom signer", async () => {
      const failing = new CustomAccountAuthSigner(async () => {
        throw new Error("prompt dismissed");
      });
      await expect(
        buildContractAuth({ address: walletAddress, nonce: 0n }, tree, failing, { networkPassphrase })
      ).rejects.toThrow(SignerError);
    });
  });
});
