/**
 * Signer capabilities.
 *
 * One implementation per address kind: Stellar accounts sign with Ed25519
 * keypairs, custom account contracts produce an opaque payload. A registry
 * holds keypair signers by address for multi-signature accounts.
 *
 * @packageDocumentation
 */

import { Keypair, StrKey } from "@stellar/stellar-sdk";

import { SignerError, SorobanAuthErrorCode, ValidationError } from "./errors";
import type {
  AccountAuthSigner,
  AccountSignature,
  ContractAuthSigner,
} from "./types";
import { addressToString } from "./utils";
import type { ScAddress, ScVal } from "./xdr/types";

/**
 * Stellar account signer backed by an in-memory keypair.
 *
 * @example
 * ```typescript
 * const signer = new KeypairAuthSigner(Keypair.fromSecret("S..."));
 * ```
 */
export class KeypairAuthSigner implements AccountAuthSigner {
  readonly kind = "account" as const;

  constructor(private readonly keypair: Keypair) {
    if (!keypair.canSign()) {
      throw new ValidationError(
        "Keypair has no secret key and cannot sign",
        SorobanAuthErrorCode.INVALID_INPUT,
        { publicKey: keypair.publicKey() }
      );
    }
  }

  get publicKey(): string {
    return this.keypair.publicKey();
  }

  async sign(payload: Buffer): Promise<AccountSignature> {
    return {
      publicKey: this.keypair.rawPublicKey(),
      signature: this.keypair.sign(payload),
    };
  }
}

/**
 * Custom account signer delegating to a caller-supplied function, e.g. a
 * passkey prompt or a remote signing service.
 */
export class CustomAccountAuthSigner implements ContractAuthSigner {
  readonly kind = "contract" as const;

  constructor(private readonly signFn: (payload: Buffer) => Promise<ScVal[]>) {}

  async sign(payload: Buffer): Promise<ScVal[]> {
    try {
      return await this.signFn(payload);
    } catch (err) {
      throw new SignerError(
        `Custom account signer failed: ${err instanceof Error ? err.message : String(err)}`,
        err instanceof Error ? err : undefined
      );
    }
  }
}

/**
 * Keypair signers indexed by account address.
 *
 * Keypairs are held in memory only and are never persisted.
 *
 * @example
 * ```typescript
 * const registry = new SignerRegistry();
 * const { address } = registry.addFromSecret("S...");
 * registry.signersFor(createAccountAddress(address)); // [KeypairAuthSigner]
 * ```
 */
export class SignerRegistry {
  /** Signers keyed by the G-address they sign for */
  private signers: Map<string, KeypairAuthSigner[]> = new Map();

  /**
   * Add a signer from a raw secret key.
   *
   * @param secretKey - Stellar secret key (S...)
   * @param account - Account it signs for (defaults to its own address)
   * @throws {ValidationError} If the secret key is invalid
   */
  addFromSecret(secretKey: string, account?: string): { address: string } {
    let keypair: Keypair;
    try {
      keypair = Keypair.fromSecret(secretKey);
    } catch {
      throw new ValidationError(
        "Invalid secret key. Must be a valid Stellar secret key (S...)",
        SorobanAuthErrorCode.INVALID_INPUT
      );
    }
    return this.addKeypair(keypair, account);
  }

  /**
   * Add a keypair signer, optionally for an account other than its own
   * (an additional signer of a multi-signature account).
   */
  addKeypair(keypair: Keypair, account?: string): { address: string } {
    const address = account ?? keypair.publicKey();
    if (!StrKey.isValidEd25519PublicKey(address)) {
      throw new ValidationError(
        "Signers can only be registered for G... accounts",
        SorobanAuthErrorCode.INVALID_ADDRESS,
        { address }
      );
    }
    const existing = this.signers.get(address) ?? [];
    if (!existing.some((s) => s.publicKey === keypair.publicKey())) {
      existing.push(new KeypairAuthSigner(keypair));
    }
    this.signers.set(address, existing);
    return { address };
  }

  /**
   * Remove every signer registered for an account.
   */
  remove(address: string): boolean {
    return this.signers.delete(address);
  }

  canSignFor(address: ScAddress): boolean {
    return address.tag === "Account" && this.signers.has(addressToString(address));
  }

  signersFor(address: ScAddress): KeypairAuthSigner[] {
    if (address.tag !== "Account") return [];
    return [...(this.signers.get(addressToString(address)) ?? [])];
  }

  /** Registered account addresses */
  getAll(): string[] {
    return Array.from(this.signers.keys());
  }
}
