/**
 * Cryptographic primitives: Argon2id key derivation, AES-256-GCM seal/open,
 * secure randomness and buffer wiping.
 *
 * All crypto operations are centralized here. Nothing outside this module
 * should touch `node:crypto` or `@noble/hashes` directly.
 */

import { createCipheriv, createDecipheriv, randomBytes, randomInt, randomUUID } from "node:crypto";
import { argon2idAsync } from "@noble/hashes/argon2.js";
import { AuthenticationFailedError, InvalidInputError, VaultLockedError } from "./errors.ts";
import { CONSTANTS, DEFAULT_KDF_PARAMS, KDF_LIMITS } from "./types.ts";
import type { KdfParams, Passphrase } from "./types.ts";

// ---------------------------------------------------------------------------
// Derived Key Handle
// ---------------------------------------------------------------------------

/**
 * A 256-bit vault key together with the salt and KDF parameters it was
 * derived from. The owner must call {@link DerivedKey.wipe} when done; a wiped
 * key throws on any further use.
 */
export class DerivedKey {
  private readonly bytes: Buffer;
  private wiped = false;

  private constructor(
    bytes: Buffer,
    readonly salt: Buffer,
    readonly params: KdfParams,
  ) {
    this.bytes = bytes;
  }

  /**
   * Derive a key from a passphrase with Argon2id.
   *
   * ```
   * key = argon2id(passphrase, salt, { m, t, p, dkLen: 32 })
   * ```
   *
   * The passphrase bytes are zero-filled before this resolves or rejects.
   */
  static async derive(
    passphrase: Passphrase,
    salt: Buffer,
    params: KdfParams = DEFAULT_KDF_PARAMS,
  ): Promise<DerivedKey> {
    const secret = encodePassphrase(passphrase);

    try {
      if (secret.length === 0) {
        throw new InvalidInputError("Passphrase must not be empty");
      }
      if (salt.length < CONSTANTS.SALT_LENGTH) {
        throw new InvalidInputError(
          `Salt must be at least ${CONSTANTS.SALT_LENGTH} bytes, got ${salt.length}`,
        );
      }
      assertKdfParams(params);

      const output = await argon2idAsync(secret, salt, {
        m: params.memory,
        t: params.iterations,
        p: params.parallelism,
        dkLen: CONSTANTS.KEY_LENGTH,
      });

      return new DerivedKey(
        Buffer.from(output.buffer, output.byteOffset, output.byteLength),
        Buffer.from(salt),
        { ...params },
      );
    } finally {
      wipe(secret);
    }
  }

  /** Raw key material. Throws once the key has been wiped. */
  get material(): Buffer {
    if (this.wiped) {
      throw new VaultLockedError();
    }
    return this.bytes;
  }

  get isWiped(): boolean {
    return this.wiped;
  }

  /** Overwrite the key bytes with zeros. Safe to call more than once. */
  wipe(): void {
    wipe(this.bytes);
    this.wiped = true;
  }
}

/**
 * Check KDF parameters against {@link KDF_LIMITS}.
 * Returns a reason string when out of range, `null` when acceptable.
 */
export function checkKdfParams(params: KdfParams): string | null {
  const { memory, iterations, parallelism } = params;

  if (!inRange(parallelism, KDF_LIMITS.MIN_PARALLELISM, KDF_LIMITS.MAX_PARALLELISM)) {
    return `parallelism ${parallelism} out of range`;
  }
  if (!inRange(iterations, KDF_LIMITS.MIN_ITERATIONS, KDF_LIMITS.MAX_ITERATIONS)) {
    return `iterations ${iterations} out of range`;
  }
  if (!inRange(memory, KDF_LIMITS.MIN_MEMORY * parallelism, KDF_LIMITS.MAX_MEMORY)) {
    return `memory ${memory} KiB out of range`;
  }
  return null;
}

function inRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

function assertKdfParams(params: KdfParams): void {
  const problem = checkKdfParams(params);
  if (problem) {
    throw new InvalidInputError(`Invalid KDF parameters: ${problem}`);
  }
}

/**
 * Copy a passphrase into a buffer this module owns.
 * A caller-supplied `Uint8Array` is zero-filled after copying.
 */
function encodePassphrase(passphrase: Passphrase): Buffer {
  if (typeof passphrase === "string") {
    return Buffer.from(passphrase, "utf-8");
  }

  const copy = Buffer.from(passphrase);
  wipe(passphrase);
  return copy;
}

// ---------------------------------------------------------------------------
// AES-256-GCM Seal / Open
// ---------------------------------------------------------------------------

/**
 * Encrypt and authenticate `plaintext` under `key` and `nonce`.
 *
 * Returns ciphertext with the 16-byte auth tag appended. The nonce must be
 * fresh for every call under the same key; use {@link generateNonce}.
 */
export function seal(key: DerivedKey, nonce: Buffer, plaintext: Buffer, aad?: Buffer): Buffer {
  if (nonce.length !== CONSTANTS.NONCE_LENGTH) {
    throw new InvalidInputError(`Nonce must be ${CONSTANTS.NONCE_LENGTH} bytes`);
  }

  const cipher = createCipheriv("aes-256-gcm", key.material, nonce, {
    authTagLength: CONSTANTS.AUTH_TAG_LENGTH,
  });
  if (aad) {
    cipher.setAAD(aad);
  }

  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return Buffer.concat([encrypted, cipher.getAuthTag()]);
}

/**
 * Verify and decrypt a sealed buffer (ciphertext with the auth tag appended).
 *
 * Throws {@link AuthenticationFailedError} on any failure; the error does not
 * say which part of the input was rejected.
 */
export function open(key: DerivedKey, nonce: Buffer, sealed: Buffer, aad?: Buffer): Buffer {
  if (sealed.length < CONSTANTS.AUTH_TAG_LENGTH || nonce.length !== CONSTANTS.NONCE_LENGTH) {
    throw new AuthenticationFailedError();
  }

  const authTag = sealed.subarray(sealed.length - CONSTANTS.AUTH_TAG_LENGTH);
  const encrypted = sealed.subarray(0, sealed.length - CONSTANTS.AUTH_TAG_LENGTH);

  const decipher = createDecipheriv("aes-256-gcm", key.material, nonce, {
    authTagLength: CONSTANTS.AUTH_TAG_LENGTH,
  });
  decipher.setAuthTag(authTag);
  if (aad) {
    decipher.setAAD(aad);
  }

  const head = decipher.update(encrypted);
  try {
    return Buffer.concat([head, decipher.final()]);
  } catch {
    throw new AuthenticationFailedError();
  } finally {
    wipe(head);
  }
}

// ---------------------------------------------------------------------------
// Randomness
// ---------------------------------------------------------------------------

/** Generate a fresh per-vault salt. */
export function generateSalt(): Buffer {
  return randomBytes(CONSTANTS.SALT_LENGTH);
}

/** Generate a fresh 96-bit nonce. Called on every seal. */
export function generateNonce(): Buffer {
  return randomBytes(CONSTANTS.NONCE_LENGTH);
}

/** Generate a random account identifier (UUID v4). */
export function generateId(): string {
  return randomUUID();
}

/** Uniform random integer in `[0, max)` from the CSPRNG. */
export function randomIndex(max: number): number {
  return randomInt(0, max);
}

/** Random hex suffix for temporary file names. */
export function randomSuffix(): string {
  return randomBytes(6).toString("hex");
}

// ---------------------------------------------------------------------------
// Wiping
// ---------------------------------------------------------------------------

/** Overwrite a buffer with zeros. */
export function wipe(buffer: Uint8Array): void {
  buffer.fill(0);
}

/** Zero-fill a caller-supplied passphrase buffer. Strings cannot be wiped and are left alone. */
export function wipePassphrase(passphrase: Passphrase): void {
  if (typeof passphrase !== "string") {
    wipe(passphrase);
  }
}
