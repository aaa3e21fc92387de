/**
 * Vault file codec: the fixed-size header and its framing.
 *
 * ```
 * offset  size  field
 *      0     4  magic "VKEP"
 *      4     1  format version
 *      5     4  argon2id memory (KiB, uint32 BE)
 *      9     4  argon2id iterations (uint32 BE)
 *     13     1  argon2id parallelism (uint8)
 *     14    16  salt
 *     30    12  nonce
 *     42     …  AES-256-GCM ciphertext + 16-byte tag
 * ```
 *
 * The encoded header is also the AEAD associated data, so the cipher
 * authenticates every header byte along with the body.
 */

import { checkKdfParams } from "./crypto.ts";
import { CorruptFileError } from "./errors.ts";
import { CONSTANTS } from "./types.ts";
import type { VaultHeader } from "./types.ts";

const OFFSET = {
  version: 4,
  memory: 5,
  iterations: 9,
  parallelism: 13,
  salt: 14,
  nonce: 30,
} as const;

/** Serialize a header to its fixed 42-byte form. */
export function encodeHeader(header: VaultHeader): Buffer {
  const out = Buffer.alloc(CONSTANTS.HEADER_LENGTH);

  out.write(CONSTANTS.MAGIC, 0, "ascii");
  out.writeUInt8(header.version, OFFSET.version);
  out.writeUInt32BE(header.kdf.memory, OFFSET.memory);
  out.writeUInt32BE(header.kdf.iterations, OFFSET.iterations);
  out.writeUInt8(header.kdf.parallelism, OFFSET.parallelism);
  header.salt.copy(out, OFFSET.salt, 0, CONSTANTS.SALT_LENGTH);
  header.nonce.copy(out, OFFSET.nonce, 0, CONSTANTS.NONCE_LENGTH);

  return out;
}

/** Parsed vault file: header fields plus the raw header bytes and sealed body. */
export interface DecodedVaultFile {
  readonly header: VaultHeader;
  readonly headerBytes: Buffer;
  readonly sealed: Buffer;
}

/**
 * Split a vault file into header and sealed body.
 *
 * Every structural problem is reported as {@link CorruptFileError} before any
 * cryptographic work happens. Unknown versions are refused rather than guessed.
 */
export function decodeVaultFile(bytes: Buffer, path?: string): DecodedVaultFile {
  if (bytes.length < CONSTANTS.HEADER_LENGTH + CONSTANTS.AUTH_TAG_LENGTH) {
    throw new CorruptFileError(`file is truncated (${bytes.length} bytes)`, path);
  }

  if (bytes.toString("ascii", 0, CONSTANTS.MAGIC.length) !== CONSTANTS.MAGIC) {
    throw new CorruptFileError("not a vault file (bad magic)", path);
  }

  const version = bytes.readUInt8(OFFSET.version);
  if (version !== CONSTANTS.FORMAT_VERSION) {
    throw new CorruptFileError(`unsupported format version ${version}`, path);
  }

  const kdf = {
    memory: bytes.readUInt32BE(OFFSET.memory),
    iterations: bytes.readUInt32BE(OFFSET.iterations),
    parallelism: bytes.readUInt8(OFFSET.parallelism),
  };
  const problem = checkKdfParams(kdf);
  if (problem) {
    throw new CorruptFileError(`invalid key derivation parameters: ${problem}`, path);
  }

  const headerBytes = Buffer.from(bytes.subarray(0, CONSTANTS.HEADER_LENGTH));

  return {
    header: {
      version,
      kdf,
      salt: Buffer.from(bytes.subarray(OFFSET.salt, OFFSET.salt + CONSTANTS.SALT_LENGTH)),
      nonce: Buffer.from(bytes.subarray(OFFSET.nonce, OFFSET.nonce + CONSTANTS.NONCE_LENGTH)),
    },
    headerBytes,
    sealed: Buffer.from(bytes.subarray(CONSTANTS.HEADER_LENGTH)),
  };
}
