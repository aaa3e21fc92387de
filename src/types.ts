/**
 * Shared type definitions for vaultkeep.
 */

/** Storage location presets. */
export type StorageLocation = "home" | "xdg";

/** Options for resolving where a vault file lives. */
export interface OpenOptions {
  /** Explicit path to the vault file. Highest priority. */
  readonly path?: string;
  /** Preset storage location. `"xdg"` resolves to XDG config dir. */
  readonly location?: StorageLocation;
  /** Vault name, used as the file stem. Defaults to `"default"`. */
  readonly name?: string;
}

/** Master passphrase input. A `Uint8Array` is zero-filled once it has been used. */
export type Passphrase = string | Uint8Array;

/** Argon2id cost parameters. Recorded in every vault header. */
export interface KdfParams {
  /** Memory cost in KiB. */
  readonly memory: number;
  /** Time cost (passes over memory). */
  readonly iterations: number;
  /** Degree of parallelism. */
  readonly parallelism: number;
}

/** Decoded fixed-size vault header. */
export interface VaultHeader {
  readonly version: number;
  readonly kdf: KdfParams;
  readonly salt: Buffer;
  readonly nonce: Buffer;
}

// ---------------------------------------------------------------------------
// Record model
// ---------------------------------------------------------------------------

export type StandardCategory = "Social" | "Banking" | "Work" | "Personal";

export type AccountCategory =
  | { readonly kind: StandardCategory }
  | { readonly kind: "Other"; readonly label: string };

/** One stored secret. */
export interface AccountRecord {
  readonly id: string;
  readonly name: string;
  readonly category: AccountCategory;
  readonly url?: string;
  readonly username?: string;
  readonly secret: string;
  readonly notes?: string;
  readonly tags: readonly string[];
  /** Epoch milliseconds. */
  readonly createdAt: number;
  /** Epoch milliseconds. */
  readonly updatedAt: number;
}

/** Fields accepted when creating an account. */
export interface NewAccount {
  readonly name: string;
  readonly secret: string;
  readonly category?: AccountCategory;
  readonly url?: string;
  readonly username?: string;
  readonly notes?: string;
  readonly tags?: readonly string[];
}

/** Fields accepted when editing an account. `null` clears an optional field. */
export interface AccountPatch {
  readonly name?: string;
  readonly secret?: string;
  readonly category?: AccountCategory;
  readonly url?: string | null;
  readonly username?: string | null;
  readonly notes?: string | null;
  readonly tags?: readonly string[];
}

/** Criteria for {@link AccountCollection.list}. All given criteria must match. */
export interface AccountFilter {
  /** Glob over the display name, `*` wildcard, case-insensitive. */
  readonly name?: string;
  /** Case-insensitive substring of the display name. */
  readonly search?: string;
  readonly category?: AccountCategory["kind"];
  readonly tag?: string;
}

/** Decrypted vault contents. */
export interface VaultBody {
  readonly schema: typeof CONSTANTS.BODY_SCHEMA;
  /** Epoch milliseconds. */
  readonly createdAt: number;
  readonly accounts: readonly AccountRecord[];
}

/** Constants used across vaultkeep. */
export const CONSTANTS = {
  /** Four-byte schema identifier at the start of every vault file. */
  MAGIC: "VKEP",
  /** Vault file format version. */
  FORMAT_VERSION: 1,
  /** Header length in bytes: magic + version + kdf(4+4+1) + salt + nonce. */
  HEADER_LENGTH: 42,
  /** Vault body schema version. */
  BODY_SCHEMA: 1,
  /** AES-256-GCM nonce length in bytes. */
  NONCE_LENGTH: 12,
  /** AES-256-GCM auth tag length in bytes. */
  AUTH_TAG_LENGTH: 16,
  /** Derived key length in bytes (256 bits). */
  KEY_LENGTH: 32,
  /** Salt length in bytes. */
  SALT_LENGTH: 16,
  /** Default directory name under the home directory. */
  DIR_NAME: ".vaultkeep",
  /** Directory name under XDG / APPDATA config roots. */
  APP_NAME: "vaultkeep",
  /** Subdirectory holding vault files. */
  VAULTS_DIR: "vaults",
  /** Subdirectory (next to the vault) holding backups. */
  BACKUPS_DIR: "backups",
  /** Vault file extension. */
  VAULT_EXTENSION: ".vault",
  /** Default vault name. */
  DEFAULT_VAULT_NAME: "default",
} as const;

/**
 * Default Argon2id parameters (OWASP minimum: 19 MiB, 2 passes, 1 lane).
 */
export const DEFAULT_KDF_PARAMS: KdfParams = {
  memory: 19_456,
  iterations: 2,
  parallelism: 1,
};

/** Accepted bounds for KDF parameters, enforced on derive and on header decode. */
export const KDF_LIMITS = {
  MIN_MEMORY: 8,
  MAX_MEMORY: 262_144,
  MIN_ITERATIONS: 1,
  MAX_ITERATIONS: 16,
  MIN_PARALLELISM: 1,
  MAX_PARALLELISM: 16,
} as const;
