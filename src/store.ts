/**
 * Vault persistence. Owns the on-disk vault file.
 *
 * Reads and writes whole vault files, drives key derivation and the cipher,
 * and (de)serializes the vault body. No vault file I/O escapes this module.
 */

import { basename, dirname, extname, join } from "node:path";
import { DerivedKey, generateNonce, generateSalt, open, seal, wipe, wipePassphrase } from "./crypto.ts";
import {
  AlreadyExistsError,
  AuthenticationFailedError,
  CorruptFileError,
  VaultNotFoundError,
  WrongPassphraseError,
} from "./errors.ts";
import { type DecodedVaultFile, decodeVaultFile, encodeHeader } from "./format.ts";
import {
  assertOwnerOnly,
  copyFileSecure,
  ensureDirectory,
  fileExists,
  isFileExistsError,
  listFiles,
  readFileIfExists,
  removeFile,
  writeFileAtomic,
} from "./platform.ts";
import { VaultBodySchema, describeIssue } from "./schema.ts";
import { CONSTANTS, DEFAULT_KDF_PARAMS } from "./types.ts";
import type { KdfParams, Passphrase, VaultBody } from "./types.ts";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Summary of a freshly created vault file. */
export interface VaultFileInfo {
  readonly path: string;
  readonly createdAt: number;
  readonly kdf: KdfParams;
}

/**
 * Result of a successful unlock. The caller owns `key` and must wipe it.
 * `sealed` holds the exact file bytes that were opened.
 */
export interface UnlockedVault {
  readonly key: DerivedKey;
  readonly body: VaultBody;
  readonly sealed: Buffer;
}

export interface InitializeOptions {
  /** Argon2id parameters recorded in the new header. */
  readonly kdf?: KdfParams;
  readonly now?: () => number;
}

export interface PersistOptions {
  /** Keep this many copies of previous versions under `backups/`. `0` disables backups. */
  readonly backups?: number;
  readonly now?: () => number;
}

export interface ExportOptions {
  /** Replace an existing file at the target path. */
  readonly overwrite?: boolean;
  readonly kdf?: KdfParams;
}

// ---------------------------------------------------------------------------
// Body (de)serialization
// ---------------------------------------------------------------------------

export function createEmptyBody(createdAt: number): VaultBody {
  return { schema: CONSTANTS.BODY_SCHEMA, createdAt, accounts: [] };
}

/** UTF-8 JSON encoding of a body. The caller wipes the returned buffer. */
export function serializeBody(body: VaultBody): Buffer {
  return Buffer.from(JSON.stringify(body), "utf-8");
}

/**
 * Parse and validate decrypted body bytes.
 * Anything that authenticates but is not a valid body is {@link CorruptFileError}.
 */
export function parseBody(plaintext: Buffer, path?: string): VaultBody {
  let raw: unknown;
  try {
    raw = JSON.parse(plaintext.toString("utf-8"));
  } catch {
    throw new CorruptFileError("vault body is not valid JSON", path);
  }

  const parsed = VaultBodySchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptFileError(`invalid vault body (${describeIssue(parsed.error)})`, path);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Seal / Open whole files
// ---------------------------------------------------------------------------

/**
 * Produce complete vault file bytes for `body` under `key`.
 * A new random nonce is generated on every call.
 */
export function sealVault(key: DerivedKey, body: VaultBody): Buffer {
  const nonce = generateNonce();
  const headerBytes = encodeHeader({
    version: CONSTANTS.FORMAT_VERSION,
    kdf: key.params,
    salt: key.salt,
    nonce,
  });

  const plaintext = serializeBody(body);
  try {
    return Buffer.concat([headerBytes, seal(key, nonce, plaintext, headerBytes)]);
  } finally {
    wipe(plaintext);
  }
}

/**
 * Decrypt an already decoded vault file with a key.
 * A tag mismatch becomes {@link WrongPassphraseError}.
 */
export function openWithKey(key: DerivedKey, file: DecodedVaultFile, path?: string): VaultBody {
  let plaintext: Buffer;
  try {
    plaintext = open(key, file.header.nonce, file.sealed, file.headerBytes);
  } catch (error) {
    if (error instanceof AuthenticationFailedError) {
      throw new WrongPassphraseError({ cause: error });
    }
    throw error;
  }

  try {
    return parseBody(plaintext, path);
  } finally {
    wipe(plaintext);
  }
}

/**
 * Unlock vault file bytes held in memory.
 *
 * The header is decoded (and refused if malformed) before any key derivation.
 * On failure the derived key is wiped before the error propagates.
 */
export async function openVaultBytes(
  bytes: Buffer,
  passphrase: Passphrase,
  path?: string,
): Promise<UnlockedVault> {
  let file: DecodedVaultFile;
  try {
    file = decodeVaultFile(bytes, path);
  } catch (error) {
    wipePassphrase(passphrase);
    throw error;
  }

  const key = await DerivedKey.derive(passphrase, file.header.salt, file.header.kdf);
  try {
    return { key, body: openWithKey(key, file, path), sealed: bytes };
  } catch (error) {
    key.wipe();
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Vault lifecycle
// ---------------------------------------------------------------------------

/**
 * Create a new vault file holding an empty body.
 *
 * Fails with {@link AlreadyExistsError} if anything exists at `path`. The
 * passphrase buffer and the derived key are wiped before this settles.
 */
export async function initializeVault(
  path: string,
  passphrase: Passphrase,
  options: InitializeOptions = {},
): Promise<VaultFileInfo> {
  const kdf = options.kdf ?? DEFAULT_KDF_PARAMS;
  const now = options.now ?? Date.now;

  try {
    if (await fileExists(path)) {
      throw new AlreadyExistsError(path);
    }
    await ensureDirectory(dirname(path));

    const key = await DerivedKey.derive(passphrase, generateSalt(), kdf);
    try {
      const body = createEmptyBody(now());
      await writeFileAtomic(path, sealVault(key, body), { exclusive: true });
      return { path, createdAt: body.createdAt, kdf };
    } catch (error) {
      if (isFileExistsError(error)) {
        throw new AlreadyExistsError(path);
      }
      throw error;
    } finally {
      key.wipe();
    }
  } finally {
    wipePassphrase(passphrase);
  }
}

/**
 * Read the vault at `path` and decrypt it with `passphrase`.
 *
 * @throws {VaultNotFoundError} no file at `path`
 * @throws {SecurityError} the file is readable by group or others
 * @throws {CorruptFileError} malformed header, unknown version, or invalid body
 * @throws {WrongPassphraseError} the ciphertext does not authenticate
 */
export async function unlockVault(path: string, passphrase: Passphrase): Promise<UnlockedVault> {
  try {
    const bytes = await readFileIfExists(path);
    if (bytes === null) {
      throw new VaultNotFoundError(path);
    }
    await assertOwnerOnly(path, "vault file");

    return await openVaultBytes(bytes, passphrase, path);
  } finally {
    wipePassphrase(passphrase);
  }
}

/**
 * Re-seal `body` under `key` with a fresh nonce and atomically replace the file.
 *
 * Nothing is visible at `path` until the final rename; a failure before it
 * leaves the previous file byte-for-byte intact.
 *
 * @returns The bytes now on disk
 */
export async function persistVault(
  path: string,
  key: DerivedKey,
  body: VaultBody,
  options: PersistOptions = {},
): Promise<Buffer> {
  const bytes = sealVault(key, body);

  if (options.backups && options.backups > 0) {
    await backupVault(path, options.backups, options.now ?? Date.now);
  }

  await writeFileAtomic(path, bytes);
  return bytes;
}

/**
 * Seal `body` into a standalone vault file under a separately supplied
 * passphrase. The export gets its own salt since it is a new vault file.
 */
export async function exportVault(
  path: string,
  body: VaultBody,
  passphrase: Passphrase,
  options: ExportOptions = {},
): Promise<void> {
  try {
    if (!options.overwrite && (await fileExists(path))) {
      throw new AlreadyExistsError(path);
    }
    await ensureDirectory(dirname(path));

    const key = await DerivedKey.derive(passphrase, generateSalt(), options.kdf ?? DEFAULT_KDF_PARAMS);
    try {
      await writeFileAtomic(path, sealVault(key, body), { exclusive: !options.overwrite });
    } catch (error) {
      if (isFileExistsError(error)) {
        throw new AlreadyExistsError(path);
      }
      throw error;
    } finally {
      key.wipe();
    }
  } finally {
    wipePassphrase(passphrase);
  }
}

/**
 * Read a vault file written by {@link exportVault} and return its body.
 * The derived key is wiped before returning.
 */
export async function importVault(path: string, passphrase: Passphrase): Promise<VaultBody> {
  try {
    const bytes = await readFileIfExists(path);
    if (bytes === null) {
      throw new VaultNotFoundError(path);
    }

    const { key, body } = await openVaultBytes(bytes, passphrase, path);
    key.wipe();
    return body;
  } finally {
    wipePassphrase(passphrase);
  }
}

/**
 * Delete the vault file and all of its backups. **Irreversible.**
 */
export async function destroyVault(path: string): Promise<void> {
  for (const backup of await listBackups(path)) {
    await removeFile(backup);
  }
  await removeFile(path);
}

/** Names (without extension) of the vault files in `directory`. */
export async function listVaults(directory: string): Promise<string[]> {
  const files = await listFiles(directory, CONSTANTS.VAULT_EXTENSION);
  return files.map((file) => file.slice(0, -CONSTANTS.VAULT_EXTENSION.length));
}

// ---------------------------------------------------------------------------
// Backups
// ---------------------------------------------------------------------------

function backupDirectory(path: string): string {
  return join(dirname(path), CONSTANTS.BACKUPS_DIR);
}

function vaultStem(path: string): string {
  return basename(path, extname(path));
}

/** Full paths of the backups of `path`, oldest first. */
export async function listBackups(path: string): Promise<string[]> {
  const dir = backupDirectory(path);
  const pattern = backupPattern(vaultStem(path));
  const files = await listFiles(dir, CONSTANTS.VAULT_EXTENSION);
  return files.filter((file) => pattern.test(file)).map((file) => join(dir, file));
}

/** `<stem>.<timestamp>.vault`, where the timestamp is an ISO date with `:` and `.` replaced by `-`. */
function backupPattern(stem: string): RegExp {
  const escaped = stem.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return new RegExp(`^${escaped}\\.\\d{4}-\\d{2}-\\d{2}T\\d{2}-\\d{2}-\\d{2}-\\d{3}Z\\.vault$`);
}

async function backupVault(path: string, keep: number, now: () => number): Promise<void> {
  if (!(await fileExists(path))) {
    return;
  }

  const dir = backupDirectory(path);
  await ensureDirectory(dir);

  const stamp = new Date(now()).toISOString().replace(/[:.]/g, "-");
  const target = join(dir, `${vaultStem(path)}.${stamp}${CONSTANTS.VAULT_EXTENSION}`);
  await copyFileSecure(path, target);

  const backups = await listBackups(path);
  for (const stale of backups.slice(0, Math.max(0, backups.length - keep))) {
    try {
      await removeFile(stale);
    } catch (error) {
      console.warn(
        `[vaultkeep] Could not prune backup "${stale}": ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
