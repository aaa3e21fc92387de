/**
 * Platform utilities: path resolution, filesystem permissions and atomic writes.
 *
 * All OS-specific logic is isolated here so the rest of the codebase remains pure.
 */

import { link, mkdir, open, readFile, readdir, rename, rm, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { basename, dirname, join } from "node:path";
import { randomSuffix } from "./crypto.ts";
import { SecurityError, VaultIoError } from "./errors.ts";
import { CONSTANTS } from "./types.ts";
import type { OpenOptions, StorageLocation } from "./types.ts";

// ---------------------------------------------------------------------------
// Path Resolution
// ---------------------------------------------------------------------------

/**
 * Resolve the vault file path.
 *
 * 1. Explicit path (highest priority)
 * 2. `{ location: "xdg" }`: explicit XDG opt-in
 * 3. Auto-detect: if `XDG_CONFIG_HOME` is set in the environment, use it
 * 4. Home directory default (`~/.vaultkeep/vaults/<name>.vault`)
 */
export function resolveVaultPath(options?: OpenOptions): string {
  if (options?.path) {
    return options.path;
  }

  const name = options?.name ?? CONSTANTS.DEFAULT_VAULT_NAME;
  return join(resolveVaultDirectory(options?.location), `${name}${CONSTANTS.VAULT_EXTENSION}`);
}

/** Directory holding named vaults for the given location preset. */
export function resolveVaultDirectory(location?: StorageLocation): string {
  return join(resolveConfigRoot(location), CONSTANTS.VAULTS_DIR);
}

function resolveConfigRoot(location?: StorageLocation): string {
  if (location === "xdg") {
    return resolveXdgPath();
  }

  // Auto-detect: respect XDG_CONFIG_HOME when set (Unix convention)
  if (location === undefined && process.platform !== "win32" && process.env.XDG_CONFIG_HOME) {
    return join(process.env.XDG_CONFIG_HOME, CONSTANTS.APP_NAME);
  }

  return join(homedir(), CONSTANTS.DIR_NAME);
}

function resolveXdgPath(): string {
  if (process.platform === "win32") {
    const appData = process.env.APPDATA;
    if (!appData) {
      throw new VaultIoError("APPDATA environment variable is not set", "%APPDATA%");
    }
    return join(appData, CONSTANTS.APP_NAME);
  }

  const xdgConfig = process.env.XDG_CONFIG_HOME || join(homedir(), ".config");
  return join(xdgConfig, CONSTANTS.APP_NAME);
}

// ---------------------------------------------------------------------------
// Directory Bootstrap
// ---------------------------------------------------------------------------

/** Expected permission modes by file. */
const EXPECTED_MODES = {
  directory: 0o700,
  vault: 0o600,
} as const;

/**
 * Ensure a directory exists. Newly created directories are owner-only.
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await mkdir(dirPath, { recursive: true, mode: EXPECTED_MODES.directory });
  } catch (error) {
    throw new VaultIoError("Cannot create directory", dirPath, error);
  }
}

// ---------------------------------------------------------------------------
// Permission Verification
// ---------------------------------------------------------------------------

/**
 * Refuse a file that group or other users can access.
 * Throws {@link SecurityError} if any bit outside the owner's is set.
 *
 * On Windows, permission checks are skipped because POSIX modes are not applicable.
 */
export async function assertOwnerOnly(filePath: string, label: string): Promise<void> {
  if (process.platform === "win32") {
    return;
  }

  let actualMode: number;
  try {
    actualMode = (await stat(filePath)).mode & 0o777;
  } catch (error) {
    throw new VaultIoError(`Cannot stat ${label}`, filePath, error);
  }

  if ((actualMode & 0o077) !== 0) {
    throw new SecurityError(
      `Insecure ${label} permissions`,
      formatOctal(EXPECTED_MODES.vault),
      formatOctal(actualMode),
      filePath,
    );
  }
}

function formatOctal(mode: number): string {
  return `0o${mode.toString(8).padStart(3, "0")}`;
}

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

/**
 * Read a whole file. Returns `null` if it does not exist.
 */
export async function readFileIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch (error: unknown) {
    if (isFileNotFoundError(error)) {
      return null;
    }
    throw new VaultIoError("Cannot read file", filePath, error);
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error: unknown) {
    if (isFileNotFoundError(error)) {
      return false;
    }
    throw new VaultIoError("Cannot stat file", filePath, error);
  }
}

/** Names of entries in `dirPath` ending in `extension`; empty if the directory is missing. */
export async function listFiles(dirPath: string, extension: string): Promise<string[]> {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
      .map((entry) => entry.name)
      .sort();
  } catch (error: unknown) {
    if (isFileNotFoundError(error)) {
      return [];
    }
    throw new VaultIoError("Cannot list directory", dirPath, error);
  }
}

// ---------------------------------------------------------------------------
// Atomic Writes
// ---------------------------------------------------------------------------

export interface AtomicWriteOptions {
  /** Fail with `EEXIST` instead of replacing an existing target. */
  readonly exclusive?: boolean;
}

/**
 * Write `data` to `filePath` so that readers see either the old file or the
 * new one, never a mix.
 *
 * ```
 * open(tmp, "wx", 0o600) → write → fsync → close → rename(tmp, target) → fsync(dir)
 * ```
 *
 * The temp file lives in the target's directory so the rename stays on one
 * filesystem. Before the rename nothing touches the target; on failure the
 * temp file is removed and the error is rethrown as {@link VaultIoError}.
 * With `exclusive`, the temp file is hard-linked into place instead, which
 * fails atomically when the target already exists.
 */
export async function writeFileAtomic(
  filePath: string,
  data: Buffer,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const dir = dirname(filePath);
  const tempPath = join(dir, `.${basename(filePath)}.${randomSuffix()}.tmp`);

  try {
    const handle = await open(tempPath, "wx", EXPECTED_MODES.vault);
    try {
      await handle.writeFile(data);
      if (process.platform !== "win32") {
        await handle.chmod(EXPECTED_MODES.vault);
      }
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (options.exclusive) {
      await link(tempPath, filePath);
      await removeQuietly(tempPath);
    } else {
      await rename(tempPath, filePath);
    }
  } catch (error) {
    await removeQuietly(tempPath);
    throw new VaultIoError("Cannot write file", filePath, error);
  }

  if (process.platform !== "win32") {
    await syncDirectory(dir);
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const handle = await open(dir, "r");
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch (error) {
    // Some filesystems refuse fsync on directories; the rename has already landed.
    console.warn(`[vaultkeep] Could not fsync directory "${dir}": ${describeError(error)}`);
  }
}

/**
 * Copy a file with owner-only permissions (used for backups).
 */
export async function copyFileSecure(source: string, target: string): Promise<void> {
  const data = await readFileIfExists(source);
  if (data === null) {
    return;
  }
  await writeFileAtomic(target, data);
}

/** Remove a file; missing files are not an error. */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (error) {
    throw new VaultIoError("Cannot remove file", filePath, error);
  }
}

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (error) {
    console.warn(`[vaultkeep] Could not remove temp file "${filePath}": ${describeError(error)}`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isFileNotFoundError(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

/** Matches `EEXIST`, also when wrapped as the `cause` of a {@link VaultIoError}. */
export function isFileExistsError(error: unknown): boolean {
  const cause = error instanceof VaultIoError ? error.cause : error;
  return errorCode(cause) === "EEXIST";
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Permission modes exported for testing and external validation. */
export const PERMISSION_MODES = EXPECTED_MODES;
