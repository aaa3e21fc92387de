/**
 * VaultSession: the public-facing class that gates access to one vault file.
 *
 * Lifecycle:
 *   open() → locked → unlock(passphrase) → unlocked → save() … → lock() → locked
 *
 * While unlocked the session holds the derived key, the decrypted accounts and
 * the exact bytes last read from or written to disk. Locking zero-fills the
 * key and drops the accounts.
 */

import { DerivedKey, wipePassphrase } from "./crypto.ts";
import {
  AccountNotFoundError,
  InvalidInputError,
  UnsavedChangesError,
  VaultLockedError,
  WrongPassphraseError,
} from "./errors.ts";
import { decodeVaultFile } from "./format.ts";
import { registerWiper, unregisterWiper } from "./lifecycle.ts";
import { Mutex } from "./mutex.ts";
import { resolveVaultPath } from "./platform.ts";
import { AccountCollection } from "./records.ts";
import {
  type VaultFileInfo,
  destroyVault,
  exportVault,
  importVault,
  initializeVault,
  openWithKey,
  persistVault,
  unlockVault,
} from "./store.ts";
import { CONSTANTS, DEFAULT_KDF_PARAMS } from "./types.ts";
import type {
  AccountFilter,
  AccountPatch,
  AccountRecord,
  KdfParams,
  NewAccount,
  OpenOptions,
  Passphrase,
  VaultBody,
} from "./types.ts";

export interface SessionOptions extends OpenOptions {
  /** Argon2id parameters for vaults this session creates or exports. */
  readonly kdf?: KdfParams;
  /** Number of previous versions to keep under `backups/` on every save. */
  readonly backups?: number;
  /** Zero-fill the key when the process exits. Defaults to `true`. */
  readonly wipeOnExit?: boolean;
  /** Clock used for record and backup timestamps (epoch ms). */
  readonly now?: () => number;
}

export interface LockOptions {
  /** Drop unsaved changes instead of refusing to lock. */
  readonly discard?: boolean;
}

export interface SessionExportOptions {
  readonly overwrite?: boolean;
}

/** Everything the session holds while unlocked. */
interface UnlockedState {
  readonly key: DerivedKey;
  readonly records: AccountCollection;
  readonly createdAt: number;
  sealed: Buffer;
  dirty: boolean;
}

/**
 * A locked-or-unlocked handle on one vault file.
 *
 * @example
 * ```ts
 * const session = await VaultSession.open({ name: "personal" });
 * await session.unlock(passphrase);
 * await session.add({ name: "GitHub", secret: "example-secret" });
 * await session.save();
 * await session.lock();
 * ```
 */
export class VaultSession {
  private readonly mutex = new Mutex();
  private state: UnlockedState | null = null;

  /** Registered with the exit registry while unlocked. */
  private readonly wipeForExit = (): void => {
    this.clearState();
  };

  // -----------------------------------------------------------------------
  // Private constructor; use `VaultSession.open()` instead
  // -----------------------------------------------------------------------

  private constructor(
    readonly path: string,
    private readonly options: SessionOptions,
  ) {}

  // -----------------------------------------------------------------------
  // Factory
  // -----------------------------------------------------------------------

  /**
   * Resolve the vault path and return a locked session.
   *
   * Resolution priority:
   * 1. Explicit `path` option (highest)
   * 2. `location: "xdg"` → XDG config directory
   * 3. Home directory default → `~/.vaultkeep/vaults/<name>.vault`
   *
   * Nothing is read from disk until {@link unlock}.
   */
  static async open(options: SessionOptions = {}): Promise<VaultSession> {
    if (options.backups !== undefined && (!Number.isInteger(options.backups) || options.backups < 0)) {
      throw new InvalidInputError(`backups must be a non-negative integer, got ${options.backups}`);
    }
    return new VaultSession(resolveVaultPath(options), options);
  }

  // -----------------------------------------------------------------------
  // State
  // -----------------------------------------------------------------------

  get isUnlocked(): boolean {
    return this.state !== null;
  }

  /** Whether in-memory changes have not been saved yet. `false` while locked. */
  get isDirty(): boolean {
    return this.state?.dirty ?? false;
  }

  /** Number of accounts held in memory. */
  get size(): number {
    return this.requireUnlocked().records.size;
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Create the vault file with an empty body. The session stays locked.
   *
   * @throws {AlreadyExistsError} if a file already exists at {@link path}
   */
  async initialize(passphrase: Passphrase): Promise<VaultFileInfo> {
    return this.mutex.runExclusive(() =>
      initializeVault(this.path, passphrase, {
        kdf: this.options.kdf ?? DEFAULT_KDF_PARAMS,
        now: this.options.now,
      }),
    );
  }

  /**
   * Read and decrypt the vault. On any failure the session stays locked and
   * the specific error propagates.
   *
   * @throws {InvalidInputError} if the session is already unlocked
   */
  async unlock(passphrase: Passphrase): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.state) {
        wipePassphrase(passphrase);
        throw new InvalidInputError("Vault is already unlocked");
      }

      const { key, body, sealed } = await unlockVault(this.path, passphrase);
      this.state = {
        key,
        records: new AccountCollection(body.accounts, this.options.now),
        createdAt: body.createdAt,
        sealed,
        dirty: false,
      };

      if (this.options.wipeOnExit !== false) {
        registerWiper(this.wipeForExit);
      }
    });
  }

  /**
   * Zero-fill the key and drop the accounts.
   *
   * A session with unsaved changes refuses to lock unless `discard` is set.
   * Locking a locked session does nothing.
   *
   * @throws {UnsavedChangesError} if dirty and `discard` is not set
   */
  async lock(options: LockOptions = {}): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (!this.state) {
        return;
      }
      if (this.state.dirty && !options.discard) {
        throw new UnsavedChangesError();
      }
      this.clearState();
    });
  }

  /**
   * Re-seal the accounts with a fresh nonce and atomically replace the file.
   * The dirty flag clears only once the new file is in place.
   */
  async save(): Promise<void> {
    return this.mutex.runExclusive(async () => {
      const state = this.requireUnlocked();
      state.sealed = await persistVault(this.path, state.key, this.snapshot(state), {
        backups: this.options.backups ?? 0,
        now: this.options.now,
      });
      state.dirty = false;
    });
  }

  // -----------------------------------------------------------------------
  // Reads
  // -----------------------------------------------------------------------

  /**
   * Accounts in insertion order.
   *
   * @param filter - `name` is a `*` glob; `search` a case-insensitive substring
   */
  async list(filter?: AccountFilter): Promise<AccountRecord[]> {
    return this.mutex.runExclusive(async () => this.requireUnlocked().records.list(filter));
  }

  /** @returns The account, or `null` if `id` is unknown */
  async get(id: string): Promise<AccountRecord | null> {
    return this.mutex.runExclusive(async () => this.requireUnlocked().records.get(id));
  }

  /** @throws {AccountNotFoundError} if `id` is unknown */
  async getOrThrow(id: string): Promise<AccountRecord> {
    const account = await this.get(id);
    if (account === null) {
      throw new AccountNotFoundError(id);
    }
    return account;
  }

  // -----------------------------------------------------------------------
  // Mutations
  // -----------------------------------------------------------------------

  async add(fields: NewAccount): Promise<AccountRecord> {
    return this.mutex.runExclusive(async () => {
      const state = this.requireUnlocked();
      const record = state.records.create(fields);
      state.dirty = true;
      return record;
    });
  }

  /** @throws {AccountNotFoundError} if `id` is unknown */
  async edit(id: string, patch: AccountPatch): Promise<AccountRecord> {
    return this.mutex.runExclusive(async () => {
      const state = this.requireUnlocked();
      const record = state.records.update(id, patch);
      if (record === null) {
        throw new AccountNotFoundError(id);
      }
      state.dirty = true;
      return record;
    });
  }

  /** @returns `true` if an account was removed */
  async remove(id: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const state = this.requireUnlocked();
      const removed = state.records.remove(id);
      if (removed) {
        state.dirty = true;
      }
      return removed;
    });
  }

  // -----------------------------------------------------------------------
  // Passphrase operations
  // -----------------------------------------------------------------------

  /**
   * Check `passphrase` against the bytes last read from or written to disk.
   * Session state is not touched.
   */
  async verify(passphrase: Passphrase): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      try {
        return await this.matchesSealed(this.requireUnlocked(), passphrase);
      } finally {
        wipePassphrase(passphrase);
      }
    });
  }

  /**
   * Re-key the vault under a new passphrase, keeping its salt and KDF
   * parameters. The current accounts, saved or not, are written with the new
   * key and the session ends up clean.
   *
   * @throws {WrongPassphraseError} if `current` does not open the vault
   */
  async changePassphrase(current: Passphrase, next: Passphrase): Promise<void> {
    return this.mutex.runExclusive(async () => {
      try {
        const state = this.requireUnlocked();
        if (!(await this.matchesSealed(state, current))) {
          throw new WrongPassphraseError();
        }

        const key = await DerivedKey.derive(next, state.key.salt, state.key.params);
        let sealed: Buffer;
        try {
          sealed = await persistVault(this.path, key, this.snapshot(state), {
            backups: this.options.backups ?? 0,
            now: this.options.now,
          });
        } catch (error) {
          key.wipe();
          throw error;
        }

        state.key.wipe();
        this.state = { ...state, key, sealed, dirty: false };
      } finally {
        wipePassphrase(current);
        wipePassphrase(next);
      }
    });
  }

  // -----------------------------------------------------------------------
  // Export / Import
  // -----------------------------------------------------------------------

  /**
   * Write the current accounts, saved or not, to a new vault file sealed
   * under `passphrase`.
   *
   * @throws {AlreadyExistsError} if `path` exists and `overwrite` is not set
   */
  async export(path: string, passphrase: Passphrase, options: SessionExportOptions = {}): Promise<void> {
    return this.mutex.runExclusive(async () => {
      let body: VaultBody;
      try {
        body = this.snapshot(this.requireUnlocked());
      } catch (error) {
        wipePassphrase(passphrase);
        throw error;
      }
      await exportVault(path, body, passphrase, {
        overwrite: options.overwrite,
        kdf: this.options.kdf ?? DEFAULT_KDF_PARAMS,
      });
    });
  }

  /**
   * Merge the accounts of another vault file into this session. Accounts whose
   * id is already known are skipped.
   *
   * @returns Number of accounts added
   */
  async import(path: string, passphrase: Passphrase): Promise<number> {
    return this.mutex.runExclusive(async () => {
      let state: UnlockedState;
      try {
        state = this.requireUnlocked();
      } catch (error) {
        wipePassphrase(passphrase);
        throw error;
      }

      const body = await importVault(path, passphrase);
      let added = 0;
      for (const account of body.accounts) {
        if (state.records.adopt(account)) {
          added++;
        }
      }
      if (added > 0) {
        state.dirty = true;
      }
      return added;
    });
  }

  /**
   * Delete the vault file and its backups, then lock without saving.
   * **This operation is irreversible.**
   *
   * @throws {WrongPassphraseError} if `passphrase` does not open the vault; nothing is deleted
   */
  async reset(passphrase: Passphrase): Promise<void> {
    return this.mutex.runExclusive(async () => {
      if (this.state) {
        const matches = await this.matchesSealed(this.state, passphrase);
        wipePassphrase(passphrase);
        if (!matches) {
          throw new WrongPassphraseError();
        }
      } else {
        const { key } = await unlockVault(this.path, passphrase);
        key.wipe();
      }

      await destroyVault(this.path);
      this.clearState();
    });
  }

  // -----------------------------------------------------------------------
  // Private Methods
  // -----------------------------------------------------------------------

  private requireUnlocked(): UnlockedState {
    if (!this.state) {
      throw new VaultLockedError();
    }
    return this.state;
  }

  private snapshot(state: UnlockedState): VaultBody {
    return {
      schema: CONSTANTS.BODY_SCHEMA,
      createdAt: state.createdAt,
      accounts: state.records.toArray(),
    };
  }

  /**
   * Derive a key from `passphrase` with the salt and parameters of the loaded
   * file and try to open it. Only a failed authentication counts as a mismatch.
   */
  private async matchesSealed(state: UnlockedState, passphrase: Passphrase): Promise<boolean> {
    const file = decodeVaultFile(state.sealed, this.path);
    const key = await DerivedKey.derive(passphrase, file.header.salt, file.header.kdf);
    try {
      openWithKey(key, file, this.path);
      return true;
    } catch (error) {
      if (error instanceof WrongPassphraseError) {
        return false;
      }
      throw error;
    } finally {
      key.wipe();
    }
  }

  private clearState(): void {
    if (!this.state) {
      return;
    }
    this.state.key.wipe();
    this.state.records.clear();
    this.state = null;
    unregisterWiper(this.wipeForExit);
  }
}
