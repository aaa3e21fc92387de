/**
 * vaultkeep
 *
 * Local, passphrase-protected account vault: Argon2id key derivation,
 * AES-256-GCM sealed files, atomic saves and explicit lock/unlock sessions.
 *
 * @packageDocumentation
 */

export { VaultSession } from "./session.ts";
export type { LockOptions, SessionExportOptions, SessionOptions } from "./session.ts";

export {
  destroyVault,
  exportVault,
  importVault,
  initializeVault,
  listBackups,
  listVaults,
  openVaultBytes,
  persistVault,
  unlockVault,
} from "./store.ts";
export type {
  ExportOptions,
  InitializeOptions,
  PersistOptions,
  UnlockedVault,
  VaultFileInfo,
} from "./store.ts";

export { DerivedKey } from "./crypto.ts";
export { resolveVaultDirectory, resolveVaultPath } from "./platform.ts";
export { wipeAllSessions } from "./lifecycle.ts";

export {
  AMBIGUOUS_CHARACTERS,
  SIMILAR_CHARACTERS,
  generatePassword,
  simplePasswordOptions,
  strongPasswordOptions,
} from "./generator.ts";
export type { PasswordOptions } from "./generator.ts";
export { describeStrength, scorePassword } from "./strength.ts";
export type { StrengthLabel } from "./strength.ts";

export {
  AccountNotFoundError,
  AlreadyExistsError,
  AuthenticationFailedError,
  CorruptFileError,
  InvalidInputError,
  InvalidOptionsError,
  SecurityError,
  UnsavedChangesError,
  VaultError,
  VaultIoError,
  VaultLockedError,
  VaultNotFoundError,
  WrongPassphraseError,
} from "./errors.ts";
export type { VaultErrorCode } from "./errors.ts";

export { CONSTANTS, DEFAULT_KDF_PARAMS } from "./types.ts";
export type {
  AccountCategory,
  AccountFilter,
  AccountPatch,
  AccountRecord,
  KdfParams,
  NewAccount,
  OpenOptions,
  Passphrase,
  StandardCategory,
  StorageLocation,
  VaultBody,
} from "./types.ts";
