/**
 * Base error class for all vaultkeep errors.
 * Provides a consistent error interface with error codes.
 */
export abstract class VaultError extends Error {
  abstract readonly code: VaultErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export type VaultErrorCode =
  | "WRONG_PASSPHRASE"
  | "CORRUPT_FILE"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_OPTIONS"
  | "IO_ERROR"
  | "AUTHENTICATION_FAILED"
  | "INVALID_INPUT"
  | "ACCOUNT_NOT_FOUND"
  | "VAULT_LOCKED"
  | "UNSAVED_CHANGES"
  | "SECURITY_ERROR";

/**
 * Thrown when the vault ciphertext does not authenticate under the derived key.
 * Either the passphrase is wrong or the ciphertext was altered; the two cannot
 * be told apart without a decryption oracle.
 */
export class WrongPassphraseError extends VaultError {
  readonly code = "WRONG_PASSPHRASE";

  constructor(options?: ErrorOptions) {
    super("Incorrect passphrase, or the vault contents have been altered", options);
  }
}

/**
 * Thrown when the vault file is structurally invalid: truncated, bad magic,
 * unknown version, impossible KDF parameters, or a body that fails validation.
 */
export class CorruptFileError extends VaultError {
  readonly code = "CORRUPT_FILE";

  constructor(
    readonly reason: string,
    readonly path?: string,
  ) {
    super(path ? `Vault file "${path}" is corrupt: ${reason}` : `Vault data is corrupt: ${reason}`);
  }
}

/**
 * Thrown when no vault file exists at the requested path.
 */
export class VaultNotFoundError extends VaultError {
  readonly code = "NOT_FOUND";

  constructor(readonly path: string) {
    super(`No vault found at "${path}"`);
  }
}

/**
 * Thrown when creating a vault (or export target) over an existing file.
 */
export class AlreadyExistsError extends VaultError {
  readonly code = "ALREADY_EXISTS";

  constructor(readonly path: string) {
    super(`A file already exists at "${path}"`);
  }
}

/**
 * Thrown when password generator options cannot produce a password.
 */
export class InvalidOptionsError extends VaultError {
  readonly code = "INVALID_OPTIONS";
}

/**
 * Thrown when a filesystem operation fails. The original error is kept as `cause`.
 */
export class VaultIoError extends VaultError {
  readonly code = "IO_ERROR";

  constructor(
    message: string,
    readonly path: string,
    cause?: unknown,
  ) {
    super(`${message} at "${path}"`, { cause });
  }
}

/**
 * Thrown by the cipher when a ciphertext fails authentication.
 * Does not report which part of the input was at fault.
 */
export class AuthenticationFailedError extends VaultError {
  readonly code = "AUTHENTICATION_FAILED";

  constructor(message = "Authentication failed") {
    super(message);
  }
}

/**
 * Thrown when caller-supplied input breaks a policy: empty passphrase,
 * empty account name, missing secret, and similar.
 */
export class InvalidInputError extends VaultError {
  readonly code = "INVALID_INPUT";
}

/**
 * Thrown when a requested account does not exist in the vault.
 */
export class AccountNotFoundError extends VaultError {
  readonly code = "ACCOUNT_NOT_FOUND";

  constructor(readonly id: string) {
    super(`Account not found: "${id}"`);
  }
}

/**
 * Thrown when an operation needs an unlocked vault and the session is locked.
 */
export class VaultLockedError extends VaultError {
  readonly code = "VAULT_LOCKED";

  constructor() {
    super("Vault is locked");
  }
}

/**
 * Thrown when locking a session that holds unsaved changes.
 */
export class UnsavedChangesError extends VaultError {
  readonly code = "UNSAVED_CHANGES";

  constructor() {
    super("Vault has unsaved changes; save first, or lock with { discard: true }");
  }
}

/**
 * Thrown when filesystem permissions are more permissive than allowed.
 * Vault operations refuse to proceed when security invariants are violated.
 */
export class SecurityError extends VaultError {
  readonly code = "SECURITY_ERROR";

  constructor(
    message: string,
    readonly expectedPermission: string,
    readonly actualPermission: string,
    readonly path: string,
  ) {
    super(`${message}: expected ${expectedPermission}, got ${actualPermission} on "${path}"`);
  }
}
