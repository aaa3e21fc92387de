/**
 * Tests for the error classes.
 */

import { describe, expect, test } from "vitest";
import {
  AccountNotFoundError,
  AlreadyExistsError,
  CorruptFileError,
  InvalidOptionsError,
  SecurityError,
  UnsavedChangesError,
  VaultError,
  VaultIoError,
  VaultLockedError,
  VaultNotFoundError,
  WrongPassphraseError,
} from "../src/errors.ts";

describe("VaultError hierarchy", () => {
  test("SecurityError is instance of VaultError and Error", () => {
    const err = new SecurityError("Insecure vault file permissions", "0o600", "0o644", "/tmp/a.vault");

    expect(err).toBeInstanceOf(SecurityError);
    expect(err).toBeInstanceOf(VaultError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe("SECURITY_ERROR");
    expect(err.name).toBe("SecurityError");
    expect(err.expectedPermission).toBe("0o600");
    expect(err.actualPermission).toBe("0o644");
    expect(err.path).toBe("/tmp/a.vault");
    expect(err.message).toBe('Insecure vault file permissions: expected 0o600, got 0o644 on "/tmp/a.vault"');
  });

  test("WrongPassphraseError has a fixed message and keeps its cause", () => {
    const cause = new Error("tag mismatch");
    const err = new WrongPassphraseError({ cause });

    expect(err.code).toBe("WRONG_PASSPHRASE");
    expect(err.message).toBe("Incorrect passphrase, or the vault contents have been altered");
    expect(err.cause).toBe(cause);
  });

  test("CorruptFileError names the file when known", () => {
    const withPath = new CorruptFileError("bad magic", "/tmp/a.vault");
    const withoutPath = new CorruptFileError("bad magic");

    expect(withPath.code).toBe("CORRUPT_FILE");
    expect(withPath.reason).toBe("bad magic");
    expect(withPath.message).toBe('Vault file "/tmp/a.vault" is corrupt: bad magic');
    expect(withoutPath.message).toBe("Vault data is corrupt: bad magic");
  });

  test("VaultNotFoundError and AlreadyExistsError carry the path", () => {
    expect(new VaultNotFoundError("/tmp/x.vault").message).toBe('No vault found at "/tmp/x.vault"');
    expect(new AlreadyExistsError("/tmp/x.vault").code).toBe("ALREADY_EXISTS");
    expect(new AlreadyExistsError("/tmp/x.vault").path).toBe("/tmp/x.vault");
  });

  test("VaultIoError keeps the original error as cause", () => {
    const cause = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });
    const err = new VaultIoError("Cannot read file", "/tmp/x.vault", cause);

    expect(err.code).toBe("IO_ERROR");
    expect(err.message).toBe('Cannot read file at "/tmp/x.vault"');
    expect(err.cause).toBe(cause);
  });

  test("AccountNotFoundError includes the id", () => {
    const err = new AccountNotFoundError("0f8e6a4c-0000-4000-8000-000000000000");

    expect(err.code).toBe("ACCOUNT_NOT_FOUND");
    expect(err.message).toBe('Account not found: "0f8e6a4c-0000-4000-8000-000000000000"');
  });

  test("session state errors have stable codes", () => {
    expect(new VaultLockedError().code).toBe("VAULT_LOCKED");
    expect(new UnsavedChangesError().code).toBe("UNSAVED_CHANGES");
    expect(new InvalidOptionsError("bad length").code).toBe("INVALID_OPTIONS");
  });

  test("name reflects the concrete class", () => {
    expect(new VaultLockedError().name).toBe("VaultLockedError");
    expect(new InvalidOptionsError("x").name).toBe("InvalidOptionsError");
  });
});
