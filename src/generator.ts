/**
 * Password generation from configurable character classes.
 *
 * Each character is drawn independently and uniformly from the effective
 * alphabet: the union of the enabled classes minus the excluded tables.
 */

import { randomIndex } from "./crypto.ts";
import { InvalidOptionsError } from "./errors.ts";

export interface PasswordOptions {
  /** Number of characters, 4 to 128. */
  readonly length?: number;
  readonly lowercase?: boolean;
  readonly uppercase?: boolean;
  readonly digits?: boolean;
  readonly special?: boolean;
  /** Drop visually confusable characters (`i l 1 L o 0 O`). */
  readonly excludeSimilar?: boolean;
  /** Drop brackets, quotes, slashes and punctuation that are awkward to transcribe. */
  readonly excludeAmbiguous?: boolean;
}

export const PASSWORD_LENGTH = { MIN: 4, MAX: 128, DEFAULT: 16 } as const;

export const CHARACTER_CLASSES = {
  lowercase: "abcdefghijklmnopqrstuvwxyz",
  uppercase: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
  digits: "0123456789",
  special: "!@#$%^&*()_+-=[]{}|;:,.<>?/\\'\"`~",
} as const;

export const SIMILAR_CHARACTERS = "il1Lo0O";
export const AMBIGUOUS_CHARACTERS = "{}[]()/\\'\"`~,;:.<>";

const DEFAULT_OPTIONS: Required<PasswordOptions> = {
  length: PASSWORD_LENGTH.DEFAULT,
  lowercase: true,
  uppercase: true,
  digits: true,
  special: true,
  excludeSimilar: true,
  excludeAmbiguous: false,
};

/** Letters and digits only, with both exclusion tables applied. */
export function simplePasswordOptions(length: number = PASSWORD_LENGTH.DEFAULT): PasswordOptions {
  return { ...DEFAULT_OPTIONS, length, special: false, excludeAmbiguous: true };
}

/** Every class enabled, confusable characters removed. */
export function strongPasswordOptions(length: number = PASSWORD_LENGTH.DEFAULT): PasswordOptions {
  return { ...DEFAULT_OPTIONS, length };
}

/**
 * The characters a password with these options may contain.
 * Returned in class order (lowercase, uppercase, digits, special).
 */
export function buildAlphabet(options: PasswordOptions = {}): string {
  const settings = { ...DEFAULT_OPTIONS, ...options };

  let alphabet = "";
  if (settings.lowercase) alphabet += CHARACTER_CLASSES.lowercase;
  if (settings.uppercase) alphabet += CHARACTER_CLASSES.uppercase;
  if (settings.digits) alphabet += CHARACTER_CLASSES.digits;
  if (settings.special) alphabet += CHARACTER_CLASSES.special;

  return Array.from(alphabet)
    .filter((char) => !(settings.excludeSimilar && SIMILAR_CHARACTERS.includes(char)))
    .filter((char) => !(settings.excludeAmbiguous && AMBIGUOUS_CHARACTERS.includes(char)))
    .join("");
}

/**
 * Generate a random password.
 *
 * @throws {InvalidOptionsError} if `length` is out of range or no characters remain
 */
export function generatePassword(options: PasswordOptions = {}): string {
  const length = options.length ?? DEFAULT_OPTIONS.length;
  if (!Number.isInteger(length) || length < PASSWORD_LENGTH.MIN || length > PASSWORD_LENGTH.MAX) {
    throw new InvalidOptionsError(
      `Password length must be an integer from ${PASSWORD_LENGTH.MIN} to ${PASSWORD_LENGTH.MAX}, got ${length}`,
    );
  }

  const alphabet = buildAlphabet(options);
  if (alphabet.length === 0) {
    throw new InvalidOptionsError("No characters available: enable at least one character class");
  }

  let password = "";
  for (let i = 0; i < length; i++) {
    password += alphabet.charAt(randomIndex(alphabet.length));
  }
  return password;
}
