/**
 * Heuristic password strength score.
 *
 * ```
 * score = lengthBonus + 10 × classes present
 *         − 20 if a character repeats three times or a keyboard run appears
 *         − 30 if the password is a well-known common password
 * ```
 *
 * clamped to 0..100. This is a coarse hint for the user, not an entropy estimate.
 */

import { CHARACTER_CLASSES } from "./generator.ts";

export type StrengthLabel = "Very Weak" | "Weak" | "Fair" | "Good" | "Strong" | "Very Strong";

const KEYBOARD_ROWS = ["qwertyuiop", "asdfghjkl", "zxcvbnm", "1234567890"] as const;

const COMMON_PASSWORDS = new Set([
  "password",
  "123456",
  "123456789",
  "qwerty",
  "abc123",
  "password123",
  "admin",
  "letmein",
  "welcome",
  "monkey",
  "1234567890",
  "password1",
  "qwerty123",
  "dragon",
  "master",
]);

/** Score a password from 0 (weakest) to 100. */
export function scorePassword(password: string): number {
  const chars = Array.from(password);
  if (chars.length === 0) {
    return 0;
  }

  let score = lengthBonus(chars.length);

  if (chars.some((c) => c !== c.toLowerCase())) score += 10;
  if (chars.some((c) => c !== c.toUpperCase())) score += 10;
  if (chars.some((c) => c >= "0" && c <= "9")) score += 10;
  if (chars.some((c) => CHARACTER_CLASSES.special.includes(c))) score += 10;

  if (hasRepeatingPattern(chars)) {
    score = Math.max(0, score - 20);
  }
  if (COMMON_PASSWORDS.has(password.toLowerCase())) {
    score = Math.max(0, score - 30);
  }

  return Math.min(score, 100);
}

export function describeStrength(score: number): StrengthLabel {
  if (score <= 20) return "Very Weak";
  if (score <= 40) return "Weak";
  if (score <= 60) return "Fair";
  if (score <= 80) return "Good";
  if (score <= 90) return "Strong";
  return "Very Strong";
}

function lengthBonus(length: number): number {
  if (length < 8) return 10;
  if (length < 12) return 20;
  if (length < 16) return 30;
  if (length < 20) return 40;
  if (length < 24) return 50;
  return 60;
}

/** Three identical characters in a row, or three consecutive keys of a keyboard row. */
function hasRepeatingPattern(chars: readonly string[]): boolean {
  for (let i = 0; i + 2 < chars.length; i++) {
    const triple = chars.slice(i, i + 3);
    if (triple[0] === triple[1] && triple[1] === triple[2]) {
      return true;
    }
    const run = triple.join("");
    if (KEYBOARD_ROWS.some((row) => row.includes(run))) {
      return true;
    }
  }
  return false;
}
