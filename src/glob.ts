/**
 * Glob-based pattern matching for account name filtering.
 *
 * Supports the `*` wildcard only. Matching is case-insensitive.
 */

/**
 * Match a display name against a glob pattern.
 *
 * Supports:
 * - `*` matches any sequence of characters, including none
 * - Literal characters are matched exactly (ignoring case)
 *
 * @example
 * ```ts
 * matchGlob("git*", "GitHub")      // true
 * matchGlob("*bank*", "My Bank")   // true
 * matchGlob("git*", "Bitbucket")   // false
 * ```
 */
export function matchGlob(pattern: string, name: string): boolean {
  const regexStr = pattern.replace(/[.+?^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*");

  const regex = new RegExp(`^${regexStr}$`, "i");
  return regex.test(name);
}
