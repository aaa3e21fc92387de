/**
 * Record model: the in-memory account collection.
 *
 * Pure data plus the invariant-preserving operations the session uses.
 * No I/O and no knowledge of encryption.
 */

import { generateId } from "./crypto.ts";
import { InvalidInputError } from "./errors.ts";
import { matchGlob } from "./glob.ts";
import { AccountPatchSchema, NewAccountSchema, describeIssue } from "./schema.ts";
import type {
  AccountCategory,
  AccountFilter,
  AccountPatch,
  AccountRecord,
  NewAccount,
} from "./types.ts";

const DEFAULT_CATEGORY: AccountCategory = { kind: "Personal" };

/**
 * Insertion-ordered collection of account records.
 *
 * Identifiers are never handed out twice: every id the collection has loaded
 * or issued stays reserved for its lifetime, including ids of removed records.
 */
export class AccountCollection {
  private readonly accounts = new Map<string, AccountRecord>();
  private readonly issuedIds = new Set<string>();

  constructor(
    initial: readonly AccountRecord[] = [],
    private readonly now: () => number = Date.now,
  ) {
    for (const account of initial) {
      this.accounts.set(account.id, account);
      this.issuedIds.add(account.id);
    }
  }

  /** Validate fields, assign a fresh id and stamp both timestamps. */
  create(fields: NewAccount): AccountRecord {
    const parsed = NewAccountSchema.safeParse(fields);
    if (!parsed.success) {
      throw new InvalidInputError(describeIssue(parsed.error));
    }

    const input = parsed.data;
    const timestamp = this.now();
    const record: AccountRecord = {
      id: this.nextId(),
      name: input.name,
      category: input.category ?? DEFAULT_CATEGORY,
      secret: input.secret,
      tags: normalizeTags(input.tags ?? []),
      createdAt: timestamp,
      updatedAt: timestamp,
      ...optionalFields(input),
    };

    this.accounts.set(record.id, record);
    return record;
  }

  /**
   * Apply a patch to an existing record.
   *
   * @returns The updated record, or `null` if `id` is unknown
   */
  update(id: string, patch: AccountPatch): AccountRecord | null {
    const existing = this.accounts.get(id);
    if (!existing) {
      return null;
    }

    const parsed = AccountPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new InvalidInputError(describeIssue(parsed.error));
    }

    const changes = parsed.data;
    const { url, username, notes, ...rest } = existing;
    const merged = {
      url: changes.url === undefined ? url : changes.url,
      username: changes.username === undefined ? username : changes.username,
      notes: changes.notes === undefined ? notes : changes.notes,
    };

    const record: AccountRecord = {
      ...rest,
      name: changes.name ?? existing.name,
      secret: changes.secret ?? existing.secret,
      category: changes.category ?? existing.category,
      tags: changes.tags ? normalizeTags(changes.tags) : existing.tags,
      updatedAt: this.now(),
      ...optionalFields(merged),
    };

    this.accounts.set(id, record);
    return record;
  }

  /** @returns `true` if a record was removed */
  remove(id: string): boolean {
    return this.accounts.delete(id);
  }

  get(id: string): AccountRecord | null {
    return this.accounts.get(id) ?? null;
  }

  /** Records in insertion order, optionally narrowed by a filter. */
  list(filter?: AccountFilter): AccountRecord[] {
    const all = Array.from(this.accounts.values());
    return filter ? all.filter((account) => matchesFilter(account, filter)) : all;
  }

  has(id: string): boolean {
    return this.accounts.has(id);
  }

  /** Insert a record loaded from elsewhere, keeping its id and timestamps. */
  adopt(record: AccountRecord): boolean {
    if (this.issuedIds.has(record.id)) {
      return false;
    }
    this.accounts.set(record.id, record);
    this.issuedIds.add(record.id);
    return true;
  }

  get size(): number {
    return this.accounts.size;
  }

  toArray(): AccountRecord[] {
    return Array.from(this.accounts.values());
  }

  /** Drop every record reference held by the collection. */
  clear(): void {
    this.accounts.clear();
  }

  private nextId(): string {
    let id = generateId();
    while (this.issuedIds.has(id)) {
      id = generateId();
    }
    this.issuedIds.add(id);
    return id;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Trim, drop empties, de-duplicate and sort. */
export function normalizeTags(tags: readonly string[]): string[] {
  const unique = new Set<string>();
  for (const tag of tags) {
    const trimmed = tag.trim();
    if (trimmed) {
      unique.add(trimmed);
    }
  }
  return Array.from(unique).sort();
}

/** Keep only the optional fields that carry a value. */
function optionalFields(source: {
  url?: string | null;
  username?: string | null;
  notes?: string | null;
}): Pick<AccountRecord, "url" | "username" | "notes"> {
  const out: { url?: string; username?: string; notes?: string } = {};
  if (source.url != null) out.url = source.url;
  if (source.username != null) out.username = source.username;
  if (source.notes != null) out.notes = source.notes;
  return out;
}

function matchesFilter(account: AccountRecord, filter: AccountFilter): boolean {
  if (filter.name !== undefined && !matchGlob(filter.name, account.name)) {
    return false;
  }
  if (filter.search !== undefined && !account.name.toLowerCase().includes(filter.search.toLowerCase())) {
    return false;
  }
  if (filter.category !== undefined && account.category.kind !== filter.category) {
    return false;
  }
  if (filter.tag !== undefined && !account.tags.includes(filter.tag)) {
    return false;
  }
  return true;
}
