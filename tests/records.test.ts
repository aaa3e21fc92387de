/**
 * Tests for the in-memory account collection.
 */

import { describe, expect, test } from "vitest";
import { InvalidInputError } from "../src/errors.ts";
import { AccountCollection, normalizeTags } from "../src/records.ts";
import type { AccountRecord } from "../src/types.ts";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function clock(start = 1_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

function storedRecord(overrides: Partial<AccountRecord> = {}): AccountRecord {
  return {
    id: "6f1c2f4e-9a3b-4c5d-8e7f-0a1b2c3d4e5f",
    name: "Imported",
    category: { kind: "Work" },
    secret: "imported-secret",
    tags: [],
    createdAt: 10,
    updatedAt: 20,
    ...overrides,
  };
}

describe("AccountCollection.create", () => {
  test("assigns an id, defaults and both timestamps", () => {
    const { now } = clock(5_000);
    const accounts = new AccountCollection([], now);

    const record = accounts.create({ name: "GitHub", secret: "abc123" });

    expect(record.id).toMatch(UUID_PATTERN);
    expect(record.name).toBe("GitHub");
    expect(record.secret).toBe("abc123");
    expect(record.category).toEqual({ kind: "Personal" });
    expect(record.tags).toEqual([]);
    expect(record.createdAt).toBe(5_000);
    expect(record.updatedAt).toBe(5_000);
    expect(record).not.toHaveProperty("url");
    expect(accounts.size).toBe(1);
  });

  test("trims the name and normalizes tags", () => {
    const accounts = new AccountCollection();

    const record = accounts.create({ name: "  Bank  ", secret: "s", tags: ["money", " home ", "money", ""] });

    expect(record.name).toBe("Bank");
    expect(record.tags).toEqual(["home", "money"]);
  });

  test("keeps optional fields and a custom category", () => {
    const accounts = new AccountCollection();

    const record = accounts.create({
      name: "Router",
      secret: "s",
      url: "http://192.168.1.1",
      username: "admin",
      notes: "closet",
      category: { kind: "Other", label: "Home lab" },
    });

    expect(record.url).toBe("http://192.168.1.1");
    expect(record.username).toBe("admin");
    expect(record.notes).toBe("closet");
    expect(record.category).toEqual({ kind: "Other", label: "Home lab" });
  });

  test("rejects a blank name", () => {
    const accounts = new AccountCollection();

    expect(() => accounts.create({ name: "   ", secret: "s" })).toThrow("name: Account name must not be empty");
    expect(accounts.size).toBe(0);
  });

  test("rejects an empty secret", () => {
    const accounts = new AccountCollection();

    expect(() => accounts.create({ name: "GitHub", secret: "" })).toThrow(
      "secret: Account secret must not be empty",
    );
  });

  test("rejects an Other category without a label", () => {
    const accounts = new AccountCollection();

    expect(() => accounts.create({ name: "X", secret: "s", category: { kind: "Other", label: " " } })).toThrow(
      InvalidInputError,
    );
  });

  test("never issues the same id twice", () => {
    const accounts = new AccountCollection();
    const ids = new Set<string>();

    for (let i = 0; i < 50; i++) {
      ids.add(accounts.create({ name: `Account ${i}`, secret: "s" }).id);
    }

    expect(ids.size).toBe(50);
  });
});

describe("AccountCollection.update", () => {
  test("applies changes and bumps updatedAt only", () => {
    const time = clock(1_000);
    const accounts = new AccountCollection([], time.now);
    const created = accounts.create({ name: "GitHub", secret: "abc123", url: "https://github.com" });

    time.advance(500);
    const updated = accounts.update(created.id, { secret: "n3w-s3cret", tags: ["dev"] });

    expect(updated).toEqual({
      ...created,
      secret: "n3w-s3cret",
      tags: ["dev"],
      updatedAt: 1_500,
    });
    expect(accounts.get(created.id)).toEqual(updated);
  });

  test("clears optional fields set to null", () => {
    const accounts = new AccountCollection();
    const created = accounts.create({ name: "GitHub", secret: "s", url: "https://github.com", notes: "n" });

    const updated = accounts.update(created.id, { url: null });

    expect(updated).not.toHaveProperty("url");
    expect(updated?.notes).toBe("n");
  });

  test("returns null for an unknown id", () => {
    const accounts = new AccountCollection();

    expect(accounts.update("6f1c2f4e-9a3b-4c5d-8e7f-0a1b2c3d4e5f", { name: "x" })).toBeNull();
  });

  test("rejects an invalid patch without changing the record", () => {
    const accounts = new AccountCollection();
    const created = accounts.create({ name: "GitHub", secret: "s" });

    expect(() => accounts.update(created.id, { name: "" })).toThrow(InvalidInputError);
    expect(accounts.get(created.id)).toEqual(created);
  });
});

describe("AccountCollection.remove / get", () => {
  test("removes an existing record once", () => {
    const accounts = new AccountCollection();
    const created = accounts.create({ name: "GitHub", secret: "s" });

    expect(accounts.remove(created.id)).toBe(true);
    expect(accounts.remove(created.id)).toBe(false);
    expect(accounts.get(created.id)).toBeNull();
    expect(accounts.has(created.id)).toBe(false);
  });
});

describe("AccountCollection.list", () => {
  function populated(): AccountCollection {
    const accounts = new AccountCollection();
    accounts.create({ name: "GitHub", secret: "s", category: { kind: "Work" }, tags: ["dev"] });
    accounts.create({ name: "GitLab", secret: "s", tags: ["dev", "mirror"] });
    accounts.create({ name: "My Bank", secret: "s", category: { kind: "Banking" } });
    return accounts;
  }

  test("returns records in insertion order", () => {
    expect(populated().list().map((a) => a.name)).toEqual(["GitHub", "GitLab", "My Bank"]);
  });

  test("filters by name glob", () => {
    expect(populated().list({ name: "git*" }).map((a) => a.name)).toEqual(["GitHub", "GitLab"]);
  });

  test("filters by case-insensitive substring", () => {
    expect(populated().list({ search: "BANK" }).map((a) => a.name)).toEqual(["My Bank"]);
  });

  test("filters by category and tag together", () => {
    const accounts = populated();

    expect(accounts.list({ category: "Personal" }).map((a) => a.name)).toEqual(["GitLab"]);
    expect(accounts.list({ tag: "dev", category: "Work" }).map((a) => a.name)).toEqual(["GitHub"]);
    expect(accounts.list({ tag: "nope" })).toEqual([]);
  });
});

describe("AccountCollection.adopt", () => {
  test("inserts a loaded record unchanged", () => {
    const accounts = new AccountCollection();
    const record = storedRecord();

    expect(accounts.adopt(record)).toBe(true);
    expect(accounts.get(record.id)).toBe(record);
  });

  test("refuses an id that is already present", () => {
    const record = storedRecord();
    const accounts = new AccountCollection([record]);

    expect(accounts.adopt(storedRecord({ name: "Other" }))).toBe(false);
    expect(accounts.get(record.id)?.name).toBe("Imported");
  });

  test("keeps ids of removed records reserved", () => {
    const record = storedRecord();
    const accounts = new AccountCollection([record]);

    accounts.remove(record.id);

    expect(accounts.adopt(record)).toBe(false);
  });
});

describe("normalizeTags", () => {
  test("trims, drops empties, de-duplicates and sorts", () => {
    expect(normalizeTags(["b", " a ", "", "b", "  "])).toEqual(["a", "b"]);
  });
});
