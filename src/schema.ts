/**
 * zod schemas for the decrypted vault body and for account input.
 */

import { z } from "zod";
import { CONSTANTS } from "./types.ts";
import type { AccountCategory, AccountRecord, VaultBody } from "./types.ts";

export const CategorySchema: z.ZodType<AccountCategory> = z.union([
  z.object({ kind: z.enum(["Social", "Banking", "Work", "Personal"]) }).strict(),
  z
    .object({
      kind: z.literal("Other"),
      label: z.string().trim().min(1, "Category label must not be empty"),
    })
    .strict(),
]);

const TagsSchema = z.array(z.string());

export const AccountRecordSchema: z.ZodType<AccountRecord> = z.object({
  id: z.string().uuid(),
  name: z.string().trim().min(1),
  category: CategorySchema,
  url: z.string().optional(),
  username: z.string().optional(),
  secret: z.string().min(1),
  notes: z.string().optional(),
  tags: TagsSchema,
  createdAt: z.number().int().nonnegative(),
  updatedAt: z.number().int().nonnegative(),
});

export const VaultBodySchema: z.ZodType<VaultBody> = z
  .object({
    schema: z.literal(CONSTANTS.BODY_SCHEMA),
    createdAt: z.number().int().nonnegative(),
    accounts: z.array(AccountRecordSchema),
  })
  .superRefine((body, ctx) => {
    const seen = new Set<string>();
    for (const account of body.accounts) {
      if (seen.has(account.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate account id ${account.id}`,
          path: ["accounts"],
        });
      }
      seen.add(account.id);
    }
  });

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

const NameSchema = z.string().trim().min(1, "Account name must not be empty");
const SecretSchema = z.string().min(1, "Account secret must not be empty");

export const NewAccountSchema = z.object({
  name: NameSchema,
  secret: SecretSchema,
  category: CategorySchema.optional(),
  url: z.string().optional(),
  username: z.string().optional(),
  notes: z.string().optional(),
  tags: TagsSchema.readonly().optional(),
});

export const AccountPatchSchema = z.object({
  name: NameSchema.optional(),
  secret: SecretSchema.optional(),
  category: CategorySchema.optional(),
  url: z.string().nullable().optional(),
  username: z.string().nullable().optional(),
  notes: z.string().nullable().optional(),
  tags: TagsSchema.readonly().optional(),
});

/** First issue of a failed parse, formatted as `path: message`. */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return "invalid value";
  }
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}
