import { z } from "zod";
import { findOverlappingAccounts } from "../models/AccountGroups";

/**
 * Zod schemas for ledger records and account group configuration.
 * Ledger schemas stay permissive where the aggregation engine tolerates bad data
 * (dates, missing amounts) and strict only on the fields it joins on.
 */

/**
 * Schema for an account; `name` is the account-group join key.
 */
export const AccountSchema = z.object({
  id: z.string(),
  name: z.string(),
  offbudget: z.boolean().optional(),
  closed: z.boolean().optional(),
});

/**
 * Schema for a category. A missing `is_income` means expense.
 */
export const CategorySchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  group_id: z.string().optional(),
  is_income: z.boolean().optional(),
});

export const PayeeSchema = z.object({
  id: z.string(),
  name: z.string(),
});

/**
 * Schema for a transaction. `date` is left unchecked: unreadable dates
 * fall back to today during aggregation rather than failing the snapshot.
 */
export const TransactionSchema = z.object({
  id: z.string(),
  account: z.string(),
  category: z.string().nullable().optional(),
  amount: z.number().int().nullable().optional(), // minor units
  date: z.unknown(),
  transfer_id: z.string().nullable().optional(),
  payee: z.string().nullable().optional(),
  notes: z.string().nullable().optional(),
});

/**
 * Schema for account groups. Rejects an account listed in two groups,
 * which would count its balance twice.
 */
export const AccountGroupConfigSchema = z
  .record(z.string(), z.array(z.string()))
  .superRefine((config, ctx) => {
    const overlapping = findOverlappingAccounts(config);
    if (overlapping.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Accounts listed in more than one group: ${overlapping.join(", ")}`,
      });
    }
  });

/**
 * Schema for a full ledger snapshot (payees optional).
 */
export const LedgerSnapshotSchema = z.object({
  accounts: z.array(AccountSchema),
  categories: z.array(CategorySchema),
  payees: z.array(PayeeSchema).default([]),
  transactions: z.array(TransactionSchema),
});

/**
 * Schema for a stateless aggregation request.
 */
export const AggregateRequestSchema = z.object({
  accounts: z.array(AccountSchema),
  categories: z.array(CategorySchema),
  transactions: z.array(TransactionSchema),
  accountGroups: AccountGroupConfigSchema,
});

export type AggregateRequest = z.infer<typeof AggregateRequestSchema>;

/**
 * Flattens zod issues into "path: message" strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
