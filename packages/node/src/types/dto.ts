/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Shapes are checked here; amounts, dates and months are validated by
 * the domain packages, which own those rules.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z.string().min(1).max(32);

export const IdSchema = z.string().min(1).max(128);

const BooleanQuerySchema = z
  .enum(["true", "false"])
  .transform((v) => v === "true")
  .optional();

// =============================================================================
// Parties & Accounts
// =============================================================================

export const CreatePartySchema = z.object({
  name: z.string().min(1).max(200),
  kind: z.enum(["person", "household"]).optional(),
  /** Overrides SEED_DEFAULT_ACCOUNTS for this party */
  seedDefaultAccounts: z.boolean().optional(),
});

export type CreatePartyDto = z.infer<typeof CreatePartySchema>;

export const CreateAccountSchema = z.object({
  name: z.string().min(1).max(200),
  type: z.enum(["asset", "liability", "income", "expense"]),
  parentId: IdSchema.optional(),
  currency: z.string().length(3).optional(),
});

export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;

export const ListAccountsQuerySchema = z.object({
  type: z.enum(["asset", "liability", "income", "expense"]).optional(),
  includeInactive: BooleanQuerySchema,
});

export type ListAccountsQuery = z.infer<typeof ListAccountsQuerySchema>;

// =============================================================================
// Transactions
// =============================================================================

export const EntrySchema = z.object({
  accountId: IdSchema,
  amount: AmountSchema,
  isReportable: z.boolean().optional(),
});

export const RecordTransactionSchema = z.object({
  description: z.string().min(1).max(500),
  date: z.string().min(1),
  entries: z.array(EntrySchema),
  notes: z.string().max(2000).optional(),
  externalId: z.string().max(128).optional(),
});

export type RecordTransactionDto = z.infer<typeof RecordTransactionSchema>;

const SimpleBase = {
  description: z.string().min(1).max(500),
  date: z.string().min(1),
  notes: z.string().max(2000).optional(),
  sourceAccountId: IdSchema,
};

/** Adapter input: the server builds the balanced entries. */
export const SimpleTransactionSchema = z.discriminatedUnion("kind", [
  z.object({
    ...SimpleBase,
    kind: z.literal("expense"),
    categoryId: IdSchema,
    amount: AmountSchema,
  }),
  z.object({
    ...SimpleBase,
    kind: z.literal("transfer"),
    destinationAccountId: IdSchema,
    amount: AmountSchema,
  }),
  z.object({
    ...SimpleBase,
    kind: z.literal("split"),
    splits: z.array(z.object({ categoryId: IdSchema, amount: AmountSchema })).min(1),
  }),
  z.object({
    ...SimpleBase,
    kind: z.literal("shared"),
    categoryId: IdSchema,
    reimbursableAccountId: IdSchema,
    amount: AmountSchema,
    share: z.object({
      method: z.enum(["FIXED", "PERCENTAGE", "EQUAL"]),
      value: AmountSchema,
    }),
  }),
]);

export type SimpleTransactionDto = z.infer<typeof SimpleTransactionSchema>;

export const UpdateTransactionSchema = z
  .object({
    description: z.string().min(1).max(500).optional(),
    /** null or "" clears the notes */
    notes: z.string().max(2000).nullable().optional(),
    date: z.string().min(1).optional(),
    entries: z.array(EntrySchema).optional(),
  })
  .refine((patch) => Object.keys(patch).length > 0, {
    message: "At least one field must be given",
  });

export type UpdateTransactionDto = z.infer<typeof UpdateTransactionSchema>;

export const ListTransactionsQuerySchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  accountId: IdSchema.optional(),
  includeDeleted: BooleanQuerySchema,
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

export const DeleteTransactionQuerySchema = z.object({
  hard: BooleanQuerySchema,
});

// =============================================================================
// Budgets
// =============================================================================

export const CategoryBudgetSchema = z.object({
  categoryId: IdSchema,
  budgetAmount: AmountSchema,
  rolloverEnabled: z.boolean().optional(),
});

export const CreateBudgetSchema = z.object({
  yearMonth: z.string().min(1),
  categories: z.array(CategoryBudgetSchema),
});

export type CreateBudgetDto = z.infer<typeof CreateBudgetSchema>;

export const CopyBudgetSchema = z.object({
  toMonth: z.string().min(1),
});

export type CopyBudgetDto = z.infer<typeof CopyBudgetSchema>;

/** PUT upserts: budgetAmount is required when the category has no allocation yet. */
export const PutCategoryBudgetSchema = z
  .object({
    budgetAmount: AmountSchema.optional(),
    rolloverEnabled: z.boolean().optional(),
  })
  .refine((patch) => patch.budgetAmount !== undefined || patch.rolloverEnabled !== undefined, {
    message: "budgetAmount or rolloverEnabled must be given",
  });

export type PutCategoryBudgetDto = z.infer<typeof PutCategoryBudgetSchema>;

export const AlertsQuerySchema = z.object({
  warningPercent: z.coerce.number().min(0).max(100).optional(),
});

export const RolloverHistoryQuerySchema = z.object({
  yearMonth: z.string().optional(),
  categoryId: IdSchema.optional(),
});

export type RolloverHistoryQueryDto = z.infer<typeof RolloverHistoryQuerySchema>;
