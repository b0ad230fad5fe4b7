/**
 * Type barrel — re-exports all public types from @ledgerline/node.
 */

// DTOs
export {
  AmountSchema,
  IdSchema,
  CreatePartySchema,
  CreateAccountSchema,
  ListAccountsQuerySchema,
  EntrySchema,
  RecordTransactionSchema,
  SimpleTransactionSchema,
  UpdateTransactionSchema,
  ListTransactionsQuerySchema,
  DeleteTransactionQuerySchema,
  CategoryBudgetSchema,
  CreateBudgetSchema,
  CopyBudgetSchema,
  PutCategoryBudgetSchema,
  AlertsQuerySchema,
  RolloverHistoryQuerySchema,
} from "./dto.js";
export type {
  CreatePartyDto,
  CreateAccountDto,
  ListAccountsQuery,
  RecordTransactionDto,
  SimpleTransactionDto,
  UpdateTransactionDto,
  ListTransactionsQuery,
  CreateBudgetDto,
  CopyBudgetDto,
  PutCategoryBudgetDto,
  RolloverHistoryQueryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
