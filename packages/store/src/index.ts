/**
 * @ledgerline/store — Persistence for the Ledgerline stack.
 *
 * One FinanceStore contract, two implementations:
 * - InMemoryFinanceStore: Maps with snapshot/restore units of work
 * - SqliteFinanceStore: better-sqlite3, schema created on open
 */

export type {
  PartyRepository,
  AccountRepository,
  Posting,
  JournalRepository,
  LegacyTransactionRepository,
  BudgetRepository,
  RolloverHistoryFilter,
  RolloverHistoryRepository,
  FinanceStore,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

export { InMemoryFinanceStore } from "./in-memory-store.js";
export { SqliteFinanceStore } from "./sqlite-store.js";
export { SCHEMA_STATEMENTS } from "./schema.js";
