/**
 * @ledgerline/store — SQLite schema.
 *
 * Amounts are TEXT (decimal strings), booleans INTEGER 0/1, timestamps
 * TEXT in UTC ISO 8601. Rollover history rejects UPDATE and DELETE
 * through triggers.
 */

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS parties (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    kind TEXT NOT NULL,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS accounts (
    id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL REFERENCES parties(id),
    name TEXT NOT NULL,
    type TEXT NOT NULL,
    parent_id TEXT REFERENCES accounts(id),
    active INTEGER NOT NULL DEFAULT 1,
    currency TEXT NOT NULL,
    created_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_accounts_owner ON accounts(owner_id)`,
  `CREATE TABLE IF NOT EXISTS ledger_transactions (
    id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL REFERENCES parties(id),
    date TEXT NOT NULL,
    description TEXT NOT NULL,
    notes TEXT,
    external_id TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    deleted_at TEXT
  )`,
  `CREATE INDEX IF NOT EXISTS idx_ledger_transactions_owner_date
    ON ledger_transactions(owner_id, date)`,
  `CREATE TABLE IF NOT EXISTS entries (
    id TEXT PRIMARY KEY,
    transaction_id TEXT NOT NULL REFERENCES ledger_transactions(id) ON DELETE CASCADE,
    account_id TEXT NOT NULL REFERENCES accounts(id),
    amount TEXT NOT NULL,
    is_reportable INTEGER NOT NULL DEFAULT 1,
    position INTEGER NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_entries_account ON entries(account_id)`,
  `CREATE INDEX IF NOT EXISTS idx_entries_transaction ON entries(transaction_id)`,
  `CREATE TABLE IF NOT EXISTS legacy_transactions (
    id TEXT PRIMARY KEY,
    owner_id TEXT NOT NULL,
    category_id TEXT NOT NULL,
    type TEXT NOT NULL,
    amount TEXT NOT NULL,
    occurred_on TEXT NOT NULL,
    is_deleted INTEGER NOT NULL DEFAULT 0
  )`,
  `CREATE INDEX IF NOT EXISTS idx_legacy_owner_category
    ON legacy_transactions(owner_id, category_id)`,
  `CREATE TABLE IF NOT EXISTS budgets (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES parties(id),
    year_month TEXT NOT NULL,
    rollover_last_calculated TEXT,
    rollover_needs_recalc INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    UNIQUE (user_id, year_month)
  )`,
  `CREATE TABLE IF NOT EXISTS category_budgets (
    id TEXT PRIMARY KEY,
    budget_id TEXT NOT NULL REFERENCES budgets(id) ON DELETE CASCADE,
    category_id TEXT NOT NULL REFERENCES accounts(id),
    budget_amount TEXT NOT NULL,
    rollover_enabled INTEGER NOT NULL DEFAULT 0,
    rollover_amount TEXT NOT NULL DEFAULT '0.00',
    UNIQUE (budget_id, category_id)
  )`,
  `CREATE TABLE IF NOT EXISTS rollover_calculations (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    budget_id TEXT NOT NULL,
    category_id TEXT NOT NULL,
    calculated_at TEXT NOT NULL,
    rollover_amount TEXT NOT NULL,
    source_month TEXT NOT NULL,
    reason TEXT NOT NULL,
    base_budget TEXT NOT NULL,
    prev_rollover TEXT NOT NULL,
    effective_budget TEXT NOT NULL,
    spent_amount TEXT NOT NULL
  )`,
  `CREATE TRIGGER IF NOT EXISTS rollover_calculations_no_update
    BEFORE UPDATE ON rollover_calculations
    BEGIN SELECT RAISE(ABORT, 'rollover_calculations is append-only'); END`,
  `CREATE TRIGGER IF NOT EXISTS rollover_calculations_no_delete
    BEFORE DELETE ON rollover_calculations
    BEGIN SELECT RAISE(ABORT, 'rollover_calculations is append-only'); END`,
];
