/**
 * @ledgerline/ledger — Account registry.
 *
 * Manages parties and their chart of accounts on top of a FinanceStore.
 * Categories are expense accounts; toCategory() is the only way to
 * view an account as a category.
 *
 * Rules:
 * - An account belongs to exactly one party
 * - A parent account must belong to the same party and share the type
 * - Active account names are unique per party
 * - Accounts are deactivated, never removed
 */

import { randomUUID } from "node:crypto";
import type { FinanceStore } from "@ledgerline/store";
import type {
  Account,
  AccountType,
  Category,
  Party,
  PartyKind,
} from "@ledgerline/types";
import type { CreateAccountInput, ListAccountsOptions, NormalBalance } from "./types.js";
import { LedgerError, NORMAL_BALANCE } from "./types.js";

/** Name, type and parent name; parents come before their children. */
const DEFAULT_CHART: ReadonlyArray<readonly [string, AccountType, string?]> = [
  ["Assets", "asset"],
  ["Liabilities", "liability"],
  ["Income", "income"],
  ["Expenses", "expense"],
  ["Cash", "asset", "Assets"],
  ["Groceries", "expense", "Expenses"],
  ["Salary", "income", "Income"],
];

/**
 * View an expense account as a budgeting category.
 * Throws NOT_A_CATEGORY for any other account type.
 */
export function toCategory(account: Account): Category {
  if (account.type !== "expense") {
    throw new LedgerError(
      "NOT_A_CATEGORY",
      `Account "${account.id}" is a ${account.type} account, not a category`,
      { accountId: account.id, type: account.type },
    );
  }
  return {
    id: account.id,
    ownerId: account.ownerId,
    name: account.name,
    parentId: account.parentId,
    active: account.active,
  };
}

export interface AccountRegistryOptions {
  /** ISO 4217 code used when createAccount() is given none. Default "USD". */
  readonly defaultCurrency?: string | undefined;
  readonly clock?: (() => Date) | undefined;
}

export class AccountRegistry {
  private readonly _store: FinanceStore;
  private readonly _defaultCurrency: string;
  private readonly _clock: () => Date;

  constructor(store: FinanceStore, options?: AccountRegistryOptions) {
    this._store = store;
    this._defaultCurrency = options?.defaultCurrency ?? "USD";
    this._clock = options?.clock ?? (() => new Date());
  }

  // ─── Parties ─────────────────────────────────────────────────────────

  createParty(name: string, kind: PartyKind = "person"): Party {
    if (name.trim() === "") {
      throw new LedgerError("INVALID_ACCOUNT", "Party name must not be empty");
    }
    const party: Party = {
      id: randomUUID(),
      name: name.trim(),
      kind,
      createdAt: this._clock().toISOString(),
    };
    this._store.insertParty(party);
    return party;
  }

  getParty(id: string): Party | undefined {
    return this._store.getParty(id);
  }

  assertParty(id: string): Party {
    const party = this._store.getParty(id);
    if (party === undefined) {
      throw new LedgerError("UNKNOWN_PARTY", `Unknown party: "${id}"`, { partyId: id });
    }
    return party;
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  /**
   * Create an account in a party's chart.
   * Throws if the owner or parent is invalid or the name is taken.
   */
  createAccount(input: CreateAccountInput): Account {
    this.assertParty(input.ownerId);

    const name = input.name.trim();
    if (name === "") {
      throw new LedgerError("INVALID_ACCOUNT", "Account name must not be empty");
    }

    if (input.parentId !== undefined) {
      const parent = this.assertOwnedAccount(input.ownerId, input.parentId);
      if (parent.type !== input.type) {
        throw new LedgerError(
          "INVALID_ACCOUNT",
          `Parent "${parent.id}" is a ${parent.type} account; child must share its type`,
          { parentId: parent.id },
        );
      }
    }

    if (this.findByName(input.ownerId, name) !== undefined) {
      throw new LedgerError(
        "DUPLICATE_ACCOUNT_NAME",
        `Account "${name}" already exists`,
        { ownerId: input.ownerId, name },
      );
    }

    const account: Account = {
      id: randomUUID(),
      ownerId: input.ownerId,
      name,
      type: input.type,
      parentId: input.parentId,
      active: true,
      currency: (input.currency ?? this._defaultCurrency).toUpperCase(),
      createdAt: this._clock().toISOString(),
    };
    this._store.insertAccount(account);
    return account;
  }

  getAccount(id: string): Account | undefined {
    return this._store.getAccount(id);
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertAccount(id: string): Account {
    const account = this._store.getAccount(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`, { accountId: id });
    }
    return account;
  }

  /**
   * Assert an account exists and belongs to `ownerId`.
   */
  assertOwnedAccount(ownerId: string, id: string): Account {
    const account = this.assertAccount(id);
    if (account.ownerId !== ownerId) {
      throw new LedgerError(
        "ACCOUNT_NOT_OWNED",
        `Account "${id}" does not belong to party "${ownerId}"`,
        { accountId: id },
      );
    }
    return account;
  }

  listAccounts(ownerId: string, options?: ListAccountsOptions): readonly Account[] {
    return this._store.listAccounts(ownerId).filter((a) => {
      if (options?.includeInactive !== true && !a.active) return false;
      if (options?.type !== undefined && a.type !== options.type) return false;
      return true;
    });
  }

  /**
   * Active account with this exact name, if any.
   */
  findByName(ownerId: string, name: string): Account | undefined {
    return this.listAccounts(ownerId).find((a) => a.name === name);
  }

  getOrCreateAccount(ownerId: string, name: string, type: AccountType): Account {
    return (
      this.findByName(ownerId, name) ?? this.createAccount({ ownerId, name, type })
    );
  }

  deactivateAccount(ownerId: string, id: string): Account {
    const account = this.assertOwnedAccount(ownerId, id);
    if (!account.active) return account;
    const updated: Account = { ...account, active: false };
    this._store.updateAccount(updated);
    return updated;
  }

  getNormalBalance(id: string): NormalBalance {
    return NORMAL_BALANCE[this.assertAccount(id).type];
  }

  // ─── Categories ──────────────────────────────────────────────────────

  /**
   * Budgetable categories: expense accounts that are not the parent of
   * another account. Grouping accounts such as the seeded "Expenses"
   * root are left out.
   */
  listCategories(ownerId: string, options?: { includeInactive?: boolean }): readonly Category[] {
    const parents = new Set(
      this.listAccounts(ownerId, { includeInactive: true }).map((a) => a.parentId),
    );
    return this.listAccounts(ownerId, {
      type: "expense",
      includeInactive: options?.includeInactive,
    })
      .filter((a) => !parents.has(a.id))
      .map(toCategory);
  }

  /**
   * Assert `id` is an expense account owned by `ownerId`.
   */
  assertCategory(ownerId: string, id: string): Category {
    return toCategory(this.assertOwnedAccount(ownerId, id));
  }

  // ─── Seeding ─────────────────────────────────────────────────────────

  /**
   * Create the starter chart for a new party, in one unit of work.
   */
  seedDefaultAccounts(partyId: string): readonly Account[] {
    return this._store.runInTransaction(() => {
      const byName = new Map<string, Account>();
      return DEFAULT_CHART.map(([name, type, parentName]) => {
        const parent = parentName === undefined ? undefined : byName.get(parentName);
        const account =
          this.findByName(partyId, name) ??
          this.createAccount({
            ownerId: partyId,
            name,
            type,
            parentId: parent?.type === type ? parent.id : undefined,
          });
        byName.set(name, account);
        return account;
      });
    });
  }
}
