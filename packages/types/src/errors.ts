/**
 * Error taxonomy shared by every Ledgerline package.
 *
 * Each package throws its own coded subclass; the kind decides how a
 * caller reacts:
 * - validation: rejected before any write, fix the input and retry
 * - not_found: missing resource, do not retry
 * - conflict: uniqueness violated
 * - database: persistence failure, retryable
 */

export type ErrorKind = "validation" | "not_found" | "conflict" | "database";

export abstract class FinanceError extends Error {
  public readonly code: string;
  public readonly kind: ErrorKind;
  public readonly details?: Record<string, unknown> | undefined;

  protected constructor(
    code: string,
    kind: ErrorKind,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.code = code;
    this.kind = kind;
    this.details = details;
  }
}

export function isFinanceError(value: unknown): value is FinanceError {
  return value instanceof FinanceError;
}
