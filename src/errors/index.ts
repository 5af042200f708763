/**
 * Ledger Domain Errors
 *
 * Each error carries the HTTP status the request layer answers with.
 */

export class LedgerError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = "LedgerError";
    this.status = status;
  }
}

/** Rejected input. Always raised before anything is written. */
export class ValidationError extends LedgerError {
  constructor(message: string) {
    super(message, 400);
    this.name = "ValidationError";
  }
}

export class MissingFieldError extends ValidationError {
  readonly fields: string[];

  constructor(fields: string[], message = `missing fields: ${fields.join(", ")}`) {
    super(message);
    this.name = "MissingFieldError";
    this.fields = fields;
  }
}

export class InvalidAmountError extends ValidationError {
  constructor(message = "invalid amount") {
    super(message);
    this.name = "InvalidAmountError";
  }
}

export class DuplicateUserError extends ValidationError {
  constructor() {
    super("username or email already exists");
    this.name = "DuplicateUserError";
  }
}

export class InvalidReferenceError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidReferenceError";
  }
}

export class SplitMismatchError extends ValidationError {
  readonly splitTotal: number;
  readonly expenseTotal: number;

  constructor(splitTotal: number, expenseTotal: number) {
    super(`split totals (${splitTotal}) do not equal amount (${expenseTotal})`);
    this.name = "SplitMismatchError";
    this.splitTotal = splitTotal;
    this.expenseTotal = expenseTotal;
  }
}

export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}
