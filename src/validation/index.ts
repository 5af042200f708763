import { z } from "zod";
import { reconcileSplits } from "../engine/index.js";
import {
  InvalidAmountError,
  InvalidReferenceError,
  MissingFieldError,
  ValidationError,
} from "../errors/index.js";
import type { NewExpense, NewSplit } from "../types/index.js";

// Plain decimal notation only; Number() alone would also take "0x1E" or "0b11".
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

// Numbers or decimal strings ("12.50"), finite only.
const amountSchema = z
  .union([z.number(), z.string().trim().regex(DECIMAL_PATTERN)])
  .pipe(z.coerce.number().finite());

// Positive integer ids, as numbers or digit strings.
export const idSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/)])
  .pipe(z.coerce.number().int().positive());

const textSchema = z.string().trim();

const bodySchema = z.record(z.string(), z.unknown());

const DEFAULT_CURRENCY = "USD";

const EXPENSE_FIELDS = ["description", "amount", "currency", "payer_id", "splits"] as const;
const SPLIT_FIELDS = ["user_id", "amount"] as const;

/** Resolves which of the given user ids exist. */
export interface UserLookup {
  findExistingIds(ids: number[]): Promise<Set<number>>;
}

function readBody(body: unknown): Record<string, unknown> {
  const parsed = bodySchema.safeParse(body);
  return parsed.success ? parsed.data : {};
}

function missingFields(data: Record<string, unknown>, fields: readonly string[]): string[] {
  return fields.filter((field) => data[field] === undefined || data[field] === null);
}

export function parseUserInput(body: unknown): { username: string; email: string } {
  const data = readBody(body);
  const username = textSchema.safeParse(data.username);
  const email = textSchema.safeParse(data.email);

  const missing: string[] = [];
  if (!username.success || username.data === "") missing.push("username");
  if (!email.success || email.data === "") missing.push("email");

  if (!username.success || !email.success || missing.length > 0) {
    throw new MissingFieldError(missing, "username and email required");
  }

  return { username: username.data, email: email.data };
}

function parseSplit(entry: unknown, index: number): NewSplit {
  const data = readBody(entry);

  const missing = missingFields(data, SPLIT_FIELDS);
  if (missing.length > 0) {
    throw new MissingFieldError(missing.map((field) => `splits[${index}].${field}`));
  }

  const userId = idSchema.safeParse(data.user_id);
  if (!userId.success) {
    throw new InvalidReferenceError("one or more split users are invalid");
  }

  const amount = amountSchema.safeParse(data.amount);
  if (!amount.success) {
    throw new InvalidAmountError(`invalid split amount at splits[${index}]`);
  }

  let percentage: number | null = null;
  if (data.percentage !== undefined && data.percentage !== null) {
    const parsed = amountSchema.safeParse(data.percentage);
    if (!parsed.success) {
      throw new InvalidAmountError(`invalid split percentage at splits[${index}]`);
    }
    percentage = parsed.data;
  }

  return { userId: userId.data, amount: amount.data, percentage };
}

/**
 * Shape-check a proposed expense. Does not touch the store.
 */
export function parseExpenseInput(body: unknown): NewExpense {
  const data = readBody(body);

  const missing = missingFields(data, EXPENSE_FIELDS);
  if (missing.length > 0) {
    throw new MissingFieldError(missing);
  }

  const description = textSchema.safeParse(data.description);
  if (!description.success || description.data === "") {
    throw new MissingFieldError(["description"], "description required");
  }

  const amount = amountSchema.safeParse(data.amount);
  if (!amount.success) {
    throw new InvalidAmountError();
  }

  const currency = textSchema.safeParse(data.currency);
  if (!currency.success) {
    throw new ValidationError("invalid currency");
  }

  const payerId = idSchema.safeParse(data.payer_id);
  if (!payerId.success) {
    throw new InvalidReferenceError("invalid payer");
  }

  const splits = z.array(z.unknown()).safeParse(data.splits);
  if (!splits.success) {
    throw new ValidationError("splits must be a list");
  }

  if (amount.data <= 0 || splits.data.length === 0) {
    throw new InvalidAmountError("invalid split/amount");
  }

  return {
    description: description.data,
    amount: amount.data,
    currency: currency.data || DEFAULT_CURRENCY,
    payerId: payerId.data,
    splits: splits.data.map((entry, index) => parseSplit(entry, index)),
  };
}

/**
 * Split Validator: accept or reject a proposed expense.
 *
 * Checks run in order: required fields, description, amount, non-empty
 * splits, payer, split users, then split totals against the amount.
 * @throws ValidationError (or a subclass) on the first failed check
 */
export async function validateExpense(body: unknown, users: UserLookup): Promise<NewExpense> {
  const expense = parseExpenseInput(body);

  const splitUserIds = [...new Set(expense.splits.map((split) => split.userId))];
  const known = await users.findExistingIds([expense.payerId, ...splitUserIds]);

  if (!known.has(expense.payerId)) {
    throw new InvalidReferenceError("invalid payer");
  }
  if (splitUserIds.some((userId) => !known.has(userId))) {
    throw new InvalidReferenceError("one or more split users are invalid");
  }

  reconcileSplits(
    expense.amount,
    expense.splits.map((split) => split.amount)
  );

  return expense;
}
