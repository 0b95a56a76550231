/**
 * Validation of the persisted item database
 */

import type { ItemDatabase, StoredSale } from "../types";

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates one stored sale
 * @param value - Parsed JSON value
 * @param field - Location used in error messages, e.g. `Iron Ore[3]`
 * @throws ValidationError if the sale is malformed
 */
export function validateStoredSale(value: unknown, field: string): StoredSale {
  if (!isRecord(value)) {
    throw new ValidationError(`${field} must be an object`, field);
  }

  const { price, timestamp, type, quantity, status, price_per_unit, ...rest } = value;
  if (typeof price !== "number" || !Number.isSafeInteger(price) || price < 0) {
    throw new ValidationError(`${field}.price must be a non-negative integer`, `${field}.price`);
  }
  if (typeof timestamp !== "string") {
    throw new ValidationError(`${field}.timestamp must be a string`, `${field}.timestamp`);
  }
  if (type !== undefined && type !== "sale") {
    throw new ValidationError(`${field}.type must be "sale"`, `${field}.type`);
  }
  if (
    quantity !== undefined &&
    (typeof quantity !== "number" || !Number.isSafeInteger(quantity) || quantity < 1)
  ) {
    throw new ValidationError(
      `${field}.quantity must be a positive integer`,
      `${field}.quantity`,
    );
  }

  if (status !== undefined && typeof status !== "string") {
    throw new ValidationError(`${field}.status must be a string`, `${field}.status`);
  }
  if (
    price_per_unit !== undefined &&
    (typeof price_per_unit !== "number" || !Number.isFinite(price_per_unit))
  ) {
    throw new ValidationError(
      `${field}.price_per_unit must be a number`,
      `${field}.price_per_unit`,
    );
  }

  const sale: StoredSale = { price, timestamp, type: "sale" };
  if (quantity !== undefined && quantity !== 1) sale.quantity = quantity;
  if (status !== undefined) sale.status = status;
  if (price_per_unit !== undefined) sale.price_per_unit = price_per_unit;
  for (const [key, extra] of Object.entries(rest)) {
    Object.defineProperty(sale, key, { value: extra, enumerable: true, writable: true, configurable: true });
  }
  return sale;
}

/**
 * Validates a parsed item database file
 * @returns A fresh database; unknown sale fields are carried over unchanged
 * @throws ValidationError on the first malformed entry
 */
export function validateItemDatabase(value: unknown): ItemDatabase {
  if (!isRecord(value)) {
    throw new ValidationError("Item database must be a JSON object");
  }

  // fromEntries defines own properties, so names like "__proto__" stay items
  return Object.fromEntries(
    Object.entries(value).map(([itemName, sales]): [string, StoredSale[]] => {
      if (!Array.isArray(sales)) {
        throw new ValidationError(`${itemName} must be a list of sales`, itemName);
      }
      return [itemName, sales.map((sale, i) => validateStoredSale(sale, `${itemName}[${i}]`))];
    }),
  );
}
