import { PurchaseReport } from '../notifier/messages';
import { isRecord } from '../utils/guards';

export const REQUIRED_FIELDS = ['username', 'item', 'price'] as const;

export type PurchaseParseResult =
  | { ok: true; purchase: PurchaseReport }
  | { ok: false; reason: string; requiredFields?: readonly string[] };

/** Plain decimal notation only; rejects the hex, binary and octal forms `Number()` takes */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * `3`, `"3.5"`, `" 7 "` → number; anything else (including booleans,
 * blank strings, `"0x10"` and non-finite values) → undefined.
 */
export function coercePrice(raw: unknown): number | undefined {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : undefined;
  }
  if (typeof raw === 'string' && DECIMAL_PATTERN.test(raw.trim())) {
    const parsed = Number(raw.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Validate a manual purchase report body into a normalized PurchaseReport.
 */
export function parsePurchaseReport(body: unknown): PurchaseParseResult {
  if (!isRecord(body)) {
    return { ok: false, reason: 'Content-Type must be application/json' };
  }

  const missing = REQUIRED_FIELDS.filter((field) => body[field] === undefined || body[field] === null);
  if (missing.length > 0) {
    return {
      ok: false,
      reason: `Missing required fields: ${missing.join(', ')}`,
      requiredFields: REQUIRED_FIELDS,
    };
  }

  const { username: rawUsername, item: rawItem, price: rawPrice } = body;

  if (typeof rawUsername !== 'string') {
    return { ok: false, reason: 'Username must be a string' };
  }
  if (typeof rawItem !== 'string') {
    return { ok: false, reason: 'Item must be a string' };
  }

  const username = rawUsername.trim();
  const item = rawItem.trim();

  if (!username) {
    return { ok: false, reason: 'Username cannot be empty' };
  }
  if (!item) {
    return { ok: false, reason: 'Item cannot be empty' };
  }

  const price = coercePrice(rawPrice);
  if (price === undefined) {
    return { ok: false, reason: 'Price must be a valid number' };
  }
  if (price < 0) {
    return { ok: false, reason: 'Price cannot be negative' };
  }

  return { ok: true, purchase: { username, item, price } };
}
