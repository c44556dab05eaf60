import type { NormalizedProduct } from './entities/Product.js';
import { ValidationError } from './errors.js';

/**
 * Product fields as delivered by the extraction source, before cleaning.
 * Monetary values usually arrive formatted ("$1,299.99").
 */
export type RawProduct = {
  web_code?: string | null;
  title?: string | null;
  model?: string | null;
  url?: string | null;
  price?: string | number | null;
  save?: string | number | null;
  date?: string | null;
};

export const WEB_CODE_PREFIX = 'Web Code:';
export const MODEL_PREFIX = 'Model:';

export function stripPrefix(text: string, prefix: string): string {
  return text.includes(prefix) ? text.replace(prefix, '').trim() : text.trim();
}

/**
 * Converts a monetary amount to integer cents using string arithmetic only.
 * Anything other than digits and the decimal point is dropped; an empty
 * amount is 0. Fractions beyond two digits are rounded half-up.
 * Throws ValidationError when the amount has no exact integer-cent value.
 */
export function parseAmountToCents(amount: string | number | null | undefined): number {
  if (amount == null) return 0;

  if (typeof amount === 'number' && !(Number.isFinite(amount) && Math.abs(amount) * 100 <= Number.MAX_SAFE_INTEGER)) {
    throw new ValidationError('Amount is out of range', { amount: String(amount) });
  }

  const text = typeof amount === 'number' ? amount.toFixed(3) : amount;
  const cleaned = text.replace(/[^\d.]/g, '');
  if (cleaned === '' || cleaned === '.') return 0;

  const [wholePart = '', ...rest] = cleaned.split('.');
  const fraction = rest.join('');
  const whole = wholePart === '' ? 0 : Number.parseInt(wholePart, 10);
  const cents = Number.parseInt(`${fraction}00`.slice(0, 2), 10);
  const roundUp = fraction.length > 2 && Number(fraction[2]) >= 5 ? 1 : 0;

  const total = whole * 100 + cents + roundUp;
  if (!Number.isSafeInteger(total)) {
    throw new ValidationError('Amount is out of range', { amount: text });
  }
  return total;
}

function parseObservedAt(value: string | null | undefined, fallback: Date): Date {
  if (!value) return fallback;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? fallback : parsed;
}

function cleanOptional(value: string | null | undefined, prefix?: string): string | null {
  if (value == null) return null;
  const cleaned = prefix ? stripPrefix(value, prefix) : value.trim();
  return cleaned === '' ? null : cleaned;
}

/**
 * Cleans raw extraction output into a NormalizedProduct.
 * Field presence is not enforced here; the ingestion decider validates.
 * A web code that names a different product than the one requested is
 * rejected with ValidationError.
 */
export function normalizeRawProduct(
  raw: RawProduct,
  options: { requestedNaturalKey: string; now: Date }
): NormalizedProduct {
  const requested = options.requestedNaturalKey.trim();
  const webCode = cleanOptional(raw.web_code, WEB_CODE_PREFIX);
  if (webCode !== null && webCode !== requested) {
    throw new ValidationError('Extracted web code does not match the requested key', {
      requested,
      extracted: webCode,
    });
  }

  return {
    naturalKey: requested,
    title: (raw.title ?? '').trim(),
    model: cleanOptional(raw.model, MODEL_PREFIX),
    url: (raw.url ?? '').trim(),
    price: parseAmountToCents(raw.price),
    save: parseAmountToCents(raw.save),
    observedAt: parseObservedAt(raw.date, options.now),
  };
}
