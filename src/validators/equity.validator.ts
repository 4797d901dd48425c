import Decimal from 'decimal.js';
import { z } from 'zod';
import { SHARE_LIMITS, TICKER_RULES } from '@/config/businessRules';
import { ValidationError } from '@/errors';

/**
 * Ticker input
 *
 * Free text from the form: trimmed and uppercased before the format check,
 * so " msft " and "MSFT" are the same ticker.
 */
export const tickerSchema = z
  .string({
    required_error: 'Ticker is required',
    invalid_type_error: 'Ticker must be a string',
  })
  .trim()
  .toUpperCase()
  .min(1, { message: 'Ticker is required' })
  .max(TICKER_RULES.MAX_INPUT_LENGTH, {
    message: `Ticker cannot exceed ${TICKER_RULES.MAX_INPUT_LENGTH} characters`,
  })
  .regex(TICKER_RULES.PATTERN, {
    message: 'Ticker must be 1-5 letters, optionally followed by a class suffix (e.g. BRK.B)',
  });

/**
 * Share count input
 *
 * The form field is free text, so numeric strings ("12") are accepted
 * alongside numbers. Anything else is left as-is and fails the number check.
 */
export const shareCountSchema = z.preprocess(
  (value) =>
    typeof value === 'string' && /^\s*[+-]?\d+(\.\d+)?\s*$/.test(value)
      ? Number(value.trim())
      : value,
  z
    .number({
      required_error: 'Share count is required',
      invalid_type_error: 'Share count must be a whole number',
    })
    .int({ message: 'Share count must be a whole number' })
    .min(SHARE_LIMITS.MIN_SHARE_COUNT, {
      message: `Share count must be at least ${SHARE_LIMITS.MIN_SHARE_COUNT}`,
    })
    .max(SHARE_LIMITS.MAX_SHARE_COUNT, {
      message: `Share count cannot exceed ${SHARE_LIMITS.MAX_SHARE_COUNT} shares`,
    })
);

/**
 * Price input, kept as a decimal string
 */
const priceSchema = z.preprocess(
  (value) => (typeof value === 'number' && Number.isFinite(value) ? String(value) : value),
  z
    .string({
      required_error: 'Price is required',
      invalid_type_error: 'Price must be a decimal number',
    })
    .trim()
    .regex(/^\d+(\.\d{1,6})?$/, { message: 'Price must be a decimal number with up to 6 decimals' })
    // Runs even when the format check failed, so only compare well-formed values
    .refine((value) => !/^\d+(\.\d+)?$/.test(value) || new Decimal(value).greaterThan(0), {
      message: 'Price must be greater than 0',
    })
);

export const addEquitySchema = z.object({
  ticker: tickerSchema,
  shareCount: shareCountSchema,
});

export const updateShareCountSchema = z.object({
  shareCount: shareCountSchema,
});

export const recordQuoteSchema = z.object({
  previousClose: priceSchema,
  currentPrice: priceSchema,
});

export type AddEquityDTO = z.infer<typeof addEquitySchema>;
export type RecordQuoteDTO = z.infer<typeof recordQuoteSchema>;

/**
 * Parse input or throw a ValidationError
 *
 * The error message is the first issue's message ("Ticker is required"),
 * the per-field breakdown goes in the details.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const error: z.ZodError = result.error;
    throw new ValidationError(error.issues[0]?.message ?? 'Invalid input', error.flatten());
  }

  return result.data;
}

export const draftIdSchema = z
  .string({ required_error: 'Draft ID is required' })
  .uuid({ message: 'Invalid draft ID' });
