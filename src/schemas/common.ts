import * as z from 'zod/v4';
import { isValid } from 'date-fns';
import { parseIsoDate } from '../activity/dates.js';
import { NAMED_WINDOWS } from '../activity/types.js';

export const nonEmptyString = z.string().trim().min(1);

export const dateSchema = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'Date must be YYYY-MM-DD' })
  .refine(value => isValid(parseIsoDate(value)), { message: 'Date is not a real calendar day' });

// Input convention for a single entry; stored hours are not bounded.
export const hoursSchema = z.number().min(0.1).max(24);

export const positionSchema = z.number().int().nonnegative();

export const windowSchema = z.enum(NAMED_WINDOWS);

export const categorySchema = (labels: readonly string[]) =>
  nonEmptyString.refine(value => labels.includes(value), {
    message: `Category must be one of: ${labels.join(', ')}`
  });
