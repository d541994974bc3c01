import { z } from 'zod';
import { DECIMAL_LIMIT } from '../utils/validators';

// Quantities and money are numeric(10,2) columns.
export const amountSchema = z.number().multipleOf(0.01).min(-DECIMAL_LIMIT).max(DECIMAL_LIMIT);
export const nonNegativeAmountSchema = z.number().multipleOf(0.01).min(0).max(DECIMAL_LIMIT);
