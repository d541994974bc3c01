import { z } from 'zod';
import { amountSchema, nonNegativeAmountSchema } from './amount.validation';
import { transactionTypes } from '../drizzle/schema/inventoryTransaction';

// Shape only. Sign and transfer rules live in the transaction engine so that
// workflows calling it directly get the same checks.
export const createTransactionSchema = z.object({
    transactionType: z.enum(transactionTypes),
    productId: z.string().uuid(),
    locationId: z.string().uuid(),
    destinationLocationId: z.string().uuid().nullish(),
    quantity: amountSchema,
    unitPrice: nonNegativeAmountSchema.default(0),
    transactionDate: z.string().date().optional(),
    reference: z.string().max(255).optional(),
    notes: z.string().optional(),
});
export type CreateTransactionBody = z.infer<typeof createTransactionSchema>;

export const transactionQuerySchema = z.object({
    productId: z.string().uuid().optional(),
    locationId: z.string().uuid().optional(),
    transactionType: z.enum(transactionTypes).optional(),
});

export const stockQuerySchema = z.object({
    productId: z.string().uuid(),
    locationId: z.string().uuid(),
});
