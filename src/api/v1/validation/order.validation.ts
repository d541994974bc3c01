import { z } from 'zod';
import { nonNegativeAmountSchema } from './amount.validation';
import { orderStatuses } from '../drizzle/schema/order';

const orderItemSchema = z.object({
    productId: z.string().uuid(),
    quantity: nonNegativeAmountSchema,
    unitPrice: nonNegativeAmountSchema,
    notes: z.string().optional(),
});

export const createOrderSchema = z.object({
    orderNumber: z.string().max(50).optional(),
    supplierId: z.string().uuid(),
    deliveryLocationId: z.string().uuid().nullish(),
    status: z.enum(['draft', 'pending']).optional(),
    expectedDeliveryDate: z.string().date().nullish(),
    shippingCost: nonNegativeAmountSchema.optional(),
    tax: nonNegativeAmountSchema.optional(),
    discount: nonNegativeAmountSchema.optional(),
    notes: z.string().optional(),
    items: z.array(orderItemSchema).min(1),
});
export type CreateOrderBody = z.infer<typeof createOrderSchema>;

// Placing, receiving and cancelling have their own endpoints, so a generic
// edit may only move an order between draft and pending.
export const updateOrderSchema = z.object({
    status: z.enum(['draft', 'pending']).optional(),
    deliveryLocationId: z.string().uuid().nullish(),
    expectedDeliveryDate: z.string().date().nullish(),
    shippingCost: nonNegativeAmountSchema.optional(),
    tax: nonNegativeAmountSchema.optional(),
    discount: nonNegativeAmountSchema.optional(),
    notes: z.string().optional(),
}).strict();

export const receivedQuantitySchema = z.object({
    receivedQuantity: nonNegativeAmountSchema,
    notes: z.string().optional(),
});

export const receiveOrderSchema = z.object({
    items: z.array(z.object({
        itemId: z.string().uuid(),
        receivedQuantity: nonNegativeAmountSchema,
    })).default([]),
});

export const orderQuerySchema = z.object({
    status: z.enum(orderStatuses).optional(),
    supplierId: z.string().uuid().optional(),
});
