import { z } from 'zod';
import { nonNegativeAmountSchema } from './amount.validation';
import { countStatuses } from '../drizzle/schema/inventoryCount';

export const createCountSchema = z.object({
    name: z.string().min(1).max(255),
    description: z.string().optional(),
    locationId: z.string().uuid(),
    scheduledDate: z.string().date().nullish(),
    notes: z.string().optional(),
    productIds: z.array(z.string().uuid()).optional(),
});

// Completion and cancellation have their own endpoints.
export const updateCountSchema = z.object({
    name: z.string().min(1).max(255).optional(),
    description: z.string().optional(),
    scheduledDate: z.string().date().nullish(),
    notes: z.string().optional(),
}).strict();

// Presence of both values is checked by the count workflow.
export const markCountItemSchema = z.object({
    countedQuantity: nonNegativeAmountSchema.nullish(),
    countedBy: z.string().uuid().nullish(),
    notes: z.string().optional(),
});

export const completeCountSchema = z.object({
    completedBy: z.string().uuid().nullish(),
});

export const countQuerySchema = z.object({
    status: z.enum(countStatuses).optional(),
    locationId: z.string().uuid().optional(),
});
