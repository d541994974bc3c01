import { z } from 'zod';
import { nonNegativeAmountSchema } from './amount.validation';
import { unitTypes } from '../drizzle/schema/product';

export const categorySchema = z.object({
    name: z.string().min(1).max(100),
    description: z.string().optional(),
    isActive: z.boolean().optional(),
});

export const supplierSchema = z.object({
    name: z.string().min(1).max(255),
    contactName: z.string().max(255).optional(),
    email: z.string().max(254).optional(),
    phone: z.string().max(20).optional(),
    address: z.string().optional(),
    website: z.string().max(500).optional(),
    notes: z.string().optional(),
    isActive: z.boolean().optional(),
});

export const locationSchema = z.object({
    name: z.string().min(1).max(100),
    description: z.string().optional(),
    isStorage: z.boolean().optional(),
    isService: z.boolean().optional(),
    isActive: z.boolean().optional(),
});

export const productSchema = z.object({
    name: z.string().min(1).max(255),
    sku: z.string().max(50).optional(),
    description: z.string().optional(),
    barcode: z.string().max(100).optional(),
    categoryId: z.string().uuid(),
    supplierId: z.string().uuid(),
    unitPrice: nonNegativeAmountSchema,
    unitSize: nonNegativeAmountSchema,
    unitType: z.enum(unitTypes).optional(),
    parLevel: nonNegativeAmountSchema.optional(),
    reorderPoint: nonNegativeAmountSchema.optional(),
    reorderQuantity: nonNegativeAmountSchema.optional(),
    notes: z.string().optional(),
    isActive: z.boolean().optional(),
});

export const productQuerySchema = z.object({
    categoryId: z.string().uuid().optional(),
    supplierId: z.string().uuid().optional(),
});
