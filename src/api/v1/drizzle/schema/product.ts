import { boolean, numeric, pgEnum, pgTable, text, timestamp, unique, uuid, varchar } from 'drizzle-orm/pg-core';
import { categoryTable } from './category';
import { supplierTable } from './supplier';

export const unitTypes = ['bottle', 'can', 'keg', 'case', 'box', 'each', 'weight', 'volume'] as const;
export type UnitType = typeof unitTypes[number];

export const unitTypeEnum = pgEnum('unit_type', unitTypes);

export const productTable = pgTable('products', {
    id: uuid('id').defaultRandom().primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    sku: varchar('sku', { length: 50 }).notNull().default(''),
    description: text('description').notNull().default(''),
    barcode: varchar('barcode', { length: 100 }).notNull().default(''),
    categoryId: uuid('category_id').references(() => categoryTable.id, { onDelete: 'restrict' }).notNull(),
    supplierId: uuid('supplier_id').references(() => supplierTable.id, { onDelete: 'restrict' }).notNull(),
    unitPrice: numeric('unit_price', { precision: 10, scale: 2, mode: 'number' }).notNull(),
    unitSize: numeric('unit_size', { precision: 10, scale: 2, mode: 'number' }).notNull(),
    unitType: unitTypeEnum('unit_type').notNull().default('bottle'),
    parLevel: numeric('par_level', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
    reorderPoint: numeric('reorder_point', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
    reorderQuantity: numeric('reorder_quantity', { precision: 10, scale: 2, mode: 'number' }).notNull().default(1),
    notes: text('notes').notNull().default(''),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (t) => [
    unique('products_supplier_sku_unique').on(t.supplierId, t.sku),
]);

export type ProductTable = typeof productTable.$inferSelect;
export type NewProduct = typeof productTable.$inferInsert;
