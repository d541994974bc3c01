import { bigserial, date, numeric, pgEnum, pgTable, text, timestamp, uuid, varchar } from 'drizzle-orm/pg-core';
import { locationTable } from './location';
import { productTable } from './product';
import { userTable } from './user';

export const transactionTypes = ['received', 'sold', 'transferred', 'adjustment', 'count'] as const;
export type TransactionType = typeof transactionTypes[number];

export const transactionTypeEnum = pgEnum('transaction_type', transactionTypes);

// Append-only. Rows are never updated or deleted; corrections are new rows.
export const inventoryTransactionTable = pgTable('inventory_transactions', {
    id: uuid('id').defaultRandom().primaryKey(),
    sequence: bigserial('sequence', { mode: 'number' }).notNull().unique(),
    transactionType: transactionTypeEnum('transaction_type').notNull(),
    transactionDate: date('transaction_date', { mode: 'string' }).notNull(),
    productId: uuid('product_id').references(() => productTable.id, { onDelete: 'restrict' }).notNull(),
    locationId: uuid('location_id').references(() => locationTable.id, { onDelete: 'restrict' }).notNull(),
    destinationLocationId: uuid('destination_location_id').references(() => locationTable.id, { onDelete: 'restrict' }),
    quantity: numeric('quantity', { precision: 10, scale: 2, mode: 'number' }).notNull(),
    unitPrice: numeric('unit_price', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
    reference: varchar('reference', { length: 255 }).notNull().default(''),
    notes: text('notes').notNull().default(''),
    performedBy: uuid('performed_by').references(() => userTable.id, { onDelete: 'restrict' }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export type InventoryTransactionTable = typeof inventoryTransactionTable.$inferSelect;
export type NewInventoryTransaction = typeof inventoryTransactionTable.$inferInsert;
