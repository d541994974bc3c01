import { boolean, date, numeric, pgEnum, pgTable, text, timestamp, unique, uuid, varchar } from 'drizzle-orm/pg-core';
import { locationTable } from './location';
import { productTable } from './product';
import { userTable } from './user';

export const countStatuses = ['in_progress', 'completed', 'cancelled'] as const;
export type CountStatus = typeof countStatuses[number];

export const countStatusEnum = pgEnum('inventory_count_status', countStatuses);

export const inventoryCountTable = pgTable('inventory_counts', {
    id: uuid('id').defaultRandom().primaryKey(),
    name: varchar('name', { length: 255 }).notNull(),
    description: text('description').notNull().default(''),
    locationId: uuid('location_id').references(() => locationTable.id, { onDelete: 'restrict' }).notNull(),
    status: countStatusEnum('status').notNull().default('in_progress'),
    scheduledDate: date('scheduled_date', { mode: 'string' }),
    completedDate: timestamp('completed_date', { withTimezone: true }),
    createdBy: uuid('created_by').references(() => userTable.id, { onDelete: 'restrict' }).notNull(),
    completedBy: uuid('completed_by').references(() => userTable.id, { onDelete: 'restrict' }),
    notes: text('notes').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const inventoryCountItemTable = pgTable('inventory_count_items', {
    id: uuid('id').defaultRandom().primaryKey(),
    countId: uuid('count_id').references(() => inventoryCountTable.id, { onDelete: 'cascade' }).notNull(),
    productId: uuid('product_id').references(() => productTable.id, { onDelete: 'restrict' }).notNull(),
    // Snapshot of stock when the count was created, never re-read.
    expectedQuantity: numeric('expected_quantity', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
    countedQuantity: numeric('counted_quantity', { precision: 10, scale: 2, mode: 'number' }),
    isCounted: boolean('is_counted').notNull().default(false),
    countedBy: uuid('counted_by').references(() => userTable.id, { onDelete: 'restrict' }),
    countedAt: timestamp('counted_at', { withTimezone: true }),
    notes: text('notes').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (t) => [
    unique('inventory_count_items_count_product_unique').on(t.countId, t.productId),
]);

export type InventoryCountTable = typeof inventoryCountTable.$inferSelect;
export type NewInventoryCount = typeof inventoryCountTable.$inferInsert;
export type InventoryCountItemTable = typeof inventoryCountItemTable.$inferSelect;
export type NewInventoryCountItem = typeof inventoryCountItemTable.$inferInsert;
