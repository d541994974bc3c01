import { numeric, pgTable, timestamp, unique, uuid } from 'drizzle-orm/pg-core';
import { locationTable } from './location';
import { productTable } from './product';

// Current quantity per (product, location). Only the transaction engine writes it.
export const inventoryItemTable = pgTable('inventory_items', {
  id: uuid('id').defaultRandom().primaryKey(),
  productId: uuid('product_id').references(() => productTable.id, { onDelete: 'cascade' }).notNull(),
  locationId: uuid('location_id').references(() => locationTable.id, { onDelete: 'cascade' }).notNull(),
  quantity: numeric('quantity', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (t) => [
  unique('inventory_items_product_location_unique').on(t.productId, t.locationId),
]);

export type InventoryItemTable = typeof inventoryItemTable.$inferSelect;
export type NewInventoryItem = typeof inventoryItemTable.$inferInsert;
