import { date, numeric, pgEnum, pgTable, text, timestamp, unique, uuid, varchar } from 'drizzle-orm/pg-core';
import { locationTable } from './location';
import { productTable } from './product';
import { supplierTable } from './supplier';
import { userTable } from './user';

export const orderStatuses = ['draft', 'pending', 'placed', 'received', 'cancelled'] as const;
export type OrderStatus = typeof orderStatuses[number];

export const orderStatusEnum = pgEnum('order_status', orderStatuses);

export const orderTable = pgTable('orders', {
    id: uuid('id').defaultRandom().primaryKey(),
    orderNumber: varchar('order_number', { length: 50 }).notNull().unique(),
    supplierId: uuid('supplier_id').references(() => supplierTable.id, { onDelete: 'restrict' }).notNull(),
    deliveryLocationId: uuid('delivery_location_id').references(() => locationTable.id, { onDelete: 'restrict' }),
    status: orderStatusEnum('status').notNull().default('draft'),
    orderDate: date('order_date', { mode: 'string' }),
    expectedDeliveryDate: date('expected_delivery_date', { mode: 'string' }),
    actualDeliveryDate: date('actual_delivery_date', { mode: 'string' }),
    shippingCost: numeric('shipping_cost', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
    tax: numeric('tax', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
    discount: numeric('discount', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
    notes: text('notes').notNull().default(''),
    createdBy: uuid('created_by').references(() => userTable.id, { onDelete: 'restrict' }).notNull(),
    updatedBy: uuid('updated_by').references(() => userTable.id, { onDelete: 'restrict' }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const orderItemTable = pgTable('order_items', {
    id: uuid('id').defaultRandom().primaryKey(),
    orderId: uuid('order_id').references(() => orderTable.id, { onDelete: 'cascade' }).notNull(),
    productId: uuid('product_id').references(() => productTable.id, { onDelete: 'restrict' }).notNull(),
    quantity: numeric('quantity', { precision: 10, scale: 2, mode: 'number' }).notNull(),
    unitPrice: numeric('unit_price', { precision: 10, scale: 2, mode: 'number' }).notNull(),
    receivedQuantity: numeric('received_quantity', { precision: 10, scale: 2, mode: 'number' }).notNull().default(0),
    notes: text('notes').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (t) => [
    unique('order_items_order_product_unique').on(t.orderId, t.productId),
]);

export type OrderTable = typeof orderTable.$inferSelect;
export type NewOrder = typeof orderTable.$inferInsert;
export type OrderItemTable = typeof orderItemTable.$inferSelect;
export type NewOrderItem = typeof orderItemTable.$inferInsert;
