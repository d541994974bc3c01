import { and, asc, eq, or, sql } from 'drizzle-orm';
import { LEDGER_LOCK_TIMEOUT_MS } from '../config/env';
import { db, type DatabaseTransaction } from '../drizzle/db';
import { inventoryCountItemTable, inventoryCountTable, type NewInventoryCount, type NewInventoryCountItem } from '../drizzle/schema/inventoryCount';
import { inventoryItemTable } from '../drizzle/schema/inventoryItem';
import { inventoryTransactionTable, type NewInventoryTransaction } from '../drizzle/schema/inventoryTransaction';
import { locationTable } from '../drizzle/schema/location';
import { orderItemTable, orderTable, type NewOrder, type NewOrderItem } from '../drizzle/schema/order';
import { productTable } from '../drizzle/schema/product';
import { ConsistencyError } from '../utils/AppError';
import {
    getPgErrorCode,
    PG_DEADLOCK_DETECTED,
    PG_LOCK_NOT_AVAILABLE,
    PG_SERIALIZATION_FAILURE,
} from '../utils/pgError';
import { getCurrentDate } from '../utils/timezone';
import type { CountItemPatch, CountPatch, Ledger, LedgerStore, OrderItemPatch, OrderPatch } from './ledgerStore';

const TRANSIENT_CODES = new Set([PG_SERIALIZATION_FAILURE, PG_DEADLOCK_DETECTED, PG_LOCK_NOT_AVAILABLE]);

function missingRow(table: string, id: string) {
    return new ConsistencyError(`${table} row ${id} disappeared mid-transaction`);
}

export class PgLedgerStore implements LedgerStore {
    constructor(private readonly tx: DatabaseTransaction) {}

    async lockStock(productId: string, locationId: string) {
        const [stock] = await this.tx.select().from(inventoryItemTable)
            .where(and(
                eq(inventoryItemTable.productId, productId),
                eq(inventoryItemTable.locationId, locationId),
            ))
            .for('update');
        return stock;
    }

    async ensureStock(productId: string, locationId: string) {
        await this.tx.insert(inventoryItemTable)
            .values({ productId, locationId, quantity: 0 })
            .onConflictDoNothing({ target: [inventoryItemTable.productId, inventoryItemTable.locationId] });
    }

    async setStockQuantity(id: string, quantity: number) {
        const [updated] = await this.tx.update(inventoryItemTable)
            .set({ quantity, updatedAt: getCurrentDate() })
            .where(eq(inventoryItemTable.id, id))
            .returning();
        if (!updated) throw missingRow('inventory_items', id);
        return updated;
    }

    async findStock(productId: string, locationId: string) {
        const [stock] = await this.tx.select().from(inventoryItemTable)
            .where(and(
                eq(inventoryItemTable.productId, productId),
                eq(inventoryItemTable.locationId, locationId),
            ));
        return stock;
    }

    async listStockAtLocation(locationId: string) {
        return await this.tx.select().from(inventoryItemTable)
            .where(eq(inventoryItemTable.locationId, locationId));
    }

    async insertTransaction(values: NewInventoryTransaction) {
        const [inserted] = await this.tx.insert(inventoryTransactionTable).values(values).returning();
        return inserted;
    }

    async listTransactionsFor(productId: string, locationId: string) {
        return await this.tx.select().from(inventoryTransactionTable)
            .where(and(
                eq(inventoryTransactionTable.productId, productId),
                or(
                    eq(inventoryTransactionTable.locationId, locationId),
                    eq(inventoryTransactionTable.destinationLocationId, locationId),
                ),
            ))
            .orderBy(asc(inventoryTransactionTable.sequence));
    }

    async findProduct(id: string) {
        const [product] = await this.tx.select().from(productTable).where(eq(productTable.id, id));
        return product;
    }

    async findLocation(id: string) {
        const [location] = await this.tx.select().from(locationTable).where(eq(locationTable.id, id));
        return location;
    }

    async findDefaultStorageLocation() {
        const [location] = await this.tx.select().from(locationTable)
            .where(and(eq(locationTable.isStorage, true), eq(locationTable.isActive, true)))
            .orderBy(asc(locationTable.name))
            .limit(1);
        return location;
    }

    async insertOrder(values: NewOrder) {
        const [inserted] = await this.tx.insert(orderTable).values(values).returning();
        return inserted;
    }

    async insertOrderItems(values: NewOrderItem[]) {
        if (values.length === 0) return [];
        return await this.tx.insert(orderItemTable).values(values).returning();
    }

    async lockOrder(id: string) {
        const [order] = await this.tx.select().from(orderTable).where(eq(orderTable.id, id)).for('update');
        return order;
    }

    async listOrderItems(orderId: string) {
        return await this.tx.select().from(orderItemTable)
            .where(eq(orderItemTable.orderId, orderId))
            .orderBy(asc(orderItemTable.createdAt), asc(orderItemTable.id));
    }

    async updateOrder(id: string, patch: OrderPatch) {
        const [updated] = await this.tx.update(orderTable)
            .set({ ...patch, updatedAt: getCurrentDate() })
            .where(eq(orderTable.id, id))
            .returning();
        if (!updated) throw missingRow('orders', id);
        return updated;
    }

    async updateOrderItem(id: string, patch: OrderItemPatch) {
        const [updated] = await this.tx.update(orderItemTable)
            .set({ ...patch, updatedAt: getCurrentDate() })
            .where(eq(orderItemTable.id, id))
            .returning();
        if (!updated) throw missingRow('order_items', id);
        return updated;
    }

    async insertCount(values: NewInventoryCount) {
        const [inserted] = await this.tx.insert(inventoryCountTable).values(values).returning();
        return inserted;
    }

    async insertCountItems(values: NewInventoryCountItem[]) {
        if (values.length === 0) return [];
        return await this.tx.insert(inventoryCountItemTable).values(values).returning();
    }

    async lockCount(id: string) {
        const [count] = await this.tx.select().from(inventoryCountTable)
            .where(eq(inventoryCountTable.id, id))
            .for('update');
        return count;
    }

    async listCountItems(countId: string) {
        return await this.tx.select().from(inventoryCountItemTable)
            .where(eq(inventoryCountItemTable.countId, countId))
            .orderBy(asc(inventoryCountItemTable.createdAt), asc(inventoryCountItemTable.id));
    }

    async updateCount(id: string, patch: CountPatch) {
        const [updated] = await this.tx.update(inventoryCountTable)
            .set({ ...patch, updatedAt: getCurrentDate() })
            .where(eq(inventoryCountTable.id, id))
            .returning();
        if (!updated) throw missingRow('inventory_counts', id);
        return updated;
    }

    async updateCountItem(id: string, patch: CountItemPatch) {
        const [updated] = await this.tx.update(inventoryCountItemTable)
            .set({ ...patch, updatedAt: getCurrentDate() })
            .where(eq(inventoryCountItemTable.id, id))
            .returning();
        if (!updated) throw missingRow('inventory_count_items', id);
        return updated;
    }
}

export class PgLedger implements Ledger {
    async transaction<T>(work: (store: LedgerStore) => Promise<T>): Promise<T> {
        return await db.transaction(async (tx) => {
            // Blocked row locks fail fast with 55P03 instead of hanging the request.
            await tx.execute(sql.raw(`set local lock_timeout = ${Math.trunc(LEDGER_LOCK_TIMEOUT_MS)}`));
            return await work(new PgLedgerStore(tx));
        });
    }

    isTransientError(err: unknown) {
        if (err instanceof ConsistencyError) return true;
        const code = getPgErrorCode(err);
        return code !== undefined && TRANSIENT_CODES.has(code);
    }
}

export const pgLedger = new PgLedger();
