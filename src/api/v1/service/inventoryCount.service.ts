import { and, asc, count, desc, eq, inArray, type SQL } from 'drizzle-orm';
import { db } from '../drizzle/db';
import {
    inventoryCountItemTable,
    inventoryCountTable,
    type CountStatus,
    type InventoryCountItemTable,
    type InventoryCountTable,
} from '../drizzle/schema/inventoryCount';
import type { CountPatch, Ledger, LedgerStore } from '../ledger/ledgerStore';
import { pgLedger } from '../ledger/pgLedger';
import { runAtomic } from '../ledger/runAtomic';
import { type Actor, assertOwnerOrStaff } from '../middleware/role';
import { ConflictError, NotFoundError, ValidationError } from '../utils/AppError';
import { getOffset, type PaginationOptions, toPaginated } from '../utils/filterWithPaginate';
import { toDecimal } from '../utils/stockMath';
import { getCurrentDate, toDay } from '../utils/timezone';
import { collectFieldErrors, decimalAmount, nonNegative, noFutureDate } from '../utils/validators';
import { InventoryTransactionService, type TransactionView } from './inventoryTransaction.service';

export type CountItemView = InventoryCountItemTable & {
    variance: number | null;
    variancePercentage: number | null;
};

export type CountDetail = InventoryCountTable & {
    items: CountItemView[];
    totalItems: number;
    completedItems: number;
    progressPercentage: number;
};

export type CompletedCount = CountDetail & {
    adjustments: TransactionView[];
};

export type CreateCountInput = {
    name: string;
    description?: string;
    locationId: string;
    scheduledDate?: string | null;
    notes?: string;
    /** Products to count; every product stocked at the location when omitted. */
    productIds?: string[];
};

export type UpdateCountInput = {
    name?: string;
    description?: string;
    scheduledDate?: string | null;
    notes?: string;
};

export type MarkCountItemInput = {
    countedQuantity?: number | null | undefined;
    countedBy?: string | null | undefined;
    notes?: string;
};

export function getVariance(item: Pick<InventoryCountItemTable, 'isCounted' | 'countedQuantity' | 'expectedQuantity'>) {
    if (!item.isCounted || item.countedQuantity === null) return null;
    return toDecimal(item.countedQuantity - item.expectedQuantity);
}

export function toCountDetail(countRow: InventoryCountTable, items: InventoryCountItemTable[]): CountDetail {
    const views = items.map((item): CountItemView => {
        const variance = getVariance(item);
        return {
            ...item,
            variance,
            variancePercentage: variance !== null && item.expectedQuantity > 0
                ? toDecimal((variance / item.expectedQuantity) * 100)
                : null,
        };
    });
    const completedItems = views.filter((item) => item.isCounted).length;
    return {
        ...countRow,
        items: views,
        totalItems: views.length,
        completedItems,
        progressPercentage: views.length === 0 ? 0 : Math.trunc((completedItems / views.length) * 100),
    };
}

/** Date rules for a count; `scheduledDate` and `completedDate` compare by day. */
export function validateCountDates(countRow: Pick<InventoryCountTable, 'scheduledDate' | 'completedDate'>) {
    const { scheduledDate, completedDate } = countRow;
    const errors = collectFieldErrors([
        ['completedDate', noFutureDate(completedDate)],
        ['scheduledDate', scheduledDate && completedDate && scheduledDate > toDay(completedDate)
            ? 'Scheduled date cannot be after completed date.'
            : null],
    ]);
    if (Object.keys(errors).length > 0) {
        throw new ValidationError(errors);
    }
}

async function lockCountForWrite(store: LedgerStore, id: string) {
    const countRow = await store.lockCount(id);
    if (!countRow) throw new NotFoundError('Inventory count not found');
    return countRow;
}

function assertInProgress(countRow: InventoryCountTable, action: string) {
    if (countRow.status !== 'in_progress') {
        throw new ConflictError(`Inventory count "${countRow.name}" is ${countRow.status}; only counts in progress can be ${action}`);
    }
}

export class InventoryCountService {
    /** Opens a count session, freezing each item's expected quantity. */
    static async createCount(input: CreateCountInput, actor: Actor, ledger: Ledger = pgLedger): Promise<CountDetail> {
        if (input.productIds) {
            const duplicates = input.productIds.filter((id, index) => input.productIds?.indexOf(id) !== index);
            if (duplicates.length > 0) {
                throw ValidationError.forField('productIds', `Products listed more than once: ${[...new Set(duplicates)].join(', ')}`);
            }
        }

        return await runAtomic(ledger, 'create inventory count', async (store) => {
            const location = await store.findLocation(input.locationId);
            if (!location) throw ValidationError.forField('locationId', 'Location not found.');

            let snapshot: Array<{ productId: string; expectedQuantity: number }>;
            if (input.productIds) {
                snapshot = [];
                for (const productId of input.productIds) {
                    if (!await store.findProduct(productId)) {
                        throw ValidationError.forField('productIds', `Product ${productId} not found.`);
                    }
                    const stock = await store.findStock(productId, input.locationId);
                    snapshot.push({ productId, expectedQuantity: stock ? stock.quantity : 0 });
                }
            } else {
                const stock = await store.listStockAtLocation(input.locationId);
                snapshot = stock.map((row) => ({ productId: row.productId, expectedQuantity: row.quantity }));
            }

            const countRow = await store.insertCount({
                name: input.name,
                description: input.description ?? '',
                locationId: input.locationId,
                scheduledDate: input.scheduledDate ?? null,
                notes: input.notes ?? '',
                createdBy: actor.id,
            });
            const items = await store.insertCountItems(snapshot.map((entry) => ({ ...entry, countId: countRow.id })));
            return toCountDetail(countRow, items);
        });
    }

    static async updateCount(id: string, input: UpdateCountInput, actor: Actor, ledger: Ledger = pgLedger): Promise<CountDetail> {
        return await runAtomic(ledger, 'update inventory count', async (store) => {
            const countRow = await lockCountForWrite(store, id);
            assertOwnerOrStaff(actor, countRow.createdBy);
            assertInProgress(countRow, 'edited');

            const patch: CountPatch = { ...input };
            validateCountDates({
                scheduledDate: patch.scheduledDate === undefined ? countRow.scheduledDate : patch.scheduledDate,
                completedDate: countRow.completedDate,
            });
            const updated = await store.updateCount(id, patch);
            return toCountDetail(updated, await store.listCountItems(id));
        });
    }

    /**
     * Records a physical count for one line. `countedAt` is stamped the first
     * time the line becomes counted and kept on later corrections.
     */
    static async markCountItem(
        countId: string,
        itemId: string,
        input: MarkCountItemInput,
        ledger: Ledger = pgLedger,
    ): Promise<CountItemView> {
        const { countedQuantity, countedBy } = input;
        if (countedQuantity === null || countedQuantity === undefined || !countedBy) {
            throw new ValidationError(collectFieldErrors([
                ['countedQuantity', countedQuantity === null || countedQuantity === undefined
                    ? 'A counted quantity is required when marking an item as counted.'
                    : null],
                ['countedBy', countedBy ? null : 'A counting user is required when marking an item as counted.'],
            ]));
        }
        const quantityError = nonNegative(countedQuantity) ?? decimalAmount(countedQuantity, 0);
        if (quantityError) throw ValidationError.forField('countedQuantity', quantityError);

        return await runAtomic(ledger, 'mark count item', async (store) => {
            const countRow = await lockCountForWrite(store, countId);
            assertInProgress(countRow, 'counted');
            const item = (await store.listCountItems(countId)).find((row) => row.id === itemId);
            if (!item) throw new NotFoundError('Inventory count item not found');

            const updated = await store.updateCountItem(itemId, {
                countedQuantity,
                countedBy,
                isCounted: true,
                countedAt: item.isCounted && item.countedAt ? item.countedAt : getCurrentDate(),
                notes: input.notes,
            });
            return toCountDetail(countRow, [updated]).items[0];
        });
    }

    /**
     * Completes a count and books one adjustment per counted line whose
     * quantity differs from the snapshot. The adjustments and the status
     * change commit together.
     */
    static async completeCount(
        id: string,
        completedBy: string | null | undefined,
        actor: Actor,
        ledger: Ledger = pgLedger,
    ): Promise<CompletedCount> {
        if (!completedBy) {
            throw ValidationError.forField('completedBy', "A completed by user is required when status is 'completed'.");
        }

        return await runAtomic(ledger, 'complete inventory count', async (store) => {
            const countRow = await lockCountForWrite(store, id);
            assertOwnerOrStaff(actor, countRow.createdBy);
            assertInProgress(countRow, 'completed');

            const patch = {
                status: 'completed' as const,
                completedDate: countRow.completedDate ?? getCurrentDate(),
                completedBy,
            };
            validateCountDates({ scheduledDate: countRow.scheduledDate, completedDate: patch.completedDate });

            const items = await store.listCountItems(id);
            const adjustments: TransactionView[] = [];
            for (const item of items) {
                const variance = getVariance(item);
                if (variance === null || variance === 0) continue;
                const product = await store.findProduct(item.productId);
                if (!product) throw ValidationError.forField('items', `Product ${item.productId} no longer exists.`);
                const applied = await InventoryTransactionService.applyWithin(store, {
                    transactionType: 'adjustment',
                    productId: item.productId,
                    locationId: countRow.locationId,
                    quantity: variance,
                    unitPrice: product.unitPrice,
                    reference: `Count adjustment: ${countRow.name}`,
                    notes: `Automatic adjustment from inventory count ${countRow.name}`,
                    performedBy: completedBy,
                });
                adjustments.push(applied.transaction);
            }

            const updated = await store.updateCount(id, patch);
            return { ...toCountDetail(updated, items), adjustments };
        });
    }

    static async cancelCount(id: string, actor: Actor, ledger: Ledger = pgLedger): Promise<CountDetail> {
        return await runAtomic(ledger, 'cancel inventory count', async (store) => {
            const countRow = await lockCountForWrite(store, id);
            assertOwnerOrStaff(actor, countRow.createdBy);
            assertInProgress(countRow, 'cancelled');
            const updated = await store.updateCount(id, { status: 'cancelled' });
            return toCountDetail(updated, await store.listCountItems(id));
        });
    }

    static async getCounts(pagination: PaginationOptions, filter: { status?: CountStatus; locationId?: string } = {}) {
        const conditions: SQL[] = [];
        if (filter.status) conditions.push(eq(inventoryCountTable.status, filter.status));
        if (filter.locationId) conditions.push(eq(inventoryCountTable.locationId, filter.locationId));
        const where = conditions.length > 0 ? and(...conditions) : undefined;

        const [{ total }] = await db.select({ total: count() }).from(inventoryCountTable).where(where);
        const counts = await db.select().from(inventoryCountTable)
            .where(where)
            .orderBy(desc(inventoryCountTable.createdAt))
            .limit(pagination.limit)
            .offset(getOffset(pagination));
        const items = counts.length === 0 ? [] : await db.select().from(inventoryCountItemTable)
            .where(inArray(inventoryCountItemTable.countId, counts.map((row) => row.id)));

        const list = counts.map((row) => toCountDetail(row, items.filter((item) => item.countId === row.id)));
        return toPaginated(list, total, pagination);
    }

    static async getCountById(id: string) {
        const [countRow] = await db.select().from(inventoryCountTable).where(eq(inventoryCountTable.id, id));
        if (!countRow) throw new NotFoundError('Inventory count not found');
        const items = await db.select().from(inventoryCountItemTable)
            .where(eq(inventoryCountItemTable.countId, id))
            .orderBy(asc(inventoryCountItemTable.createdAt));
        return toCountDetail(countRow, items);
    }

    static async getUncountedItems(id: string) {
        const detail = await this.getCountById(id);
        return detail.items.filter((item) => !item.isCounted);
    }
}
