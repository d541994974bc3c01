import { and, count, desc, eq, type SQL } from 'drizzle-orm';
import { db } from '../drizzle/db';
import { inventoryTransactionTable, type InventoryTransactionTable, type TransactionType } from '../drizzle/schema/inventoryTransaction';
import type { InventoryItemTable } from '../drizzle/schema/inventoryItem';
import type { Ledger, LedgerStore } from '../ledger/ledgerStore';
import { pgLedger } from '../ledger/pgLedger';
import { runAtomic } from '../ledger/runAtomic';
import { ConsistencyError, NotFoundError, ValidationError } from '../utils/AppError';
import { getOffset, type PaginationOptions, toPaginated } from '../utils/filterWithPaginate';
import { applyToDestination, applyToSource, replayStock, toDecimal, transactionTotalValue } from '../utils/stockMath';
import { getToday } from '../utils/timezone';
import { collectFieldErrors, decimalAmount, noFutureDate } from '../utils/validators';

export type ApplyTransactionInput = {
    transactionType: TransactionType;
    productId: string;
    locationId: string;
    destinationLocationId?: string | null;
    quantity: number;
    unitPrice: number;
    performedBy: string;
    transactionDate?: string;
    reference?: string;
    notes?: string;
};

export type TransactionView = InventoryTransactionTable & {
    totalValue: number;
};

export type AppliedTransaction = {
    transaction: TransactionView;
    source: InventoryItemTable;
    destination: InventoryItemTable | null;
};

export type TransactionFilter = {
    productId?: string;
    locationId?: string;
    transactionType?: TransactionType;
};

export type StockVerification = {
    productId: string;
    locationId: string;
    quantity: number;
    replayedQuantity: number;
    transactionCount: number;
    consistent: boolean;
};

export function toTransactionView(row: InventoryTransactionTable): TransactionView {
    return { ...row, totalValue: transactionTotalValue(row.quantity, row.unitPrice) };
}

/**
 * Sign and transfer rules. Direction is encoded in the stored quantity, so a
 * sale or transfer must arrive negative and a receipt positive; nothing is
 * flipped on the caller's behalf.
 */
export function validateTransactionInput(input: ApplyTransactionInput) {
    const { transactionType, quantity, destinationLocationId } = input;
    const amountError = decimalAmount(quantity);
    let quantityError: string | null = null;
    if (!Number.isFinite(quantity)) {
        quantityError = 'Quantity must be a number.';
    } else if (amountError) {
        quantityError = amountError;
    } else if ((transactionType === 'sold' || transactionType === 'transferred') && quantity >= 0) {
        quantityError = `Quantity must be negative for ${transactionType} transactions.`;
    } else if (transactionType === 'received' && quantity <= 0) {
        quantityError = 'Quantity must be positive for received transactions.';
    }

    let destinationError: string | null = null;
    if (transactionType === 'transferred') {
        if (!destinationLocationId) {
            destinationError = 'Destination location is required for transfers.';
        } else if (destinationLocationId === input.locationId) {
            destinationError = 'Destination location must be different from source location.';
        }
    } else if (destinationLocationId) {
        destinationError = 'Destination location is only used by transfers.';
    }

    const errors = collectFieldErrors([
        ['quantity', quantityError],
        ['destinationLocationId', destinationError],
        ['unitPrice', decimalAmount(input.unitPrice, 0)],
        ['transactionDate', noFutureDate(input.transactionDate)],
    ]);
    if (Object.keys(errors).length > 0) {
        throw new ValidationError(errors);
    }
}

async function lockOrCreateStock(store: LedgerStore, productId: string, locationId: string) {
    await store.ensureStock(productId, locationId);
    const stock = await store.lockStock(productId, locationId);
    if (!stock) {
        throw new ConsistencyError(`Stock row for product ${productId} at location ${locationId} vanished after creation`);
    }
    return stock;
}

export class InventoryTransactionService {
    /**
     * Records one transaction and moves stock inside the caller's unit of
     * work. Workflows use this so their own writes commit or roll back
     * together with the stock movements.
     */
    static async applyWithin(store: LedgerStore, input: ApplyTransactionInput): Promise<AppliedTransaction> {
        validateTransactionInput(input);

        const product = await store.findProduct(input.productId);
        if (!product) throw ValidationError.forField('productId', 'Product not found.');
        const location = await store.findLocation(input.locationId);
        if (!location) throw ValidationError.forField('locationId', 'Location not found.');
        const destinationLocationId = input.transactionType === 'transferred' ? input.destinationLocationId ?? null : null;
        if (destinationLocationId && !await store.findLocation(destinationLocationId)) {
            throw ValidationError.forField('destinationLocationId', 'Destination location not found.');
        }

        const quantity = toDecimal(input.quantity);
        // Stock rows are locked before the transaction row takes its sequence
        // number, so sequence order is the order in which stock changed.
        let sourceRow: InventoryItemTable;
        let destinationRow: InventoryItemTable | null = null;
        if (destinationLocationId) {
            // Lock both rows in a fixed order so opposite transfers cannot deadlock.
            const [first, second] = [input.locationId, destinationLocationId].sort();
            const locked = new Map<string, InventoryItemTable>();
            locked.set(first, await lockOrCreateStock(store, input.productId, first));
            locked.set(second, await lockOrCreateStock(store, input.productId, second));
            const lockedSource = locked.get(input.locationId);
            const lockedDestination = locked.get(destinationLocationId);
            if (!lockedSource || !lockedDestination) {
                throw new ConsistencyError('Transfer stock rows could not be locked');
            }
            sourceRow = lockedSource;
            destinationRow = lockedDestination;
        } else {
            sourceRow = await lockOrCreateStock(store, input.productId, input.locationId);
        }

        const transaction = await store.insertTransaction({
            transactionType: input.transactionType,
            transactionDate: input.transactionDate ?? getToday(),
            productId: input.productId,
            locationId: input.locationId,
            destinationLocationId,
            quantity,
            unitPrice: toDecimal(input.unitPrice),
            reference: input.reference ?? '',
            notes: input.notes ?? '',
            performedBy: input.performedBy,
        });

        const source = await store.setStockQuantity(
            sourceRow.id,
            applyToSource(sourceRow.quantity, input.transactionType, quantity),
        );
        const destination = destinationRow
            ? await store.setStockQuantity(destinationRow.id, applyToDestination(destinationRow.quantity, quantity))
            : null;
        return { transaction: toTransactionView(transaction), source, destination };
    }

    static async applyTransaction(input: ApplyTransactionInput, ledger: Ledger = pgLedger) {
        // Reject bad input before opening a database transaction at all.
        validateTransactionInput(input);
        return await runAtomic(ledger, 'apply transaction', (store) => this.applyWithin(store, input));
    }

    static async getStock(productId: string, locationId: string, ledger: Ledger = pgLedger) {
        return await ledger.transaction(async (store) => {
            const stock = await store.findStock(productId, locationId);
            return stock ? stock.quantity : 0;
        });
    }

    /** Replays every transaction for the pair and compares with the live row. */
    static async verifyStock(productId: string, locationId: string, ledger: Ledger = pgLedger): Promise<StockVerification> {
        return await ledger.transaction(async (store) => {
            const stock = await store.findStock(productId, locationId);
            const entries = await store.listTransactionsFor(productId, locationId);
            const quantity = stock ? stock.quantity : 0;
            const replayedQuantity = replayStock(entries, locationId);
            return {
                productId,
                locationId,
                quantity,
                replayedQuantity,
                transactionCount: entries.length,
                consistent: quantity === replayedQuantity,
            };
        });
    }

    static async getTransactions(pagination: PaginationOptions, filter: TransactionFilter = {}) {
        const conditions: SQL[] = [];
        if (filter.productId) conditions.push(eq(inventoryTransactionTable.productId, filter.productId));
        if (filter.locationId) conditions.push(eq(inventoryTransactionTable.locationId, filter.locationId));
        if (filter.transactionType) conditions.push(eq(inventoryTransactionTable.transactionType, filter.transactionType));
        const where = conditions.length > 0 ? and(...conditions) : undefined;

        const [{ total }] = await db.select({ total: count() }).from(inventoryTransactionTable).where(where);
        const rows = await db.select().from(inventoryTransactionTable)
            .where(where)
            .orderBy(desc(inventoryTransactionTable.sequence))
            .limit(pagination.limit)
            .offset(getOffset(pagination));

        return toPaginated(rows.map(toTransactionView), total, pagination);
    }

    static async getTransactionById(id: string) {
        const [row] = await db.select().from(inventoryTransactionTable).where(eq(inventoryTransactionTable.id, id));
        if (!row) throw new NotFoundError('Transaction not found');
        return toTransactionView(row);
    }
}
