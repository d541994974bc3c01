import type { TransactionType } from '../drizzle/schema/inventoryTransaction';

/** Quantities and prices are stored with two decimals. */
export function toDecimal(value: number) {
    return Number(value.toFixed(2));
}

/**
 * New source quantity after a transaction. Receipts, sales and counts cannot
 * push physical stock below zero; an explicit adjustment may, and a transfer
 * is left unclamped so the two locations always sum to the same total.
 */
export function applyToSource(current: number, type: TransactionType, quantity: number) {
    const next = toDecimal(current + quantity);
    if (next < 0 && type !== 'adjustment' && type !== 'transferred') {
        return 0;
    }
    return next;
}

/** New destination quantity after a transfer of `quantity` (stored negative). */
export function applyToDestination(current: number, quantity: number) {
    return toDecimal(current + Math.abs(quantity));
}

export function transactionTotalValue(quantity: number, unitPrice: number) {
    return toDecimal(Math.abs(quantity) * unitPrice);
}

export interface LedgerEntry {
    transactionType: TransactionType;
    locationId: string;
    destinationLocationId: string | null;
    quantity: number;
}

/**
 * Rebuilds the quantity at `locationId` from an empty row by applying every
 * entry in creation order, exactly as the engine applied them.
 */
export function replayStock(entries: LedgerEntry[], locationId: string) {
    let quantity = 0;
    for (const entry of entries) {
        if (entry.locationId === locationId) {
            quantity = applyToSource(quantity, entry.transactionType, entry.quantity);
        } else if (entry.transactionType === 'transferred' && entry.destinationLocationId === locationId) {
            quantity = applyToDestination(quantity, entry.quantity);
        }
    }
    return quantity;
}
