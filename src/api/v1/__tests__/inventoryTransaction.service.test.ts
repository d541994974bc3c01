import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { LocationTable } from '../drizzle/schema/location';
import type { ProductTable } from '../drizzle/schema/product';
import { type ApplyTransactionInput, InventoryTransactionService } from '../service/inventoryTransaction.service';
import { ConsistencyError, ValidationError } from '../utils/AppError';
import { MemoryLedger, TransientLedgerError } from './helpers/memoryLedger';

const BARTENDER = '6f1d9a52-1111-4c3e-9d7a-000000000001';

describe('InventoryTransactionService', () => {
    let ledger: MemoryLedger;
    let cellar: LocationTable;
    let bar: LocationTable;
    let gin: ProductTable;

    const apply = (input: Partial<ApplyTransactionInput> & Pick<ApplyTransactionInput, 'transactionType' | 'quantity'>) =>
        InventoryTransactionService.applyTransaction({
            productId: gin.id,
            locationId: cellar.id,
            unitPrice: 20,
            performedBy: BARTENDER,
            ...input,
        }, ledger);

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date(2024, 5, 15, 18, 0, 0));
        ledger = new MemoryLedger();
        cellar = ledger.addLocation({ name: 'Cellar', isStorage: true });
        bar = ledger.addLocation({ name: 'Main Bar', isService: true });
        gin = ledger.addProduct({ name: 'London Dry Gin', unitPrice: 20 });
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('records a receipt and creates the stock row', async () => {
        const applied = await apply({ transactionType: 'received', quantity: 10 });

        expect(applied.source.quantity).toBe(10);
        expect(applied.destination).toBeNull();
        expect(applied.transaction).toMatchObject({
            transactionType: 'received',
            quantity: 10,
            unitPrice: 20,
            totalValue: 200,
            transactionDate: '2024-06-15',
            performedBy: BARTENDER,
        });
        expect(ledger.quantityOf(gin.id, cellar.id)).toBe(10);
        expect(ledger.state.transactions).toHaveLength(1);
    });

    describe('sign and transfer rules', () => {
        it('rejects a positive sale without touching the ledger', async () => {
            await expect(apply({ transactionType: 'sold', quantity: 5 })).rejects.toMatchObject({
                statusCode: 400,
                errors: { quantity: 'Quantity must be negative for sold transactions.' },
            });
            expect(ledger.transactionCalls).toBe(0);
        });

        it('rejects a negative receipt', async () => {
            await expect(apply({ transactionType: 'received', quantity: -5 })).rejects.toMatchObject({
                errors: { quantity: 'Quantity must be positive for received transactions.' },
            });
        });

        it('rejects a positive transfer', async () => {
            await expect(apply({ transactionType: 'transferred', quantity: 5, destinationLocationId: bar.id }))
                .rejects.toMatchObject({
                    errors: { quantity: 'Quantity must be negative for transferred transactions.' },
                });
        });

        it('requires a destination for transfers', async () => {
            await expect(apply({ transactionType: 'transferred', quantity: -5 })).rejects.toMatchObject({
                errors: { destinationLocationId: 'Destination location is required for transfers.' },
            });
        });

        it('rejects a transfer to the source location', async () => {
            await expect(apply({ transactionType: 'transferred', quantity: -5, destinationLocationId: cellar.id }))
                .rejects.toMatchObject({
                    errors: { destinationLocationId: 'Destination location must be different from source location.' },
                });
        });

        it('rejects a destination on a non-transfer', async () => {
            await expect(apply({ transactionType: 'sold', quantity: -1, destinationLocationId: bar.id }))
                .rejects.toMatchObject({
                    errors: { destinationLocationId: 'Destination location is only used by transfers.' },
                });
        });

        it('rejects a negative unit price and a future date together', async () => {
            await expect(apply({
                transactionType: 'received',
                quantity: 1,
                unitPrice: -1,
                transactionDate: '2024-06-16',
            })).rejects.toMatchObject({
                errors: {
                    unitPrice: 'Value cannot be less than 0.',
                    transactionDate: '2024-06-16 is in the future. This field cannot accept future dates.',
                },
            });
        });

        it('rejects quantities finer than a hundredth instead of rounding them to zero', async () => {
            await expect(apply({ transactionType: 'sold', quantity: -0.001 })).rejects.toMatchObject({
                errors: { quantity: '-0.001 cannot have more than 2 decimal places.' },
            });
            await expect(apply({ transactionType: 'received', quantity: 0.004 })).rejects.toMatchObject({
                errors: { quantity: '0.004 cannot have more than 2 decimal places.' },
            });
            expect(ledger.transactionCalls).toBe(0);
        });

        it('rejects quantities and prices beyond the stored precision', async () => {
            await expect(apply({ transactionType: 'received', quantity: 1e9, unitPrice: 1e9 })).rejects.toMatchObject({
                errors: {
                    quantity: 'Value cannot be greater than 99999999.99.',
                    unitPrice: 'Value cannot be greater than 99999999.99.',
                },
            });
            await expect(apply({ transactionType: 'sold', quantity: -1e9 })).rejects.toMatchObject({
                errors: { quantity: 'Value cannot be less than -99999999.99.' },
            });
        });

        it('accepts two-decimal quantities as given', async () => {
            const applied = await apply({ transactionType: 'received', quantity: 0.29 });

            expect(applied.transaction.quantity).toBe(0.29);
            expect(applied.source.quantity).toBe(0.29);
        });

        it('rejects an unknown product before recording anything', async () => {
            const error = await apply({ transactionType: 'received', quantity: 1, productId: BARTENDER })
                .catch((err: unknown) => err);

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ errors: { productId: 'Product not found.' } });
            expect(ledger.state.transactions).toHaveLength(0);
        });
    });

    it('moves stock between locations on a transfer', async () => {
        await apply({ transactionType: 'received', quantity: 20 });
        const applied = await apply({ transactionType: 'transferred', quantity: -5, destinationLocationId: bar.id });

        expect(applied.source.quantity).toBe(15);
        expect(applied.destination?.quantity).toBe(5);
        expect(applied.transaction.destinationLocationId).toBe(bar.id);
        expect(ledger.quantityOf(gin.id, cellar.id)).toBe(15);
        expect(ledger.quantityOf(gin.id, bar.id)).toBe(5);
    });

    it('keeps the total constant when a transfer exceeds the source', async () => {
        await apply({ transactionType: 'received', quantity: 2 });
        await apply({ transactionType: 'transferred', quantity: -5, destinationLocationId: bar.id });

        expect(ledger.quantityOf(gin.id, cellar.id)).toBe(-3);
        expect(ledger.quantityOf(gin.id, bar.id)).toBe(5);
    });

    it('clamps an oversized sale at zero', async () => {
        await apply({ transactionType: 'received', quantity: 5 });
        const applied = await apply({ transactionType: 'sold', quantity: -8 });

        expect(applied.source.quantity).toBe(0);
        expect(applied.transaction.quantity).toBe(-8);
    });

    it('lets an adjustment take stock below zero', async () => {
        await apply({ transactionType: 'received', quantity: 2 });
        const applied = await apply({ transactionType: 'adjustment', quantity: -3 });

        expect(applied.source.quantity).toBe(-1);
    });

    it('locks the stock row before the transaction takes its sequence number', async () => {
        const calls: string[] = [];
        ledger.fault = (method) => {
            calls.push(method);
        };

        await apply({ transactionType: 'received', quantity: 3 });

        expect(calls).toEqual([
            'findProduct',
            'findLocation',
            'ensureStock',
            'lockStock',
            'insertTransaction',
            'setStockQuantity',
        ]);
    });

    it('locks both transfer rows before recording the transfer', async () => {
        await apply({ transactionType: 'received', quantity: 6 });
        const calls: string[] = [];
        ledger.fault = (method) => {
            calls.push(method);
        };

        await apply({ transactionType: 'transferred', quantity: -2, destinationLocationId: bar.id });

        expect(calls).toEqual([
            'findProduct',
            'findLocation',
            'findLocation',
            'ensureStock',
            'lockStock',
            'ensureStock',
            'lockStock',
            'insertTransaction',
            'setStockQuantity',
            'setStockQuantity',
        ]);
    });

    it('replays a clamped sale followed by a receipt in application order', async () => {
        await apply({ transactionType: 'sold', quantity: -3 });
        await apply({ transactionType: 'received', quantity: 5 });

        expect(await InventoryTransactionService.verifyStock(gin.id, cellar.id, ledger)).toMatchObject({
            quantity: 5,
            replayedQuantity: 5,
            consistent: true,
        });
        expect(ledger.state.transactions.map((row) => [row.sequence, row.quantity])).toEqual([[1, -3], [2, 5]]);
    });

    it('rolls back the transaction row when the stock write fails', async () => {
        ledger.fault = (method) => {
            if (method === 'setStockQuantity') throw new Error('disk full');
        };

        await expect(apply({ transactionType: 'received', quantity: 3 })).rejects.toThrow('disk full');
        expect(ledger.state.transactions).toHaveLength(0);
        expect(ledger.state.stock).toHaveLength(0);
    });

    it('retries a transient failure from scratch', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        let failures = 1;
        ledger.fault = (method) => {
            if (method === 'lockStock' && failures > 0) {
                failures -= 1;
                throw new TransientLedgerError('could not serialize access');
            }
        };

        const applied = await apply({ transactionType: 'received', quantity: 4 });

        expect(applied.source.quantity).toBe(4);
        expect(ledger.transactionCalls).toBe(2);
        expect(ledger.state.transactions).toHaveLength(1);
        expect(warn).toHaveBeenCalledWith('apply transaction attempt 1 rolled back, retrying: could not serialize access');
    });

    it('gives up with a ConsistencyError after the configured attempts', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        ledger.fault = (method) => {
            if (method === 'lockStock') throw new TransientLedgerError('lock timeout');
        };

        await expect(apply({ transactionType: 'received', quantity: 4 })).rejects.toBeInstanceOf(ConsistencyError);
        expect(ledger.transactionCalls).toBe(3);
        expect(ledger.state.transactions).toHaveLength(0);
        expect(error).toHaveBeenCalledWith('apply transaction failed after 3 attempts: lock timeout');
    });

    it('reads zero for a pair without a stock row', async () => {
        expect(await InventoryTransactionService.getStock(gin.id, bar.id, ledger)).toBe(0);
    });

    it('replays the ledger to the live quantity', async () => {
        await apply({ transactionType: 'received', quantity: 12 });
        await apply({ transactionType: 'transferred', quantity: -5, destinationLocationId: bar.id });
        await apply({ transactionType: 'sold', quantity: -2, locationId: bar.id });
        await apply({ transactionType: 'sold', quantity: -9, locationId: bar.id });
        await apply({ transactionType: 'count', quantity: 1, locationId: bar.id });

        const atBar = await InventoryTransactionService.verifyStock(gin.id, bar.id, ledger);
        const atCellar = await InventoryTransactionService.verifyStock(gin.id, cellar.id, ledger);

        expect(atBar).toEqual({
            productId: gin.id,
            locationId: bar.id,
            quantity: 1,
            replayedQuantity: 1,
            transactionCount: 4,
            consistent: true,
        });
        expect(atCellar).toMatchObject({ quantity: 7, replayedQuantity: 7, transactionCount: 2, consistent: true });
    });
});
