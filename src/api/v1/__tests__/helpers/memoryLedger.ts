import { randomUUID } from 'crypto';
import type {
    InventoryCountItemTable,
    InventoryCountTable,
    NewInventoryCount,
    NewInventoryCountItem,
} from '../../drizzle/schema/inventoryCount';
import type { InventoryItemTable } from '../../drizzle/schema/inventoryItem';
import type { InventoryTransactionTable, NewInventoryTransaction } from '../../drizzle/schema/inventoryTransaction';
import type { LocationTable } from '../../drizzle/schema/location';
import type { NewOrder, NewOrderItem, OrderItemTable, OrderTable } from '../../drizzle/schema/order';
import type { ProductTable } from '../../drizzle/schema/product';
import type {
    CountItemPatch,
    CountPatch,
    Ledger,
    LedgerStore,
    OrderItemPatch,
    OrderPatch,
} from '../../ledger/ledgerStore';
import { ConsistencyError } from '../../utils/AppError';

type State = {
    products: ProductTable[];
    locations: LocationTable[];
    stock: InventoryItemTable[];
    transactions: InventoryTransactionTable[];
    orders: OrderTable[];
    orderItems: OrderItemTable[];
    counts: InventoryCountTable[];
    countItems: InventoryCountItemTable[];
    sequence: number;
};

function emptyState(): State {
    return {
        products: [],
        locations: [],
        stock: [],
        transactions: [],
        orders: [],
        orderItems: [],
        counts: [],
        countItems: [],
        sequence: 0,
    };
}

/** Copies defined keys only, the way an ORM `set()` skips undefined values. */
function applyPatch<T extends object>(row: T, patch: Partial<T>): T {
    const defined = Object.fromEntries(Object.entries(patch).filter(([, value]) => value !== undefined));
    return { ...row, ...defined };
}

export class TransientLedgerError extends Error {
    code = '40001';
}

/** Invoked before every store call; throwing from it aborts the unit of work. */
export type FaultHook = (method: keyof LedgerStore) => void;

class MemoryLedgerStore implements LedgerStore {
    constructor(private readonly state: State, private readonly fault: FaultHook) {}

    private now() {
        return new Date();
    }

    async lockStock(productId: string, locationId: string) {
        this.fault('lockStock');
        return this.state.stock.find((row) => row.productId === productId && row.locationId === locationId);
    }

    async ensureStock(productId: string, locationId: string) {
        this.fault('ensureStock');
        if (this.state.stock.some((row) => row.productId === productId && row.locationId === locationId)) return;
        this.state.stock.push({
            id: randomUUID(),
            productId,
            locationId,
            quantity: 0,
            createdAt: this.now(),
            updatedAt: this.now(),
        });
    }

    async setStockQuantity(id: string, quantity: number) {
        this.fault('setStockQuantity');
        const index = this.state.stock.findIndex((row) => row.id === id);
        if (index < 0) throw new ConsistencyError(`inventory_items row ${id} disappeared mid-transaction`);
        this.state.stock[index] = { ...this.state.stock[index], quantity, updatedAt: this.now() };
        return this.state.stock[index];
    }

    async findStock(productId: string, locationId: string) {
        this.fault('findStock');
        return this.state.stock.find((row) => row.productId === productId && row.locationId === locationId);
    }

    async listStockAtLocation(locationId: string) {
        this.fault('listStockAtLocation');
        return this.state.stock.filter((row) => row.locationId === locationId);
    }

    async insertTransaction(values: NewInventoryTransaction) {
        this.fault('insertTransaction');
        this.state.sequence += 1;
        const row: InventoryTransactionTable = {
            id: randomUUID(),
            sequence: this.state.sequence,
            transactionType: values.transactionType,
            transactionDate: values.transactionDate,
            productId: values.productId,
            locationId: values.locationId,
            destinationLocationId: values.destinationLocationId ?? null,
            quantity: values.quantity,
            unitPrice: values.unitPrice ?? 0,
            reference: values.reference ?? '',
            notes: values.notes ?? '',
            performedBy: values.performedBy,
            createdAt: this.now(),
        };
        this.state.transactions.push(row);
        return row;
    }

    async listTransactionsFor(productId: string, locationId: string) {
        this.fault('listTransactionsFor');
        return this.state.transactions
            .filter((row) => row.productId === productId
                && (row.locationId === locationId || row.destinationLocationId === locationId))
            .sort((a, b) => a.sequence - b.sequence);
    }

    async findProduct(id: string) {
        this.fault('findProduct');
        return this.state.products.find((row) => row.id === id);
    }

    async findLocation(id: string) {
        this.fault('findLocation');
        return this.state.locations.find((row) => row.id === id);
    }

    async findDefaultStorageLocation() {
        this.fault('findDefaultStorageLocation');
        return this.state.locations
            .filter((row) => row.isStorage && row.isActive)
            .sort((a, b) => a.name.localeCompare(b.name))[0];
    }

    async insertOrder(values: NewOrder) {
        this.fault('insertOrder');
        const row: OrderTable = {
            id: randomUUID(),
            orderNumber: values.orderNumber,
            supplierId: values.supplierId,
            deliveryLocationId: values.deliveryLocationId ?? null,
            status: values.status ?? 'draft',
            orderDate: values.orderDate ?? null,
            expectedDeliveryDate: values.expectedDeliveryDate ?? null,
            actualDeliveryDate: values.actualDeliveryDate ?? null,
            shippingCost: values.shippingCost ?? 0,
            tax: values.tax ?? 0,
            discount: values.discount ?? 0,
            notes: values.notes ?? '',
            createdBy: values.createdBy,
            updatedBy: values.updatedBy ?? null,
            createdAt: this.now(),
            updatedAt: this.now(),
        };
        this.state.orders.push(row);
        return row;
    }

    async insertOrderItems(values: NewOrderItem[]) {
        this.fault('insertOrderItems');
        const rows = values.map((value): OrderItemTable => ({
            id: randomUUID(),
            orderId: value.orderId,
            productId: value.productId,
            quantity: value.quantity,
            unitPrice: value.unitPrice,
            receivedQuantity: value.receivedQuantity ?? 0,
            notes: value.notes ?? '',
            createdAt: this.now(),
            updatedAt: this.now(),
        }));
        this.state.orderItems.push(...rows);
        return rows;
    }

    async lockOrder(id: string) {
        this.fault('lockOrder');
        return this.state.orders.find((row) => row.id === id);
    }

    async listOrderItems(orderId: string) {
        this.fault('listOrderItems');
        return this.state.orderItems.filter((row) => row.orderId === orderId);
    }

    async updateOrder(id: string, patch: OrderPatch) {
        this.fault('updateOrder');
        const index = this.state.orders.findIndex((row) => row.id === id);
        if (index < 0) throw new ConsistencyError(`orders row ${id} disappeared mid-transaction`);
        this.state.orders[index] = applyPatch(this.state.orders[index], { ...patch, updatedAt: this.now() });
        return this.state.orders[index];
    }

    async updateOrderItem(id: string, patch: OrderItemPatch) {
        this.fault('updateOrderItem');
        const index = this.state.orderItems.findIndex((row) => row.id === id);
        if (index < 0) throw new ConsistencyError(`order_items row ${id} disappeared mid-transaction`);
        this.state.orderItems[index] = applyPatch(this.state.orderItems[index], { ...patch, updatedAt: this.now() });
        return this.state.orderItems[index];
    }

    async insertCount(values: NewInventoryCount) {
        this.fault('insertCount');
        const row: InventoryCountTable = {
            id: randomUUID(),
            name: values.name,
            description: values.description ?? '',
            locationId: values.locationId,
            status: values.status ?? 'in_progress',
            scheduledDate: values.scheduledDate ?? null,
            completedDate: values.completedDate ?? null,
            createdBy: values.createdBy,
            completedBy: values.completedBy ?? null,
            notes: values.notes ?? '',
            createdAt: this.now(),
            updatedAt: this.now(),
        };
        this.state.counts.push(row);
        return row;
    }

    async insertCountItems(values: NewInventoryCountItem[]) {
        this.fault('insertCountItems');
        const rows = values.map((value): InventoryCountItemTable => ({
            id: randomUUID(),
            countId: value.countId,
            productId: value.productId,
            expectedQuantity: value.expectedQuantity ?? 0,
            countedQuantity: value.countedQuantity ?? null,
            isCounted: value.isCounted ?? false,
            countedBy: value.countedBy ?? null,
            countedAt: value.countedAt ?? null,
            notes: value.notes ?? '',
            createdAt: this.now(),
            updatedAt: this.now(),
        }));
        this.state.countItems.push(...rows);
        return rows;
    }

    async lockCount(id: string) {
        this.fault('lockCount');
        return this.state.counts.find((row) => row.id === id);
    }

    async listCountItems(countId: string) {
        this.fault('listCountItems');
        return this.state.countItems.filter((row) => row.countId === countId);
    }

    async updateCount(id: string, patch: CountPatch) {
        this.fault('updateCount');
        const index = this.state.counts.findIndex((row) => row.id === id);
        if (index < 0) throw new ConsistencyError(`inventory_counts row ${id} disappeared mid-transaction`);
        this.state.counts[index] = applyPatch(this.state.counts[index], { ...patch, updatedAt: this.now() });
        return this.state.counts[index];
    }

    async updateCountItem(id: string, patch: CountItemPatch) {
        this.fault('updateCountItem');
        const index = this.state.countItems.findIndex((row) => row.id === id);
        if (index < 0) throw new ConsistencyError(`inventory_count_items row ${id} disappeared mid-transaction`);
        this.state.countItems[index] = applyPatch(this.state.countItems[index], { ...patch, updatedAt: this.now() });
        return this.state.countItems[index];
    }
}

/**
 * In-process ledger for tests. Each unit of work runs against a copy of the
 * state that replaces the committed state only when the work resolves.
 */
export class MemoryLedger implements Ledger {
    state: State = emptyState();
    transactionCalls = 0;
    fault: FaultHook = () => undefined;

    async transaction<T>(work: (store: LedgerStore) => Promise<T>): Promise<T> {
        this.transactionCalls += 1;
        const draft = structuredClone(this.state);
        const result = await work(new MemoryLedgerStore(draft, this.fault));
        this.state = draft;
        return result;
    }

    isTransientError(err: unknown) {
        return err instanceof TransientLedgerError || err instanceof ConsistencyError;
    }

    addLocation(values: Partial<LocationTable> & Pick<LocationTable, 'name'>): LocationTable {
        const row: LocationTable = {
            id: randomUUID(),
            description: '',
            isStorage: false,
            isService: false,
            isActive: true,
            createdAt: new Date(),
            updatedAt: new Date(),
            ...values,
        };
        this.state.locations.push(row);
        return row;
    }

    addProduct(values: Partial<ProductTable> & Pick<ProductTable, 'name' | 'unitPrice'>): ProductTable {
        const row: ProductTable = {
            id: randomUUID(),
            sku: '',
            description: '',
            barcode: '',
            categoryId: randomUUID(),
            supplierId: randomUUID(),
            unitSize: 750,
            unitType: 'bottle',
            parLevel: 0,
            reorderPoint: 0,
            reorderQuantity: 1,
            notes: '',
            isActive: true,
            createdAt: new Date(),
            updatedAt: new Date(),
            ...values,
        };
        this.state.products.push(row);
        return row;
    }

    quantityOf(productId: string, locationId: string) {
        const row = this.state.stock.find((stock) => stock.productId === productId && stock.locationId === locationId);
        return row ? row.quantity : undefined;
    }
}
