import type { InventoryCountItemTable, InventoryCountTable, NewInventoryCount, NewInventoryCountItem } from '../drizzle/schema/inventoryCount';
import type { InventoryItemTable } from '../drizzle/schema/inventoryItem';
import type { InventoryTransactionTable, NewInventoryTransaction } from '../drizzle/schema/inventoryTransaction';
import type { LocationTable } from '../drizzle/schema/location';
import type { NewOrder, NewOrderItem, OrderItemTable, OrderTable } from '../drizzle/schema/order';
import type { ProductTable } from '../drizzle/schema/product';

export type OrderPatch = Partial<Omit<OrderTable, 'id' | 'orderNumber' | 'createdAt' | 'createdBy'>>;
export type OrderItemPatch = Partial<Pick<OrderItemTable, 'receivedQuantity' | 'notes'>>;
export type CountPatch = Partial<Omit<InventoryCountTable, 'id' | 'createdAt' | 'createdBy' | 'locationId'>>;
export type CountItemPatch = Partial<Pick<InventoryCountItemTable, 'countedQuantity' | 'isCounted' | 'countedBy' | 'countedAt' | 'notes'>>;

/**
 * Everything the ledger workflows read or write, scoped to one unit of work.
 * Methods named `lock*` take a row lock that is held until the unit commits
 * or rolls back.
 */
export interface LedgerStore {
    lockStock(productId: string, locationId: string): Promise<InventoryItemTable | undefined>;
    /** Inserts a zero row for the pair unless one exists. */
    ensureStock(productId: string, locationId: string): Promise<void>;
    setStockQuantity(id: string, quantity: number): Promise<InventoryItemTable>;
    findStock(productId: string, locationId: string): Promise<InventoryItemTable | undefined>;
    listStockAtLocation(locationId: string): Promise<InventoryItemTable[]>;

    insertTransaction(values: NewInventoryTransaction): Promise<InventoryTransactionTable>;
    /** Transactions touching the pair as source or transfer destination, oldest first. */
    listTransactionsFor(productId: string, locationId: string): Promise<InventoryTransactionTable[]>;

    findProduct(id: string): Promise<ProductTable | undefined>;
    findLocation(id: string): Promise<LocationTable | undefined>;
    /** First active storage location by name. */
    findDefaultStorageLocation(): Promise<LocationTable | undefined>;

    insertOrder(values: NewOrder): Promise<OrderTable>;
    insertOrderItems(values: NewOrderItem[]): Promise<OrderItemTable[]>;
    lockOrder(id: string): Promise<OrderTable | undefined>;
    listOrderItems(orderId: string): Promise<OrderItemTable[]>;
    updateOrder(id: string, patch: OrderPatch): Promise<OrderTable>;
    updateOrderItem(id: string, patch: OrderItemPatch): Promise<OrderItemTable>;

    insertCount(values: NewInventoryCount): Promise<InventoryCountTable>;
    insertCountItems(values: NewInventoryCountItem[]): Promise<InventoryCountItemTable[]>;
    lockCount(id: string): Promise<InventoryCountTable | undefined>;
    listCountItems(countId: string): Promise<InventoryCountItemTable[]>;
    updateCount(id: string, patch: CountPatch): Promise<InventoryCountTable>;
    updateCountItem(id: string, patch: CountItemPatch): Promise<InventoryCountItemTable>;
}

export interface Ledger {
    /** Runs `work` in one database transaction; a throw rolls back every write. */
    transaction<T>(work: (store: LedgerStore) => Promise<T>): Promise<T>;
    /** Whether a failed unit of work may succeed if run again from scratch. */
    isTransientError(err: unknown): boolean;
}
