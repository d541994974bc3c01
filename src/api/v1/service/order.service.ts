import { randomUUID } from 'crypto';
import { and, count, desc, eq, inArray, type SQL } from 'drizzle-orm';
import { db } from '../drizzle/db';
import { orderItemTable, orderTable, type OrderItemTable, type OrderStatus, type OrderTable } from '../drizzle/schema/order';
import type { Ledger, LedgerStore, OrderPatch } from '../ledger/ledgerStore';
import { pgLedger } from '../ledger/pgLedger';
import { runAtomic } from '../ledger/runAtomic';
import { type Actor, assertOwnerOrStaff } from '../middleware/role';
import { ConflictError, NotFoundError, ValidationError } from '../utils/AppError';
import { getOffset, type PaginationOptions, toPaginated } from '../utils/filterWithPaginate';
import { toDecimal } from '../utils/stockMath';
import { getToday } from '../utils/timezone';
import { collectFieldErrors, dateNotBefore, decimalAmount, nonNegative, noFutureDate } from '../utils/validators';
import { InventoryTransactionService, type TransactionView } from './inventoryTransaction.service';

export type ReceivingStatus = 'not_received' | 'partially_received' | 'fully_received';

export type OrderItemView = OrderItemTable & {
    totalPrice: number;
    isFullyReceived: boolean;
    receivingStatus: ReceivingStatus;
};

export type OrderDetail = OrderTable & {
    items: OrderItemView[];
    subtotal: number;
    total: number;
};

export type ReceivedOrder = OrderDetail & {
    transactions: TransactionView[];
};

export type CreateOrderInput = {
    orderNumber?: string;
    supplierId: string;
    deliveryLocationId?: string | null;
    status?: Extract<OrderStatus, 'draft' | 'pending'>;
    expectedDeliveryDate?: string | null;
    shippingCost?: number;
    tax?: number;
    discount?: number;
    notes?: string;
    items: Array<{
        productId: string;
        quantity: number;
        unitPrice: number;
        notes?: string;
    }>;
};

export type UpdateOrderInput = {
    status?: Extract<OrderStatus, 'draft' | 'pending'>;
    deliveryLocationId?: string | null;
    expectedDeliveryDate?: string | null;
    shippingCost?: number;
    tax?: number;
    discount?: number;
    notes?: string;
};

export type ReceivedQuantityInput = {
    itemId: string;
    receivedQuantity: number;
};

const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set(['received', 'cancelled']);

export function generateOrderNumber() {
    return `ORD-${randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase()}`;
}

export function getReceivingStatus(item: Pick<OrderItemTable, 'quantity' | 'receivedQuantity'>): ReceivingStatus {
    if (item.receivedQuantity === 0) return 'not_received';
    if (item.receivedQuantity >= item.quantity) return 'fully_received';
    return 'partially_received';
}

export function toOrderDetail(order: OrderTable, items: OrderItemTable[]): OrderDetail {
    const views = items.map((item): OrderItemView => ({
        ...item,
        totalPrice: toDecimal(item.quantity * item.unitPrice),
        isFullyReceived: item.receivedQuantity >= item.quantity,
        receivingStatus: getReceivingStatus(item),
    }));
    const subtotal = toDecimal(views.reduce((sum, item) => sum + item.totalPrice, 0));
    return {
        ...order,
        items: views,
        subtotal,
        total: toDecimal(subtotal + order.shippingCost + order.tax - order.discount),
    };
}

type OrderState = Pick<OrderTable,
    'status' | 'orderDate' | 'expectedDeliveryDate' | 'actualDeliveryDate' | 'shippingCost' | 'tax' | 'discount'>;

/** Cross-field rules every order status write must satisfy. */
export function validateOrderState(order: OrderState) {
    const errors = collectFieldErrors([
        ['orderDate', order.status === 'placed' && !order.orderDate
            ? "Order date is required when status is 'placed'."
            : null],
        ['orderDate', noFutureDate(order.orderDate)],
        ['actualDeliveryDate', order.status === 'received' && !order.actualDeliveryDate
            ? "Actual delivery date is required when status is 'received'."
            : null],
        ['actualDeliveryDate', noFutureDate(order.actualDeliveryDate)],
        ['actualDeliveryDate', dateNotBefore(order.actualDeliveryDate, order.orderDate)],
        ['expectedDeliveryDate', dateNotBefore(order.expectedDeliveryDate, order.orderDate)],
        ['shippingCost', decimalAmount(order.shippingCost, 0)],
        ['tax', decimalAmount(order.tax, 0)],
        ['discount', decimalAmount(order.discount, 0)],
    ]);
    if (Object.keys(errors).length > 0) {
        throw new ValidationError(errors);
    }
}

async function lockOrderForWrite(store: LedgerStore, id: string, actor: Actor) {
    const order = await store.lockOrder(id);
    if (!order) throw new NotFoundError('Order not found');
    assertOwnerOrStaff(actor, order.createdBy);
    return order;
}

function assertNotTerminal(order: OrderTable) {
    if (TERMINAL_STATUSES.has(order.status)) {
        throw new ConflictError(`Order ${order.orderNumber} is ${order.status} and can no longer be changed`);
    }
}

export class OrderService {
    static async createOrder(input: CreateOrderInput, actor: Actor, ledger: Ledger = pgLedger): Promise<OrderDetail> {
        const seen = new Set<string>();
        const itemErrors: Array<[string, string | null]> = [];
        input.items.forEach((item, index) => {
            itemErrors.push([`items.${index}.productId`, seen.has(item.productId) ? 'This product is already in the order.' : null]);
            itemErrors.push([`items.${index}.quantity`, nonNegative(item.quantity)]);
            itemErrors.push([`items.${index}.quantity`, decimalAmount(item.quantity, 0)]);
            itemErrors.push([`items.${index}.unitPrice`, decimalAmount(item.unitPrice, 0)]);
            seen.add(item.productId);
        });
        const errors = collectFieldErrors(itemErrors);
        if (Object.keys(errors).length > 0) {
            throw new ValidationError(errors);
        }

        const state: OrderState = {
            status: input.status ?? 'draft',
            orderDate: null,
            expectedDeliveryDate: input.expectedDeliveryDate ?? null,
            actualDeliveryDate: null,
            shippingCost: input.shippingCost ?? 0,
            tax: input.tax ?? 0,
            discount: input.discount ?? 0,
        };
        validateOrderState(state);

        return await runAtomic(ledger, 'create order', async (store) => {
            const order = await store.insertOrder({
                ...state,
                orderNumber: input.orderNumber || generateOrderNumber(),
                supplierId: input.supplierId,
                deliveryLocationId: input.deliveryLocationId ?? null,
                notes: input.notes ?? '',
                createdBy: actor.id,
            });
            const items = await store.insertOrderItems(input.items.map((item) => ({
                orderId: order.id,
                productId: item.productId,
                quantity: item.quantity,
                unitPrice: item.unitPrice,
                notes: item.notes ?? '',
            })));
            return toOrderDetail(order, items);
        });
    }

    static async updateOrder(id: string, input: UpdateOrderInput, actor: Actor, ledger: Ledger = pgLedger): Promise<OrderDetail> {
        return await runAtomic(ledger, 'update order', async (store) => {
            const order = await lockOrderForWrite(store, id, actor);
            assertNotTerminal(order);
            if (input.status && input.status !== order.status && order.status === 'placed') {
                throw new ConflictError('A placed order can only be received or cancelled');
            }

            const patch: OrderPatch = {
                ...input,
                updatedBy: actor.id,
            };
            validateOrderState({
                status: patch.status ?? order.status,
                orderDate: order.orderDate,
                expectedDeliveryDate: patch.expectedDeliveryDate === undefined ? order.expectedDeliveryDate : patch.expectedDeliveryDate,
                actualDeliveryDate: order.actualDeliveryDate,
                shippingCost: patch.shippingCost ?? order.shippingCost,
                tax: patch.tax ?? order.tax,
                discount: patch.discount ?? order.discount,
            });

            const updated = await store.updateOrder(id, patch);
            return toOrderDetail(updated, await store.listOrderItems(id));
        });
    }

    /** Records how much of a line arrived, ahead of receiving the order. */
    static async updateReceivedQuantity(
        orderId: string,
        input: ReceivedQuantityInput & { notes?: string },
        actor: Actor,
        ledger: Ledger = pgLedger,
    ): Promise<OrderDetail> {
        const quantityError = nonNegative(input.receivedQuantity) ?? decimalAmount(input.receivedQuantity, 0);
        if (quantityError) throw ValidationError.forField('receivedQuantity', quantityError);

        return await runAtomic(ledger, 'update received quantity', async (store) => {
            const order = await lockOrderForWrite(store, orderId, actor);
            if (order.status !== 'placed') {
                throw new ConflictError('Received quantities can only be recorded on placed orders');
            }
            const items = await store.listOrderItems(orderId);
            if (!items.some((item) => item.id === input.itemId)) {
                throw new NotFoundError('Order item not found');
            }
            await store.updateOrderItem(input.itemId, {
                receivedQuantity: input.receivedQuantity,
                notes: input.notes,
            });
            const updated = await store.updateOrder(orderId, { updatedBy: actor.id });
            return toOrderDetail(updated, await store.listOrderItems(orderId));
        });
    }

    static async placeOrder(id: string, actor: Actor, ledger: Ledger = pgLedger): Promise<OrderDetail> {
        return await runAtomic(ledger, 'place order', async (store) => {
            const order = await lockOrderForWrite(store, id, actor);
            if (order.status !== 'draft' && order.status !== 'pending') {
                throw new ConflictError('Only draft or pending orders can be placed');
            }

            const patch = {
                status: 'placed' as const,
                orderDate: order.orderDate ?? getToday(),
                updatedBy: actor.id,
            };
            validateOrderState({ ...order, ...patch });

            const updated = await store.updateOrder(id, patch);
            return toOrderDetail(updated, await store.listOrderItems(id));
        });
    }

    /**
     * Receives a placed order: one `received` transaction per line with a
     * positive received quantity, then the status change. Lines and status
     * commit together or not at all.
     */
    static async receiveOrder(
        id: string,
        actor: Actor,
        receivedItems: ReceivedQuantityInput[] = [],
        ledger: Ledger = pgLedger,
    ): Promise<ReceivedOrder> {
        receivedItems.forEach((item, index) => {
            const error = nonNegative(item.receivedQuantity) ?? decimalAmount(item.receivedQuantity, 0);
            if (error) throw ValidationError.forField(`items.${index}.receivedQuantity`, error);
        });

        return await runAtomic(ledger, 'receive order', async (store) => {
            const order = await lockOrderForWrite(store, id, actor);
            if (order.status !== 'placed') {
                throw new ConflictError('Only placed orders can be received');
            }

            const patch = {
                status: 'received' as const,
                actualDeliveryDate: getToday(),
                updatedBy: actor.id,
            };
            validateOrderState({ ...order, ...patch });

            const location = order.deliveryLocationId
                ? await store.findLocation(order.deliveryLocationId)
                : await store.findDefaultStorageLocation();
            if (!location) {
                throw ValidationError.forField(
                    'deliveryLocationId',
                    'The order has no delivery location and no active storage location exists.',
                );
            }

            let items = await store.listOrderItems(id);
            for (const [index, received] of receivedItems.entries()) {
                if (!items.some((item) => item.id === received.itemId)) {
                    throw ValidationError.forField(`items.${index}.itemId`, 'Item does not belong to this order.');
                }
                await store.updateOrderItem(received.itemId, { receivedQuantity: received.receivedQuantity });
            }
            if (receivedItems.length > 0) {
                items = await store.listOrderItems(id);
            }

            const transactions: TransactionView[] = [];
            for (const item of items) {
                if (item.receivedQuantity <= 0) continue;
                const applied = await InventoryTransactionService.applyWithin(store, {
                    transactionType: 'received',
                    productId: item.productId,
                    locationId: location.id,
                    quantity: item.receivedQuantity,
                    unitPrice: item.unitPrice,
                    reference: `Order #${order.orderNumber}`,
                    notes: `Received from order #${order.orderNumber}`,
                    performedBy: actor.id,
                });
                transactions.push(applied.transaction);
            }

            const updated = await store.updateOrder(id, patch);
            return { ...toOrderDetail(updated, items), transactions };
        });
    }

    static async cancelOrder(id: string, actor: Actor, ledger: Ledger = pgLedger): Promise<OrderDetail> {
        return await runAtomic(ledger, 'cancel order', async (store) => {
            const order = await lockOrderForWrite(store, id, actor);
            assertNotTerminal(order);
            const updated = await store.updateOrder(id, { status: 'cancelled', updatedBy: actor.id });
            return toOrderDetail(updated, await store.listOrderItems(id));
        });
    }

    static async getOrders(pagination: PaginationOptions, filter: { status?: OrderStatus; supplierId?: string } = {}) {
        const conditions: SQL[] = [];
        if (filter.status) conditions.push(eq(orderTable.status, filter.status));
        if (filter.supplierId) conditions.push(eq(orderTable.supplierId, filter.supplierId));
        const where = conditions.length > 0 ? and(...conditions) : undefined;

        const [{ total }] = await db.select({ total: count() }).from(orderTable).where(where);
        const orders = await db.select().from(orderTable)
            .where(where)
            .orderBy(desc(orderTable.createdAt))
            .limit(pagination.limit)
            .offset(getOffset(pagination));
        const items = orders.length === 0 ? [] : await db.select().from(orderItemTable)
            .where(inArray(orderItemTable.orderId, orders.map((order) => order.id)));

        const list = orders.map((order) => toOrderDetail(order, items.filter((item) => item.orderId === order.id)));
        return toPaginated(list, total, pagination);
    }

    static async getOrderById(id: string) {
        const [order] = await db.select().from(orderTable).where(eq(orderTable.id, id));
        if (!order) throw new NotFoundError('Order not found');
        const items = await db.select().from(orderItemTable).where(eq(orderItemTable.orderId, id));
        return toOrderDetail(order, items);
    }
}
