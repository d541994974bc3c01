import { and, asc, count, eq, inArray, type SQL, sum } from "drizzle-orm";
import { db } from "../drizzle/db";
import { inventoryItemTable } from "../drizzle/schema/inventoryItem";
import { locationTable } from "../drizzle/schema/location";
import { type NewProduct, productTable, type ProductTable } from "../drizzle/schema/product";
import { NotFoundError, ValidationError } from "../utils/AppError";
import { getOffset, type PaginationOptions, toPaginated } from "../utils/filterWithPaginate";
import { toDecimal } from "../utils/stockMath";
import { getCurrentDate } from "../utils/timezone";
import { collectFieldErrors, decimalAmount } from "../utils/validators";

export type ProductDetail = ProductTable & {
    totalQuantity: number;
    totalValue: number;
    belowParLevel: boolean;
    needsReorder: boolean;
};

export type ReorderSuggestion = ProductDetail & {
    suggestedOrderQuantity: number;
};

export type ProductFilter = {
    categoryId?: string;
    supplierId?: string;
};

/** Derived stock figures for a product holding `totalQuantity` across all locations. */
export function toProductDetail(product: ProductTable, totalQuantity: number): ProductDetail {
    const total = toDecimal(totalQuantity);
    return {
        ...product,
        totalQuantity: total,
        totalValue: toDecimal(total * product.unitPrice),
        belowParLevel: total < product.parLevel,
        needsReorder: total <= product.reorderPoint,
    };
}

export function validateProduct(product: Partial<NewProduct>) {
    const errors = collectFieldErrors([
        ['unitPrice', decimalAmount(product.unitPrice, 0)],
        ['unitSize', decimalAmount(product.unitSize, 0)],
        ['parLevel', decimalAmount(product.parLevel, 0)],
        ['reorderPoint', decimalAmount(product.reorderPoint, 0)],
        ['reorderQuantity', decimalAmount(product.reorderQuantity, 0)],
    ]);
    if (Object.keys(errors).length > 0) {
        throw new ValidationError(errors);
    }
}

async function getTotalQuantities(productIds: string[]) {
    if (productIds.length === 0) return new Map<string, number>();
    const rows = await db.select({
        productId: inventoryItemTable.productId,
        total: sum(inventoryItemTable.quantity).mapWith(Number),
    })
        .from(inventoryItemTable)
        .where(inArray(inventoryItemTable.productId, productIds))
        .groupBy(inventoryItemTable.productId);
    return new Map(rows.map((row) => [row.productId, row.total]));
}

export class ProductService {
    static async createProduct(product: NewProduct) {
        validateProduct(product);
        const [createdProduct] = await db.insert(productTable).values(product).returning();
        return toProductDetail(createdProduct, 0);
    }

    static async updateProduct(id: string, product: Partial<NewProduct>) {
        validateProduct(product);
        const [updated] = await db.update(productTable)
            .set({
                ...product,
                updatedAt: getCurrentDate()
            })
            .where(eq(productTable.id, id))
            .returning();
        if (!updated) throw new NotFoundError('Product not found');
        const totals = await getTotalQuantities([id]);
        return toProductDetail(updated, totals.get(id) ?? 0);
    }

    static async deleteProduct(id: string) {
        const [deleted] = await db.delete(productTable)
            .where(eq(productTable.id, id))
            .returning();
        if (!deleted) throw new NotFoundError('Product not found');
        return deleted;
    }

    static async getProducts(pagination: PaginationOptions, filter: ProductFilter = {}) {
        const conditions: SQL[] = [];
        if (filter.categoryId) conditions.push(eq(productTable.categoryId, filter.categoryId));
        if (filter.supplierId) conditions.push(eq(productTable.supplierId, filter.supplierId));
        const where = conditions.length > 0 ? and(...conditions) : undefined;

        const [{ total }] = await db.select({ total: count() }).from(productTable).where(where);
        const products = await db.select().from(productTable)
            .where(where)
            .orderBy(asc(productTable.name))
            .limit(pagination.limit)
            .offset(getOffset(pagination));
        const totals = await getTotalQuantities(products.map((product) => product.id));

        const list = products.map((product) => toProductDetail(product, totals.get(product.id) ?? 0));
        return toPaginated(list, total, pagination);
    }

    static async getProductById(id: string) {
        const [product] = await db.select().from(productTable).where(eq(productTable.id, id));
        if (!product) throw new NotFoundError('Product not found');
        const totals = await getTotalQuantities([id]);
        return toProductDetail(product, totals.get(id) ?? 0);
    }

    /** Stock rows for one product at every location holding it. */
    static async getProductInventory(id: string) {
        const product = await this.getProductById(id);
        const rows = await db.select({
            id: inventoryItemTable.id,
            quantity: inventoryItemTable.quantity,
            updatedAt: inventoryItemTable.updatedAt,
            location: {
                id: locationTable.id,
                name: locationTable.name,
                isStorage: locationTable.isStorage,
                isService: locationTable.isService,
            },
        })
            .from(inventoryItemTable)
            .innerJoin(locationTable, eq(inventoryItemTable.locationId, locationTable.id))
            .where(eq(inventoryItemTable.productId, id))
            .orderBy(asc(locationTable.name));

        return rows.map((row) => ({
            ...row,
            productId: id,
            value: toDecimal(row.quantity * product.unitPrice),
        }));
    }

    /** Active products at or below their reorder point. */
    static async getReorderList(): Promise<ReorderSuggestion[]> {
        const products = await db.select().from(productTable)
            .where(eq(productTable.isActive, true))
            .orderBy(asc(productTable.name));
        const totals = await getTotalQuantities(products.map((product) => product.id));

        return products
            .map((product) => toProductDetail(product, totals.get(product.id) ?? 0))
            .filter((detail) => detail.needsReorder)
            .map((detail) => ({ ...detail, suggestedOrderQuantity: detail.reorderQuantity }));
    }
}
