import { asc, count, desc, eq } from "drizzle-orm";
import { db } from "../drizzle/db";
import { orderTable } from "../drizzle/schema/order";
import { productTable } from "../drizzle/schema/product";
import { type NewSupplier, supplierTable } from "../drizzle/schema/supplier";
import { NotFoundError, ValidationError } from "../utils/AppError";
import { getOffset, type PaginationOptions, toPaginated } from "../utils/filterWithPaginate";
import { getCurrentDate } from "../utils/timezone";
import { collectFieldErrors, emailFormat, phoneFormat } from "../utils/validators";

export function validateSupplierContact(supplier: Pick<Partial<NewSupplier>, 'email' | 'phone'>) {
    const errors = collectFieldErrors([
        ['email', emailFormat(supplier.email)],
        ['phone', phoneFormat(supplier.phone)],
    ]);
    if (Object.keys(errors).length > 0) {
        throw new ValidationError(errors);
    }
}

export class SupplierService {
    static async createSupplier(supplier: NewSupplier) {
        validateSupplierContact(supplier);
        const [createdSupplier] = await db.insert(supplierTable).values(supplier).returning();
        return createdSupplier;
    }

    static async updateSupplier(id: string, supplier: Partial<NewSupplier>) {
        validateSupplierContact(supplier);
        const [updated] = await db.update(supplierTable)
            .set({
                ...supplier,
                updatedAt: getCurrentDate()
            })
            .where(eq(supplierTable.id, id))
            .returning();
        if (!updated) throw new NotFoundError('Supplier not found');
        return updated;
    }

    static async deleteSupplier(id: string) {
        const [deleted] = await db.delete(supplierTable)
            .where(eq(supplierTable.id, id))
            .returning();
        if (!deleted) throw new NotFoundError('Supplier not found');
        return deleted;
    }

    static async getSuppliers(pagination: PaginationOptions) {
        const [{ total }] = await db.select({ total: count() }).from(supplierTable);
        const list = await db.select().from(supplierTable)
            .orderBy(asc(supplierTable.name))
            .limit(pagination.limit)
            .offset(getOffset(pagination));
        return toPaginated(list, total, pagination);
    }

    static async getSupplierById(id: string) {
        const [supplier] = await db.select().from(supplierTable).where(eq(supplierTable.id, id));
        if (!supplier) throw new NotFoundError('Supplier not found');
        return supplier;
    }

    static async getSupplierProducts(id: string) {
        await this.getSupplierById(id);
        return await db.select().from(productTable)
            .where(eq(productTable.supplierId, id))
            .orderBy(asc(productTable.name));
    }

    static async getSupplierOrders(id: string) {
        await this.getSupplierById(id);
        return await db.select().from(orderTable)
            .where(eq(orderTable.supplierId, id))
            .orderBy(desc(orderTable.createdAt));
    }
}
