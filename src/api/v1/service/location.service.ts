import { asc, count, eq } from "drizzle-orm";
import { db } from "../drizzle/db";
import { inventoryItemTable } from "../drizzle/schema/inventoryItem";
import { locationTable, type NewLocation } from "../drizzle/schema/location";
import { productTable } from "../drizzle/schema/product";
import { NotFoundError } from "../utils/AppError";
import { getOffset, type PaginationOptions, toPaginated } from "../utils/filterWithPaginate";
import { toDecimal } from "../utils/stockMath";
import { getCurrentDate } from "../utils/timezone";

export class LocationService {
    static async createLocation(location: NewLocation) {
        const [createdLocation] = await db.insert(locationTable).values(location).returning();
        return createdLocation;
    }

    static async updateLocation(id: string, location: Partial<NewLocation>) {
        const [updated] = await db.update(locationTable)
            .set({
                ...location,
                updatedAt: getCurrentDate()
            })
            .where(eq(locationTable.id, id))
            .returning();
        if (!updated) throw new NotFoundError('Location not found');
        return updated;
    }

    static async deleteLocation(id: string) {
        const [deleted] = await db.delete(locationTable)
            .where(eq(locationTable.id, id))
            .returning();
        if (!deleted) throw new NotFoundError('Location not found');
        return deleted;
    }

    static async getLocations(pagination: PaginationOptions) {
        const [{ total }] = await db.select({ total: count() }).from(locationTable);
        const list = await db.select().from(locationTable)
            .orderBy(asc(locationTable.name))
            .limit(pagination.limit)
            .offset(getOffset(pagination));
        return toPaginated(list, total, pagination);
    }

    static async getLocationById(id: string) {
        const [location] = await db.select().from(locationTable).where(eq(locationTable.id, id));
        if (!location) throw new NotFoundError('Location not found');
        return location;
    }

    /** Stock rows held at a location, each with its value at the product's current price. */
    static async getLocationInventory(id: string) {
        await this.getLocationById(id);
        const rows = await db.select({
            id: inventoryItemTable.id,
            quantity: inventoryItemTable.quantity,
            updatedAt: inventoryItemTable.updatedAt,
            product: {
                id: productTable.id,
                name: productTable.name,
                sku: productTable.sku,
                unitPrice: productTable.unitPrice,
            },
        })
            .from(inventoryItemTable)
            .innerJoin(productTable, eq(inventoryItemTable.productId, productTable.id))
            .where(eq(inventoryItemTable.locationId, id))
            .orderBy(asc(productTable.name));

        return rows.map((row) => ({
            ...row,
            locationId: id,
            value: toDecimal(row.quantity * row.product.unitPrice),
        }));
    }
}
