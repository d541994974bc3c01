import { asc, count, eq } from "drizzle-orm";
import { db } from "../drizzle/db";
import { categoryTable, type NewCategory } from "../drizzle/schema/category";
import { productTable } from "../drizzle/schema/product";
import { NotFoundError } from "../utils/AppError";
import { getOffset, type PaginationOptions, toPaginated } from "../utils/filterWithPaginate";
import { getCurrentDate } from "../utils/timezone";

export class CategoryService {
    static async createCategory(category: NewCategory) {
        const [createdCategory] = await db.insert(categoryTable).values(category).returning();
        return createdCategory;
    }

    static async updateCategory(id: string, category: Partial<NewCategory>) {
        const [updated] = await db.update(categoryTable)
            .set({
                ...category,
                updatedAt: getCurrentDate()
            })
            .where(eq(categoryTable.id, id))
            .returning();
        if (!updated) throw new NotFoundError('Category not found');
        return updated;
    }

    // Products reference categories with RESTRICT, so a used category fails with a 409.
    static async deleteCategory(id: string) {
        const [deleted] = await db.delete(categoryTable)
            .where(eq(categoryTable.id, id))
            .returning();
        if (!deleted) throw new NotFoundError('Category not found');
        return deleted;
    }

    static async getCategories(pagination: PaginationOptions) {
        const [{ total }] = await db.select({ total: count() }).from(categoryTable);
        const list = await db.select().from(categoryTable)
            .orderBy(asc(categoryTable.name))
            .limit(pagination.limit)
            .offset(getOffset(pagination));
        return toPaginated(list, total, pagination);
    }

    static async getCategoryById(id: string) {
        const [category] = await db.select().from(categoryTable).where(eq(categoryTable.id, id));
        if (!category) throw new NotFoundError('Category not found');
        return category;
    }

    static async getCategoryProducts(id: string) {
        await this.getCategoryById(id);
        return await db.select().from(productTable)
            .where(eq(productTable.categoryId, id))
            .orderBy(asc(productTable.name));
    }
}
