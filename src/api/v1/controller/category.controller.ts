import { Response } from "express";
import { AuthRequest } from "../middleware/auth";
import { CategoryService } from "../service/category.service";
import { getPaginationFromRequest } from "../utils/filterWithPaginate";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { categorySchema } from "../validation/reference.validation";

export class CategoryController {
    static createCategory = requestHandler(async (req: AuthRequest, res: Response) => {
        const category = categorySchema.parse(req.body);
        const createdCategory = await CategoryService.createCategory(category);
        sendResponse(res, 201, 'Category created successfully', createdCategory);
    })

    static updateCategory = requestHandler(async (req: AuthRequest, res: Response) => {
        const category = categorySchema.partial().parse(req.body);
        const updatedCategory = await CategoryService.updateCategory(req.params.id, category);
        sendResponse(res, 200, 'Category updated successfully', updatedCategory);
    })

    static deleteCategory = requestHandler(async (req: AuthRequest, res: Response) => {
        const deletedCategory = await CategoryService.deleteCategory(req.params.id);
        sendResponse(res, 200, 'Category deleted successfully', deletedCategory);
    })

    static getCategories = requestHandler(async (req: AuthRequest, res: Response) => {
        const categories = await CategoryService.getCategories(getPaginationFromRequest(req));
        sendResponse(res, 200, 'Categories fetched successfully', categories);
    })

    static getCategoryById = requestHandler(async (req: AuthRequest, res: Response) => {
        const category = await CategoryService.getCategoryById(req.params.id);
        sendResponse(res, 200, 'Category fetched successfully', category);
    })

    static getCategoryProducts = requestHandler(async (req: AuthRequest, res: Response) => {
        const products = await CategoryService.getCategoryProducts(req.params.id);
        sendResponse(res, 200, 'Category products fetched successfully', products);
    })
}
