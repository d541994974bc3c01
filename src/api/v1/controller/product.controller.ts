import { Response } from "express";
import { AuthRequest } from "../middleware/auth";
import { ProductService } from "../service/product.service";
import { getPaginationFromRequest } from "../utils/filterWithPaginate";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { productQuerySchema, productSchema } from "../validation/reference.validation";

export class ProductController {
    static createProduct = requestHandler(async (req: AuthRequest, res: Response) => {
        const product = productSchema.parse(req.body);
        const createdProduct = await ProductService.createProduct(product);
        sendResponse(res, 201, 'Product created successfully', createdProduct);
    })

    static updateProduct = requestHandler(async (req: AuthRequest, res: Response) => {
        const product = productSchema.partial().parse(req.body);
        const updatedProduct = await ProductService.updateProduct(req.params.id, product);
        sendResponse(res, 200, 'Product updated successfully', updatedProduct);
    })

    static deleteProduct = requestHandler(async (req: AuthRequest, res: Response) => {
        const deletedProduct = await ProductService.deleteProduct(req.params.id);
        sendResponse(res, 200, 'Product deleted successfully', deletedProduct);
    })

    static getProducts = requestHandler(async (req: AuthRequest, res: Response) => {
        const pagination = getPaginationFromRequest(req);
        const filter = productQuerySchema.parse(req.query);
        const products = await ProductService.getProducts(pagination, filter);
        sendResponse(res, 200, 'Products fetched successfully', products);
    })

    static getProductById = requestHandler(async (req: AuthRequest, res: Response) => {
        const product = await ProductService.getProductById(req.params.id);
        sendResponse(res, 200, 'Product fetched successfully', product);
    })

    static getProductInventory = requestHandler(async (req: AuthRequest, res: Response) => {
        const inventory = await ProductService.getProductInventory(req.params.id);
        sendResponse(res, 200, 'Product inventory fetched successfully', inventory);
    })

    static getReorderList = requestHandler(async (req: AuthRequest, res: Response) => {
        const products = await ProductService.getReorderList();
        sendResponse(res, 200, 'Reorder list fetched successfully', products);
    })
}
