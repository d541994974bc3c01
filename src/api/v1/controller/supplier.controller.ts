import { Response } from "express";
import { AuthRequest } from "../middleware/auth";
import { SupplierService } from "../service/supplier.service";
import { getPaginationFromRequest } from "../utils/filterWithPaginate";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { supplierSchema } from "../validation/reference.validation";

export class SupplierController {
    static createSupplier = requestHandler(async (req: AuthRequest, res: Response) => {
        const supplier = supplierSchema.parse(req.body);
        const createdSupplier = await SupplierService.createSupplier(supplier);
        sendResponse(res, 201, 'Supplier created successfully', createdSupplier);
    })

    static updateSupplier = requestHandler(async (req: AuthRequest, res: Response) => {
        const supplier = supplierSchema.partial().parse(req.body);
        const updatedSupplier = await SupplierService.updateSupplier(req.params.id, supplier);
        sendResponse(res, 200, 'Supplier updated successfully', updatedSupplier);
    })

    static deleteSupplier = requestHandler(async (req: AuthRequest, res: Response) => {
        const deletedSupplier = await SupplierService.deleteSupplier(req.params.id);
        sendResponse(res, 200, 'Supplier deleted successfully', deletedSupplier);
    })

    static getSuppliers = requestHandler(async (req: AuthRequest, res: Response) => {
        const suppliers = await SupplierService.getSuppliers(getPaginationFromRequest(req));
        sendResponse(res, 200, 'Suppliers fetched successfully', suppliers);
    })

    static getSupplierById = requestHandler(async (req: AuthRequest, res: Response) => {
        const supplier = await SupplierService.getSupplierById(req.params.id);
        sendResponse(res, 200, 'Supplier fetched successfully', supplier);
    })

    static getSupplierProducts = requestHandler(async (req: AuthRequest, res: Response) => {
        const products = await SupplierService.getSupplierProducts(req.params.id);
        sendResponse(res, 200, 'Supplier products fetched successfully', products);
    })

    static getSupplierOrders = requestHandler(async (req: AuthRequest, res: Response) => {
        const orders = await SupplierService.getSupplierOrders(req.params.id);
        sendResponse(res, 200, 'Supplier orders fetched successfully', orders);
    })
}
