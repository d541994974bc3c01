import { Response } from "express";
import { AuthRequest } from "../middleware/auth";
import { InventoryTransactionService } from "../service/inventoryTransaction.service";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { stockQuerySchema } from "../validation/transaction.validation";

export class StockController {
    static getStock = requestHandler(async (req: AuthRequest, res: Response) => {
        const { productId, locationId } = stockQuerySchema.parse(req.query);
        const quantity = await InventoryTransactionService.getStock(productId, locationId);
        sendResponse(res, 200, 'Stock fetched successfully', { productId, locationId, quantity });
    })

    static verifyStock = requestHandler(async (req: AuthRequest, res: Response) => {
        const { productId, locationId } = stockQuerySchema.parse(req.query);
        const verification = await InventoryTransactionService.verifyStock(productId, locationId);
        sendResponse(res, 200, 'Stock verified successfully', verification);
    })
}
