import { Response } from "express";
import { requireUser } from "../middleware/role";
import { InventoryTransactionService } from "../service/inventoryTransaction.service";
import { getPaginationFromRequest } from "../utils/filterWithPaginate";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { createTransactionSchema, transactionQuerySchema } from "../validation/transaction.validation";
import { AuthRequest } from "../middleware/auth";

export class InventoryTransactionController {
    static createTransaction = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const body = createTransactionSchema.parse(req.body);
        const applied = await InventoryTransactionService.applyTransaction({ ...body, performedBy: user.id });
        sendResponse(res, 201, 'Transaction recorded successfully', applied);
    })

    static getTransactions = requestHandler(async (req: AuthRequest, res: Response) => {
        const pagination = getPaginationFromRequest(req);
        const filter = transactionQuerySchema.parse(req.query);
        const transactions = await InventoryTransactionService.getTransactions(pagination, filter);
        sendResponse(res, 200, 'Transactions fetched successfully', transactions);
    })

    static getTransactionById = requestHandler(async (req: AuthRequest, res: Response) => {
        const transaction = await InventoryTransactionService.getTransactionById(req.params.id);
        sendResponse(res, 200, 'Transaction fetched successfully', transaction);
    })
}
