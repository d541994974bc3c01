import { Response } from "express";
import { AuthRequest } from "../middleware/auth";
import { requireUser } from "../middleware/role";
import { InventoryCountService } from "../service/inventoryCount.service";
import { getPaginationFromRequest } from "../utils/filterWithPaginate";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import {
    completeCountSchema,
    countQuerySchema,
    createCountSchema,
    markCountItemSchema,
    updateCountSchema,
} from "../validation/count.validation";

export class InventoryCountController {
    static createCount = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const body = createCountSchema.parse(req.body);
        const countDetail = await InventoryCountService.createCount(body, user);
        sendResponse(res, 201, 'Inventory count created successfully', countDetail);
    })

    static getCounts = requestHandler(async (req: AuthRequest, res: Response) => {
        const pagination = getPaginationFromRequest(req);
        const filter = countQuerySchema.parse(req.query);
        const counts = await InventoryCountService.getCounts(pagination, filter);
        sendResponse(res, 200, 'Inventory counts fetched successfully', counts);
    })

    static getCountById = requestHandler(async (req: AuthRequest, res: Response) => {
        const countDetail = await InventoryCountService.getCountById(req.params.id);
        sendResponse(res, 200, 'Inventory count fetched successfully', countDetail);
    })

    static getUncountedItems = requestHandler(async (req: AuthRequest, res: Response) => {
        const items = await InventoryCountService.getUncountedItems(req.params.id);
        sendResponse(res, 200, 'Uncounted items fetched successfully', items);
    })

    static updateCount = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const body = updateCountSchema.parse(req.body);
        const countDetail = await InventoryCountService.updateCount(req.params.id, body, user);
        sendResponse(res, 200, 'Inventory count updated successfully', countDetail);
    })

    static markCountItem = requestHandler(async (req: AuthRequest, res: Response) => {
        requireUser(req);
        const body = markCountItemSchema.parse(req.body);
        const item = await InventoryCountService.markCountItem(req.params.id, req.params.itemId, body);
        sendResponse(res, 200, 'Inventory count item marked as counted', item);
    })

    static completeCount = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const { completedBy } = completeCountSchema.parse(req.body ?? {});
        const countDetail = await InventoryCountService.completeCount(req.params.id, completedBy, user);
        sendResponse(res, 200, 'Inventory count completed successfully', countDetail);
    })

    static cancelCount = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const countDetail = await InventoryCountService.cancelCount(req.params.id, user);
        sendResponse(res, 200, 'Inventory count cancelled successfully', countDetail);
    })
}
