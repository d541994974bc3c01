import { Response } from "express";
import { AuthRequest } from "../middleware/auth";
import { requireUser } from "../middleware/role";
import { OrderService } from "../service/order.service";
import { getPaginationFromRequest } from "../utils/filterWithPaginate";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import {
    createOrderSchema,
    orderQuerySchema,
    receivedQuantitySchema,
    receiveOrderSchema,
    updateOrderSchema,
} from "../validation/order.validation";

export class OrderController {
    static createOrder = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const body = createOrderSchema.parse(req.body);
        const order = await OrderService.createOrder(body, user);
        sendResponse(res, 201, 'Order created successfully', order);
    })

    static getOrders = requestHandler(async (req: AuthRequest, res: Response) => {
        const pagination = getPaginationFromRequest(req);
        const filter = orderQuerySchema.parse(req.query);
        const orders = await OrderService.getOrders(pagination, filter);
        sendResponse(res, 200, 'Orders fetched successfully', orders);
    })

    static getOrderById = requestHandler(async (req: AuthRequest, res: Response) => {
        const order = await OrderService.getOrderById(req.params.id);
        sendResponse(res, 200, 'Order fetched successfully', order);
    })

    static updateOrder = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const body = updateOrderSchema.parse(req.body);
        const order = await OrderService.updateOrder(req.params.id, body, user);
        sendResponse(res, 200, 'Order updated successfully', order);
    })

    static updateOrderItem = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const body = receivedQuantitySchema.parse(req.body);
        const order = await OrderService.updateReceivedQuantity(
            req.params.id,
            { ...body, itemId: req.params.itemId },
            user,
        );
        sendResponse(res, 200, 'Order item updated successfully', order);
    })

    static placeOrder = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const order = await OrderService.placeOrder(req.params.id, user);
        sendResponse(res, 200, 'Order placed successfully', order);
    })

    static receiveOrder = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const { items } = receiveOrderSchema.parse(req.body ?? {});
        const order = await OrderService.receiveOrder(req.params.id, user, items);
        sendResponse(res, 200, 'Order received successfully', order);
    })

    static cancelOrder = requestHandler(async (req: AuthRequest, res: Response) => {
        const user = requireUser(req);
        const order = await OrderService.cancelOrder(req.params.id, user);
        sendResponse(res, 200, 'Order cancelled successfully', order);
    })
}
