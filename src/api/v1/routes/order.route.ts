import { Router } from 'express';
import { OrderController } from '../controller/order.controller';

const router = Router();

router
    .post('/', OrderController.createOrder)
    .get('/', OrderController.getOrders)
    .get('/:id', OrderController.getOrderById)
    .patch('/:id', OrderController.updateOrder)
    .put('/:id/items/:itemId', OrderController.updateOrderItem)
    .post('/:id/place', OrderController.placeOrder)
    .post('/:id/receive', OrderController.receiveOrder)
    .post('/:id/cancel', OrderController.cancelOrder);

export default router;
