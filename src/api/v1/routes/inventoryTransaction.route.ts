import { Router } from 'express';
import { InventoryTransactionController } from '../controller/inventoryTransaction.controller';

// Append-only: there is no update or delete route.
const router = Router();

router
    .post('/', InventoryTransactionController.createTransaction)
    .get('/', InventoryTransactionController.getTransactions)
    .get('/:id', InventoryTransactionController.getTransactionById);

export default router;
