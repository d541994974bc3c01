import { Router } from 'express';
import { InventoryCountController } from '../controller/inventoryCount.controller';

const router = Router();

router
    .post('/', InventoryCountController.createCount)
    .get('/', InventoryCountController.getCounts)
    .get('/:id', InventoryCountController.getCountById)
    .get('/:id/uncounted', InventoryCountController.getUncountedItems)
    .patch('/:id', InventoryCountController.updateCount)
    .put('/:id/items/:itemId', InventoryCountController.markCountItem)
    .post('/:id/complete', InventoryCountController.completeCount)
    .post('/:id/cancel', InventoryCountController.cancelCount);

export default router;
