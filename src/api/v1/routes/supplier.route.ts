import { Router } from 'express';
import { SupplierController } from '../controller/supplier.controller';

const router = Router();

router
    .post('/', SupplierController.createSupplier)
    .get('/', SupplierController.getSuppliers)
    .get('/:id', SupplierController.getSupplierById)
    .get('/:id/products', SupplierController.getSupplierProducts)
    .get('/:id/orders', SupplierController.getSupplierOrders)
    .put('/:id', SupplierController.updateSupplier)
    .delete('/:id', SupplierController.deleteSupplier);

export default router;
