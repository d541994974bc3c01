import { Router } from 'express';
import { ProductController } from '../controller/product.controller';

const router = Router();

router
    .post('/', ProductController.createProduct)
    .get('/', ProductController.getProducts)
    .get('/reorder', ProductController.getReorderList)
    .get('/:id', ProductController.getProductById)
    .get('/:id/inventory', ProductController.getProductInventory)
    .put('/:id', ProductController.updateProduct)
    .delete('/:id', ProductController.deleteProduct);

export default router;
