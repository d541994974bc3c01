import { Router } from 'express';
import { CategoryController } from '../controller/category.controller';

const router = Router();

router
    .post('/', CategoryController.createCategory)
    .get('/', CategoryController.getCategories)
    .get('/:id', CategoryController.getCategoryById)
    .get('/:id/products', CategoryController.getCategoryProducts)
    .put('/:id', CategoryController.updateCategory)
    .delete('/:id', CategoryController.deleteCategory);

export default router;
