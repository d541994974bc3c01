import { Router } from 'express';
import { StockController } from '../controller/stock.controller';

const router = Router();

router
    .get('/', StockController.getStock)
    .get('/verify', StockController.verifyStock);

export default router;
