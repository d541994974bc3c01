import { Router } from 'express';
import { authMiddleware } from '../middleware/auth';
import { isStaffOrReadOnly } from '../middleware/role';
import categoryRoutes from './category.route';
import inventoryCountRoutes from './inventoryCount.route';
import inventoryTransactionRoutes from './inventoryTransaction.route';
import locationRoutes from './location.route';
import orderRoutes from './order.route';
import productRoutes from './product.route';
import stockRoutes from './stock.route';
import supplierRoutes from './supplier.route';
import userRoutes from './user.route';

const router = Router();

router.use("/users", userRoutes);
router.use("/categories", [authMiddleware, isStaffOrReadOnly], categoryRoutes);
router.use("/suppliers", [authMiddleware, isStaffOrReadOnly], supplierRoutes);
router.use("/locations", [authMiddleware, isStaffOrReadOnly], locationRoutes);
router.use("/products", [authMiddleware, isStaffOrReadOnly], productRoutes);
// Workflows check ownership per record in the services.
router.use("/transactions", [authMiddleware], inventoryTransactionRoutes);
router.use("/stock", [authMiddleware], stockRoutes);
router.use("/orders", [authMiddleware], orderRoutes);
router.use("/counts", [authMiddleware], inventoryCountRoutes);

export default router;
