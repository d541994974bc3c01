import { Router } from 'express';
import { LocationController } from '../controller/location.controller';

const router = Router();

router
    .post('/', LocationController.createLocation)
    .get('/', LocationController.getLocations)
    .get('/:id', LocationController.getLocationById)
    .get('/:id/inventory', LocationController.getLocationInventory)
    .put('/:id', LocationController.updateLocation)
    .delete('/:id', LocationController.deleteLocation);

export default router;
