import { Response } from "express";
import { AuthRequest } from "../middleware/auth";
import { LocationService } from "../service/location.service";
import { getPaginationFromRequest } from "../utils/filterWithPaginate";
import { requestHandler } from "../utils/requestHandler";
import { sendResponse } from "../utils/response";
import { locationSchema } from "../validation/reference.validation";

export class LocationController {
    static createLocation = requestHandler(async (req: AuthRequest, res: Response) => {
        const location = locationSchema.parse(req.body);
        const createdLocation = await LocationService.createLocation(location);
        sendResponse(res, 201, 'Location created successfully', createdLocation);
    })

    static updateLocation = requestHandler(async (req: AuthRequest, res: Response) => {
        const location = locationSchema.partial().parse(req.body);
        const updatedLocation = await LocationService.updateLocation(req.params.id, location);
        sendResponse(res, 200, 'Location updated successfully', updatedLocation);
    })

    static deleteLocation = requestHandler(async (req: AuthRequest, res: Response) => {
        const deletedLocation = await LocationService.deleteLocation(req.params.id);
        sendResponse(res, 200, 'Location deleted successfully', deletedLocation);
    })

    static getLocations = requestHandler(async (req: AuthRequest, res: Response) => {
        const locations = await LocationService.getLocations(getPaginationFromRequest(req));
        sendResponse(res, 200, 'Locations fetched successfully', locations);
    })

    static getLocationById = requestHandler(async (req: AuthRequest, res: Response) => {
        const location = await LocationService.getLocationById(req.params.id);
        sendResponse(res, 200, 'Location fetched successfully', location);
    })

    static getLocationInventory = requestHandler(async (req: AuthRequest, res: Response) => {
        const inventory = await LocationService.getLocationInventory(req.params.id);
        sendResponse(res, 200, 'Location inventory fetched successfully', inventory);
    })
}
