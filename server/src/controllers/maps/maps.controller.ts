/**
 * Maps Controller
 *
 * Endpoints (mounted under /api/maps):
 * - POST /search          place search, optional free-text center
 * - GET  /place/:placeId  place details
 * - POST /directions      route between two free-text locations
 * - POST /geocode         address → coordinates
 *
 * Handlers validate, delegate to MapsService and pass every failure to next();
 * errorMiddleware owns the translation to HTTP.
 */

import { Router, type Request } from 'express';
import type { MapsCallContext, MapsService } from '../../services/maps/maps.service.js';
import {
    DirectionsRequestSchema,
    GeocodeRequestSchema,
    PlaceIdParamSchema,
    SearchRequestSchema,
} from '../../services/maps/maps-request.dto.js';

export function callContext(req: Request): MapsCallContext {
    return { requestId: req.traceId, log: req.log };
}

export function createMapsRouter(service: MapsService): Router {
    const router = Router();

    router.post('/search', async (req, res, next) => {
        try {
            const request = SearchRequestSchema.parse(req.body ?? {});
            res.json(await service.searchPlaces(request, callContext(req)));
        } catch (error) {
            next(error);
        }
    });

    router.get('/place/:placeId', async (req, res, next) => {
        try {
            const { placeId } = PlaceIdParamSchema.parse(req.params);
            res.json(await service.getPlaceDetails(placeId, callContext(req)));
        } catch (error) {
            next(error);
        }
    });

    router.post('/directions', async (req, res, next) => {
        try {
            const request = DirectionsRequestSchema.parse(req.body ?? {});
            res.json(await service.getDirections(request, callContext(req)));
        } catch (error) {
            next(error);
        }
    });

    router.post('/geocode', async (req, res, next) => {
        try {
            const request = GeocodeRequestSchema.parse(req.body ?? {});
            res.json(await service.geocodeAddress(request, callContext(req)));
        } catch (error) {
            next(error);
        }
    });

    return router;
}
