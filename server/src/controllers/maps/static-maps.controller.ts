/**
 * Static / Embed Map Controller
 * Builds provider image URLs server-side so the key never leaves the gateway
 * as a separate field.
 *
 * - GET /embed           { src } embed URL
 * - GET /embed-redirect  302 to the embed URL
 * - GET /static          { src } static map URL
 * - GET /static-image    proxied PNG bytes (for callers that cannot reach the provider)
 */

import { Router } from 'express';
import type { MapSourceResponse } from '../../../../shared/api/index.js';
import type { MapsService } from '../../services/maps/maps.service.js';
import { EmbedQuerySchema, StaticMapQuerySchema } from '../../services/maps/maps-request.dto.js';
import { callContext } from './maps.controller.js';

export const STATIC_IMAGE_CACHE_CONTROL = 'public, max-age=3600';

export function createStaticMapsRouter(service: MapsService): Router {
    const router = Router();

    router.get('/embed', (req, res, next) => {
        try {
            const query = EmbedQuerySchema.parse(req.query);
            const body: MapSourceResponse = { src: service.getEmbedSrc(query) };
            req.log.info({ q: query.q, zoom: query.zoom }, '[StaticMaps] Embed URL generated');
            res.json(body);
        } catch (error) {
            next(error);
        }
    });

    router.get('/embed-redirect', (req, res, next) => {
        try {
            const query = EmbedQuerySchema.parse(req.query);
            res.redirect(302, service.getEmbedSrc(query));
        } catch (error) {
            next(error);
        }
    });

    router.get('/static', (req, res, next) => {
        try {
            const query = StaticMapQuerySchema.parse(req.query);
            const body: MapSourceResponse = { src: service.getStaticMapSrc(query) };
            res.json(body);
        } catch (error) {
            next(error);
        }
    });

    router.get('/static-image', async (req, res, next) => {
        try {
            const query = StaticMapQuerySchema.parse(req.query);
            const image = await service.fetchStaticMap(query, callContext(req));

            // Override Helmet's default so chat UIs on other origins can load the image
            res.setHeader('Cross-Origin-Resource-Policy', 'cross-origin');
            res.setHeader('Content-Type', 'image/png');
            res.setHeader('Cache-Control', STATIC_IMAGE_CACHE_CONTROL);
            res.setHeader('Content-Length', image.body.byteLength);
            res.send(image.body);

            req.log.info({
                q: query.q,
                width: query.width,
                height: query.height,
                sizeBytes: image.body.byteLength,
            }, '[StaticMaps] Map image served');
        } catch (error) {
            next(error);
        }
    });

    return router;
}
