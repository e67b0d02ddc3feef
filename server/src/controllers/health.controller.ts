/**
 * Health & service info endpoints
 *
 * - GET /health: liveness plus whether a provider key is configured
 * - GET /:       service info
 */

import type { Request, Response } from 'express';
import type { HealthResponse } from '../../../shared/api/index.js';
import { SERVICE_NAME, SERVICE_VERSION } from '../config/env.js';
import type { MapsService } from '../services/maps/maps.service.js';

export function createHealthHandler(service: MapsService) {
    return (_req: Request, res: Response): void => {
        const body: HealthResponse = {
            status: 'healthy',
            service: SERVICE_NAME,
            version: SERVICE_VERSION,
            maps_api_configured: service.isConfigured,
        };
        res.status(200).json(body);
    };
}

export function createRootHandler(appName: string) {
    return (_req: Request, res: Response): void => {
        res.status(200).json({
            message: appName,
            version: SERVICE_VERSION,
            health: '/health',
            api: '/api/maps',
        });
    };
}
