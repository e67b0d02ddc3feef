import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { GatewayConfig } from './config/env.js';
import { createMapsRouter } from './controllers/maps/maps.controller.js';
import { createStaticMapsRouter } from './controllers/maps/static-maps.controller.js';
import { createHealthHandler, createRootHandler } from './controllers/health.controller.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { errorMiddleware, notFoundMiddleware } from './middleware/error.middleware.js';
import type { MapsService } from './services/maps/maps.service.js';

export interface AppDependencies {
    service: MapsService;
    config: Pick<GatewayConfig, 'appName' | 'corsOrigins'>;
}

export function createApp({ service, config }: AppDependencies) {
    const app = express();
    app.use(helmet());
    app.use(compression());
    app.use(cors({
        origin: config.corsOrigins,
        credentials: true,
    }));

    // Request context & logging (BEFORE body parsing so malformed bodies are traced too)
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);

    app.use(express.json({ limit: '1mb' }));

    app.use('/api/maps', createMapsRouter(service));
    app.use('/api/maps', createStaticMapsRouter(service));

    app.get('/health', createHealthHandler(service));
    app.get('/', createRootHandler(config.appName));

    app.use(notFoundMiddleware);
    app.use(errorMiddleware);

    return app;
}
