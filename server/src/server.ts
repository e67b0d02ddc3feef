import 'dotenv/config';
import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { GoogleMapsClient } from './services/google/google-maps.client.js';
import { MapsService } from './services/maps/maps.service.js';

const config = getConfig();

if (config.debug && logger.levelVal > logger.levels.values.debug) {
    logger.level = 'debug';
}

// Client construction failures surface here, at startup, not mid-request
const provider = config.googleMapsApiKey
    ? new GoogleMapsClient({ apiKey: config.googleMapsApiKey, timeoutMs: config.apiTimeoutMs })
    : null;

if (!provider) {
    logger.warn('GOOGLE_MAPS_API_KEY is not set. Maps endpoints will respond 500 until it is provided.');
}

const service = new MapsService(provider, { maxResults: config.maxResults });

logger.info({
    appName: config.appName,
    env: config.env,
    debug: config.debug,
    logLevel: config.logLevel,
    corsOrigins: config.corsOrigins,
    apiKeyConfigured: provider !== null,
    apiKeySource: config.apiKeySource,
    apiTimeoutMs: config.apiTimeoutMs,
    maxResults: config.maxResults,
}, `Starting ${config.appName}`);

const app = createApp({ service, config });
const server = app.listen(config.port, () => {
    logger.info(`Server listening on http://localhost:${config.port}`);
});

function shutdown(signal: NodeJS.Signals) {
    logger.info(`Received ${signal}. Shutting down gracefully...`);
    server.close(() => {
        logger.info('Server closed');
        process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
