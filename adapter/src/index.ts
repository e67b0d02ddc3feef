export { MapsTool, type MapsToolOptions } from './maps-tool.js';
export {
    AdapterConfigError,
    AdapterSettingsSchema,
    type AdapterSettings,
    type AdapterSettingsInput,
} from './config.js';
export { GatewayClient, type GatewayFailure, type GatewayResult } from './gateway-client.js';
export { createAdapterLogger, type Logger } from './logger.js';
