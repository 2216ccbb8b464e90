/**
 * Configuration Module
 */

export {
  GatewayConfigSchema,
  type GatewayConfig,
  type Env,
  ConfigError,
  loadGatewayConfig,
} from './gateway-config.js';
