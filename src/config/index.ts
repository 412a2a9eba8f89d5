export {
  loadGatewayConfig,
  parseGatewayConfig,
  applyEnvironment,
  resolveGatewayConfig,
  ENV_CONNECTION_STRING,
  ENV_STREAM_PREFIX,
  ENV_EVENT_TYPE_NAMESPACE,
  ENV_PORT,
  ENV_HOST,
  type GatewayConfig,
  type GatewayConfigInput,
  type LoadGatewayConfigOptions,
} from './gateway-config.js';
