/**
 * `config` command: prints the gateway configuration after defaults, the
 * YAML file and environment overrides are applied.
 */

import { resolveConfig } from '../../api/config.js';
import { loadGatewayConfig, type GatewayConfig } from '../../config/gateway-config.js';
import type { GlobalOptions } from '../types.js';
import { colorize, print, printJson } from '../utils/output.js';

export interface ConfigCommandOptions extends GlobalOptions {
  env?: Readonly<Record<string, string | undefined>>;
}

function formatPretty(config: GatewayConfig, source: string): string {
  const server = resolveConfig(config.server);
  return [
    colorize(`Configuration (${source})`, 'bold'),
    '',
    `  event store:     ${config.eventStore.connectionString}`,
    `  stream prefix:   ${config.naming.streamPrefix}`,
    `  event namespace: ${config.naming.eventTypeNamespace}`,
    `  listen:          ${server.host}:${server.port}`,
    `  graphql path:    ${server.graphql.path}`,
    `  dispatch policy: ${server.graphql.dispatchPolicy}`,
    `  metrics:         ${config.metrics.enabled === false ? 'disabled' : 'enabled'}`,
  ].join('\n');
}

export async function configCommand(options: ConfigCommandOptions): Promise<GatewayConfig> {
  const config = await loadGatewayConfig({
    ...(options.config !== undefined && { file: options.config }),
    ...(options.env !== undefined && { env: options.env }),
  });

  if (options.format === 'json') {
    printJson(config);
  } else {
    print(formatPretty(config, options.config ?? 'defaults and environment'));
  }
  return config;
}
