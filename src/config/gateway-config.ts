/**
 * Gateway configuration from a YAML file and environment variables.
 *
 * Precedence, lowest first: built-in defaults, the YAML file, environment
 * variables. Validation errors name the offending path.
 *
 * @example
 * ```yaml
 * eventStore:
 *   connectionString: kurrentdb://kurrentdb:2113?tls=false
 * naming:
 *   streamPrefix: graphql-mutation-
 *   eventTypeNamespace: GraphQL
 * server:
 *   port: 4000
 *   graphql:
 *     dispatchPolicy: resolved
 *     loanIdResultFields: [recordLoanRequested]
 * metrics:
 *   enabled: true
 * ```
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import type { DispatchPolicy, GraphQLConfig, ServerConfigInput } from '../api/config.js';
import { ConfigError } from '../mapping/errors.js';
import {
  DEFAULT_EVENT_TYPE_NAMESPACE,
  DEFAULT_STREAM_PREFIX,
  type NamingPolicyConfig,
} from '../mapping/naming-policy.js';
import type { MetricsConfig } from '../observability/types.js';
import { DEFAULT_CONNECTION_STRING, type EventStoreConfig } from '../sinks/event-store-sink.js';
import { isPlainObject } from '../types/json.js';

export interface GatewayConfigInput {
  eventStore?: EventStoreConfig;
  naming?: NamingPolicyConfig;
  server?: ServerConfigInput;
  metrics?: MetricsConfig;
}

export interface GatewayConfig {
  eventStore: Required<EventStoreConfig>;
  naming: Required<NamingPolicyConfig>;
  server: ServerConfigInput;
  metrics: MetricsConfig;
}

export const ENV_CONNECTION_STRING = 'MUTATION_STREAM_CONNECTION_STRING';
export const ENV_STREAM_PREFIX = 'MUTATION_STREAM_STREAM_PREFIX';
export const ENV_EVENT_TYPE_NAMESPACE = 'MUTATION_STREAM_EVENT_TYPE_NAMESPACE';
export const ENV_PORT = 'MUTATION_STREAM_PORT';
export const ENV_HOST = 'MUTATION_STREAM_HOST';

const DISPATCH_POLICIES: readonly DispatchPolicy[] = ['resolved', 'always'];

// ---------------------------------------------------------------------------
// Field validators
// ---------------------------------------------------------------------------

type Section = Record<string, unknown>;

function section(value: unknown, path: string, allowed: readonly string[]): Section | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isPlainObject(value)) {
    throw new ConfigError(path, `must be a mapping, got ${Array.isArray(value) ? 'array' : typeof value}`);
  }
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new ConfigError(path ? `${path}.${key}` : key, 'unknown option');
    }
  }
  return value;
}

function optionalString(obj: Section, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${path}.${key}`, `must be a string, got ${typeof value}`);
  }
  return value;
}

function optionalBoolean(obj: Section, key: string, path: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${path}.${key}`, `must be a boolean, got ${typeof value}`);
  }
  return value;
}

function toPort(value: unknown, path: string): number {
  const port = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(path, `must be an integer between 0 and 65535, got ${JSON.stringify(value)}`);
  }
  return port;
}

function optionalNumbers(obj: Section, key: string, path: string): number[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((n) => typeof n === 'number' && Number.isFinite(n))) {
    throw new ConfigError(`${path}.${key}`, 'must be a list of finite numbers');
  }
  return value.filter((n): n is number => typeof n === 'number');
}

function optionalStrings(obj: Section, key: string, path: string): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new ConfigError(`${path}.${key}`, 'must be a list of strings');
  }
  return value.filter((item): item is string => typeof item === 'string');
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function parseEventStore(value: unknown): EventStoreConfig | undefined {
  const obj = section(value, 'eventStore', ['connectionString']);
  if (!obj) return undefined;
  const connectionString = optionalString(obj, 'connectionString', 'eventStore');
  return connectionString !== undefined ? { connectionString } : {};
}

function parseNaming(value: unknown): NamingPolicyConfig | undefined {
  const obj = section(value, 'naming', ['streamPrefix', 'eventTypeNamespace']);
  if (!obj) return undefined;
  const streamPrefix = optionalString(obj, 'streamPrefix', 'naming');
  const eventTypeNamespace = optionalString(obj, 'eventTypeNamespace', 'naming');
  return {
    ...(streamPrefix !== undefined && { streamPrefix }),
    ...(eventTypeNamespace !== undefined && { eventTypeNamespace }),
  };
}

function parseGraphQL(value: unknown): GraphQLConfig | undefined {
  const obj = section(value, 'server.graphql', ['path', 'graphiql', 'dispatchPolicy', 'loanIdResultFields']);
  if (!obj) return undefined;

  const path = optionalString(obj, 'path', 'server.graphql');
  const graphiql = optionalBoolean(obj, 'graphiql', 'server.graphql');
  const loanIdResultFields = optionalStrings(obj, 'loanIdResultFields', 'server.graphql');
  const policy = optionalString(obj, 'dispatchPolicy', 'server.graphql');
  const dispatchPolicy = DISPATCH_POLICIES.find((p) => p === policy);
  if (policy !== undefined && dispatchPolicy === undefined) {
    throw new ConfigError(
      'server.graphql.dispatchPolicy',
      `must be one of ${DISPATCH_POLICIES.join(', ')}, got "${policy}"`,
    );
  }

  return {
    ...(path !== undefined && { path }),
    ...(graphiql !== undefined && { graphiql }),
    ...(dispatchPolicy !== undefined && { dispatchPolicy }),
    ...(loanIdResultFields !== undefined && { loanIdResultFields }),
  };
}

function parseServer(value: unknown): ServerConfigInput | undefined {
  const obj = section(value, 'server', ['port', 'host', 'logger', 'graphql']);
  if (!obj) return undefined;

  const host = optionalString(obj, 'host', 'server');
  const logger = optionalBoolean(obj, 'logger', 'server');
  const graphql = parseGraphQL(obj['graphql']);
  const rawPort = obj['port'];

  return {
    ...(rawPort !== undefined && rawPort !== null && { port: toPort(rawPort, 'server.port') }),
    ...(host !== undefined && { host }),
    ...(logger !== undefined && { logger }),
    ...(graphql !== undefined && { graphql }),
  };
}

function parseMetrics(value: unknown): MetricsConfig | undefined {
  const obj = section(value, 'metrics', [
    'enabled', 'prefix', 'perFieldMetrics', 'maxLabeledFields', 'histogramBuckets',
  ]);
  if (!obj) return undefined;

  const enabled = optionalBoolean(obj, 'enabled', 'metrics');
  const prefix = optionalString(obj, 'prefix', 'metrics');
  const perFieldMetrics = optionalBoolean(obj, 'perFieldMetrics', 'metrics');
  const histogramBuckets = optionalNumbers(obj, 'histogramBuckets', 'metrics');
  const rawMax = obj['maxLabeledFields'];
  if (rawMax !== undefined && (typeof rawMax !== 'number' || !Number.isInteger(rawMax) || rawMax < 0)) {
    throw new ConfigError('metrics.maxLabeledFields', 'must be a non-negative integer');
  }

  return {
    ...(enabled !== undefined && { enabled }),
    ...(prefix !== undefined && { prefix }),
    ...(perFieldMetrics !== undefined && { perFieldMetrics }),
    ...(typeof rawMax === 'number' && { maxLabeledFields: rawMax }),
    ...(histogramBuckets !== undefined && { histogramBuckets }),
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Parses and validates YAML configuration text. An empty document is an
 * empty configuration.
 *
 * @throws ConfigError on YAML syntax errors and invalid options
 */
export function parseGatewayConfig(yamlContent: string): GatewayConfigInput {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (err) {
    throw new ConfigError('', `YAML syntax error: ${err instanceof Error ? err.message : String(err)}`);
  }

  const root = section(parsed, '', ['eventStore', 'naming', 'server', 'metrics']);
  if (!root) return {};

  const eventStore = parseEventStore(root['eventStore']);
  const naming = parseNaming(root['naming']);
  const server = parseServer(root['server']);
  const metrics = parseMetrics(root['metrics']);

  return {
    ...(eventStore !== undefined && { eventStore }),
    ...(naming !== undefined && { naming }),
    ...(server !== undefined && { server }),
    ...(metrics !== undefined && { metrics }),
  };
}

/** Overlays `MUTATION_STREAM_*` environment variables */
export function applyEnvironment(
  input: GatewayConfigInput,
  env: Readonly<Record<string, string | undefined>>,
): GatewayConfigInput {
  const connectionString = env[ENV_CONNECTION_STRING];
  const streamPrefix = env[ENV_STREAM_PREFIX];
  const eventTypeNamespace = env[ENV_EVENT_TYPE_NAMESPACE];
  const port = env[ENV_PORT];
  const host = env[ENV_HOST];

  return {
    ...input,
    eventStore: {
      ...input.eventStore,
      ...(connectionString !== undefined && { connectionString }),
    },
    naming: {
      ...input.naming,
      ...(streamPrefix !== undefined && { streamPrefix }),
      ...(eventTypeNamespace !== undefined && { eventTypeNamespace }),
    },
    server: {
      ...input.server,
      ...(port !== undefined && { port: toPort(port, ENV_PORT) }),
      ...(host !== undefined && { host }),
    },
  };
}

/** Fills defaults for the event store and naming sections */
export function resolveGatewayConfig(input: GatewayConfigInput = {}): GatewayConfig {
  return {
    eventStore: {
      connectionString: input.eventStore?.connectionString ?? DEFAULT_CONNECTION_STRING,
    },
    naming: {
      streamPrefix: input.naming?.streamPrefix ?? DEFAULT_STREAM_PREFIX,
      eventTypeNamespace: input.naming?.eventTypeNamespace ?? DEFAULT_EVENT_TYPE_NAMESPACE,
    },
    server: input.server ?? {},
    metrics: input.metrics ?? {},
  };
}

export interface LoadGatewayConfigOptions {
  /** YAML file; skipped when omitted */
  file?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: Readonly<Record<string, string | undefined>>;
}

export async function loadGatewayConfig(options: LoadGatewayConfigOptions = {}): Promise<GatewayConfig> {
  let input: GatewayConfigInput = {};

  if (options.file !== undefined) {
    let content: string;
    try {
      content = await readFile(options.file, 'utf-8');
    } catch (err) {
      throw new ConfigError(options.file, `cannot read configuration file: ${err instanceof Error ? err.message : String(err)}`);
    }
    input = parseGatewayConfig(content);
  }

  return resolveGatewayConfig(applyEnvironment(input, options.env ?? process.env));
}
