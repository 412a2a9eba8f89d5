import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { fileURLToPath } from 'node:url';
import { configCommand, type ConfigCommandOptions } from '../../../../src/cli/commands/config.js';
import { ConfigError } from '../../../../src/mapping/errors.js';
import { setOutputOptions } from '../../../../src/cli/utils/output.js';

const configFile = fileURLToPath(new URL('../../../fixtures/cli/gateway.yaml', import.meta.url));

function createOptions(overrides: Partial<ConfigCommandOptions> = {}): ConfigCommandOptions {
  return {
    format: 'pretty',
    quiet: false,
    noColor: true,
    config: undefined,
    env: {},
    ...overrides,
  };
}

describe('configCommand', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    setOutputOptions({ noColor: true, quiet: false });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('should print defaults without a file', async () => {
    await configCommand(createOptions());

    expect(String(consoleLogSpy.mock.calls[0]?.[0]).split('\n')).toEqual([
      'Configuration (defaults and environment)',
      '',
      '  event store:     kurrentdb://localhost:2113?tls=false',
      '  stream prefix:   graphql-mutation-',
      '  event namespace: GraphQL',
      '  listen:          0.0.0.0:4000',
      '  graphql path:    /graphql',
      '  dispatch policy: resolved',
      '  metrics:         enabled',
    ]);
  });

  it('should read the YAML file', async () => {
    const config = await configCommand(createOptions({ config: configFile }));

    expect(config).toEqual({
      eventStore: { connectionString: 'kurrentdb://events.internal:2113?tls=false' },
      naming: { streamPrefix: 'loans-', eventTypeNamespace: 'Loans' },
      server: { port: 8080, graphql: { dispatchPolicy: 'always' } },
      metrics: { enabled: false },
    });
  });

  it('should print file settings completed with server defaults', async () => {
    await configCommand(createOptions({ config: configFile }));

    expect(String(consoleLogSpy.mock.calls[0]?.[0]).split('\n')).toEqual([
      `Configuration (${configFile})`,
      '',
      '  event store:     kurrentdb://events.internal:2113?tls=false',
      '  stream prefix:   loans-',
      '  event namespace: Loans',
      '  listen:          0.0.0.0:8080',
      '  graphql path:    /graphql',
      '  dispatch policy: always',
      '  metrics:         disabled',
    ]);
  });

  it('should let the environment override the file', async () => {
    const config = await configCommand(createOptions({
      config: configFile,
      env: { MUTATION_STREAM_PORT: '9090', MUTATION_STREAM_STREAM_PREFIX: 'env-' },
    }));

    expect(config.server.port).toBe(9090);
    expect(config.naming.streamPrefix).toBe('env-');
  });

  it('should print JSON', async () => {
    const config = await configCommand(createOptions({ format: 'json' }));

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual(config);
  });

  it('should fail for an unreadable file', async () => {
    await expect(configCommand(createOptions({ config: '/nonexistent/gateway.yaml' })))
      .rejects.toBeInstanceOf(ConfigError);
  });
});
