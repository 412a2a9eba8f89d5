/**
 * CLI setup with CAC.
 */

import { cac } from 'cac';
import { loadGatewayConfig } from '../config/gateway-config.js';
import type { NamingPolicyConfig } from '../mapping/naming-policy.js';
import { configCommand } from './commands/config.js';
import { validateCommand } from './commands/validate.js';
import { OUTPUT_FORMATS, type GlobalOptions } from './types.js';
import { InvalidArgumentsError, formatError, getExitCode } from './utils/errors.js';
import { printError, setOutputOptions } from './utils/output.js';
import { version } from './version.js';

const cli = cac('mutation-stream');

/**
 * Promise of the running async action. CAC does not await async action
 * handlers, so run() awaits it.
 */
let actionPromise: Promise<void> | undefined;

function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => void {
  return (...args: T) => {
    actionPromise = fn(...args);
  };
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function processGlobalOptions(options: Record<string, unknown>): GlobalOptions {
  const rawFormat = stringOption(options, 'format') ?? 'pretty';
  const format = OUTPUT_FORMATS.find((f) => f === rawFormat);
  if (format === undefined) {
    throw new InvalidArgumentsError(
      `Unknown output format "${rawFormat}", expected one of: ${OUTPUT_FORMATS.join(', ')}`,
    );
  }

  const quiet = options['quiet'] === true;
  const noColor = options['color'] === false;
  setOutputOptions({ format, quiet, noColor });

  return { format, quiet, noColor, config: stringOption(options, 'config') };
}

function fail(err: unknown): never {
  printError(formatError(err));
  process.exit(getExitCode(err));
}

function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, table, pretty')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to the gateway YAML configuration');
}

function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    console.log(`mutation-stream v${version}`);
  });
}

function registerValidateCommand(): void {
  cli
    .command('validate <schema>', 'Check mutation fields of an SDL file against the naming policy')
    .option('--stream-prefix <prefix>', 'Override the stream name prefix')
    .option('--namespace <namespace>', 'Override the event type namespace')
    .action(tracked(async (schema: string, options: Record<string, unknown>) => {
      try {
        const globalOptions = processGlobalOptions(options);
        const gateway = await loadGatewayConfig(
          globalOptions.config !== undefined ? { file: globalOptions.config } : {},
        );
        const streamPrefix = stringOption(options, 'streamPrefix');
        const namespace = stringOption(options, 'namespace');
        const naming: NamingPolicyConfig = {
          ...gateway.naming,
          ...(streamPrefix !== undefined && { streamPrefix }),
          ...(namespace !== undefined && { eventTypeNamespace: namespace }),
        };
        await validateCommand(schema, { ...globalOptions, naming });
      } catch (err) {
        fail(err);
      }
    }));
}

function registerConfigCommand(): void {
  cli
    .command('config', 'Show the resolved gateway configuration')
    .action(tracked(async (options: Record<string, unknown>) => {
      try {
        await configCommand(processGlobalOptions(options));
      } catch (err) {
        fail(err);
      }
    }));
}

export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerValidateCommand();
  registerConfigCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (actionPromise) {
      await actionPromise;
    }
  } catch (err) {
    fail(err);
  }
}

export { cli };
