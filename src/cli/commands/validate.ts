/**
 * `validate` command: checks a schema's mutation fields against the naming
 * policy and prints the stream / event type of each.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { GraphQLError } from 'graphql';
import { NamingPolicyViolationError } from '../../mapping/errors.js';
import { NamingPolicy, type NamingPolicyConfig, type NamingTableEntry } from '../../mapping/naming-policy.js';
import { loadSchemaFromSDL } from '../../mapping/schema-loader.js';
import { renderTable } from '../formatters/table-formatter.js';
import type { GlobalOptions } from '../types.js';
import { FileNotFoundError, ValidationError } from '../utils/errors.js';
import { colorize, print, printJson, success } from '../utils/output.js';

export interface ValidateOptions extends GlobalOptions {
  naming: NamingPolicyConfig;
}

export interface ValidateOutput {
  file: string;
  streamPrefix: string;
  eventTypeNamespace: string;
  mutations: NamingTableEntry[];
}

async function readSchemaFile(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf-8');
  } catch (err) {
    throw new FileNotFoundError(file, err instanceof Error ? err : undefined);
  }
}

function buildTable(sdl: string, policy: NamingPolicy): NamingTableEntry[] {
  try {
    return policy.validateSchema(loadSchemaFromSDL(sdl));
  } catch (err) {
    if (err instanceof NamingPolicyViolationError) {
      throw new ValidationError(
        `Naming policy violated by ${err.collisions.length} mutation field pair(s)`,
        err.collisions.map((c) => ({
          path: `Mutation.${c.fields[1]}`,
          message: `collides with Mutation.${c.fields[0]} on event type ${c.eventType}`,
        })),
        err,
      );
    }
    if (err instanceof GraphQLError) {
      throw new ValidationError(`Invalid schema: ${err.message}`, [], err);
    }
    throw err;
  }
}

function formatPretty(output: ValidateOutput): string {
  const lines = [colorize(`Schema: ${output.file}`, 'bold')];

  if (output.mutations.length === 0) {
    lines.push('No mutation fields found.');
    return lines.join('\n');
  }

  lines.push('');
  for (const entry of output.mutations) {
    lines.push(`  ${colorize(entry.fieldName, 'cyan')}`);
    lines.push(`    stream:     ${entry.streamName}`);
    lines.push(`    event type: ${entry.eventType}`);
  }
  lines.push('');
  lines.push(success(`${output.mutations.length} mutation field(s) map to distinct event types`));
  return lines.join('\n');
}

export async function validateCommand(file: string, options: ValidateOptions): Promise<ValidateOutput> {
  const path = resolve(file);
  const sdl = await readSchemaFile(path);
  const policy = new NamingPolicy(options.naming);

  const output: ValidateOutput = {
    file: path,
    streamPrefix: policy.streamPrefix,
    eventTypeNamespace: policy.eventTypeNamespace,
    mutations: buildTable(sdl, policy),
  };

  switch (options.format) {
    case 'json':
      printJson(output);
      break;
    case 'table':
      print(renderTable(
        [{ header: 'Field' }, { header: 'Stream' }, { header: 'Event type' }],
        output.mutations.map((m) => [m.fieldName, m.streamName, m.eventType]),
        (text) => colorize(text, 'cyan'),
      ));
      break;
    case 'pretty':
      print(formatPretty(output));
      break;
  }

  return output;
}
