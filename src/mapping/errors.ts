/**
 * Error taxonomy of the mutation pipeline.
 *
 * Every error carries `statusCode`, `code` and optional `details`, the same
 * shape the GraphQL error formatter and the HTTP error handler copy into
 * responses. Extraction errors reject the operation; dispatch errors never
 * reach the client and are only logged.
 */

export abstract class MutationStreamError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;
  readonly details?: unknown;

  constructor(message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

/** A variable referenced inside an argument has no bound value and no default */
export class UnboundVariableError extends MutationStreamError {
  readonly statusCode = 400;
  readonly code = 'UNBOUND_VARIABLE';
  readonly variableName: string;

  constructor(variableName: string) {
    super(`Variable "$${variableName}" is referenced but has no bound value`, { variable: variableName });
    this.variableName = variableName;
  }
}

/** A value cannot be represented as a JSON event body */
export class SerializationError extends MutationStreamError {
  readonly statusCode = 400;
  readonly code = 'SERIALIZATION_ERROR';
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Cannot serialize value at ${path}: ${reason}`, { path });
    this.path = path;
  }
}

export interface NamingCollision {
  eventType: string;
  fields: [string, string];
}

/** Two mutation fields would map to the same stream or event type */
export class NamingPolicyViolationError extends MutationStreamError {
  readonly statusCode = 500;
  readonly code = 'NAMING_POLICY_VIOLATION';
  readonly collisions: NamingCollision[];

  constructor(collisions: NamingCollision[]) {
    const summary = collisions
      .map((c) => `"${c.fields[0]}" and "${c.fields[1]}" both map to ${c.eventType}`)
      .join('; ');
    super(`Mutation naming policy violated: ${summary}`, { collisions });
    this.collisions = collisions;
  }
}

/** The sink does not accept submissions (closed or never connected) */
export class SinkUnavailableError extends MutationStreamError {
  readonly statusCode = 503;
  readonly code = 'SINK_UNAVAILABLE';

  constructor(message = 'Mutation sink is not accepting submissions') {
    super(message);
  }
}

/** The event store rejected or failed an append */
export class SinkTransportError extends MutationStreamError {
  readonly statusCode = 502;
  readonly code = 'SINK_TRANSPORT_ERROR';
  readonly streamName: string;

  constructor(streamName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Append to stream "${streamName}" failed: ${reason}`, { stream: streamName }, { cause });
    this.streamName = streamName;
  }
}

/** Invalid gateway configuration (file content or environment) */
export class ConfigError extends MutationStreamError {
  readonly statusCode = 500;
  readonly code = 'CONFIG_ERROR';
  readonly path: string;

  constructor(path: string, message: string) {
    super(path ? `${path}: ${message}` : message, { path });
    this.path = path;
  }
}

export function isMutationStreamError(error: unknown): error is MutationStreamError {
  return error instanceof MutationStreamError;
}
