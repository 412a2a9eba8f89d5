import type { GraphQLSchema } from 'graphql';
import type { DerivedNames } from '../types/mutation.js';
import { NamingPolicyViolationError, type NamingCollision } from './errors.js';

export const DEFAULT_STREAM_PREFIX = 'graphql-mutation-';
export const DEFAULT_EVENT_TYPE_NAMESPACE = 'GraphQL';

export interface NamingPolicyConfig {
  /** Prepended to the raw field name (default: 'graphql-mutation-') */
  streamPrefix?: string;

  /** Namespace of event types, joined with '.' (default: 'GraphQL') */
  eventTypeNamespace?: string;
}

/** One row of the mapping table for a schema's mutation set */
export interface NamingTableEntry extends DerivedNames {
  fieldName: string;
}

/**
 * Upper-cases the first character of every `_`-separated segment and joins
 * them: `recordLoanRequested` → `RecordLoanRequested`, `record_loan` →
 * `RecordLoan`.
 */
export function toPascalCase(name: string): string {
  const segments = name.split('_').filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    return name;
  }
  return segments.map((s) => s.charAt(0).toUpperCase() + s.slice(1)).join('');
}

/**
 * Deterministic mapping from a mutation field name to its stream and event
 * type. Injectivity over a field set is checked up front with
 * {@link NamingPolicy.validate}, never per request.
 */
export class NamingPolicy {
  readonly streamPrefix: string;
  readonly eventTypeNamespace: string;

  constructor(config: NamingPolicyConfig = {}) {
    this.streamPrefix = config.streamPrefix ?? DEFAULT_STREAM_PREFIX;
    this.eventTypeNamespace = config.eventTypeNamespace ?? DEFAULT_EVENT_TYPE_NAMESPACE;
  }

  streamName(fieldName: string): string {
    this.assertFieldName(fieldName);
    return `${this.streamPrefix}${fieldName}`;
  }

  eventType(fieldName: string): string {
    this.assertFieldName(fieldName);
    const type = toPascalCase(fieldName);
    return this.eventTypeNamespace ? `${this.eventTypeNamespace}.${type}` : type;
  }

  derive(fieldName: string): DerivedNames {
    return {
      streamName: this.streamName(fieldName),
      eventType: this.eventType(fieldName),
    };
  }

  /**
   * Builds the mapping table for a set of field names and fails when two
   * distinct fields collide.
   *
   * @throws NamingPolicyViolationError listing every collision found
   */
  validate(fieldNames: Iterable<string>): NamingTableEntry[] {
    const table: NamingTableEntry[] = [];
    const byEventType = new Map<string, string>();
    const collisions: NamingCollision[] = [];

    for (const fieldName of new Set(fieldNames)) {
      const entry = { fieldName, ...this.derive(fieldName) };
      const existing = byEventType.get(entry.eventType);
      if (existing !== undefined) {
        collisions.push({ eventType: entry.eventType, fields: [existing, fieldName] });
        continue;
      }
      byEventType.set(entry.eventType, fieldName);
      table.push(entry);
    }

    if (collisions.length > 0) {
      throw new NamingPolicyViolationError(collisions);
    }
    return table;
  }

  /** Validates the fields of the schema's mutation root (empty table when it has none) */
  validateSchema(schema: GraphQLSchema): NamingTableEntry[] {
    const mutationType = schema.getMutationType();
    if (!mutationType) {
      return [];
    }
    return this.validate(Object.keys(mutationType.getFields()));
  }

  private assertFieldName(fieldName: string): void {
    if (fieldName.length === 0) {
      throw new TypeError('Mutation field name must not be empty');
    }
  }
}
