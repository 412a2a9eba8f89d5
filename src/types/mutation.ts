import type { DocumentNode } from 'graphql';
import type { JsonObject, JsonValue } from './json.js';

/** Argument written on a mutation field, with its value already resolved */
export interface ResolvedArgument {
  name: string;
  value: JsonValue;
}

/** Stream name and event type derived from a mutation field name */
export interface DerivedNames {
  streamName: string;       // "graphql-mutation-recordLoanRequested"
  eventType: string;        // "GraphQL.RecordLoanRequested"
}

/**
 * One invocation of a mutation field inside an executed operation.
 *
 * Frozen at construction; the argument tree carries no variable references.
 */
export interface MutationCall extends DerivedNames {
  readonly fieldName: string;
  readonly alias: string | null;
  readonly operationName: string | null;
  readonly arguments: Readonly<JsonObject>;
  readonly selectedFields: readonly string[];
  /** Loan the call concerns, once known: `input.loanId`, or the result of a loan-creating field */
  readonly loanId?: string;
  /** Value the field resolved to, attached after execution */
  readonly response?: JsonValue;
}

/** Key under which the field's result appears in the response `data` */
export function responseKey(call: Pick<MutationCall, 'alias' | 'fieldName'>): string {
  return call.alias ?? call.fieldName;
}

/** Parsed operation handed to the extractor */
export interface OperationInput {
  document: DocumentNode;
  variables?: Readonly<Record<string, unknown>> | null | undefined;
  operationName?: string | null | undefined;
}
