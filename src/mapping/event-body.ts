import type { JsonObject, JsonValue } from '../types/json.js';
import type { MutationCall } from '../types/mutation.js';
import { SerializationError } from './errors.js';

/**
 * JSON payload appended for one mutation call. `loanId` and `response` are
 * present only when the call carries them.
 */
export interface MutationEventBody extends JsonObject {
  fieldName: string;
  operationName: string | null;
  alias: string | null;
  arguments: JsonObject;
  selectedFields: string[];
}

function assertSerializable(value: JsonValue, path: string): void {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new SerializationError(path, `non-finite number ${String(value)}`);
    }
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item, index) => assertSerializable(item, `${path}[${index}]`));
    return;
  }
  if (value !== null && typeof value === 'object') {
    for (const [key, item] of Object.entries(value)) {
      assertSerializable(item, `${path}.${key}`);
    }
  }
}

/**
 * Event body for a call. JSON has no encoding for NaN or Infinity (a Float
 * literal such as `1e400` parses to Infinity), so those are rejected instead
 * of being silently turned into `null`.
 *
 * @throws SerializationError naming the offending path, e.g. `arguments.input.amount`
 */
export function toEventBody(call: MutationCall): MutationEventBody {
  const args: JsonObject = { ...call.arguments };
  assertSerializable(args, 'arguments');

  const body: MutationEventBody = {
    fieldName: call.fieldName,
    operationName: call.operationName,
    alias: call.alias,
    arguments: args,
    selectedFields: [...call.selectedFields],
  };
  if (call.loanId !== undefined) {
    body['loanId'] = call.loanId;
  }
  if (call.response !== undefined) {
    assertSerializable(call.response, 'response');
    body['response'] = call.response;
  }
  return body;
}

/** Canonical JSON text of the event body */
export function serializeEventBody(call: MutationCall): string {
  return JSON.stringify(toEventBody(call));
}
