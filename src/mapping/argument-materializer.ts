import type { ArgumentNode } from 'graphql';
import { setEntry, type JsonObject, type JsonValue } from '../types/json.js';
import type { ResolvedArgument } from '../types/mutation.js';
import { resolveValue, type VariableBindings } from './variable-resolver.js';

/** Deep copy of a JSON tree, frozen at every level */
export function freezeTree(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    const items = value.map(freezeTree);
    Object.freeze(items);
    return items;
  }
  if (value !== null && typeof value === 'object') {
    const copy: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(copy, key, freezeTree(item));
    }
    Object.freeze(copy);
    return copy;
  }
  return value;
}

/**
 * Builds the argument mapping of a call from resolved name/value pairs.
 *
 * Keys keep the order the arguments were written in. Values are deep copies,
 * frozen, so a call never shares structure with request variables.
 */
export function materializeArguments(args: readonly ResolvedArgument[]): Readonly<JsonObject> {
  const result: JsonObject = {};
  for (const { name, value } of args) {
    setEntry(result, name, freezeTree(value));
  }
  Object.freeze(result);
  return result;
}

/** Resolves the arguments written on a field and materializes them */
export function resolveArguments(
  nodes: readonly ArgumentNode[] | undefined,
  bindings: VariableBindings,
): Readonly<JsonObject> {
  const resolved: ResolvedArgument[] = (nodes ?? []).map((node) => ({
    name: node.name.value,
    value: resolveValue(node.value, bindings),
  }));
  return materializeArguments(resolved);
}
