import { Kind, type OperationDefinitionNode, type ValueNode } from 'graphql';
import { isPlainObject, setEntry, type JsonObject, type JsonValue } from '../types/json.js';
import { SerializationError, UnboundVariableError } from './errors.js';

/** Variable name → bound value, as supplied by the request */
export type VariableBindings = Readonly<Record<string, unknown>>;

/**
 * Converts a value supplied from outside (request variables) into an owned
 * JSON tree. Arrays and plain objects are copied; anything JSON cannot carry
 * is rejected.
 */
export function copyBoundValue(value: unknown, path: string): JsonValue {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
    case 'number':
      return value;
    case 'object':
      break;
    default:
      throw new SerializationError(path, `unsupported ${typeof value} value`);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => copyBoundValue(item, `${path}[${index}]`));
  }

  if (!isPlainObject(value)) {
    throw new SerializationError(path, 'only plain objects can be bound to variables');
  }

  const copy: JsonObject = {};
  for (const [key, item] of Object.entries(value)) {
    if (item === undefined) continue;
    setEntry(copy, key, copyBoundValue(item, `${path}.${key}`));
  }
  return copy;
}

function isBound(bindings: VariableBindings, name: string): boolean {
  return Object.hasOwn(bindings, name) && bindings[name] !== undefined;
}

/**
 * Resolves an argument value tree written in a document into plain JSON,
 * substituting every variable reference at any depth with a copy of its bound
 * value.
 *
 * Literal conversion: enum names become strings, Int and Float literals
 * numbers, block strings their decoded value.
 *
 * @throws UnboundVariableError when a referenced variable has no binding
 */
export function resolveValue(node: ValueNode, bindings: VariableBindings): JsonValue {
  switch (node.kind) {
    case Kind.VARIABLE: {
      const name = node.name.value;
      if (!isBound(bindings, name)) {
        throw new UnboundVariableError(name);
      }
      return copyBoundValue(bindings[name], `$${name}`);
    }
    case Kind.INT:
    case Kind.FLOAT:
      return Number(node.value);
    case Kind.STRING:
    case Kind.ENUM:
      return node.value;
    case Kind.BOOLEAN:
      return node.value;
    case Kind.NULL:
      return null;
    case Kind.LIST:
      return node.values.map((item) => resolveValue(item, bindings));
    case Kind.OBJECT: {
      const result: JsonObject = {};
      for (const field of node.fields) {
        setEntry(result, field.name.value, resolveValue(field.value, bindings));
      }
      return result;
    }
  }
}

/**
 * Effective bindings for an operation: the supplied variables, plus the
 * declared default of every variable the request left out.
 */
export function collectBindings(
  operation: OperationDefinitionNode,
  variables: VariableBindings | null | undefined,
): VariableBindings {
  const bindings: Record<string, unknown> = { ...variables };

  for (const definition of operation.variableDefinitions ?? []) {
    const name = definition.variable.name.value;
    if (isBound(bindings, name) || definition.defaultValue === undefined) {
      continue;
    }
    // Defaults are constant values, so they resolve without bindings.
    setEntry(bindings, name, resolveValue(definition.defaultValue, {}));
  }

  return bindings;
}
