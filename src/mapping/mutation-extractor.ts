import {
  Kind,
  OperationTypeNode,
  getOperationAST,
  type DirectiveNode,
  type DocumentNode,
  type FieldNode,
  type FragmentDefinitionNode,
  type SelectionSetNode,
} from 'graphql';
import type { MutationCall, OperationInput } from '../types/mutation.js';
import { resolveArguments } from './argument-materializer.js';
import { NamingPolicy } from './naming-policy.js';
import { collectBindings, resolveValue, type VariableBindings } from './variable-resolver.js';

// ---------------------------------------------------------------------------
// Selection walking
// ---------------------------------------------------------------------------

function findFragment(document: DocumentNode, name: string): FragmentDefinitionNode | undefined {
  for (const definition of document.definitions) {
    if (definition.kind === Kind.FRAGMENT_DEFINITION && definition.name.value === name) {
      return definition;
    }
  }
  return undefined;
}

/** Evaluates `@skip(if:)` and `@include(if:)` on a selection */
function isIncluded(
  directives: readonly DirectiveNode[] | undefined,
  bindings: VariableBindings,
): boolean {
  for (const directive of directives ?? []) {
    const name = directive.name.value;
    if (name !== 'skip' && name !== 'include') continue;

    const condition = directive.arguments?.find((arg) => arg.name.value === 'if');
    if (!condition) continue;

    const value = resolveValue(condition.value, bindings) === true;
    if (name === 'skip' && value) return false;
    if (name === 'include' && !value) return false;
  }
  return true;
}

/**
 * Yields the top-level fields of a selection set in textual order, expanding
 * inline fragments and fragment spreads in place.
 */
function* collectRootFields(
  document: DocumentNode,
  selectionSet: SelectionSetNode,
  bindings: VariableBindings,
  visited: Set<string>,
): Generator<FieldNode> {
  for (const selection of selectionSet.selections) {
    if (!isIncluded(selection.directives, bindings)) continue;

    switch (selection.kind) {
      case Kind.FIELD:
        if (!selection.name.value.startsWith('__')) {
          yield selection;
        }
        break;
      case Kind.INLINE_FRAGMENT:
        yield* collectRootFields(document, selection.selectionSet, bindings, visited);
        break;
      case Kind.FRAGMENT_SPREAD: {
        const name = selection.name.value;
        const fragment = visited.has(name) ? undefined : findFragment(document, name);
        if (fragment) {
          visited.add(name);
          yield* collectRootFields(document, fragment.selectionSet, bindings, visited);
        }
        break;
      }
    }
  }
}

function selectedFields(field: FieldNode): string[] {
  const names: string[] = [];
  for (const selection of field.selectionSet?.selections ?? []) {
    if (selection.kind === Kind.FIELD) {
      names.push(selection.alias?.value ?? selection.name.value);
    }
  }
  return names;
}

// ---------------------------------------------------------------------------
// MutationExtractor
// ---------------------------------------------------------------------------

/**
 * Turns an executed operation into one {@link MutationCall} per invoked
 * mutation field.
 *
 * Only `mutation` operations produce calls. Aliased repeats of one field are
 * separate calls. Resolution failures fail the whole operation.
 */
export class MutationExtractor {
  readonly namingPolicy: NamingPolicy;

  constructor(namingPolicy: NamingPolicy = new NamingPolicy()) {
    this.namingPolicy = namingPolicy;
  }

  /** Lazily yields calls in textual order */
  *iterate(input: OperationInput): Generator<MutationCall> {
    const operation = getOperationAST(input.document, input.operationName ?? undefined);
    if (!operation || operation.operation !== OperationTypeNode.MUTATION) {
      return;
    }

    const bindings = collectBindings(operation, input.variables);
    const operationName = operation.name?.value ?? input.operationName ?? null;
    const fields = collectRootFields(input.document, operation.selectionSet, bindings, new Set());

    for (const field of fields) {
      const fieldName = field.name.value;
      const call: MutationCall = {
        fieldName,
        alias: field.alias?.value ?? null,
        operationName,
        arguments: resolveArguments(field.arguments, bindings),
        selectedFields: Object.freeze(selectedFields(field)),
        ...this.namingPolicy.derive(fieldName),
      };
      yield Object.freeze(call);
    }
  }

  /** All calls of the operation, or a thrown error; never a partial list */
  extract(input: OperationInput): MutationCall[] {
    return Array.from(this.iterate(input));
  }
}
