import { GraphQLError, type ExecutionResult } from 'graphql';

interface AppError extends Error {
  statusCode: number;
  code?: string;
  details?: unknown;
}

function isAppError(error: unknown): error is AppError {
  return (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  );
}

/** What Mercurius hands to the formatter: an execution result, or an error thrown by a hook */
export type FormatterInput =
  | (ExecutionResult & Required<Pick<ExecutionResult, 'errors'>>)
  | Error;

/**
 * Mercurius `require`s graphql while ESM code may load its other build, so an
 * error can come from a second `GraphQLError` class. Such errors are
 * recognized by shape; wrapping them again would drop `path` and `locations`.
 */
export function isGraphQLError(error: Error): error is GraphQLError {
  return (
    error instanceof GraphQLError ||
    (error.name === 'GraphQLError' && 'path' in error && 'locations' in error && 'extensions' in error)
  );
}

function toGraphQLError(error: Error): GraphQLError {
  return isGraphQLError(error)
    ? error
    : new GraphQLError(error.message, { originalError: error });
}

/**
 * Copies `code`, `statusCode` and `details` of pipeline errors (an
 * UnboundVariableError thrown from the extraction hook, for instance) into the
 * GraphQL error's `extensions`.
 */
export function mapError(error: GraphQLError): GraphQLError {
  const original = error.originalError;

  if (!isAppError(original)) {
    return error;
  }

  const extensions: Record<string, unknown> = {
    ...error.extensions,
    code: original.code ?? 'ERROR',
    statusCode: original.statusCode,
  };

  if (original.details !== undefined) {
    extensions['details'] = original.details;
  }

  return new GraphQLError(error.message, {
    nodes: error.nodes ?? null,
    source: error.source ?? null,
    positions: error.positions ?? null,
    path: error.path ?? null,
    originalError: original,
    extensions,
  });
}

function collectErrors(input: FormatterInput): { data: ExecutionResult['data']; errors: GraphQLError[] } {
  if (input instanceof Error) {
    const nested: unknown = 'errors' in input ? input.errors : undefined;
    const errors = Array.isArray(nested)
      ? nested.filter((e): e is Error => e instanceof Error)
      : [input];
    return { data: null, errors: errors.map(toGraphQLError) };
  }
  return { data: input.data ?? null, errors: input.errors.map(toGraphQLError) };
}

/**
 * Mercurius `errorFormatter`.
 *
 * GraphQL responses are always HTTP 200, errors included; clients tell error
 * kinds apart through `extensions.code`.
 */
export function errorFormatter(
  execution: FormatterInput,
): { statusCode: number; response: ExecutionResult } {
  const { data, errors } = collectErrors(execution);

  return {
    statusCode: 200,
    response: {
      data,
      errors: errors.map(mapError),
    },
  };
}
