import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { MercuriusContext } from 'mercurius';
import {
  attachResolution,
  selectResolvedCalls,
  type MutationInterceptor,
} from '../../interceptor/mutation-interceptor.js';
import type { MutationCall } from '../../types/mutation.js';
import type { DispatchPolicy } from '../config.js';

export interface MutationHooksOptions {
  dispatchPolicy: DispatchPolicy;
  loanIdResultFields: readonly string[];
}

function readOperationName(source: unknown): string | null {
  if (typeof source !== 'object' || source === null || !('operationName' in source)) {
    return null;
  }
  const { operationName } = source;
  return typeof operationName === 'string' && operationName.length > 0 ? operationName : null;
}

/** `operationName` of a POST body or a GET query string */
export function requestOperationName(request: FastifyRequest): string | null {
  return readOperationName(request.body) ?? readOperationName(request.query);
}

/**
 * Wires the interceptor into the Mercurius request pipeline.
 *
 * Extraction runs in `preExecution`, after validation and before any resolver;
 * a rejected extraction throws, so the request fails before anything executes
 * or is dispatched. Dispatch runs in `onResolution`, with each call carrying
 * its field's result, and does not hold the response back.
 */
export function registerMutationHooks(
  fastify: FastifyInstance,
  interceptor: MutationInterceptor,
  options: MutationHooksOptions,
): void {
  const pending = new WeakMap<MercuriusContext, MutationCall[]>();

  fastify.graphql.addHook('preExecution', async (_schema, document, context, variables) => {
    const outcome = interceptor.extract({
      document,
      variables,
      operationName: requestOperationName(context.reply.request),
    });

    if (outcome.state === 'rejected') {
      throw outcome.error;
    }
    if (outcome.calls.length > 0) {
      pending.set(context, outcome.calls);
    }
  });

  fastify.graphql.addHook('onResolution', async (execution, context) => {
    const calls = pending.get(context);
    if (!calls) return;
    pending.delete(context);

    const dispatchable = options.dispatchPolicy === 'always'
      ? calls
      : selectResolvedCalls(calls, execution);
    interceptor.dispatch(attachResolution(dispatchable, execution, options));
  });
}
