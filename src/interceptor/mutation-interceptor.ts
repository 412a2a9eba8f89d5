import { freezeTree } from '../mapping/argument-materializer.js';
import { SerializationError, isMutationStreamError, type MutationStreamError } from '../mapping/errors.js';
import { MutationExtractor } from '../mapping/mutation-extractor.js';
import { copyBoundValue } from '../mapping/variable-resolver.js';
import type { MetricsCollector } from '../observability/metrics-collector.js';
import { createLogger, type ComponentLogger } from '../observability/logger.js';
import { isPlainObject, type JsonValue } from '../types/json.js';
import { responseKey, type MutationCall, type OperationInput } from '../types/mutation.js';
import type { MutationSink } from '../types/sink.js';
import { DispatchTracker } from './dispatch-tracker.js';

/**
 * Lifecycle of one intercepted operation:
 * `received → extracted → dispatching → completed`, or `received → rejected`.
 */
export type InterceptorState = 'received' | 'extracted' | 'dispatching' | 'completed' | 'rejected';

export type ExtractionOutcome =
  | { state: 'extracted'; calls: MutationCall[] }
  | { state: 'rejected'; error: MutationStreamError };

export interface DispatchOutcome {
  state: 'completed';
  submitted: number;
}

export type InterceptOutcome =
  | { state: 'completed'; calls: MutationCall[] }
  | { state: 'rejected'; error: MutationStreamError };

export interface MutationInterceptorOptions {
  sink: MutationSink;
  extractor?: MutationExtractor;
  logger?: ComponentLogger;
  metrics?: MetricsCollector;
}

/** Error entry of an execution result, reduced to what dispatch filtering reads */
export interface ExecutionErrorLike {
  path?: ReadonlyArray<string | number> | undefined;
}

/** Execution result, reduced to what dispatch filtering reads */
export interface ExecutionResultLike {
  data?: unknown;
  errors?: ReadonlyArray<ExecutionErrorLike> | undefined;
}

/**
 * Calls whose field resolved: none when the whole `data` is null, otherwise
 * every call whose response key is not the first path segment of an error.
 */
export function selectResolvedCalls(
  calls: readonly MutationCall[],
  execution: ExecutionResultLike,
): MutationCall[] {
  if (execution.data === null || execution.data === undefined) {
    return [];
  }

  const failedKeys = new Set<string>();
  for (const error of execution.errors ?? []) {
    const root = error.path?.[0];
    if (typeof root === 'string') failedKeys.add(root);
  }

  return calls.filter((call) => !failedKeys.has(responseKey(call)));
}

export interface ResolutionOptions {
  /** Fields whose string result is the id of the loan they created */
  loanIdResultFields: readonly string[];
}

/** `input.loanId` written on the call, when it is a string */
export function loanIdFromArguments(call: MutationCall): string | null {
  const input = call.arguments['input'];
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return null;
  const loanId = input['loanId'];
  return typeof loanId === 'string' ? loanId : null;
}

function readResponse(data: Record<string, unknown>, key: string): JsonValue | undefined {
  if (!Object.hasOwn(data, key)) return undefined;
  try {
    return freezeTree(copyBoundValue(data[key], `data.${key}`));
  } catch (err) {
    // A custom scalar may resolve to something JSON cannot carry; the call goes out without it.
    if (err instanceof SerializationError) return undefined;
    throw err;
  }
}

/**
 * Copies of the calls carrying what execution produced: the field's value
 * under its response key as `response`, and `loanId` taken from
 * `input.loanId` or, for a loan-creating field, from its string result.
 * `arguments` stay exactly as the caller wrote them.
 */
export function attachResolution(
  calls: readonly MutationCall[],
  execution: ExecutionResultLike,
  options: ResolutionOptions,
): MutationCall[] {
  const data = isPlainObject(execution.data) ? execution.data : null;

  return calls.map((call) => {
    const response = data ? readResponse(data, responseKey(call)) : undefined;
    const loanId = loanIdFromArguments(call)
      ?? (options.loanIdResultFields.includes(call.fieldName) && typeof response === 'string' ? response : null);

    if (response === undefined && loanId === null) return call;
    return Object.freeze({
      ...call,
      ...(loanId !== null && { loanId }),
      ...(response !== undefined && { response }),
    });
  });
}

/**
 * Extracts mutation calls from operations and hands them to the sink.
 *
 * Extraction is synchronous and either yields every call of the operation or
 * rejects it. Dispatch submits each call without waiting for the sink; the
 * outcome is supervised by a {@link DispatchTracker}.
 */
export class MutationInterceptor {
  readonly sink: MutationSink;
  readonly extractor: MutationExtractor;
  private readonly logger: ComponentLogger;
  private readonly metrics: MetricsCollector | null;
  private readonly tracker: DispatchTracker;

  constructor(options: MutationInterceptorOptions) {
    this.sink = options.sink;
    this.extractor = options.extractor ?? new MutationExtractor();
    this.logger = options.logger ?? createLogger({ name: 'mutation-interceptor' });
    this.metrics = options.metrics ?? null;
    this.tracker = new DispatchTracker(this.logger, this.metrics);
    this.metrics?.setPendingProvider(() => this.tracker.pending);
  }

  get pendingDispatches(): number {
    return this.tracker.pending;
  }

  /** received → extracted | rejected */
  extract(input: OperationInput): ExtractionOutcome {
    let calls: MutationCall[];
    try {
      calls = this.extractor.extract(input);
    } catch (err) {
      if (!isMutationStreamError(err)) throw err;

      this.metrics?.recordRejected(err.code);
      this.logger.warn(
        { code: err.code, operationName: input.operationName ?? null, details: err.details },
        `Mutation operation rejected: ${err.message}`,
      );
      return { state: 'rejected', error: err };
    }

    for (const call of calls) {
      this.metrics?.recordExtracted(call.fieldName);
    }
    return { state: 'extracted', calls };
  }

  /** extracted → dispatching → completed; returns before any sink I/O finishes */
  dispatch(calls: readonly MutationCall[]): DispatchOutcome {
    for (const call of calls) {
      this.tracker.track(call, this.submit(call));
    }
    return { state: 'completed', submitted: calls.length };
  }

  /** Extraction followed by dispatch of every extracted call */
  intercept(input: OperationInput): InterceptOutcome {
    const extraction = this.extract(input);
    if (extraction.state === 'rejected') {
      return extraction;
    }
    this.dispatch(extraction.calls);
    return { state: 'completed', calls: extraction.calls };
  }

  /** Waits until every submitted call has settled */
  async drain(): Promise<void> {
    await this.tracker.drain();
  }

  private submit(call: MutationCall): ReturnType<MutationSink['submit']> {
    try {
      return this.sink.submit(call);
    } catch (err) {
      return Promise.reject(err);
    }
  }
}
