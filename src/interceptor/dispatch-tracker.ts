import { performance } from 'node:perf_hooks';
import { SerializationError, isMutationStreamError } from '../mapping/errors.js';
import type { ComponentLogger } from '../observability/logger.js';
import type { MetricsCollector } from '../observability/metrics-collector.js';
import type { MutationCall } from '../types/mutation.js';
import type { SinkReceipt } from '../types/sink.js';

/**
 * Supervised set of dispatches that were submitted and have not settled.
 *
 * Every tracked promise gets a handler, so a failed append is logged and
 * counted but never surfaces as an unhandled rejection.
 */
export class DispatchTracker {
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: ComponentLogger;
  private readonly metrics: MetricsCollector | null;

  constructor(logger: ComponentLogger, metrics: MetricsCollector | null = null) {
    this.logger = logger;
    this.metrics = metrics;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  track(call: MutationCall, dispatch: Promise<SinkReceipt>): void {
    const startedAt = performance.now();
    const elapsed = (): number => (performance.now() - startedAt) / 1000;

    const task: Promise<void> = dispatch
      .then(
        (receipt) => {
          this.metrics?.recordDispatch(call.fieldName, 'succeeded', elapsed());
          this.logger.debug(
            { stream: receipt.streamName, eventType: receipt.eventType, eventId: receipt.eventId },
            'Mutation call dispatched',
          );
        },
        (err: unknown) => {
          this.metrics?.recordDispatch(call.fieldName, 'failed', elapsed());
          this.reportFailure(call, err);
        },
      )
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }

  /** Resolves once nothing is in flight, including dispatches tracked while waiting */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private reportFailure(call: MutationCall, err: unknown): void {
    const context = {
      err,
      stream: call.streamName,
      eventType: call.eventType,
      fieldName: call.fieldName,
      code: isMutationStreamError(err) ? err.code : undefined,
    };

    if (err instanceof SerializationError) {
      this.logger.fatal(context, 'Mutation call cannot be serialized; event dropped');
    } else {
      this.logger.error(context, 'Failed to persist GraphQL mutation event');
    }
  }
}
