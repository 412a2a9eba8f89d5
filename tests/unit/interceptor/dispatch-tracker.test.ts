import { describe, it, expect, beforeEach, vi } from 'vitest';
import { pino, type Logger } from 'pino';
import { DispatchTracker } from '../../../src/interceptor/dispatch-tracker.js';
import { SerializationError, SinkTransportError } from '../../../src/mapping/errors.js';
import { NamingPolicy } from '../../../src/mapping/naming-policy.js';
import { COUNTER_DISPATCHES, HISTOGRAM_DISPATCH_DURATION, MetricsCollector } from '../../../src/observability/metrics-collector.js';
import type { MutationCall } from '../../../src/types/mutation.js';
import type { SinkReceipt } from '../../../src/types/sink.js';
import { createDeferred } from '../../fixtures/fake-event-store.js';

const call: MutationCall = {
  fieldName: 'recordLoanRequested',
  alias: null,
  operationName: null,
  arguments: {},
  selectedFields: [],
  ...new NamingPolicy().derive('recordLoanRequested'),
};

const receipt: SinkReceipt = {
  streamName: call.streamName,
  eventType: call.eventType,
  eventId: 'evt-1',
};

describe('DispatchTracker', () => {
  let logger: Logger;
  let metrics: MetricsCollector;
  let tracker: DispatchTracker;

  beforeEach(() => {
    logger = pino({ level: 'silent' });
    metrics = new MetricsCollector();
    tracker = new DispatchTracker(logger, metrics);
  });

  it('should count pending dispatches until they settle', async () => {
    const first = createDeferred<SinkReceipt>();
    const second = createDeferred<SinkReceipt>();
    tracker.track(call, first.promise);
    tracker.track(call, second.promise);

    expect(tracker.pending).toBe(2);

    first.resolve(receipt);
    second.resolve(receipt);
    await tracker.drain();
    expect(tracker.pending).toBe(0);
  });

  it('should record successful dispatches', async () => {
    const debug = vi.spyOn(logger, 'debug');
    tracker.track(call, Promise.resolve(receipt));
    await tracker.drain();

    expect(metrics.counterValue(COUNTER_DISPATCHES, { outcome: 'succeeded' })).toBe(1);
    expect(metrics.getHistograms().find((h) => h.name === HISTOGRAM_DISPATCH_DURATION)?.samples[0]?.count).toBe(1);
    expect(debug).toHaveBeenCalledWith(
      { stream: 'graphql-mutation-recordLoanRequested', eventType: 'GraphQL.RecordLoanRequested', eventId: 'evt-1' },
      'Mutation call dispatched',
    );
  });

  it('should log transport failures as errors', async () => {
    const error = vi.spyOn(logger, 'error');
    const err = new SinkTransportError(call.streamName, new Error('down'));

    tracker.track(call, Promise.reject(err));
    await tracker.drain();

    expect(metrics.counterValue(COUNTER_DISPATCHES, { outcome: 'failed' })).toBe(1);
    expect(error).toHaveBeenCalledWith(
      {
        err,
        stream: 'graphql-mutation-recordLoanRequested',
        eventType: 'GraphQL.RecordLoanRequested',
        fieldName: 'recordLoanRequested',
        code: 'SINK_TRANSPORT_ERROR',
      },
      'Failed to persist GraphQL mutation event',
    );
  });

  it('should log serialization failures as fatal', async () => {
    const fatal = vi.spyOn(logger, 'fatal');
    const error = vi.spyOn(logger, 'error');

    tracker.track(call, Promise.reject(new SerializationError('arguments.amount', 'non-finite number NaN')));
    await tracker.drain();

    expect(fatal).toHaveBeenCalledTimes(1);
    expect(fatal.mock.calls[0]?.[1]).toBe('Mutation call cannot be serialized; event dropped');
    expect(error).not.toHaveBeenCalled();
  });

  it('should leave the code empty for foreign errors', async () => {
    const error = vi.spyOn(logger, 'error');

    tracker.track(call, Promise.reject(new Error('socket hang up')));
    await tracker.drain();

    expect(error.mock.calls[0]?.[0]).toMatchObject({ code: undefined, fieldName: 'recordLoanRequested' });
  });

  it('should drain dispatches tracked while draining', async () => {
    const first = createDeferred<SinkReceipt>();
    const late = createDeferred<SinkReceipt>();
    tracker.track(call, first.promise);

    const draining = tracker.drain();
    tracker.track(call, late.promise);
    first.resolve(receipt);
    await Promise.resolve();
    late.resolve(receipt);
    await draining;

    expect(tracker.pending).toBe(0);
  });

  it('should work without metrics', async () => {
    const bare = new DispatchTracker(logger);
    bare.track(call, Promise.reject(new Error('down')));

    await expect(bare.drain()).resolves.toBeUndefined();
  });
});
