import { describe, it, expect, beforeEach, vi } from 'vitest';
import { pino } from 'pino';
import {
  SerializationError,
  SinkTransportError,
  SinkUnavailableError,
} from '../../../src/mapping/errors.js';
import { NamingPolicy } from '../../../src/mapping/naming-policy.js';
import { EventStoreSink } from '../../../src/sinks/event-store-sink.js';
import type { MutationCall } from '../../../src/types/mutation.js';
import { createDeferred, FakeEventStoreClient, sequentialIds } from '../../fixtures/fake-event-store.js';

const policy = new NamingPolicy();

function createCall(fieldName: string, args: MutationCall['arguments'] = {}): MutationCall {
  return {
    fieldName,
    alias: null,
    operationName: null,
    arguments: args,
    selectedFields: [],
    ...policy.derive(fieldName),
  };
}

describe('EventStoreSink', () => {
  let client: FakeEventStoreClient;
  let sink: EventStoreSink;

  beforeEach(() => {
    client = new FakeEventStoreClient();
    sink = new EventStoreSink({
      client,
      logger: pino({ level: 'silent' }),
      generateId: sequentialIds(),
    });
  });

  it('should append one JSON event per call', async () => {
    const receipt = await sink.submit(createCall('recordLoanRequested', { input: { Amount: 500, LoanRequestID: 'L1' } }));

    expect(receipt).toEqual({
      streamName: 'graphql-mutation-recordLoanRequested',
      eventType: 'GraphQL.RecordLoanRequested',
      eventId: 'evt-1',
    });
    expect(client.records).toEqual([
      {
        streamName: 'graphql-mutation-recordLoanRequested',
        eventType: 'GraphQL.RecordLoanRequested',
        eventId: 'evt-1',
        body: {
          fieldName: 'recordLoanRequested',
          operationName: null,
          alias: null,
          arguments: { input: { Amount: 500, LoanRequestID: 'L1' } },
          selectedFields: [],
        },
      },
    ]);
  });

  it('should keep submission order within a stream', async () => {
    const hold = createDeferred();
    client.gate('graphql-mutation-recordCreditChecked', hold.promise);

    const first = sink.submit(createCall('recordCreditChecked', { n: 1 }));
    const second = sink.submit(createCall('recordCreditChecked', { n: 2 }));
    hold.resolve();
    await Promise.all([first, second]);

    expect(client.records.map((r) => r.body['arguments'])).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('should not hold one stream behind another', async () => {
    const hold = createDeferred();
    client.gate('graphql-mutation-recordCreditChecked', hold.promise);

    const blocked = sink.submit(createCall('recordCreditChecked'));
    await sink.submit(createCall('recordAutomatedSummary'));

    expect(client.records.map((r) => r.streamName)).toEqual(['graphql-mutation-recordAutomatedSummary']);
    hold.resolve();
    await blocked;
    expect(client.records).toHaveLength(2);
  });

  it('should wrap client failures in SinkTransportError', async () => {
    const cause = new Error('connection refused');
    client.failWith('graphql-mutation-recordLoanRequested', cause);

    const result = sink.submit(createCall('recordLoanRequested'));

    await expect(result).rejects.toBeInstanceOf(SinkTransportError);
    await expect(result).rejects.toMatchObject({
      message: 'Append to stream "graphql-mutation-recordLoanRequested" failed: connection refused',
      streamName: 'graphql-mutation-recordLoanRequested',
      cause,
    });
  });

  it('should keep appending to a stream after a failure', async () => {
    client.failWith('graphql-mutation-recordLoanRequested', new Error('timeout'));

    const failed = sink.submit(createCall('recordLoanRequested', { n: 1 }));
    const next = sink.submit(createCall('recordLoanRequested', { n: 2 }));

    await expect(failed).rejects.toThrow(SinkTransportError);
    await expect(next).resolves.toMatchObject({ eventId: 'evt-2' });
    expect(client.records.map((r) => r.body['arguments'])).toEqual([{ n: 2 }]);
  });

  it('should reject non-serializable calls without reaching the client', async () => {
    await expect(sink.submit(createCall('recordLoanRequested', { amount: Infinity })))
      .rejects.toBeInstanceOf(SerializationError);
    expect(client.started).toEqual([]);
  });

  it('should log each persisted event', async () => {
    const logger = pino({ level: 'silent' });
    const info = vi.spyOn(logger, 'info');
    const logged = new EventStoreSink({ client, logger, generateId: () => 'evt-x' });

    await logged.submit(createCall('recordLoanRequested'));

    expect(info).toHaveBeenCalledWith(
      {
        stream: 'graphql-mutation-recordLoanRequested',
        eventType: 'GraphQL.RecordLoanRequested',
        eventId: 'evt-x',
      },
      'Persisted GraphQL mutation event',
    );
  });

  describe('close', () => {
    it('should wait for queued appends and close the client', async () => {
      const hold = createDeferred();
      client.gate('graphql-mutation-recordLoanRequested', hold.promise);
      const pending = sink.submit(createCall('recordLoanRequested'));

      const closing = sink.close();
      expect(sink.isClosed).toBe(true);
      expect(client.closed).toBe(false);

      hold.resolve();
      await closing;
      await pending;
      expect(client.records).toHaveLength(1);
      expect(client.closed).toBe(true);
    });

    it('should reject submissions once closed', async () => {
      await sink.close();

      await expect(sink.submit(createCall('recordLoanRequested'))).rejects.toBeInstanceOf(SinkUnavailableError);
      await expect(sink.submit(createCall('recordLoanRequested'))).rejects.toThrow('Event store sink is closed');
    });

    it('should be idempotent', async () => {
      await sink.close();
      await expect(sink.close()).resolves.toBeUndefined();
    });
  });
});
