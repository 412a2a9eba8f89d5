import type { MutationCall } from './mutation.js';

/** What a sink reports once a call is durably recorded */
export interface SinkReceipt {
  streamName: string;
  eventType: string;
  eventId: string | null;   // null for sinks that assign no record id
}

/**
 * Persistence boundary for extracted mutation calls.
 *
 * `submit` enqueues the call before it returns and never waits on I/O to do
 * so. The promise settles once the call is recorded or has failed; calls for
 * one stream are recorded in submission order.
 */
export interface MutationSink {
  submit(call: MutationCall): Promise<SinkReceipt>;
}
