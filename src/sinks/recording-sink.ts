import type { MutationCall } from '../types/mutation.js';
import type { MutationSink, SinkReceipt } from '../types/sink.js';

/**
 * In-memory sink: keeps every submitted call in submission order and
 * resolves at once. Used by tests and for running without an event store.
 */
export class RecordingSink implements MutationSink {
  private readonly log: MutationCall[] = [];

  async submit(call: MutationCall): Promise<SinkReceipt> {
    this.log.push(call);
    return { streamName: call.streamName, eventType: call.eventType, eventId: null };
  }

  /** Snapshot of the recorded calls */
  get calls(): readonly MutationCall[] {
    return [...this.log];
  }

  forStream(streamName: string): MutationCall[] {
    return this.log.filter((call) => call.streamName === streamName);
  }

  clear(): void {
    this.log.length = 0;
  }
}
