export * from './json.js';
export * from './mutation.js';
export type { MutationSink, SinkReceipt } from './sink.js';
