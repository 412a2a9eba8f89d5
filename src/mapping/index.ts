export {
  MutationStreamError,
  UnboundVariableError,
  SerializationError,
  NamingPolicyViolationError,
  SinkUnavailableError,
  SinkTransportError,
  ConfigError,
  isMutationStreamError,
  type NamingCollision,
} from './errors.js';
export {
  resolveValue,
  collectBindings,
  copyBoundValue,
  type VariableBindings,
} from './variable-resolver.js';
export { materializeArguments, resolveArguments, freezeTree } from './argument-materializer.js';
export {
  NamingPolicy,
  toPascalCase,
  DEFAULT_STREAM_PREFIX,
  DEFAULT_EVENT_TYPE_NAMESPACE,
  type NamingPolicyConfig,
  type NamingTableEntry,
} from './naming-policy.js';
export { MutationExtractor } from './mutation-extractor.js';
export { toEventBody, serializeEventBody, type MutationEventBody } from './event-body.js';
export { loadSchemaFromSDL } from './schema-loader.js';
