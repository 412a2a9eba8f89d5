// Types
export * from './types/index.js';

// Mapping pipeline
export * from './mapping/index.js';

// Sinks
export * from './sinks/index.js';

// Interceptor
export * from './interceptor/index.js';

// Configuration
export * from './config/index.js';

// Observability
export * from './observability/index.js';

// Server
export * from './api/index.js';
