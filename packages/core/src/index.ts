// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Collections
export * from './collections/index.js';

// Component model
export * from './component-model/index.js';

// Extensions
export * from './extensions/index.js';
