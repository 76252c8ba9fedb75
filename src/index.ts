// =============================================================================
// Core Classes
// =============================================================================

export { LeaderElection, DEFAULT_PATH } from './election.class.js';
export { NodeReader } from './node-reader.class.js';
export type {
  NodeReaderListener,
  NodeReaderOptions,
  NodeReadEvent
} from './node-reader.class.js';

// =============================================================================
// Election Types
// =============================================================================

export { ElectionState } from './types/election.types.js';
export type {
  ElectionEvent,
  ElectionEventName,
  ElectionListener,
  ElectionMetrics,
  LeaderElectionOptions,
  RetryConfig,
  StateChangedEvent
} from './types/election.types.js';
export { ElectionListenerAdapter } from './listener-adapter.class.js';

// =============================================================================
// Clients
// =============================================================================

export * from './clients/index.js';

// =============================================================================
// Errors
// =============================================================================

export * from './errors.js';

// =============================================================================
// Concerns/Utilities
// =============================================================================

export * from './concerns/index.js';

export { LeaderElection as default } from './election.class.js';
