export { MemoryCoordinationService } from './memory-coordination-service.class.js';
export type {
  ConnectOptions,
  MemoryCoordinationServiceConfig,
  MemoryServiceStats
} from './memory-coordination-service.class.js';
export { MemoryCoordinationClient } from './memory-coordination-client.class.js';
export type {
  InjectedFailure,
  MemoryOperation,
  RecordedCall
} from './memory-coordination-client.class.js';
export {
  FATAL_SESSION_STATES,
  OPEN_ACL_UNSAFE,
  Permission,
  failureFromError,
  isFatalSessionState
} from './types.js';
export type {
  AclEntry,
  CoordinationClient,
  CreateMode,
  CreateResult,
  ExistsResult,
  FailureCode,
  FailureResult,
  NodeStat,
  ReadResult,
  ResultCode,
  SessionState,
  WatchedEvent,
  WatchedEventType,
  Watcher
} from './types.js';
