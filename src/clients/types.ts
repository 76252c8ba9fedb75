/**
 * Coordination client contract
 *
 * The narrow capability surface an election needs from a hierarchical
 * coordination service with ephemeral nodes, atomic create and one-shot
 * watches. Adapt a ZooKeeper driver to this interface, or use the in-process
 * {@link MemoryCoordinationClient}.
 */

export type ResultCode =
  | 'OK'
  | 'NODE_EXISTS'
  | 'NO_NODE'
  | 'CONNECTION_LOSS'
  | 'OPERATION_TIMEOUT'
  | 'SESSION_EXPIRED'
  | 'NO_AUTH'
  | 'AUTH_FAILED'
  | 'SYSTEM_ERROR';

export type FailureCode = Exclude<ResultCode, 'OK'>;

export type SessionState =
  | 'CONNECTING'
  | 'CONNECTED'
  | 'CONNECTED_READ_ONLY'
  | 'DISCONNECTED'
  | 'EXPIRED'
  | 'AUTH_FAILED'
  | 'CLOSED';

export type CreateMode = 'PERSISTENT' | 'EPHEMERAL';

export type WatchedEventType =
  | 'NONE'
  | 'NODE_CREATED'
  | 'NODE_DELETED'
  | 'NODE_DATA_CHANGED'
  | 'NODE_CHILDREN_CHANGED';

export interface WatchedEvent {
  type: WatchedEventType;
  path: string;
}

export type Watcher = (event: WatchedEvent) => void;

export const Permission = {
  READ: 1,
  WRITE: 2,
  CREATE: 4,
  DELETE: 8,
  ADMIN: 16,
  ALL: 31
} as const;

export interface AclEntry {
  perms: number;
  id: {
    scheme: string;
    id: string;
  };
}

/** Anyone may do anything with the node. */
export const OPEN_ACL_UNSAFE: readonly AclEntry[] = Object.freeze([
  Object.freeze({ perms: Permission.ALL, id: Object.freeze({ scheme: 'world', id: 'anyone' }) })
]);

export interface NodeStat {
  version: number;
  ctime: number;
  mtime: number;
  /** Session id of the owner for ephemeral nodes, `null` otherwise. */
  ephemeralOwner: string | null;
  dataLength: number;
}

export interface FailureResult {
  code: FailureCode;
  error?: Error;
}

export type CreateResult = { code: 'OK'; path: string } | FailureResult;

export type ReadResult = { code: 'OK'; data: Uint8Array; stat: NodeStat } | FailureResult;

export type ExistsResult = { code: 'OK'; stat: NodeStat } | FailureResult;

export interface CoordinationClient {
  create(path: string, data: Uint8Array, acl: readonly AclEntry[], mode: CreateMode): Promise<CreateResult>;
  getData(path: string): Promise<ReadResult>;
  /** Checks existence and registers `watcher` for the next change of `path`. */
  exists(path: string, watcher: Watcher): Promise<ExistsResult>;
  getState(): SessionState;
}

/** Session states after which no further call can ever succeed. */
export const FATAL_SESSION_STATES: readonly SessionState[] = ['AUTH_FAILED', 'CLOSED'];

export function isFatalSessionState(state: SessionState): boolean {
  return FATAL_SESSION_STATES.includes(state);
}

/** A rejected client promise counts as an unclassified failure. */
export function failureFromError(error: Error): FailureResult {
  return { code: 'SYSTEM_ERROR', error };
}
