import type { LeaderElection } from '../election.class.js';
import type { ElectionLogger, LogLevel } from '../concerns/logger.js';
import type { IdentityGenerator } from '../concerns/identity.js';
import type {
  AclEntry,
  CoordinationClient,
  CreateResult,
  ExistsResult,
  ReadResult,
  WatchedEvent
} from '../clients/types.js';

/**
 * Leader election state.
 *
 * ```
 *                     +----------------+
 *                     |  +----------+  |
 *                     |  |  LEADER  |  |
 *                     |  +----------+  |
 *                     |       ^|       |
 *                     |       |v       |
 * +---------+         |  +----------+  |
 * | CREATED |----------->| ELECTING |  |
 * +---------+         |  +----------+  |
 *      |              |       ^|       |
 *      v              |       |v       |
 * +---------+         |  +----------+  |
 * |  DONE   |<---------  | FOLLOWER |  |
 * +---------+         |  +----------+  |
 *                     +----------------+
 * ```
 *
 * `DONE` is reachable from every other state and is never left.
 */
export const ElectionState = {
  CREATED: 'CREATED',
  ELECTING: 'ELECTING',
  LEADER: 'LEADER',
  FOLLOWER: 'FOLLOWER',
  DONE: 'DONE'
} as const;

export type ElectionState = typeof ElectionState[keyof typeof ElectionState];

/**
 * Receives election events. Every method is optional; `onStateChanged` is
 * always called before the `onWin`/`onLose`/`onVacant`/`onFinish` of the same
 * step. Errors thrown here are caught and logged.
 */
export interface ElectionListener {
  onStateChanged?(election: LeaderElection, oldState: ElectionState, newState: ElectionState): void;
  /** This candidate holds the contested node. */
  onWin?(election: LeaderElection): void;
  /** Another candidate holds the contested node. */
  onLose?(election: LeaderElection): void;
  /** The contested node is gone; a new claim follows immediately. */
  onVacant?(election: LeaderElection): void;
  /**
   * The election stopped for good. May fire late, and does not fire at all
   * when the instance is abandoned before its pending call settles.
   */
  onFinish?(election: LeaderElection): void;
}

export interface StateChangedEvent {
  oldState: ElectionState;
  newState: ElectionState;
}

export type ElectionEventName = 'state:changed' | 'win' | 'lose' | 'vacant' | 'finish';

export interface RetryConfig {
  /** Delay before the first retry of a failed call. `0` retries immediately. */
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export interface LeaderElectionOptions {
  client?: CoordinationClient;
  path?: string;
  id?: string;
  acl?: readonly AclEntry[];
  listener?: ElectionListener;
  identityGenerator?: IdentityGenerator;
  retry?: RetryConfig;
  logger?: ElectionLogger;
  logLevel?: LogLevel;
}

export interface NormalizedElectionConfig {
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

/**
 * Input of {@link LeaderElection.handleEvent}. `ticket` identifies the call
 * (or, for watches, the track call) the event answers.
 */
export type ElectionEvent =
  | { kind: 'claimed'; ticket: number; result: CreateResult }
  | { kind: 'resolved'; ticket: number; result: ReadResult }
  | { kind: 'tracked'; ticket: number; result: ExistsResult }
  | { kind: 'watched'; ticket: number; event: WatchedEvent };

export interface ElectionMetrics {
  claims: number;
  resolves: number;
  tracks: number;
  retries: number;
  wins: number;
  losses: number;
  vacancies: number;
  watchEvents: number;
  staleEvents: number;
  listenerFaults: number;
  startTime: number | null;
  finishedAt: number | null;
}
