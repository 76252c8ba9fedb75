import type { LeaderElection } from './election.class.js';
import type { ElectionListener, ElectionState } from './types/election.types.js';

/**
 * Empty {@link ElectionListener}. Extend it and override only the callbacks
 * you need.
 */
export class ElectionListenerAdapter implements ElectionListener {
  onStateChanged(_election: LeaderElection, _oldState: ElectionState, _newState: ElectionState): void {}

  onWin(_election: LeaderElection): void {}

  onLose(_election: LeaderElection): void {}

  onVacant(_election: LeaderElection): void {}

  onFinish(_election: LeaderElection): void {}
}
