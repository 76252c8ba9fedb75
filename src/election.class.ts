import { EventEmitter } from 'events';
import { computeBackoff, normalizeRetry } from './concerns/backoff.js';
import {
  decodeIdentity,
  encodeIdentity,
  randomIdentity,
  sameIdentity,
  type IdentityGenerator
} from './concerns/identity.js';
import { createLogger, getLoggerOptionsFromEnv, type ElectionLogger } from './concerns/logger.js';
import { tryFn, tryFnSync } from './concerns/try-fn.js';
import { InvalidStateError, NotConfiguredError } from './errors.js';
import {
  OPEN_ACL_UNSAFE,
  failureFromError,
  isFatalSessionState,
  type AclEntry,
  type CoordinationClient,
  type CreateResult,
  type ExistsResult,
  type FailureResult,
  type ReadResult,
  type WatchedEvent
} from './clients/types.js';
import {
  ElectionState,
  type ElectionEvent,
  type ElectionEventName,
  type ElectionListener,
  type ElectionMetrics,
  type LeaderElectionOptions,
  type NormalizedElectionConfig,
  type StateChangedEvent
} from './types/election.types.js';

export const DEFAULT_PATH = '/leader';

type DriverStep = 'CLAIM' | 'RESOLVE' | 'TRACK';

/**
 * Leader election over a single ephemeral node.
 *
 * Every candidate tries to create the node at `path` with its own id as
 * content. The one whose create succeeds is the leader; everybody else
 * follows and watches the node. When the node disappears (the leader's
 * session ended, or it was deleted) all candidates run again.
 *
 * @example
 * const election = new LeaderElection({ client, listener: {
 *   onWin: () => console.log("I'm the leader."),
 *   onLose: () => console.log('Someone else is the leader.')
 * }}).start();
 *
 * // later
 * election.finish();
 *
 * The election keeps running until `finish()` is called or the client reports
 * `AUTH_FAILED` or `CLOSED`; either is noticed right before the next call to
 * the client, at which point the state becomes `DONE` and `finish` fires.
 * `finish()` does not remove a watch that is already installed.
 */
export class LeaderElection extends EventEmitter {
  protected client: CoordinationClient | null;
  protected path: string | null;
  protected id: string | null;
  protected acl: readonly AclEntry[] | null;
  protected listener: ElectionListener | null;
  protected identityGenerator: IdentityGenerator;
  protected config: NormalizedElectionConfig;

  logger: ElectionLogger;
  metrics: ElectionMetrics;

  private _state: ElectionState;
  private _shouldFinish: boolean;
  private _idBytes: Uint8Array | null;
  private _ticket: number;
  private _consecutiveFailures: number;
  private _depth: number;
  private _pending: ElectionEvent[];

  constructor(options: LeaderElectionOptions = {}) {
    super();

    this.client = options.client ?? null;
    this.path = options.path ?? null;
    this.id = options.id ?? null;
    this.acl = options.acl ?? null;
    this.listener = options.listener ?? null;
    this.identityGenerator = options.identityGenerator ?? randomIdentity;
    this.config = normalizeRetry(options.retry);

    this.logger = options.logger ?? createLogger(
      getLoggerOptionsFromEnv({ name: 'LeaderElection', level: options.logLevel ?? 'info' })
    );

    this.metrics = {
      claims: 0,
      resolves: 0,
      tracks: 0,
      retries: 0,
      wins: 0,
      losses: 0,
      vacancies: 0,
      watchEvents: 0,
      staleEvents: 0,
      listenerFaults: 0,
      startTime: null,
      finishedAt: null
    };

    this._state = ElectionState.CREATED;
    this._shouldFinish = false;
    this._idBytes = null;
    this._ticket = 0;
    this._consecutiveFailures = 0;
    this._depth = 0;
    this._pending = [];
  }

  getClient(): CoordinationClient | null {
    return this.client;
  }

  /** Required. `start()` throws {@link NotConfiguredError} without a client. */
  setClient(client: CoordinationClient): this {
    this._assertConfigurable('setClient');
    this.client = client;
    return this;
  }

  getPath(): string | null {
    return this.path;
  }

  /** Path of the contested node. Defaults to `/leader`. */
  setPath(path: string): this {
    this._assertConfigurable('setPath');
    this.path = path;
    return this;
  }

  getId(): string | null {
    return this.id;
  }

  /**
   * Identity of this candidate; must differ from every other candidate's.
   * Generated by the identity generator when unset at `start()`.
   */
  setId(id: string): this {
    this._assertConfigurable('setId');
    this.id = id;
    return this;
  }

  getAcl(): readonly AclEntry[] | null {
    return this.acl;
  }

  /** ACL used to create the contested node. Defaults to {@link OPEN_ACL_UNSAFE}. */
  setAcl(acl: readonly AclEntry[]): this {
    this._assertConfigurable('setAcl');
    this.acl = acl;
    return this;
  }

  getListener(): ElectionListener | null {
    return this.listener;
  }

  setListener(listener: ElectionListener): this {
    this._assertConfigurable('setListener');
    this.listener = listener;
    return this;
  }

  /**
   * Starts the election. Before returning, the state is `ELECTING` and the
   * first create call has been issued, or the state is `DONE` when the
   * election was finished beforehand or the session is already dead.
   *
   * @throws {NotConfiguredError} no client was set
   * @throws {InvalidStateError} the state is not `CREATED`
   */
  start(): this {
    this._atomically(() => {
      const client = this.client;
      if (!client) {
        throw new NotConfiguredError('A coordination client must be set.', { setting: 'client' });
      }

      if (this._state !== ElectionState.CREATED) {
        throw new InvalidStateError(
          `start() can be called only when the state is CREATED. The current state is ${this._state}.`,
          { currentState: this._state, expectedState: ElectionState.CREATED }
        );
      }

      this._setup();
      this.metrics.startTime = Date.now();

      this._runForLeader(client);
    });

    return this;
  }

  /**
   * Marks the election as finished. Takes effect the next time the driver is
   * about to call the client; no further call is issued after that.
   */
  finish(): this {
    this._atomically(() => {
      if (!this._shouldFinish) {
        this.logger.debug('[FINISH] requested');
      }
      this._shouldFinish = true;
    });
    return this;
  }

  getState(): ElectionState {
    return this._atomically(() => this._state);
  }

  isLeader(): boolean {
    return this.getState() === ElectionState.LEADER;
  }

  getMetrics(): ElectionMetrics {
    return { ...this.metrics };
  }

  /**
   * Single entry point of the driver. Results of client calls and watch
   * notifications are routed here. Events that arrive while another event is
   * being handled are queued and handled afterwards, in arrival order.
   */
  handleEvent(event: ElectionEvent): void {
    if (this._depth > 0) {
      this._pending.push(event);
      return;
    }
    this._atomically(() => this._dispatch(event));
  }

  protected _dispatch(event: ElectionEvent): void {
    const client = this.client;
    if (this._state === ElectionState.DONE || !client) {
      this.logger.debug({ kind: event.kind }, '[EVENT] ignored after finish');
      return;
    }

    if (event.ticket !== this._ticket) {
      this.metrics.staleEvents++;
      this.logger.debug({ kind: event.kind, ticket: event.ticket, current: this._ticket }, '[EVENT] stale, ignored');
      return;
    }

    switch (event.kind) {
      case 'claimed':
        this._onClaimed(client, event.result);
        return;
      case 'resolved':
        this._onResolved(client, event.result);
        return;
      case 'tracked':
        this._onTracked(client, event.result);
        return;
      case 'watched':
        this._onWatched(client, event.event);
        return;
    }
  }

  protected _onClaimed(client: CoordinationClient, result: CreateResult): void {
    this.logger.debug({ code: result.code }, '[CLAIM] result');

    switch (result.code) {
      case 'OK':
        // I'm the leader. Track myself.
        this._consecutiveFailures = 0;
        this._becomeLeader();
        this._trackLeader(client);
        return;
      case 'NODE_EXISTS':
        this._consecutiveFailures = 0;
        this._becomeFollower();
        this._trackLeader(client);
        return;
      default:
        // The create may have been applied even though it reported a failure.
        this._retry(client, result, () => this._checkLeader(client));
    }
  }

  protected _onResolved(client: CoordinationClient, result: ReadResult): void {
    this.logger.debug({ code: result.code }, '[RESOLVE] result');

    switch (result.code) {
      case 'OK': {
        this._consecutiveFailures = 0;
        if (sameIdentity(result.data, this._requireIdBytes())) {
          this._becomeLeader();
        } else {
          this.logger.debug({ leaderId: decodeIdentity(result.data) }, '[RESOLVE] held by another candidate');
          this._becomeFollower();
        }
        this._trackLeader(client);
        return;
      }
      case 'NO_NODE':
        this._consecutiveFailures = 0;
        this._becomeVacant();
        this._runForLeader(client);
        return;
      default:
        this._retry(client, result, () => this._checkLeader(client));
    }
  }

  protected _onTracked(client: CoordinationClient, result: ExistsResult): void {
    this.logger.debug({ code: result.code }, '[TRACK] result');

    switch (result.code) {
      case 'OK':
        // Idle until the watch fires.
        this._consecutiveFailures = 0;
        return;
      case 'NO_NODE':
        this._consecutiveFailures = 0;
        this._becomeVacant();
        this._runForLeader(client);
        return;
      default:
        this._retry(client, result, () => this._trackLeader(client));
    }
  }

  protected _onWatched(client: CoordinationClient, event: WatchedEvent): void {
    this.metrics.watchEvents++;
    this.logger.debug({ type: event.type }, '[WATCH] fired');

    if (event.type !== 'NODE_DELETED') {
      return;
    }

    // The leader resigned.
    this._becomeVacant();
    this._runForLeader(client);
  }

  protected _runForLeader(client: CoordinationClient): void {
    if (this._finishIfAppropriate(client)) {
      return;
    }

    if (this._state === ElectionState.CREATED) {
      this._changeState(ElectionState.ELECTING);
    }

    const path = this._requirePath();
    const idBytes = this._requireIdBytes();
    const acl = this.acl ?? OPEN_ACL_UNSAFE;

    this.metrics.claims++;
    this._issue('CLAIM', () => client.create(path, idBytes, acl, 'EPHEMERAL'), (ticket, result) => ({
      kind: 'claimed',
      ticket,
      result
    }));
  }

  protected _checkLeader(client: CoordinationClient): void {
    if (this._finishIfAppropriate(client)) {
      return;
    }

    const path = this._requirePath();

    this.metrics.resolves++;
    this._issue('RESOLVE', () => client.getData(path), (ticket, result) => ({
      kind: 'resolved',
      ticket,
      result
    }));
  }

  protected _trackLeader(client: CoordinationClient): void {
    if (this._finishIfAppropriate(client)) {
      return;
    }

    const path = this._requirePath();
    const ticket = this._ticket + 1;
    const watcher = (event: WatchedEvent): void => {
      this.handleEvent({ kind: 'watched', ticket, event });
    };

    this.metrics.tracks++;
    this._issue('TRACK', () => client.exists(path, watcher), (issued, result) => ({
      kind: 'tracked',
      ticket: issued,
      result
    }));
  }

  /**
   * Issues one client call. The settled result comes back through
   * {@link handleEvent}; a rejected promise counts as `SYSTEM_ERROR`.
   */
  protected _issue<R extends CreateResult | ReadResult | ExistsResult>(
    step: DriverStep,
    call: () => Promise<R>,
    toEvent: (ticket: number, result: R | FailureResult) => ElectionEvent
  ): void {
    const ticket = ++this._ticket;
    this.logger.debug({ ticket }, `[${step}] issued`);

    tryFn(call)
      .then((settled) => {
        const [ok, err, result] = settled;
        if (ok) {
          this.handleEvent(toEvent(ticket, result));
        } else {
          this.logger.debug({ err }, `[${step}] call rejected`);
          this.handleEvent(toEvent(ticket, failureFromError(err)));
        }
      })
      .catch((err: unknown) => {
        this.logger.error({ err }, `[${step}] failed to handle result`);
      });
  }

  protected _retry(client: CoordinationClient, failure: FailureResult, next: () => void): void {
    this._consecutiveFailures++;
    this.metrics.retries++;

    const delayMs = computeBackoff(
      this._consecutiveFailures,
      this.config.retryBaseDelayMs,
      this.config.retryMaxDelayMs
    );

    this.logger.debug(
      { code: failure.code, attempt: this._consecutiveFailures, delayMs, sessionState: client.getState() },
      '[RETRY] scheduled'
    );

    const expected = this._ticket;
    const resume = (): void => {
      this._atomically(() => {
        if (this._ticket !== expected || this._state === ElectionState.DONE) {
          return;
        }
        next();
      });
    };

    // Even an immediate retry yields to timers and I/O first.
    if (delayMs === 0) {
      setImmediate(resume);
      return;
    }
    setTimeout(resume, delayMs);
  }

  /**
   * Termination gate. Returns `true`, after moving to `DONE` and notifying
   * `finish`, when no further client call may be issued.
   */
  protected _finishIfAppropriate(client: CoordinationClient): boolean {
    const sessionState = client.getState();
    const shouldFinish = this._shouldFinish || isFatalSessionState(sessionState);

    if (!shouldFinish) {
      return false;
    }

    if (this._state !== ElectionState.DONE) {
      this.logger.debug(
        { finishRequested: this._shouldFinish, sessionState },
        '[GATE] stopping the election'
      );
      this.metrics.finishedAt = Date.now();
      this._changeState(ElectionState.DONE);
      this._notify('finish', (listener) => listener.onFinish?.(this));
    }

    return true;
  }

  protected _becomeLeader(): void {
    this.metrics.wins++;
    this._changeState(ElectionState.LEADER);
    this._notify('win', (listener) => listener.onWin?.(this));
  }

  protected _becomeFollower(): void {
    this.metrics.losses++;
    this._changeState(ElectionState.FOLLOWER);
    this._notify('lose', (listener) => listener.onLose?.(this));
  }

  protected _becomeVacant(): void {
    this.metrics.vacancies++;
    this._changeState(ElectionState.ELECTING);
    this._notify('vacant', (listener) => listener.onVacant?.(this));
  }

  protected _changeState(newState: ElectionState): void {
    const oldState = this._state;
    this._state = newState;

    this.logger.debug({ from: oldState, to: newState }, '[STATE] changed');

    const payload: StateChangedEvent = { oldState, newState };
    this._notify(
      'state:changed',
      (listener) => listener.onStateChanged?.(this, oldState, newState),
      payload
    );
  }

  /**
   * Delivers one notification to the listener, then to emitter subscribers.
   * Nothing thrown by either reaches the driver.
   */
  protected _notify(
    eventName: ElectionEventName,
    invoke: (listener: ElectionListener) => void,
    payload?: StateChangedEvent
  ): void {
    const listener = this.listener;
    if (listener) {
      const [ok, err] = tryFnSync(() => invoke(listener));
      if (!ok) {
        this.metrics.listenerFaults++;
        this.logger.warn({ err, event: eventName }, 'Listener threw, ignored');
      }
    }

    const [ok, err] = tryFnSync(() => (payload ? this.emit(eventName, payload) : this.emit(eventName)));
    if (!ok) {
      this.metrics.listenerFaults++;
      this.logger.warn({ err, event: eventName }, 'Event handler threw, ignored');
    }
  }

  /**
   * Exclusive region for every read and write of the state and the finish
   * flag. Re-entrant, so listeners may call `getState()` or `finish()`;
   * events handed to `handleEvent` from inside the region run once the
   * outermost region exits.
   */
  protected _atomically<T>(action: () => T): T {
    this._depth++;
    try {
      return action();
    } finally {
      this._depth--;
      if (this._depth === 0 && this._pending.length > 0) {
        this._drainPending();
      }
    }
  }

  private _drainPending(): void {
    const next = this._pending.shift();
    if (next) {
      this._atomically(() => this._dispatch(next));
    }
  }

  private _setup(): void {
    if (this.path === null) {
      this.path = DEFAULT_PATH;
    }

    if (this.id === null) {
      this.id = this.identityGenerator();
    }

    this._idBytes = encodeIdentity(this.id);

    if (this.acl === null) {
      this.acl = OPEN_ACL_UNSAFE;
    }

    this.logger = this.logger.child({ path: this.path, id: this.id });
  }

  private _assertConfigurable(setter: string): void {
    if (this._state !== ElectionState.CREATED) {
      throw new InvalidStateError(
        `${setter}() can be called only before start(). The current state is ${this._state}.`,
        { currentState: this._state, expectedState: ElectionState.CREATED }
      );
    }
  }

  private _requirePath(): string {
    if (this.path === null) {
      throw new NotConfiguredError('The election path is not resolved; call start() first.', { setting: 'path' });
    }
    return this.path;
  }

  private _requireIdBytes(): Uint8Array {
    if (this._idBytes === null) {
      throw new NotConfiguredError('The election id is not resolved; call start() first.', { setting: 'id' });
    }
    return this._idBytes;
  }
}

export default LeaderElection;
