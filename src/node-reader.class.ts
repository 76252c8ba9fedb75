import { EventEmitter } from 'events';
import { computeBackoff, normalizeRetry } from './concerns/backoff.js';
import { createLogger, getLoggerOptionsFromEnv, type ElectionLogger, type LogLevel } from './concerns/logger.js';
import { tryFn, tryFnSync } from './concerns/try-fn.js';
import { InvalidStateError, NotConfiguredError } from './errors.js';
import {
  failureFromError,
  isFatalSessionState,
  type CoordinationClient,
  type ExistsResult,
  type NodeStat,
  type ReadResult,
  type WatchedEvent
} from './clients/types.js';
import type { RetryConfig } from './types/election.types.js';

export interface NodeReaderListener {
  onRead?(reader: NodeReader, data: Uint8Array, stat: NodeStat): void;
  /**
   * The reader stopped before reading the node, because `finish()` was called
   * or the session reported `AUTH_FAILED` or `CLOSED`. May fire late, or not
   * at all.
   */
  onGaveUp?(reader: NodeReader): void;
}

export interface NodeReaderOptions {
  client?: CoordinationClient;
  path?: string;
  listener?: NodeReaderListener;
  retry?: RetryConfig;
  logger?: ElectionLogger;
  logLevel?: LogLevel;
}

export interface NodeReadEvent {
  data: Uint8Array;
  stat: NodeStat;
}

/**
 * Reads a node once. When the node does not exist yet, waits for it to be
 * created and reads it then.
 *
 * Emits `read` ({@link NodeReadEvent}) or `gaveUp`.
 */
export class NodeReader extends EventEmitter {
  protected client: CoordinationClient | null;
  protected path: string | null;
  protected listener: NodeReaderListener | null;
  protected retryBaseDelayMs: number;
  protected retryMaxDelayMs: number;
  logger: ElectionLogger;

  private _started: boolean;
  private _completed: boolean;
  private _shouldFinish: boolean;
  private _ticket: number;
  private _failures: number;

  constructor(options: NodeReaderOptions = {}) {
    super();
    this.client = options.client ?? null;
    this.path = options.path ?? null;
    this.listener = options.listener ?? null;

    const retry = normalizeRetry(options.retry);
    this.retryBaseDelayMs = retry.retryBaseDelayMs;
    this.retryMaxDelayMs = retry.retryMaxDelayMs;

    this.logger = options.logger ?? createLogger(
      getLoggerOptionsFromEnv({ name: 'NodeReader', level: options.logLevel ?? 'info' })
    );

    this._started = false;
    this._completed = false;
    this._shouldFinish = false;
    this._ticket = 0;
    this._failures = 0;
  }

  getClient(): CoordinationClient | null {
    return this.client;
  }

  setClient(client: CoordinationClient): this {
    this._assertNotStarted('setClient');
    this.client = client;
    return this;
  }

  getPath(): string | null {
    return this.path;
  }

  setPath(path: string): this {
    this._assertNotStarted('setPath');
    this.path = path;
    return this;
  }

  getListener(): NodeReaderListener | null {
    return this.listener;
  }

  setListener(listener: NodeReaderListener): this {
    this._assertNotStarted('setListener');
    this.listener = listener;
    return this;
  }

  /**
   * @throws {NotConfiguredError} no client or no path was set
   * @throws {InvalidStateError} already started
   */
  start(): this {
    const client = this.client;
    if (!client) {
      throw new NotConfiguredError('A coordination client must be set.', { setting: 'client' });
    }

    const path = this.path;
    if (path === null) {
      throw new NotConfiguredError('A path must be set.', { setting: 'path' });
    }

    this._assertNotStarted('start');
    this._started = true;
    this.logger = this.logger.child({ path });

    this._read(client, path);
    return this;
  }

  finish(): this {
    this._shouldFinish = true;
    return this;
  }

  /** `true` once the node was read or the reader gave up. */
  isCompleted(): boolean {
    return this._completed;
  }

  protected _read(client: CoordinationClient, path: string): void {
    if (this._finishIfAppropriate(client)) {
      // Terminate the chain here.
      return;
    }

    const ticket = ++this._ticket;
    tryFn(() => client.getData(path))
      .then((settled) => {
        const [ok, err, result] = settled;
        this._onRead(client, path, ticket, ok ? result : failureFromError(err));
      })
      .catch((err: unknown) => {
        this.logger.error({ err }, '[READ] failed to handle result');
      });
  }

  protected _track(client: CoordinationClient, path: string): void {
    if (this._finishIfAppropriate(client)) {
      return;
    }

    const ticket = ++this._ticket;
    const watcher = (event: WatchedEvent): void => {
      if (event.type !== 'NODE_CREATED' || ticket !== this._ticket || this._completed) {
        return;
      }
      this.logger.debug('[WATCH] node created');
      this._read(client, path);
    };

    tryFn(() => client.exists(path, watcher))
      .then((settled) => {
        const [ok, err, result] = settled;
        this._onTracked(client, path, ticket, ok ? result : failureFromError(err));
      })
      .catch((err: unknown) => {
        this.logger.error({ err }, '[TRACK] failed to handle result');
      });
  }

  private _onRead(client: CoordinationClient, path: string, ticket: number, result: ReadResult): void {
    if (ticket !== this._ticket || this._completed) {
      return;
    }

    switch (result.code) {
      case 'OK': {
        const { data, stat } = result;
        this._completed = true;
        this.logger.debug({ version: stat.version }, '[READ] done');
        this._notify('read', (listener) => listener.onRead?.(this, data, stat), { data, stat });
        return;
      }
      case 'NO_NODE':
        // Wait for the node to be created.
        this._failures = 0;
        this._track(client, path);
        return;
      default:
        this._retry(result.code, () => this._read(client, path));
    }
  }

  private _onTracked(client: CoordinationClient, path: string, ticket: number, result: ExistsResult): void {
    if (ticket !== this._ticket || this._completed) {
      return;
    }

    switch (result.code) {
      case 'OK':
        this._failures = 0;
        this._read(client, path);
        return;
      case 'NO_NODE':
        // The watch brings us back.
        this._failures = 0;
        return;
      default:
        this._retry(result.code, () => this._track(client, path));
    }
  }

  private _retry(code: string, next: () => void): void {
    this._failures++;
    const delayMs = computeBackoff(this._failures, this.retryBaseDelayMs, this.retryMaxDelayMs);
    this.logger.debug({ code, attempt: this._failures, delayMs }, '[RETRY] scheduled');

    const expected = this._ticket;
    const resume = (): void => {
      if (expected === this._ticket && !this._completed) {
        next();
      }
    };

    if (delayMs === 0) {
      setImmediate(resume);
      return;
    }
    setTimeout(resume, delayMs);
  }

  private _finishIfAppropriate(client: CoordinationClient): boolean {
    const sessionState = client.getState();
    if (!this._shouldFinish && !isFatalSessionState(sessionState)) {
      return false;
    }

    if (!this._completed) {
      this._completed = true;
      this.logger.debug({ finishRequested: this._shouldFinish, sessionState }, '[GATE] giving up');
      this._notify('gaveUp', (listener) => listener.onGaveUp?.(this));
    }
    return true;
  }

  private _notify(
    eventName: 'read' | 'gaveUp',
    invoke: (listener: NodeReaderListener) => void,
    payload?: NodeReadEvent
  ): void {
    const listener = this.listener;
    if (listener) {
      const [ok, err] = tryFnSync(() => invoke(listener));
      if (!ok) {
        this.logger.warn({ err, event: eventName }, 'Listener threw, ignored');
      }
    }

    const [ok, err] = tryFnSync(() => (payload ? this.emit(eventName, payload) : this.emit(eventName)));
    if (!ok) {
      this.logger.warn({ err, event: eventName }, 'Event handler threw, ignored');
    }
  }

  private _assertNotStarted(method: string): void {
    if (this._started) {
      throw new InvalidStateError(`${method}() can be called only before the reader is started.`, {
        currentState: 'STARTED',
        expectedState: 'CREATED'
      });
    }
  }
}

export default NodeReader;
