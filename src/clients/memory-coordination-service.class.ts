import { createLogger, type ElectionLogger, type LogLevel } from '../concerns/logger.js';
import { tryFnSync } from '../concerns/try-fn.js';
import { DuplicateSessionError } from '../errors.js';
import { MemoryCoordinationClient } from './memory-coordination-client.class.js';
import type {
  CreateMode,
  CreateResult,
  ExistsResult,
  FailureResult,
  NodeStat,
  ReadResult,
  WatchedEventType,
  Watcher
} from './types.js';

interface MemoryNode {
  data: Uint8Array;
  stat: NodeStat;
}

export interface MemoryCoordinationServiceConfig {
  logger?: ElectionLogger;
  logLevel?: LogLevel;
}

export interface ConnectOptions {
  sessionId?: string;
}

export interface MemoryServiceStats {
  nodes: number;
  sessions: number;
  pendingWatches: number;
}

/**
 * In-process node tree shared by any number of {@link MemoryCoordinationClient}
 * sessions. Paths are flat keys: parents are neither required nor created.
 *
 * Watches are one-shot and are delivered on a later macrotask, in the order
 * the triggering changes happened. Expiring a session discards the watches it
 * registered.
 */
export class MemoryCoordinationService {
  private nodes: Map<string, MemoryNode>;
  /** path -> watcher -> id of the session that registered it */
  private watches: Map<string, Map<Watcher, string>>;
  private sessions: Map<string, MemoryCoordinationClient>;
  private sessionCounter: number;
  logger: ElectionLogger;

  constructor(config: MemoryCoordinationServiceConfig = {}) {
    this.nodes = new Map();
    this.watches = new Map();
    this.sessions = new Map();
    this.sessionCounter = 0;

    if (config.logger) {
      this.logger = config.logger;
    } else {
      this.logger = createLogger({ name: 'MemoryCoordinationService', level: config.logLevel ?? 'info' });
    }
  }

  connect(options: ConnectOptions = {}): MemoryCoordinationClient {
    const sessionId = options.sessionId ?? `session-${++this.sessionCounter}`;
    if (this.sessions.has(sessionId)) {
      throw new DuplicateSessionError(`MemoryCoordinationService: session "${sessionId}" is already connected`, {
        sessionId
      });
    }

    const client = new MemoryCoordinationClient(this, sessionId);
    this.sessions.set(sessionId, client);
    this.logger.debug({ sessionId }, 'session connected');
    return client;
  }

  /**
   * Ends a session the way a server-side timeout would: its ephemeral nodes
   * are removed (firing their watches) and the client reports `CLOSED`.
   */
  expireSession(sessionId: string): void {
    const client = this.sessions.get(sessionId);
    this.sessions.delete(sessionId);

    // A dead session hears nothing more, not even about its own nodes.
    for (const [path, registered] of [...this.watches]) {
      for (const [watcher, owner] of registered) {
        if (owner === sessionId) {
          registered.delete(watcher);
        }
      }
      if (registered.size === 0) {
        this.watches.delete(path);
      }
    }

    for (const [path, node] of [...this.nodes]) {
      if (node.stat.ephemeralOwner === sessionId) {
        this.nodes.delete(path);
        this._fire(path, 'NODE_DELETED');
      }
    }

    client?.markClosed();
    this.logger.debug({ sessionId }, 'session expired');
  }

  createNode(sessionId: string, path: string, data: Uint8Array, mode: CreateMode): CreateResult {
    if (this.nodes.has(path)) {
      return { code: 'NODE_EXISTS' };
    }

    const now = Date.now();
    this.nodes.set(path, {
      data: Uint8Array.from(data),
      stat: {
        version: 0,
        ctime: now,
        mtime: now,
        ephemeralOwner: mode === 'EPHEMERAL' ? sessionId : null,
        dataLength: data.byteLength
      }
    });
    this._fire(path, 'NODE_CREATED');
    return { code: 'OK', path };
  }

  readNode(path: string): ReadResult {
    const node = this.nodes.get(path);
    if (!node) {
      return { code: 'NO_NODE' };
    }
    return { code: 'OK', data: Uint8Array.from(node.data), stat: { ...node.stat } };
  }

  statNode(sessionId: string, path: string, watcher?: Watcher): ExistsResult {
    if (watcher) {
      const registered = this.watches.get(path) ?? new Map<Watcher, string>();
      registered.set(watcher, sessionId);
      this.watches.set(path, registered);
    }

    const node = this.nodes.get(path);
    if (!node) {
      return { code: 'NO_NODE' };
    }
    return { code: 'OK', stat: { ...node.stat } };
  }

  deleteNode(path: string): { code: 'OK' } | FailureResult {
    if (!this.nodes.delete(path)) {
      return { code: 'NO_NODE' };
    }
    this._fire(path, 'NODE_DELETED');
    return { code: 'OK' };
  }

  setNodeData(path: string, data: Uint8Array): ExistsResult {
    const node = this.nodes.get(path);
    if (!node) {
      return { code: 'NO_NODE' };
    }

    node.data = Uint8Array.from(data);
    node.stat = {
      ...node.stat,
      version: node.stat.version + 1,
      mtime: Date.now(),
      dataLength: data.byteLength
    };
    this._fire(path, 'NODE_DATA_CHANGED');
    return { code: 'OK', stat: { ...node.stat } };
  }

  has(path: string): boolean {
    return this.nodes.has(path);
  }

  peek(path: string): Uint8Array | undefined {
    const node = this.nodes.get(path);
    return node ? Uint8Array.from(node.data) : undefined;
  }

  getStats(): MemoryServiceStats {
    let pendingWatches = 0;
    for (const registered of this.watches.values()) {
      pendingWatches += registered.size;
    }
    return {
      nodes: this.nodes.size,
      sessions: this.sessions.size,
      pendingWatches
    };
  }

  private _fire(path: string, type: WatchedEventType): void {
    const registered = this.watches.get(path);
    if (!registered || registered.size === 0) {
      return;
    }
    this.watches.delete(path);

    this.logger.debug({ path, type, watchers: registered.size }, 'firing watches');
    for (const watcher of registered.keys()) {
      setImmediate(() => {
        const [ok, err] = tryFnSync(() => watcher({ type, path }));
        if (!ok) {
          this.logger.warn({ path, type, err }, 'watcher threw');
        }
      });
    }
  }
}
