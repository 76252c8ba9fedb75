import type { MemoryCoordinationService } from './memory-coordination-service.class.js';
import type {
  AclEntry,
  CoordinationClient,
  CreateMode,
  CreateResult,
  ExistsResult,
  FailureCode,
  FailureResult,
  ReadResult,
  SessionState,
  Watcher
} from './types.js';

export type MemoryOperation = 'create' | 'getData' | 'exists' | 'delete' | 'setData';

export interface RecordedCall {
  operation: MemoryOperation;
  path: string;
}

export interface InjectedFailure {
  code: FailureCode;
  /**
   * Apply the operation before reporting the failure, as when the server
   * committed a change but the acknowledgement was lost.
   */
  applied?: boolean;
}

/**
 * One session against a {@link MemoryCoordinationService}.
 *
 * Operations take effect when called; their results are delivered on a later
 * macrotask so that a caller retrying on every failure never starves the
 * event loop.
 */
export class MemoryCoordinationClient implements CoordinationClient {
  readonly sessionId: string;
  readonly calls: RecordedCall[];
  private service: MemoryCoordinationService;
  private state: SessionState;
  private failures: Map<MemoryOperation, InjectedFailure[]>;

  constructor(service: MemoryCoordinationService, sessionId: string) {
    this.service = service;
    this.sessionId = sessionId;
    this.calls = [];
    this.state = 'CONNECTED';
    this.failures = new Map();
  }

  getState(): SessionState {
    return this.state;
  }

  /** Simulates a connection-level state change such as `DISCONNECTED` or `AUTH_FAILED`. */
  setState(state: SessionState): this {
    if (this.state === 'CLOSED') {
      return this;
    }
    if (state === 'CLOSED') {
      this.close();
      return this;
    }
    this.state = state;
    return this;
  }

  /** Queues a failure for the next call of `operation`. Calls stack in FIFO order. */
  failNext(operation: MemoryOperation, code: FailureCode, options: { applied?: boolean } = {}): this {
    const queue = this.failures.get(operation) ?? [];
    queue.push({ code, applied: options.applied });
    this.failures.set(operation, queue);
    return this;
  }

  callsOf(operation: MemoryOperation): RecordedCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  create(path: string, data: Uint8Array, _acl: readonly AclEntry[], mode: CreateMode): Promise<CreateResult> {
    return this._execute('create', path, () => this.service.createNode(this.sessionId, path, data, mode));
  }

  getData(path: string): Promise<ReadResult> {
    return this._execute('getData', path, () => this.service.readNode(path));
  }

  exists(path: string, watcher: Watcher): Promise<ExistsResult> {
    return this._execute('exists', path, () => this.service.statNode(this.sessionId, path, watcher));
  }

  delete(path: string): Promise<{ code: 'OK' } | FailureResult> {
    return this._execute('delete', path, () => this.service.deleteNode(path));
  }

  setData(path: string, data: Uint8Array): Promise<ExistsResult> {
    return this._execute('setData', path, () => this.service.setNodeData(path, data));
  }

  /** Closes the session; its ephemeral nodes are removed. */
  close(): void {
    if (this.state === 'CLOSED') {
      return;
    }
    this.service.expireSession(this.sessionId);
    this.state = 'CLOSED';
  }

  /** @internal called by the service when the session ends server-side */
  markClosed(): void {
    this.state = 'CLOSED';
  }

  private _execute<R>(operation: MemoryOperation, path: string, apply: () => R | FailureResult): Promise<R | FailureResult> {
    this.calls.push({ operation, path });

    let result: R | FailureResult;
    const unavailable = this._unavailableCode();
    const injected = unavailable ? undefined : this.failures.get(operation)?.shift();

    if (unavailable) {
      result = { code: unavailable };
    } else if (injected) {
      if (injected.applied) {
        apply();
      }
      result = { code: injected.code };
    } else {
      result = apply();
    }

    return new Promise((resolve) => {
      setImmediate(() => resolve(result));
    });
  }

  private _unavailableCode(): FailureCode | null {
    switch (this.state) {
      case 'CONNECTED':
      case 'CONNECTED_READ_ONLY':
        return null;
      case 'AUTH_FAILED':
        return 'AUTH_FAILED';
      case 'EXPIRED':
      case 'CLOSED':
        return 'SESSION_EXPIRED';
      default:
        return 'CONNECTION_LOSS';
    }
  }
}
