import { describe, it, expect, afterEach, vi } from 'vitest';
import { LeaderElection } from '../../src/election.class.js';
import type { CreateResult, ExistsResult, ReadResult, Watcher } from '../../src/clients/types.js';
import { STAT, bytes, createRecorder, createStubClient, flushMicrotasks } from '../utils/election-helpers.js';

function never<T>(): Promise<T> {
  return new Promise<T>(() => {});
}

function nextMacrotask(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

describe('LeaderElection - driver events', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('client failures', () => {
    it('should treat a rejected create as an unclassified failure and read the node', async () => {
      const client = createStubClient();
      client.create.mockRejectedValue(new Error('socket closed'));
      client.getData.mockResolvedValue({ code: 'OK', data: bytes('candidate-a'), stat: STAT });
      client.exists.mockReturnValue(never<ExistsResult>());

      const election = new LeaderElection({ client, id: 'candidate-a', logLevel: 'silent' }).start();

      await vi.waitFor(() => expect(election.getState()).toBe('LEADER'));
      expect(client.create).toHaveBeenCalledTimes(1);
      expect(client.getData).toHaveBeenCalledWith('/leader');
      expect(client.exists).toHaveBeenCalledTimes(1);
    });

    it('should treat a synchronous throw like a rejection', async () => {
      const client = createStubClient();
      client.getData.mockResolvedValue({ code: 'NO_NODE' });
      client.create.mockImplementationOnce(() => {
        throw new Error('not connected');
      });
      client.create.mockResolvedValueOnce({ code: 'OK', path: '/leader' });
      client.exists.mockReturnValue(never<ExistsResult>());

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();

      await vi.waitFor(() => expect(election.getState()).toBe('LEADER'));
      expect(client.create).toHaveBeenCalledTimes(2);
      expect(client.getData).toHaveBeenCalledTimes(1);
    });

    it('should not treat an expired session as final', async () => {
      const client = createStubClient();
      client.getState.mockReturnValue('EXPIRED');
      client.create.mockResolvedValue({ code: 'SESSION_EXPIRED' });
      client.getData.mockResolvedValueOnce({ code: 'SESSION_EXPIRED' });
      client.getData.mockReturnValue(never<ReadResult>());

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();

      await vi.waitFor(() => expect(client.getData).toHaveBeenCalledTimes(2));
      expect(election.getState()).toBe('ELECTING');
      expect(election.getMetrics().retries).toBe(2);
    });

    it('should stop at the next call once the session reports CLOSED', async () => {
      const client = createStubClient();
      client.create.mockResolvedValue({ code: 'CONNECTION_LOSS' });
      client.getData.mockReturnValue(never<ReadResult>());
      const recorder = createRecorder();

      const election = new LeaderElection({ client, listener: recorder.listener, logLevel: 'silent' }).start();
      client.getState.mockReturnValue('CLOSED');

      await vi.waitFor(() => expect(election.getState()).toBe('DONE'));
      expect(client.getData).not.toHaveBeenCalled();
      expect(recorder.events).toEqual(['state:CREATED->ELECTING', 'state:ELECTING->DONE', 'finish']);
    });
  });

  describe('event routing', () => {
    it('should ignore results carrying an old ticket', () => {
      const client = createStubClient();
      client.create.mockReturnValue(never<CreateResult>());
      client.exists.mockReturnValue(never<ExistsResult>());

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();

      election.handleEvent({ kind: 'claimed', ticket: 0, result: { code: 'OK', path: '/leader' } });
      expect(election.getState()).toBe('ELECTING');
      expect(election.getMetrics().staleEvents).toBe(1);

      election.handleEvent({ kind: 'claimed', ticket: 1, result: { code: 'OK', path: '/leader' } });
      expect(election.getState()).toBe('LEADER');
    });

    it('should ignore a second result for the same call', () => {
      const client = createStubClient();
      client.create.mockReturnValue(never<CreateResult>());
      client.exists.mockReturnValue(never<ExistsResult>());

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();

      election.handleEvent({ kind: 'claimed', ticket: 1, result: { code: 'NODE_EXISTS' } });
      election.handleEvent({ kind: 'claimed', ticket: 1, result: { code: 'OK', path: '/leader' } });

      expect(election.getState()).toBe('FOLLOWER');
      expect(election.getMetrics().staleEvents).toBe(1);
      expect(client.exists).toHaveBeenCalledTimes(1);
    });

    it('should ignore a watch installed by an earlier track', () => {
      const client = createStubClient();
      const watchers: Watcher[] = [];
      client.create.mockReturnValue(never<CreateResult>());
      client.exists.mockImplementation((_path, watcher) => {
        watchers.push(watcher);
        return never<ExistsResult>();
      });

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();
      election.handleEvent({ kind: 'claimed', ticket: 1, result: { code: 'OK', path: '/leader' } });
      expect(watchers).toHaveLength(1);

      const [first] = watchers;
      first?.({ type: 'NODE_DELETED', path: '/leader' });
      expect(election.getState()).toBe('ELECTING');
      expect(client.create).toHaveBeenCalledTimes(2);

      first?.({ type: 'NODE_DELETED', path: '/leader' });
      expect(client.create).toHaveBeenCalledTimes(2);
      expect(election.getMetrics().staleEvents).toBe(1);
    });

    it('should queue events delivered from inside a callback', () => {
      const client = createStubClient();
      client.create.mockReturnValue(never<CreateResult>());
      client.exists.mockReturnValue(never<ExistsResult>());
      const recorder = createRecorder();

      let delivered = false;
      const election = new LeaderElection({
        client,
        listener: {
          ...recorder.listener,
          onWin: (target) => {
            recorder.events.push('win');
            if (!delivered) {
              delivered = true;
              target.handleEvent({ kind: 'watched', ticket: 2, event: { type: 'NODE_DELETED', path: '/leader' } });
            }
          }
        },
        logLevel: 'silent'
      }).start();

      election.handleEvent({ kind: 'claimed', ticket: 1, result: { code: 'OK', path: '/leader' } });

      expect(recorder.events).toEqual([
        'state:CREATED->ELECTING',
        'state:ELECTING->LEADER',
        'win',
        'state:LEADER->ELECTING',
        'vacant'
      ]);
      expect(client.exists).toHaveBeenCalledTimes(1);
      expect(client.create).toHaveBeenCalledTimes(2);
    });

    it('should run again when the track finds no node', () => {
      const client = createStubClient();
      client.create.mockReturnValue(never<CreateResult>());
      client.exists.mockReturnValue(never<ExistsResult>());

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();
      election.handleEvent({ kind: 'claimed', ticket: 1, result: { code: 'NODE_EXISTS' } });
      election.handleEvent({ kind: 'tracked', ticket: 2, result: { code: 'NO_NODE' } });

      expect(election.getState()).toBe('ELECTING');
      expect(client.create).toHaveBeenCalledTimes(2);
      expect(election.getMetrics().vacancies).toBe(1);
    });

    it('should track again when the track fails', async () => {
      const client = createStubClient();
      client.create.mockReturnValue(never<CreateResult>());
      client.exists.mockReturnValue(never<ExistsResult>());

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();
      election.handleEvent({ kind: 'claimed', ticket: 1, result: { code: 'NODE_EXISTS' } });
      election.handleEvent({ kind: 'tracked', ticket: 2, result: { code: 'CONNECTION_LOSS' } });

      await vi.waitFor(() => expect(client.exists).toHaveBeenCalledTimes(2));
      expect(election.getState()).toBe('FOLLOWER');
      expect(client.create).toHaveBeenCalledTimes(1);
    });
  });

  describe('immediate retries', () => {
    it('should defer each retry to a later macrotask', async () => {
      const client = createStubClient();
      client.create.mockResolvedValue({ code: 'CONNECTION_LOSS' });
      client.getData.mockResolvedValue({ code: 'CONNECTION_LOSS' });
      const recorder = createRecorder();

      const election = new LeaderElection({ client, listener: recorder.listener, logLevel: 'silent' }).start();
      await flushMicrotasks();

      expect(client.getData).not.toHaveBeenCalled();

      await nextMacrotask();
      expect(client.getData).toHaveBeenCalledTimes(1);

      election.finish();
      await nextMacrotask();

      expect(election.getState()).toBe('DONE');
      expect(client.getData).toHaveBeenCalledTimes(1);
      expect(recorder.events).toEqual(['state:CREATED->ELECTING', 'state:ELECTING->DONE', 'finish']);
    });

    it('should let a timer call finish() while every call fails at once', async () => {
      const client = createStubClient();
      client.create.mockResolvedValue({ code: 'CONNECTION_LOSS' });
      client.getData.mockResolvedValue({ code: 'CONNECTION_LOSS' });

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();
      setTimeout(() => election.finish(), 0);

      await vi.waitFor(() => expect(election.getState()).toBe('DONE'));

      const reads = client.getData.mock.calls.length;
      await nextMacrotask();
      await nextMacrotask();

      expect(client.getData).toHaveBeenCalledTimes(reads);
    });

    it('should drop a pending retry once a newer call was issued', async () => {
      const client = createStubClient();
      client.create.mockReturnValue(never<CreateResult>());
      client.exists.mockReturnValue(never<ExistsResult>());

      const election = new LeaderElection({ client, logLevel: 'silent' }).start();
      election.handleEvent({ kind: 'claimed', ticket: 1, result: { code: 'NODE_EXISTS' } });
      election.handleEvent({ kind: 'tracked', ticket: 2, result: { code: 'CONNECTION_LOSS' } });
      election.handleEvent({ kind: 'watched', ticket: 2, event: { type: 'NODE_DELETED', path: '/leader' } });

      await nextMacrotask();

      expect(client.create).toHaveBeenCalledTimes(2);
      expect(client.exists).toHaveBeenCalledTimes(1);
      expect(election.getState()).toBe('ELECTING');
    });
  });

  describe('retry backoff', () => {
    it('should wait exponentially longer between consecutive failures', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });

      const client = createStubClient();
      client.create
        .mockResolvedValueOnce({ code: 'CONNECTION_LOSS' })
        .mockResolvedValueOnce({ code: 'OK', path: '/leader' });
      client.getData
        .mockResolvedValueOnce({ code: 'CONNECTION_LOSS' })
        .mockResolvedValueOnce({ code: 'NO_NODE' });
      client.exists.mockReturnValue(never<ExistsResult>());

      const election = new LeaderElection({
        client,
        retry: { baseDelayMs: 100, maxDelayMs: 1000 },
        logLevel: 'silent'
      }).start();
      await flushMicrotasks();

      vi.advanceTimersByTime(99);
      expect(client.getData).not.toHaveBeenCalled();

      vi.advanceTimersByTime(1);
      expect(client.getData).toHaveBeenCalledTimes(1);
      await flushMicrotasks();

      vi.advanceTimersByTime(199);
      expect(client.getData).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(1);
      expect(client.getData).toHaveBeenCalledTimes(2);
      await flushMicrotasks();

      expect(election.getState()).toBe('LEADER');
      expect(client.create).toHaveBeenCalledTimes(2);
      expect(election.getMetrics().retries).toBe(2);
    });

    it('should finish instead of retrying when finish() lands during the delay', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });

      const client = createStubClient();
      client.create.mockResolvedValue({ code: 'CONNECTION_LOSS' });
      const recorder = createRecorder();

      const election = new LeaderElection({
        client,
        listener: recorder.listener,
        retry: { baseDelayMs: 100 },
        logLevel: 'silent'
      }).start();
      await flushMicrotasks();

      election.finish();
      vi.advanceTimersByTime(100);

      expect(election.getState()).toBe('DONE');
      expect(client.getData).not.toHaveBeenCalled();
      expect(recorder.events).toEqual(['state:CREATED->ELECTING', 'state:ELECTING->DONE', 'finish']);
    });
  });
});
