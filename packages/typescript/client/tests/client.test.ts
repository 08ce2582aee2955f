/**
 * Tests for CoordinationClient, run against the session doubles
 */

import { describe, it, expect, vi } from 'vitest';
import {
  ClientHarness,
  MockConnection,
  MockDialer,
  MockRetrySleeper,
  MockTracerDriver,
  anything,
  bytes,
} from '@ensemble/test-utils';
import { ClientBuilder } from '../src/builder.js';
import { EventChannel } from '../src/channel.js';
import { DEFAULT_SESSION_TIMEOUT_MS, type ConnectionState } from '../src/client.js';
import { ClientStateError, ConnectionLossError, NoNodeError, NodeExistsError } from '../src/errors.js';
import { RetryOneTime } from '../src/retry.js';
import {
  CreateMode,
  OPEN_ACL_UNSAFE,
  READ_ACL_UNSAFE,
  connectedEvent,
  createStat,
  disconnectedEvent,
  expiredEvent,
  type SessionEvent,
} from '../src/types.js';

const stat = createStat({ version: 1 });

describe('CoordinationClient', () => {
  describe('lifecycle', () => {
    function createClient() {
      const connection = new MockConnection();
      const events = new EventChannel<SessionEvent>();
      const dialer = new MockDialer();
      dialer.on('dial', 'localhost:2181', DEFAULT_SESSION_TIMEOUT_MS, false).returns({ connection, events }).once();
      const client = new ClientBuilder({ dialer })
        .connectString('localhost:2181')
        .authorization('digest', bytes('user:test-secret'))
        .build();
      return { client, connection, dialer, events };
    }

    it('should refuse operations before start', () => {
      const { client } = createClient();
      expect(() => client.getConnection()).toThrow(new ClientStateError('Client is latent, expected started'));
    });

    it('should dial once and send credentials on start', async () => {
      const { client, connection, dialer } = createClient();
      connection.on('addAuth', 'digest', bytes('user:test-secret')).once();
      connection.on('close').once();

      await client.start();
      expect(client.state).toBe('started');
      expect(client.getConnection()).toBe(connection);

      await client.close();
      expect(client.state).toBe('stopped');
      connection.assertExpectations();
      dialer.assertExpectations();
    });

    it('should not start twice', async () => {
      const { client, connection } = createClient();
      connection.on('addAuth', 'digest', anything());

      await client.start();
      await expect(client.start()).rejects.toThrow(new ClientStateError('Cannot be started more than once'));
    });

    it('should close the session once', async () => {
      const { client, connection } = createClient();
      connection.on('addAuth', 'digest', anything());
      connection.on('close').once();

      await client.start();
      await client.close();
      await client.close();

      expect(connection.getCallsForMethod('close')).toHaveLength(1);
    });

    it('should stop when the dial fails', async () => {
      const dialer = new MockDialer();
      dialer.on('dial', 'localhost:2181', DEFAULT_SESSION_TIMEOUT_MS, false).throws(new ConnectionLossError());
      const client = new ClientBuilder({ dialer }).connectString('localhost:2181').build();

      await expect(client.start()).rejects.toBeInstanceOf(ConnectionLossError);
      expect(client.state).toBe('stopped');
    });
  });

  describe('session events', () => {
    it('should map session events to connection states', async () => {
      await new ClientHarness().run(['client', 'events'], async (client, events) => {
        const states: ConnectionState[] = [];
        const seen: SessionEvent[] = [];
        client.onConnectionStateChange(state => states.push(state));
        client.onSessionEvent(event => seen.push(event));

        await events.send(connectedEvent());
        await events.send(disconnectedEvent());
        await events.send(expiredEvent());

        await vi.waitFor(() => expect(states).toEqual(['connected', 'suspended', 'lost']));
        expect(seen).toHaveLength(3);
        expect(client.connectionState).toBe('lost');
      });
    });

    it('should stop notifying unsubscribed listeners', async () => {
      await new ClientHarness().run(['client', 'events'], async (client, events) => {
        const listener = vi.fn();
        const unsubscribe = client.onSessionEvent(listener);
        const probe = vi.fn();
        client.onSessionEvent(probe);

        unsubscribe();
        await events.send(connectedEvent());

        await vi.waitFor(() => expect(probe).toHaveBeenCalledTimes(1));
        expect(listener).not.toHaveBeenCalled();
      });
    });
  });

  describe('operations', () => {
    it('should read data', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection.on('get', '/a').returns({ data: bytes('v'), stat }).once();

        await expect(client.getData('/a')).resolves.toEqual({ data: bytes('v'), stat });
      });
    });

    it('should create with the default payload and ACL', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection
          .on('create', '/node', bytes('default'), CreateMode.PERSISTENT, [...OPEN_ACL_UNSAFE])
          .returns('/node')
          .once();

        await expect(client.create('/node')).resolves.toBe('/node');
      });
    });

    it('should pass explicit create options through', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection
          .on('create', '/lock-', bytes('me'), CreateMode.EPHEMERAL_SEQUENTIAL, [...READ_ACL_UNSAFE])
          .returns('/lock-0000000001')
          .once();

        const created = await client.create('/lock-', {
          data: bytes('me'),
          mode: CreateMode.EPHEMERAL_SEQUENTIAL,
          acl: [...READ_ACL_UNSAFE],
        });
        expect(created).toBe('/lock-0000000001');
      });
    });

    it('should create missing parents when asked', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection.on('create', '/a/b', anything(), CreateMode.PERSISTENT, anything()).throws(new NoNodeError('/a/b')).once();
        connection.on('create', '/a/b', anything(), CreateMode.PERSISTENT, anything()).returns('/a/b').once();
        connection.on('exists', '/a').returns({ exists: false }).once();
        connection.on('create', '/a', bytes(''), CreateMode.PERSISTENT, anything()).returns('/a').once();

        await expect(client.create('/a/b', { creatingParentsIfNeeded: true })).resolves.toBe('/a/b');
        expect(connection.callLog.map(entry => `${entry.method} ${String(entry.args[0])}`)).toEqual([
          'create /a/b',
          'exists /a',
          'create /a',
          'create /a/b',
        ]);
      });
    });

    it('should surface simulated service errors unchanged', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection.on('create', '/a', anything(), anything(), anything()).throws(new NodeExistsError('/a')).once();

        await expect(client.create('/a')).rejects.toThrow(new NodeExistsError('/a'));
      });
    });

    it('should compress and decompress payloads through the provider', async () => {
      await new ClientHarness().run(
        ['client', 'connection', 'compression'],
        async (client, connection, compression) => {
          compression.on('compress', '/c', bytes('raw')).returns(bytes('packed')).once();
          compression.on('decompress', '/c', bytes('packed')).returns(bytes('raw')).once();
          connection.on('create', '/c', bytes('packed'), CreateMode.PERSISTENT, anything()).returns('/c').once();
          connection.on('get', '/c').returns({ data: bytes('packed'), stat }).once();

          await client.create('/c', { data: bytes('raw'), compressed: true });
          await expect(client.getData('/c', { decompressed: true })).resolves.toEqual({ data: bytes('raw'), stat });
        }
      );
    });

    it('should report existence', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection.on('exists', '/yes').returns({ exists: true, stat }).once();
        connection.on('exists', '/no').returns({ exists: false }).once();

        await expect(client.checkExists('/yes')).resolves.toEqual(stat);
        await expect(client.checkExists('/no')).resolves.toBeUndefined();
      });
    });

    it('should hand back the watch armed by a watched read', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        const watch = new EventChannel<SessionEvent>();
        connection.on('getW', '/w').returns({ data: bytes('v'), watch }).once();
        connection.on('childrenW', '/w').returns({ children: ['x'], watch }).once();
        connection.on('existsW', '/w').returns({ exists: true, stat, watch }).once();

        expect((await client.watchData('/w')).watch).toBe(watch);
        expect(await client.watchChildren('/w')).toEqual({ children: ['x'], watch });
        expect(await client.watchExists('/w')).toEqual({ stat, watch });
      });
    });

    it('should write data at any version by default', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection.on('set', '/a', bytes('x'), -1).returns(stat).once();
        connection.on('set', '/a', bytes('y'), 1).returns(createStat({ version: 2 })).once();

        await expect(client.setData('/a', bytes('x'))).resolves.toEqual(stat);
        await expect(client.setData('/a', bytes('y'), { version: 1 })).resolves.toEqual(createStat({ version: 2 }));
      });
    });

    it('should list children, manage ACLs, delete and sync', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection.on('children', '/jobs').returns({ children: ['a', 'b'] }).once();
        connection.on('getAcl', '/jobs').returns({ acl: [...OPEN_ACL_UNSAFE], stat }).once();
        connection.on('setAcl', '/jobs', [...READ_ACL_UNSAFE], -1).returns(stat).once();
        connection.on('delete', '/jobs/a', 3).once();
        connection.on('sync', '/jobs').returns('/jobs').once();

        await expect(client.getChildren('/jobs')).resolves.toEqual(['a', 'b']);
        await expect(client.getAcl('/jobs')).resolves.toEqual({ acl: [...OPEN_ACL_UNSAFE], stat });
        await expect(client.setAcl('/jobs', [...READ_ACL_UNSAFE])).resolves.toEqual(stat);
        await client.delete('/jobs/a', { version: 3 });
        await expect(client.sync('/jobs')).resolves.toBe('/jobs');
      });
    });

    it('should retry a connection loss under the retry policy', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        connection.on('get', '/r').throws(new ConnectionLossError('/r')).once();
        connection.on('get', '/r').returns({ data: bytes('ok') }).once();

        await expect(client.getData('/r')).resolves.toEqual({ data: bytes('ok') });
      });
    });

    it('should trace every operation and sleep through the sleeper between retries', async () => {
      const harness = new ClientHarness();
      const tracer = new MockTracerDriver();
      const sleeper = new MockRetrySleeper();
      harness.builder.tracer = tracer;
      harness.builder.retrySleeper = sleeper;
      harness.builder.retryPolicy = new RetryOneTime(10);
      tracer.on('addCount', 'retries-allowed', 1).once();
      tracer.on('addTime', 'get-data', anything()).once();
      tracer.on('addCount', 'get-data', 1).once();
      sleeper.on('sleepFor', 10).once();

      await harness.run(['client', 'connection'], async (client, connection) => {
        connection.on('get', '/r').throws(new ConnectionLossError('/r')).once();
        connection.on('get', '/r').returns({ data: bytes('ok') }).once();

        await expect(client.getData('/r')).resolves.toEqual({ data: bytes('ok') });
      });

      tracer.assertExpectations();
      sleeper.assertExpectations();
      expect(tracer.callLog.map(entry => [entry.method, entry.args[0]])).toEqual([
        ['addCount', 'retries-allowed'],
        ['addTime', 'get-data'],
        ['addCount', 'get-data'],
      ]);
    });

    it('should reject invalid paths before reaching the session', async () => {
      await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
        await expect(client.getData('relative')).rejects.toThrow('Invalid path "relative": path must start with /');
        expect(connection.callLog).toHaveLength(0);
      });
    });
  });

  describe('namespaces', () => {
    it('should prefix requests and strip results', async () => {
      await new ClientHarness({ namespace: 'app' }).run(['client', 'connection'], async (client, connection) => {
        connection.on('create', '/app/node', anything(), CreateMode.PERSISTENT, anything()).returns('/app/node').once();
        connection.on('sync', '/app/node').returns('/app/node').once();

        await expect(client.create('/node')).resolves.toBe('/node');
        await expect(client.sync('/node')).resolves.toBe('/node');
      });
    });
  });
});
