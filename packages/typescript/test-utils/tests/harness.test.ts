/**
 * Tests for ClientHarness
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CoordinationClient,
  DEFAULT_SESSION_TIMEOUT_MS,
  connectedEvent,
  createStat,
  type NodeData,
} from '@ensemble/client';
import { HarnessErrorCode } from '../src/errors.js';
import { ClientHarness, HARNESS_CONNECT_STRING, withClient, withClientAndNamespace } from '../src/harness.js';
import { bytes } from '../src/matchers.js';
import { MockConnection } from '../src/mock-connection.js';

describe('ClientHarness', () => {
  describe('a run', () => {
    it('should hand the callback a client that reads through the connection', async () => {
      const harness = new ClientHarness();
      const stat = createStat({ version: 1 });
      let observed: NodeData | undefined;

      await harness.run(['client', 'connection'], async (client, connection) => {
        expect(client).toBeInstanceOf(CoordinationClient);
        expect(connection).toBe(harness.connection);
        connection.on('get', '/a').returns({ data: bytes('v'), stat }).once();

        observed = await client.getData('/a');
      });

      expect(observed).toEqual({ data: bytes('v'), stat });
      expect(harness.connection.getCallsForMethod('close')).toHaveLength(1);
      expect(harness.state).toBe('torn-down');
    });

    it('should dial once with the configured parameters', async () => {
      const harness = new ClientHarness();
      await harness.run([], () => {});

      expect(harness.dialer.callLog.map(entry => entry.args)).toEqual([
        [HARNESS_CONNECT_STRING, DEFAULT_SESSION_TIMEOUT_MS, false],
      ]);
    });

    it('should dial read-only sessions when configured to', async () => {
      const harness = new ClientHarness({ canBeReadOnly: true });
      await harness.run([], () => {});

      expect(harness.dialer.callLog.map(entry => entry.args)).toEqual([['connectString', 60000, true]]);
    });

    it('should dial, then close, then close the event channel', async () => {
      const harness = new ClientHarness();
      const dial = vi.spyOn(harness.dialer, 'dial');
      const close = vi.spyOn(harness.connection, 'close');
      const closeEvents = vi.spyOn(harness.events, 'close');

      await harness.run([], () => {});

      expect(dial).toHaveBeenCalledTimes(1);
      expect(close).toHaveBeenCalledTimes(1);
      expect(closeEvents).toHaveBeenCalledTimes(1);
      expect(dial.mock.invocationCallOrder[0]).toBeLessThan(close.mock.invocationCallOrder[0] ?? 0);
      expect(close.mock.invocationCallOrder[0]).toBeLessThan(closeEvents.mock.invocationCallOrder[0] ?? 0);
      expect(harness.events.closed).toBe(true);
    });

    it('should resolve dependencies in the order asked for', async () => {
      const harness = new ClientHarness();

      await harness.run(
        ['events', 'dialer', 'builder', 'compression', 'done'],
        (events, dialer, builder, compression, done) => {
          expect(events).toBe(harness.events);
          expect(dialer).toBe(harness.dialer);
          expect(builder).toBe(harness.builder);
          expect(compression).toBe(harness.compression);
          done.done();
        }
      );
    });

    it('should pass the whole dependency bag to a single-argument callback', async () => {
      const harness = new ClientHarness();

      await harness.run(async ({ client, connection, done }) => {
        expect(client).toBe(harness.client);
        expect(done.pending).toBe(0);
        connection.on('sync', '/a').returns('/a').once();
        await client.sync('/a');
      });
    });

    it('should deliver session events to the client', async () => {
      await new ClientHarness().run(['client', 'events'], async (client, events) => {
        await events.send(connectedEvent());
        await vi.waitFor(() => expect(client.connectionState).toBe('connected'));
      });
    });
  });

  describe('background work', () => {
    it('should wait for the completion signal before closing', async () => {
      const harness = new ClientHarness();
      const close = vi.spyOn(harness.connection, 'close');
      const read = vi.fn<(children: string[]) => void>();

      await harness.run(['client', 'connection', 'done'], (client, connection, done) => {
        connection.on('children', '/jobs').returns({ children: ['a', 'b', 'c'] }).once();

        setTimeout(() => {
          void (async () => {
            try {
              read(await client.getChildren('/jobs'));
            } finally {
              done.done();
            }
          })();
        }, 5);
      });

      expect(read).toHaveBeenCalledWith(['a', 'b', 'c']);
      expect(read.mock.invocationCallOrder[0]).toBeLessThan(close.mock.invocationCallOrder[0] ?? 0);
    });
  });

  describe('failures', () => {
    it('should report an unprogrammed batch after recording its operations', async () => {
      const harness = new ClientHarness();

      const run = harness.run(['client'], async client => {
        await client.inTransaction().create('/a').delete('/b').commit();
      });

      await expect(run).rejects.toMatchObject({ code: HarnessErrorCode.UNPROGRAMMED_CALL });
      expect(harness.connection.operations.map(op => op.type)).toEqual(['create', 'delete']);
      expect(harness.events.closed).toBe(true);
    });

    it('should report a failure the client under test swallowed', async () => {
      const run = new ClientHarness().run(['client'], async client => {
        await client.getData('/missing').catch(() => undefined);
      });

      await expect(run).rejects.toMatchObject({ code: HarnessErrorCode.UNPROGRAMMED_CALL });
    });

    it('should report expectations left unmet', async () => {
      const run = new ClientHarness().run(['connection'], connection => {
        connection.on('sync', '/never').returns('/never').once();
      });

      await expect(run).rejects.toMatchObject({
        code: HarnessErrorCode.UNSATISFIED_EXPECTATION,
        details: ['connection: sync("/never") expected 1 call(s), got 0'],
      });
    });

    it('should fail when the client dials with other parameters', async () => {
      const harness = new ClientHarness();
      harness.builder.sessionTimeoutMs = 5000;
      const callback = vi.fn();

      await expect(harness.run(['client'], callback)).rejects.toMatchObject({
        code: HarnessErrorCode.UNPROGRAMMED_CALL,
        details: [
          'dialer: unexpected call dial("connectString", 5000, false)',
          'dialer: dial("connectString", 60000, false) expected 1 call(s), got 0',
        ],
      });
      expect(callback).not.toHaveBeenCalled();
    });

    it('should reject an unsupported dependency before dialing', async () => {
      const harness = new ClientHarness();
      const callback = vi.fn();

      await expect(harness.execute({ keys: ['client', 'timer'], callback })).rejects.toMatchObject({
        code: HarnessErrorCode.UNSUPPORTED_DEPENDENCY,
        message: expect.stringContaining('unsupported callback dependency "timer"'),
      });
      expect(callback).not.toHaveBeenCalled();
      expect(harness.dialer.callLog).toHaveLength(0);
      expect(harness.client).toBeUndefined();
      expect(harness.state).toBe('torn-down');
    });

    it('should close the session once and rethrow a callback error', async () => {
      const harness = new ClientHarness();

      await expect(
        harness.run([], () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
      expect(harness.dialer.callLog).toHaveLength(1);
      expect(harness.connection.getCallsForMethod('close')).toHaveLength(1);
      expect(harness.client?.state).toBe('stopped');
      expect(harness.events.closed).toBe(true);
      expect(harness.state).toBe('torn-down');
    });

    it('should keep the callback error when closing afterwards crashes', async () => {
      const harness = new ClientHarness();
      harness.connection.crashOnClose = true;

      await expect(
        harness.run([], () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
      expect(harness.events.closed).toBe(true);
    });

    it('should run only once', async () => {
      const harness = new ClientHarness();
      await harness.run([], () => {});

      await expect(harness.run([], () => {})).rejects.toMatchObject({ code: HarnessErrorCode.INVALID_STATE });
    });

    it('should fix the namespace before the client is built', async () => {
      const harness = new ClientHarness();
      await harness.run([], () => {});

      expect(() => harness.withNamespace('app')).toThrow(
        'namespace can only be set before the client is built (harness is torn-down)'
      );
    });

    it('should surface a crashing close', async () => {
      const harness = new ClientHarness();
      harness.connection.crashOnClose = true;

      await expect(harness.run([], () => {})).rejects.toThrow('connection crashed while closing');
      expect(harness.events.closed).toBe(true);
    });
  });

  describe('namespaces', () => {
    it('should build the client inside the namespace', async () => {
      const harness = new ClientHarness().withNamespace('app');

      await harness.run(['client', 'connection'], async (client, connection) => {
        connection.on('exists', '/app/a').returns({ exists: true, stat: createStat({ version: 2 }) }).once();
        expect(client.namespace).toBe('app');
        await expect(client.checkExists('/a')).resolves.toEqual(createStat({ version: 2 }));
      });
    });
  });
});

describe('withClient', () => {
  it('should run against a fresh harness', async () => {
    let seen: MockConnection | undefined;
    await withClient(['connection'], connection => {
      seen = connection;
    });
    expect(seen?.getCallsForMethod('close')).toHaveLength(1);
  });

  it('should accept a bag callback', async () => {
    await withClient(async ({ client, connection }) => {
      connection.on('delete', '/a', -1).once();
      await client.delete('/a');
    });
  });
});

describe('withClientAndNamespace', () => {
  it('should run inside the namespace', async () => {
    await withClientAndNamespace('app', ['client', 'connection'], async (client, connection) => {
      connection.on('sync', '/app/a').returns('/app/a').once();
      await expect(client.sync('/a')).resolves.toBe('/a');
    });
  });
});
