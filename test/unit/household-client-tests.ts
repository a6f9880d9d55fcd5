import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { HouseholdClient } from '../../src/household-client.js';
import { CATEGORY_EVENT_PATHS } from '../../src/types/household.js';
import { CommandError } from '../../src/errors/household-errors.js';
import type { GroupEvent } from '../../src/topology/snapshot-diff.js';
import { FakeClock, flush } from '../helpers/fake-clock.js';
import { FakeCommandTransport, FakeDiscoverySocket, FakeSubscriptionTransport, locationFor } from '../helpers/fakes.js';
import { presenceNotify, searchResponse, topologyEvent } from '../helpers/payloads.js';

const A = 'RINCON_A';
const B = 'RINCON_B';
const C = 'RINCON_C';

const ROOMS: Record<string, string> = {
  [locationFor('192.168.1.10')]: 'Kitchen',
  [locationFor('192.168.1.11')]: 'Bath'
};

describe('HouseholdClient', () => {
  let clock: FakeClock;
  let socket: FakeDiscoverySocket;
  let subscriptions: FakeSubscriptionTransport;
  let commands: FakeCommandTransport;
  let client: HouseholdClient;

  const discover = async (id: string, host: string): Promise<void> => {
    socket.deliver(searchResponse(id, locationFor(host)));
    await flush();
  };

  // A and B both discovered, A's topology subscription is uuid:sub-1
  const mergeKitchenAndBath = async (): Promise<void> => {
    await discover(A, '192.168.1.10');
    await discover(B, '192.168.1.11');
    client.sink.accept({
      sid: 'uuid:sub-1',
      seq: 0,
      body: topologyEvent([{ coordinator: A, members: [{ id: A, room: 'Kitchen' }, { id: B, room: 'Bath' }] }])
    });
    await client.sink.idle();
  };

  beforeEach(async () => {
    clock = new FakeClock();
    socket = new FakeDiscoverySocket();
    subscriptions = new FakeSubscriptionTransport();
    commands = new FakeCommandTransport();
    client = new HouseholdClient({
      clock,
      socket,
      subscriptionTransport: subscriptions,
      commandTransport: commands,
      describe: async (location) => ({ roomName: ROOMS[location] }),
      config: { callback: { host: '127.0.0.1', port: 0 } }
    });
    client.subscriptions.setCallbackUrl('http://127.0.0.1:3500/notify');
    await client.startBackgroundDiscovery();
  });

  afterEach(async () => {
    await client.shutdown();
  });

  describe('discovery', () => {
    it('should subscribe every category of a found device', async () => {
      await discover(A, '192.168.1.10');

      const calls = subscriptions.callsOf('subscribe', A);
      assert.deepStrictEqual(calls.map(c => c.eventPath), [
        CATEGORY_EVENT_PATHS.topology,
        CATEGORY_EVENT_PATHS.transport,
        CATEGORY_EVENT_PATHS.rendering
      ]);
      assert(calls.every(c => c.callbackUrl === 'http://127.0.0.1:3500/notify'));
      assert.strictEqual(client.subscriptions.getState(A, 'topology'), 'ACTIVE');
    });

    it('should publish the new device as its own group', async () => {
      await discover(A, '192.168.1.10');

      const snapshot = client.getSnapshot();
      assert.strictEqual(snapshot.version, 1);
      assert.deepStrictEqual([...snapshot.groups.keys()], ['RINCON_A:group']);
      assert.strictEqual(snapshot.groups.get('RINCON_A:group')?.name, 'Kitchen');
    });

    it('should keep notifying listeners after one of them throws', async () => {
      const versions: number[] = [];
      client.subscribeToChanges(() => {
        throw new Error('listener failed');
      });
      client.onTopologyChange((snapshot) => versions.push(snapshot.version));

      await discover(A, '192.168.1.10');
      await discover(B, '192.168.1.11');

      assert.deepStrictEqual(versions, [1, 2]);
    });
  });

  describe('notifications', () => {
    it('should merge groups from a topology event', async () => {
      await mergeKitchenAndBath();

      const snapshot = client.getSnapshot();
      assert.deepStrictEqual([...snapshot.groups.keys()], ['RINCON_A:group']);
      assert.deepStrictEqual(snapshot.groups.get('RINCON_A:group')?.memberIds, [A, B]);
      assert.strictEqual(snapshot.groups.get('RINCON_A:group')?.name, 'Kitchen + Bath');
      assert.deepStrictEqual(client.getStats(), {
        devices: 2,
        groups: 1,
        snapshotVersion: 3,
        callback: { received: 1, dispatched: 1, dropped: 0, failed: 0 },
        decoder: { decoded: 1, ignored: 0, errors: 0 }
      });
    });

    it('should drop notifications for unknown subscriptions', () => {
      assert.strictEqual(client.sink.accept({ sid: 'uuid:unknown', body: '' }), 'unknown-subscription');
    });

    it('should register members that only appear in topology', async () => {
      await discover(A, '192.168.1.10');

      client.sink.accept({
        sid: 'uuid:sub-1',
        seq: 0,
        body: topologyEvent([{
          coordinator: A,
          members: [
            { id: A, room: 'Kitchen' },
            { id: C, room: 'Den', location: locationFor('192.168.1.12') },
            { id: 'RINCON_D', room: 'Garage' }
          ]
        }])
      });
      await client.sink.idle();

      assert.strictEqual(client.registry.get(C)?.roomName, 'Den');
      assert.strictEqual(client.registry.get(C)?.host, '192.168.1.12');
      assert.strictEqual(client.registry.has('RINCON_D'), false);
      assert.strictEqual(subscriptions.callsOf('subscribe', C).length, 3);
      assert.deepStrictEqual(client.getSnapshot().groups.get('RINCON_A:group')?.memberIds, [A, C]);
      assert.strictEqual(client.getSnapshot().groups.get('RINCON_A:group')?.name, 'Kitchen + Den');
    });
  });

  describe('failures local to one device', () => {
    it('should keep routing events from a device that went unreachable', async () => {
      await discover(A, '192.168.1.10');
      await discover(B, '192.168.1.11');
      socket.deliver(presenceNotify(A, 'ssdp:byebye'));
      await flush();
      assert.strictEqual(client.registry.get(A)?.reachable, false);

      const result = client.sink.accept({
        sid: 'uuid:sub-1',
        seq: 0,
        body: topologyEvent([{ coordinator: A, members: [{ id: A, room: 'Kitchen' }, { id: B, room: 'Bath' }] }])
      });
      await client.sink.idle();

      assert.strictEqual(result, 'accepted');
      assert.strictEqual(client.subscriptions.getState(A, 'topology'), 'ACTIVE');
      assert.deepStrictEqual(client.getSnapshot().groups.get('RINCON_A:group')?.memberIds, [A, B]);
    });

    it('should not resubscribe a device that comes back', async () => {
      await discover(A, '192.168.1.10');
      socket.deliver(presenceNotify(A, 'ssdp:byebye'));
      await flush();

      socket.deliver(presenceNotify(A, 'ssdp:alive', locationFor('192.168.1.10')));
      await flush();

      assert.strictEqual(client.registry.get(A)?.reachable, true);
      assert.strictEqual(subscriptions.callsOf('subscribe', A).length, 3);
    });

    it('should apply the other claims when one member has a malformed location', async () => {
      await discover(A, '192.168.1.10');
      await discover(B, '192.168.1.11');

      client.sink.accept({
        sid: 'uuid:sub-1',
        seq: 0,
        body: topologyEvent([{
          coordinator: A,
          members: [
            { id: A, room: 'Kitchen' },
            { id: B, room: 'Bath' },
            { id: C, room: 'Den', location: 'not a url' }
          ]
        }])
      });
      await client.sink.idle();

      assert.strictEqual(client.registry.has(C), false);
      assert.deepStrictEqual(client.getSnapshot().groups.get('RINCON_A:group')?.memberIds, [A, B]);
      assert.deepStrictEqual(client.sink.getStats(), { received: 1, dispatched: 1, dropped: 0, failed: 0 });
    });

    it('should keep publishing while another device is degraded', async () => {
      subscriptions.silentDevices.add(B);
      await discover(A, '192.168.1.10');
      await discover(B, '192.168.1.11');

      // Three subscribe timeouts of 5s with 1s and 2s backoff in between
      await clock.advance(18_000);
      assert.deepStrictEqual(
        client.getDegradedSubscriptions().map(ref => [ref.deviceId, ref.category]),
        [[B, 'topology'], [B, 'transport'], [B, 'rendering']]
      );

      client.sink.accept({
        sid: 'uuid:sub-1',
        seq: 0,
        body: topologyEvent([{ coordinator: A, members: [{ id: A, room: 'Kitchen' }, { id: B, room: 'Bath' }] }])
      });
      await client.sink.idle();

      const snapshot = client.getSnapshot();
      assert.strictEqual(snapshot.version, 3);
      assert.deepStrictEqual([...snapshot.groups.keys()], ['RINCON_A:group']);
      assert.deepStrictEqual(snapshot.groups.get('RINCON_A:group')?.memberIds, [A, B]);
    });
  });

  describe('group events', () => {
    it('should filter by event type and group id', async () => {
      await discover(A, '192.168.1.10');
      await discover(B, '192.168.1.11');
      const updated: GroupEvent[] = [];
      const forBath: GroupEvent[] = [];
      client.onGroupEvent((event) => updated.push(event), { events: ['group-updated'] });
      client.onGroupEvent((event) => forBath.push(event), { groupIds: ['RINCON_B:group'] });

      client.sink.accept({
        sid: 'uuid:sub-1',
        seq: 0,
        body: topologyEvent([{ coordinator: A, members: [{ id: A, room: 'Kitchen' }, { id: B, room: 'Bath' }] }])
      });
      await client.sink.idle();

      assert.deepStrictEqual(updated.map(e => [e.type, e.groupId, e.group?.memberIds]), [
        ['group-updated', 'RINCON_A:group', [A, B]]
      ]);
      assert.deepStrictEqual(forBath.map(e => [e.type, e.groupId, e.version]), [
        ['group-removed', 'RINCON_B:group', 3]
      ]);
    });

    it('should stop delivering after unsubscribe', async () => {
      const events: GroupEvent[] = [];
      const unsubscribe = client.onGroupEvent((event) => events.push(event));

      await discover(A, '192.168.1.10');
      unsubscribe();
      await discover(B, '192.168.1.11');

      assert.deepStrictEqual(events.map(e => [e.type, e.groupId]), [['group-added', 'RINCON_A:group']]);
    });
  });

  describe('commands', () => {
    it('should send actions to a reachable device', async () => {
      await discover(A, '192.168.1.10');
      commands.result = { CurrentVolume: '30' };

      const result = await client.sendCommand(A, 'RenderingControl.GetVolume', { Channel: 'Master' });

      assert.deepStrictEqual(result, { CurrentVolume: '30' });
      assert.deepStrictEqual(commands.calls, [
        { deviceId: A, action: 'RenderingControl.GetVolume', args: { Channel: 'Master' } }
      ]);
    });

    it('should reject unknown devices', async () => {
      await assert.rejects(client.sendCommand('RINCON_X', 'AVTransport.Play'), {
        name: 'DeviceNotFoundError',
        code: 'DEVICE_NOT_FOUND'
      });
      assert.strictEqual(commands.calls.length, 0);
    });

    it('should reject unreachable devices', async () => {
      await discover(A, '192.168.1.10');
      socket.deliver(presenceNotify(A, 'ssdp:byebye'));
      await flush();

      await assert.rejects(client.sendCommand(A, 'AVTransport.Play'), {
        name: 'CommandError',
        code: 'DEVICE_UNREACHABLE'
      });
    });

    it('should wrap transport failures', async () => {
      await discover(A, '192.168.1.10');
      const failure = new Error('socket hang up');
      commands.failWith = failure;

      await assert.rejects(
        client.sendCommand(A, 'AVTransport.Pause'),
        (error: unknown) => error instanceof CommandError &&
          error.code === 'COMMAND_FAILED' &&
          error.message === 'AVTransport.Pause failed on RINCON_A: socket hang up' &&
          error.cause === failure
      );
    });

    it('should route group commands to the coordinator', async () => {
      await mergeKitchenAndBath();

      await client.sendGroupCommand('RINCON_A:group', 'AVTransport.Play', { Speed: 1 });

      assert.deepStrictEqual(commands.calls.map(c => c.deviceId), [A]);
      await assert.rejects(client.sendGroupCommand('RINCON_B:group', 'AVTransport.Play'), {
        name: 'CommandError',
        code: 'GROUP_NOT_FOUND'
      });
    });
  });

  describe('forgetDevice', () => {
    it('should remove an unreachable device at once', async () => {
      await discover(A, '192.168.1.10');
      await discover(B, '192.168.1.11');
      socket.deliver(presenceNotify(B, 'ssdp:byebye'));
      await flush();
      assert(client.getSnapshot().groups.has('RINCON_B:group'));

      assert.strictEqual(await client.forgetDevice(B), true);

      const snapshot = client.getSnapshot();
      assert.strictEqual(client.registry.has(B), false);
      assert.strictEqual(snapshot.devices.has(B), false);
      assert.deepStrictEqual([...snapshot.groups.keys()], ['RINCON_A:group']);
      assert.strictEqual(subscriptions.callsOf('unsubscribe', B).length, 0);
      assert.strictEqual(client.subscriptions.getState(B, 'topology'), 'UNSUBSCRIBED');
    });

    it('should refuse reachable and unknown devices', async () => {
      await discover(A, '192.168.1.10');

      assert.strictEqual(await client.forgetDevice(A), false);
      assert.strictEqual(await client.forgetDevice('RINCON_X'), false);
      assert.strictEqual(client.registry.has(A), true);
    });
  });

  describe('shutdown', () => {
    it('should unsubscribe and leaves no timers behind', async () => {
      await discover(A, '192.168.1.10');
      await discover(B, '192.168.1.11');

      await client.shutdown();

      assert.strictEqual(subscriptions.callsOf('unsubscribe').length, 6);
      assert.strictEqual(socket.closed, true);
      assert.strictEqual(clock.pendingTimers(), 0);
      assert.deepStrictEqual(client.subscriptions.list(), []);
    });
  });
});
