import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { SubscriptionManager, type SubscriptionInfo } from '../../src/upnp/subscription-manager.js';
import type { SubscriptionConfig } from '../../src/types/config.js';
import { FakeClock, flush } from '../helpers/fake-clock.js';
import { FakeSubscriptionTransport, makeDevice } from '../helpers/fakes.js';

const CALLBACK_URL = 'http://192.168.1.2:3500/notify';

const config: SubscriptionConfig = {
  timeoutSeconds: 300,
  renewalMarginMs: 30000,
  requestTimeoutMs: 5000,
  maxAttempts: 3,
  initialRetryDelayMs: 1000,
  maxRetryDelayMs: 30000,
  backoffFactor: 2
};

describe('SubscriptionManager', () => {
  let clock: FakeClock;
  let transport: FakeSubscriptionTransport;
  let manager: SubscriptionManager;
  let degraded: SubscriptionInfo[];

  const deviceA = makeDevice({ id: 'RINCON_A' });
  const deviceB = makeDevice({ id: 'RINCON_B', host: '192.168.1.11' });

  beforeEach(() => {
    clock = new FakeClock();
    transport = new FakeSubscriptionTransport();
    manager = new SubscriptionManager({ transport, config, clock, callbackUrl: CALLBACK_URL });
    degraded = [];
    manager.on('degraded', (info) => degraded.push(info));
  });

  afterEach(async () => {
    await manager.shutdown();
  });

  it('should subscribe every category of a device', async () => {
    manager.ensure(deviceA);
    await flush();

    assert.deepStrictEqual(
      transport.callsOf('subscribe').map(c => c.eventPath),
      ['/ZoneGroupTopology/Event', '/MediaRenderer/AVTransport/Event', '/MediaRenderer/RenderingControl/Event']
    );
    assert.strictEqual(transport.calls[0]?.callbackUrl, CALLBACK_URL);
    assert.strictEqual(manager.getState('RINCON_A', 'rendering'), 'ACTIVE');
    assert.deepStrictEqual(manager.lookup('uuid:sub-2'), { deviceId: 'RINCON_A', category: 'transport' });
  });

  it('should coalesce repeated triggers while subscribed', async () => {
    manager.ensure(deviceA);
    manager.ensure(deviceA);
    await flush();
    manager.ensure(deviceA);
    await flush();

    assert.strictEqual(transport.callsOf('subscribe').length, 3);
  });

  it('should renew at half the granted duration', async () => {
    manager.ensure(deviceA);
    await flush();

    await clock.advance(149_999);
    assert.strictEqual(transport.callsOf('renew').length, 0);

    await clock.advance(1);
    assert.deepStrictEqual(transport.callsOf('renew').map(c => c.sid), ['uuid:sub-1', 'uuid:sub-2', 'uuid:sub-3']);
    assert.strictEqual(manager.getState('RINCON_A', 'topology'), 'ACTIVE');
  });

  it('should renew earlier when half the duration would eat into the margin', async () => {
    transport.grantSeconds = 40;
    manager.ensure(deviceA);
    await flush();

    await clock.advance(9_999);
    assert.strictEqual(transport.callsOf('renew').length, 0);

    await clock.advance(1);
    assert.strictEqual(transport.callsOf('renew').length, 3);
  });

  it('should resubscribe when a renewal is refused', async () => {
    manager.ensure(deviceA);
    await flush();
    transport.failRenewals = true;

    await clock.advance(150_000);

    assert.deepStrictEqual(
      transport.callsOf('subscribe').slice(3).map(c => c.eventPath),
      ['/ZoneGroupTopology/Event', '/MediaRenderer/AVTransport/Event', '/MediaRenderer/RenderingControl/Event']
    );
    assert.deepStrictEqual(manager.lookup('uuid:sub-4'), { deviceId: 'RINCON_A', category: 'topology' });
    // The refused sid still routes late events
    assert.deepStrictEqual(manager.lookup('uuid:sub-1'), { deviceId: 'RINCON_A', category: 'topology' });
  });

  it('should back off and degrades a device that keeps failing', async () => {
    transport.failingDevices.add('RINCON_B');
    manager.ensure(deviceA);
    manager.ensure(deviceB);
    await flush();
    assert.strictEqual(transport.callsOf('subscribe', 'RINCON_B').length, 3);

    await clock.advance(999);
    assert.strictEqual(transport.callsOf('subscribe', 'RINCON_B').length, 3);

    await clock.advance(1);
    assert.strictEqual(transport.callsOf('subscribe', 'RINCON_B').length, 6);

    await clock.advance(2000);
    assert.strictEqual(transport.callsOf('subscribe', 'RINCON_B').length, 9);

    assert.deepStrictEqual(degraded.map(info => [info.deviceId, info.category, info.attempts]), [
      ['RINCON_B', 'topology', 3],
      ['RINCON_B', 'transport', 3],
      ['RINCON_B', 'rendering', 3]
    ]);
    assert.strictEqual(manager.getDegraded().length, 3);
    assert.strictEqual(manager.getState('RINCON_A', 'topology'), 'ACTIVE');

    // No further retries once degraded
    await clock.advance(60_000);
    assert.strictEqual(transport.callsOf('subscribe', 'RINCON_B').length, 9);
  });

  it('should degrade a device whose subscribe requests keep timing out', async () => {
    transport.silentDevices.add('RINCON_B');
    manager.ensure(deviceA);
    manager.ensure(deviceB);
    await flush();

    await clock.advance(4_999);
    assert.strictEqual(manager.getState('RINCON_B', 'topology'), 'SUBSCRIBING');

    // Timed out at 5s, retried 1s later
    await clock.advance(1_001);
    assert.strictEqual(transport.callsOf('subscribe', 'RINCON_B').length, 6);

    // Timed out at 11s, retried 2s later
    await clock.advance(7_000);
    assert.strictEqual(transport.callsOf('subscribe', 'RINCON_B').length, 9);
    assert.deepStrictEqual<SubscriptionInfo[]>(degraded, []);

    await clock.advance(5_000);
    assert.deepStrictEqual(degraded.map(info => [info.deviceId, info.category, info.attempts]), [
      ['RINCON_B', 'topology', 3],
      ['RINCON_B', 'transport', 3],
      ['RINCON_B', 'rendering', 3]
    ]);
    assert.strictEqual(manager.getState('RINCON_B', 'topology'), 'UNSUBSCRIBED');
    assert.strictEqual(manager.getState('RINCON_A', 'topology'), 'ACTIVE');
    assert.strictEqual(clock.pendingTimers(), 3);
  });

  it('should wait at least a second before renewing a zero timeout', async () => {
    transport.grantSeconds = 0;
    manager.ensure(deviceA);
    await flush();

    await clock.advance(999);
    assert.strictEqual(transport.callsOf('renew').length, 0);

    await clock.advance(1);
    assert.strictEqual(transport.callsOf('renew').length, 3);
  });

  it('should give a degraded device fresh attempts on the next trigger', async () => {
    transport.failingDevices.add('RINCON_B');
    manager.ensure(deviceB);
    await clock.advance(3000);
    assert.strictEqual(manager.getDegraded().length, 3);

    transport.failingDevices.delete('RINCON_B');
    manager.ensure(deviceB);
    await flush();

    assert.strictEqual(manager.getDegraded().length, 0);
    assert.strictEqual(manager.getState('RINCON_B', 'transport'), 'ACTIVE');
  });

  it('should unsubscribe a subscription that completes after release', async () => {
    transport.holdSubscribes = true;
    manager.ensure(deviceA);
    await flush();
    assert.strictEqual(transport.held.length, 3);

    await manager.release('RINCON_A');
    assert.strictEqual(transport.callsOf('unsubscribe').length, 0);

    for (const pending of transport.held) {
      pending.resolve({ sid: 'ignored', timeoutSeconds: 300 });
    }
    await flush();

    assert.deepStrictEqual(
      transport.callsOf('unsubscribe').map(c => c.sid),
      ['uuid:sub-1', 'uuid:sub-2', 'uuid:sub-3']
    );
    assert.strictEqual(manager.lookup('uuid:sub-1'), undefined);
    assert.strictEqual(manager.getState('RINCON_A', 'topology'), 'UNSUBSCRIBED');
  });

  it('should release without unsubscribing when the device is gone', async () => {
    manager.ensure(deviceA);
    await flush();

    await manager.release('RINCON_A', { unsubscribe: false });

    assert.strictEqual(transport.callsOf('unsubscribe').length, 0);
    assert.strictEqual(manager.lookup('uuid:sub-1'), undefined);
    assert.deepStrictEqual(manager.list(), []);
    assert.strictEqual(clock.pendingTimers(), 0);
  });

  it('should defer subscribing until a callback URL is known', async () => {
    await manager.shutdown();
    manager = new SubscriptionManager({ transport, config, clock });

    manager.ensure(deviceA);
    await flush();
    assert.strictEqual(transport.calls.length, 0);
    assert.strictEqual(manager.getState('RINCON_A', 'topology'), 'UNSUBSCRIBED');

    manager.setCallbackUrl(CALLBACK_URL);
    await flush();
    assert.strictEqual(transport.callsOf('subscribe').length, 3);
    assert.strictEqual(manager.getCallbackUrl(), CALLBACK_URL);
  });

  it('should resubscribe everything when the callback URL changes', async () => {
    manager.ensure(deviceA);
    await flush();

    manager.setCallbackUrl('http://192.168.1.3:3500/notify');
    await flush();

    const subscribes = transport.callsOf('subscribe');
    assert.strictEqual(subscribes.length, 6);
    assert.strictEqual(subscribes[5]?.callbackUrl, 'http://192.168.1.3:3500/notify');
    assert.deepStrictEqual(
      transport.callsOf('unsubscribe').map(c => c.sid),
      ['uuid:sub-1', 'uuid:sub-2', 'uuid:sub-3']
    );
    assert.deepStrictEqual(manager.lookup('uuid:sub-6'), { deviceId: 'RINCON_A', category: 'rendering' });
    assert.deepStrictEqual(manager.lookup('uuid:sub-1'), { deviceId: 'RINCON_A', category: 'topology' });
  });

  it('should shut down even when devices refuse to unsubscribe', async () => {
    manager.ensure(deviceA);
    await flush();
    transport.failUnsubscribes = true;

    await manager.shutdown();

    assert.strictEqual(transport.callsOf('unsubscribe').length, 3);
    assert.deepStrictEqual(manager.list(), []);
    assert.strictEqual(clock.pendingTimers(), 0);
  });
});
