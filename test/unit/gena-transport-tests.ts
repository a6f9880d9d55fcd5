import { describe, it, before, after, beforeEach } from 'node:test';
import assert from 'node:assert';
import { createServer, type IncomingHttpHeaders, type Server } from 'http';
import type { AddressInfo } from 'net';
import { GenaTransport, parseTimeoutHeader, toSubscriptionError } from '../../src/upnp/gena-transport.js';
import { TimeoutError } from '../../src/errors/household-errors.js';
import type { Device } from '../../src/types/household.js';
import { makeDevice } from '../helpers/fakes.js';

interface RecordedRequest {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
}

describe('GenaTransport', () => {
  let server: Server;
  let port: number;
  let requests: RecordedRequest[];
  let reply: { status: number; headers: Record<string, string> };
  const transport = new GenaTransport(2000);

  before(async () => {
    server = createServer((req, res) => {
      requests.push({ method: req.method, url: req.url, headers: req.headers });
      res.writeHead(reply.status, reply.headers);
      res.end();
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    port = typeof address === 'object' && address ? address.port : 0;
  });

  after(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  beforeEach(() => {
    requests = [];
    reply = { status: 200, headers: { 'SID': 'uuid:RINCON_A_sub0000000001', 'TIMEOUT': 'Second-1800' } };
  });

  const device = (): Device => makeDevice({ id: 'RINCON_A', host: '127.0.0.1', port });

  it('should send SUBSCRIBE with the callback and requested timeout', async () => {
    const result = await transport.subscribe(device(), '/ZoneGroupTopology/Event', 'http://127.0.0.1:3500/notify', 300);

    assert.deepStrictEqual(result, { sid: 'uuid:RINCON_A_sub0000000001', timeoutSeconds: 1800 });
    assert.strictEqual(requests.length, 1);
    assert.strictEqual(requests[0]?.method, 'SUBSCRIBE');
    assert.strictEqual(requests[0]?.url, '/ZoneGroupTopology/Event');
    assert.strictEqual(requests[0]?.headers['callback'], '<http://127.0.0.1:3500/notify>');
    assert.strictEqual(requests[0]?.headers['nt'], 'upnp:event');
    assert.strictEqual(requests[0]?.headers['timeout'], 'Second-300');
  });

  it('should renew with the SID and keeps it when the reply omits one', async () => {
    reply = { status: 200, headers: { 'TIMEOUT': 'Second-300' } };

    const result = await transport.renew(device(), '/MediaRenderer/AVTransport/Event', 'uuid:RINCON_A_sub0000000007', 300);

    assert.deepStrictEqual(result, { sid: 'uuid:RINCON_A_sub0000000007', timeoutSeconds: 300 });
    assert.strictEqual(requests[0]?.headers['sid'], 'uuid:RINCON_A_sub0000000007');
    assert.strictEqual(requests[0]?.headers['callback'], undefined);
  });

  it('should report a refused renewal as expired', async () => {
    reply = { status: 412, headers: {} };

    await assert.rejects(
      transport.renew(device(), '/MediaRenderer/AVTransport/Event', 'uuid:gone', 300),
      { name: 'SubscriptionError', reason: 'SUBSCRIPTION_EXPIRED', statusCode: 412 }
    );
  });

  it('should reject other error statuses', async () => {
    reply = { status: 503, headers: {} };

    await assert.rejects(
      transport.subscribe(device(), '/ZoneGroupTopology/Event', 'http://127.0.0.1:3500/notify', 300),
      { reason: 'REJECTED', statusCode: 503 }
    );
  });

  it('should send UNSUBSCRIBE with the SID', async () => {
    reply = { status: 200, headers: {} };

    await transport.unsubscribe(device(), '/MediaRenderer/RenderingControl/Event', 'uuid:RINCON_A_sub0000000001');

    assert.strictEqual(requests[0]?.method, 'UNSUBSCRIBE');
    assert.strictEqual(requests[0]?.headers['sid'], 'uuid:RINCON_A_sub0000000001');
  });

  it('should treat a refused connection as an offline device', async () => {
    const closed = createServer();
    await new Promise<void>(resolve => closed.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = closed.address();
    const closedPort = typeof address === 'object' && address ? address.port : 0;
    await new Promise<void>(resolve => closed.close(() => resolve()));

    await assert.rejects(
      transport.subscribe(makeDevice({ id: 'RINCON_B', host: '127.0.0.1', port: closedPort }), '/ZoneGroupTopology/Event', 'http://127.0.0.1:3500/notify', 300),
      { reason: 'DEVICE_OFFLINE' }
    );
  });
});

describe('GENA helpers', () => {
  it('should read the granted duration from TIMEOUT', () => {
    assert.strictEqual(parseTimeoutHeader('Second-1800', 300), 1800);
    assert.strictEqual(parseTimeoutHeader('second-60', 300), 60);
    assert.strictEqual(parseTimeoutHeader('infinite', 300), 300);
    assert.strictEqual(parseTimeoutHeader(undefined, 300), 300);
  });

  it('should map timeouts onto the TIMEOUT reason', () => {
    const error = toSubscriptionError(new TimeoutError('SUBSCRIBE', 5000));
    assert.strictEqual(error.reason, 'TIMEOUT');
    assert.ok(error.cause instanceof TimeoutError);
  });

  it('should map unknown failures onto REJECTED', () => {
    const error = toSubscriptionError(new Error('parse error'));
    assert.strictEqual(error.reason, 'REJECTED');
    assert.strictEqual(error.message, 'Subscription request failed: parse error');
  });
});
