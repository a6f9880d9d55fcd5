import dgram from 'dgram';
import logger from '../utils/logger.js';
import { DiscoveryError, getErrorMessage } from '../errors/household-errors.js';
import { normalizeDeviceId } from '../types/household.js';

export const SSDP_ADDRESS = '239.255.255.250';
export const SSDP_PORT = 1900;
export const ZONEPLAYER_URN = 'urn:schemas-upnp-org:device:ZonePlayer:1';

export interface SsdpMessage {
  kind: 'response' | 'alive' | 'byebye';
  deviceId: string;
  location?: string;
  householdId?: string;
}

export interface RemoteInfo {
  address: string;
  port: number;
}

/**
 * Multicast send/receive primitive used by the scanner
 */
export interface DiscoverySocket {
  bind(): Promise<void>;
  send(message: string): Promise<void>;
  onMessage(handler: (message: string, remote: RemoteInfo) => void): void;
  close(): void;
}

export function buildSearchMessage(mx: number, searchTarget = ZONEPLAYER_URN): string {
  return [
    'M-SEARCH * HTTP/1.1',
    `HOST: ${SSDP_ADDRESS}:${SSDP_PORT}`,
    'MAN: "ssdp:discover"',
    `MX: ${mx}`,
    `ST: ${searchTarget}`,
    '',
    ''
  ].join('\r\n');
}

function parseHeaders(lines: string[]): Map<string, string> {
  const headers = new Map<string, string>();
  for (const line of lines) {
    const separator = line.indexOf(':');
    if (separator <= 0) {
      continue;
    }
    headers.set(line.substring(0, separator).trim().toUpperCase(), line.substring(separator + 1).trim());
  }
  return headers;
}

/**
 * Parse a search response or presence NOTIFY. Returns null for anything that
 * is not about a ZonePlayer.
 */
export function parseSsdpMessage(raw: string): SsdpMessage | null {
  const [startLine = '', ...rest] = raw.split(/\r?\n/);
  const headers = parseHeaders(rest);

  let kind: SsdpMessage['kind'];
  if (/^HTTP\/1\.[01] 200/i.test(startLine)) {
    kind = 'response';
  } else if (/^NOTIFY \* HTTP\/1\.[01]/i.test(startLine)) {
    const nts = headers.get('NTS')?.toLowerCase();
    if (nts === 'ssdp:alive') {
      kind = 'alive';
    } else if (nts === 'ssdp:byebye') {
      kind = 'byebye';
    } else {
      return null;
    }
  } else {
    return null;
  }

  const target = headers.get('ST') ?? headers.get('NT') ?? '';
  const usn = headers.get('USN') ?? '';
  if (!target.includes(ZONEPLAYER_URN) && !usn.includes(ZONEPLAYER_URN)) {
    return null;
  }

  // USN: uuid:RINCON_000E58A0123401400::urn:schemas-upnp-org:device:ZonePlayer:1
  const match = usn.match(/^(uuid:[^:]+)/i);
  if (!match || !match[1]) {
    return null;
  }

  const location = headers.get('LOCATION');
  if (kind !== 'byebye' && !location) {
    return null;
  }

  return {
    kind,
    deviceId: normalizeDeviceId(match[1]),
    location,
    householdId: headers.get('X-RINCON-HOUSEHOLD')
  };
}

export interface SsdpSocketOptions {
  /** Port of the presence listener; devices multicast their announcements to SSDP_PORT */
  listenPort?: number;
}

/**
 * Two UDP sockets behind one DiscoverySocket. Probes go out from an ephemeral
 * port, which is where devices send their unicast replies. Presence NOTIFYs
 * only reach a socket bound to the SSDP port and joined to the group.
 */
export function createSsdpSocket(options: SsdpSocketOptions = {}): DiscoverySocket {
  const listenPort = options.listenPort ?? SSDP_PORT;
  const handlers: Array<(message: string, remote: RemoteInfo) => void> = [];
  let search: dgram.Socket | undefined;
  let listener: dgram.Socket | undefined;

  const open = (): dgram.Socket => {
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    socket.on('error', (err) => logger.error('Discovery socket error:', err));
    socket.on('message', (msg, rinfo) => {
      const text = msg.toString();
      for (const handler of handlers) {
        handler(text, { address: rinfo.address, port: rinfo.port });
      }
    });
    return socket;
  };

  const close = (): void => {
    search?.close();
    listener?.close();
    search = undefined;
    listener = undefined;
  };

  return {
    bind: async () => {
      close();
      const searchSocket = open();
      try {
        await bindSocket(searchSocket, 0);
      } catch (error) {
        searchSocket.close();
        throw new DiscoveryError(`Failed to bind SSDP socket: ${getErrorMessage(error)}`, { cause: error });
      }
      search = searchSocket;

      const listenSocket = open();
      try {
        await bindSocket(listenSocket, listenPort);
      } catch (error) {
        listenSocket.close();
        logger.warn(`Cannot listen for SSDP announcements on port ${listenPort}, relying on probes: ${getErrorMessage(error)}`);
        return;
      }
      listener = listenSocket;
      try {
        listenSocket.addMembership(SSDP_ADDRESS);
      } catch (error) {
        logger.warn(`Failed to join SSDP multicast group: ${getErrorMessage(error)}`);
      }
    },
    send: (message) => new Promise<void>((resolve, reject) => {
      if (!search) {
        reject(new DiscoveryError('SSDP socket is not bound'));
        return;
      }
      search.send(message, SSDP_PORT, SSDP_ADDRESS, (error) => {
        if (error) {
          reject(new DiscoveryError(`Failed to send SSDP search: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    }),
    onMessage: (handler) => {
      handlers.push(handler);
    },
    close
  };
}

function bindSocket(socket: dgram.Socket, port: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    socket.once('error', reject);
    socket.bind(port, () => {
      socket.off('error', reject);
      resolve();
    });
  });
}
