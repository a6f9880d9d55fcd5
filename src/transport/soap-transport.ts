import { debugManager } from '../utils/debug-manager.js';
import { soapRequest, soapRequestWithRetry, type SoapResult } from '../utils/soap.js';
import { TransportError } from '../errors/household-errors.js';
import type { RetryOptions } from '../utils/retry.js';
import type { CommandTransport, Device } from '../types/household.js';

interface ServiceDefinition {
  serviceType: string;
  controlURL: string;
  /** Actions take an InstanceID argument */
  instanced: boolean;
}

export const SERVICES: Readonly<Record<string, ServiceDefinition>> = {
  AVTransport: {
    serviceType: 'urn:schemas-upnp-org:service:AVTransport:1',
    controlURL: '/MediaRenderer/AVTransport/Control',
    instanced: true
  },
  RenderingControl: {
    serviceType: 'urn:schemas-upnp-org:service:RenderingControl:1',
    controlURL: '/MediaRenderer/RenderingControl/Control',
    instanced: true
  },
  GroupRenderingControl: {
    serviceType: 'urn:schemas-upnp-org:service:GroupRenderingControl:1',
    controlURL: '/MediaRenderer/GroupRenderingControl/Control',
    instanced: true
  },
  ZoneGroupTopology: {
    serviceType: 'urn:schemas-upnp-org:service:ZoneGroupTopology:1',
    controlURL: '/ZoneGroupTopology/Control',
    instanced: false
  },
  ContentDirectory: {
    serviceType: 'urn:schemas-upnp-org:service:ContentDirectory:1',
    controlURL: '/MediaServer/ContentDirectory/Control',
    instanced: false
  }
};

export interface SoapCommandTransportOptions {
  timeoutMs?: number;
  /** Retry policy for read-only (Get*) actions */
  retryOptions?: RetryOptions;
}

/**
 * Splits "Service.Action" into its parts
 */
export function parseActionName(name: string): { service: string; action: string } {
  const separator = name.indexOf('.');
  if (separator <= 0 || separator === name.length - 1) {
    throw new TransportError(`Action must be written as Service.Action: ${name}`, 'INVALID_ACTION');
  }
  return { service: name.substring(0, separator), action: name.substring(separator + 1) };
}

/**
 * Sends control actions as SOAP requests. Read-only Get* actions are retried,
 * anything that changes device state is sent once.
 */
export class SoapCommandTransport implements CommandTransport {
  constructor(private readonly options: SoapCommandTransportOptions = {}) {}

  async sendAction(device: Device, name: string, args: Readonly<Record<string, unknown>>): Promise<SoapResult> {
    const { service, action } = parseActionName(name);
    const definition = SERVICES[service];
    if (!definition) {
      throw new TransportError(`Unknown service: ${service}`, 'INVALID_ACTION');
    }

    const request = {
      url: `http://${device.host}:${device.port}${definition.controlURL}`,
      service,
      serviceType: definition.serviceType,
      action,
      body: definition.instanced ? { InstanceID: 0, ...args } : { ...args },
      timeoutMs: this.options.timeoutMs
    };

    debugManager.debug('command', `${device.roomName ?? device.id}: ${service}.${action}`, args);

    if (action.startsWith('Get')) {
      return soapRequestWithRetry(request, this.options.retryOptions);
    }
    return soapRequest(request);
  }
}
