import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import logger from './logger.js';
import { debugManager } from './debug-manager.js';
import { isXmlNode, textOf, type XmlNode } from './xml.js';
import { SOAPError, TimeoutError, TransportError, UPnPError } from '../errors/household-errors.js';
import { retry, SOAP_RETRY_OPTIONS, type RetryOptions } from './retry.js';

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  format: false,
  suppressEmptyNode: true
});

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true
});

interface SoapEnvelope {
  's:Envelope': {
    '@_xmlns:s': string;
    '@_s:encodingStyle': string;
    's:Body': {
      [key: string]: {
        '@_xmlns:u': string;
        [key: string]: unknown;
      };
    };
  };
}

export type SoapResult = Record<string, unknown>;

export function createSoapEnvelope(serviceType: string, action: string, body: Readonly<Record<string, unknown>> = {}): string {
  const envelope: SoapEnvelope = {
    's:Envelope': {
      '@_xmlns:s': 'http://schemas.xmlsoap.org/soap/envelope/',
      '@_s:encodingStyle': 'http://schemas.xmlsoap.org/soap/encoding/',
      's:Body': {
        [`u:${action}`]: {
          '@_xmlns:u': serviceType,
          ...body
        }
      }
    }
  };

  return xmlBuilder.build(envelope);
}

function pickNode(node: XmlNode, ...keys: string[]): XmlNode | undefined {
  for (const key of keys) {
    const value = node[key];
    if (isXmlNode(value)) {
      return value;
    }
  }
  return undefined;
}

/**
 * Unwrap the action response from a SOAP envelope, raising UPnPError or
 * SOAPError for faults
 */
export function parseSoapResponse(xml: string, service = 'Unknown', action = 'Unknown'): SoapResult {
  const parsed: unknown = xmlParser.parse(xml);
  const envelope = isXmlNode(parsed) ? pickNode(parsed, 's:Envelope', 'SOAP-ENV:Envelope') : undefined;
  if (!envelope) {
    throw new SOAPError('Invalid SOAP response: no envelope found', service, action);
  }

  const body = pickNode(envelope, 's:Body', 'SOAP-ENV:Body');
  if (!body) {
    throw new SOAPError('Invalid SOAP response: no body found', service, action);
  }

  const fault = pickNode(body, 's:Fault', 'SOAP-ENV:Fault');
  if (fault) {
    const detail = fault['detail'];
    const upnpError = isXmlNode(detail) ? pickNode(detail, 'UPnPError') : undefined;
    const errorCode = upnpError ? textOf(upnpError['errorCode']) : undefined;
    if (upnpError && errorCode) {
      throw new UPnPError(service, action, errorCode, textOf(upnpError['errorDescription']));
    }

    throw SOAPError.fromFault(service, action, {
      faultcode: textOf(fault['faultcode']),
      faultstring: textOf(fault['faultstring']),
      detail
    });
  }

  // The first element in the body is the action response
  const [first] = Object.values(body);
  return isXmlNode(first) ? first : {};
}

export interface SoapRequest {
  url: string;
  service: string;
  serviceType: string;
  action: string;
  body?: Readonly<Record<string, unknown>>;
  timeoutMs?: number;
}

export async function soapRequest(request: SoapRequest): Promise<SoapResult> {
  const { url, service, serviceType, action } = request;
  const timeoutMs = request.timeoutMs ?? 10000;
  const envelope = createSoapEnvelope(serviceType, action, request.body);

  debugManager.debug('soap', `SOAP Request to ${url}`, { action, body: request.body });

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'text/xml; charset=utf-8',
        'SOAPAction': `"${serviceType}#${action}"`
      },
      body: envelope,
      signal: AbortSignal.timeout(timeoutMs)
    });
  } catch (error) {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      throw new TimeoutError(`SOAP ${service}.${action}`, timeoutMs);
    }
    throw new TransportError(`SOAP request to ${url} failed`, 'NETWORK_ERROR', { cause: error });
  }

  const responseText = await response.text();

  // Faults arrive with status 500, so parse before looking at the status
  if (!response.ok && !responseText.includes('Fault>')) {
    logger.error(`SOAP request failed: ${response.status} ${response.statusText}`, { responseText });
    throw new TransportError(`SOAP request failed: ${response.status} ${response.statusText}`, 'HTTP_ERROR');
  }

  const result = parseSoapResponse(responseText, service, action);

  debugManager.trace('soap', `SOAP Response from ${url}`, { action, result });
  debugManager.debug('soap', `SOAP Response from ${url} - ${action} completed`);

  return result;
}

/**
 * soapRequest with retry; only for actions that are safe to repeat
 */
export async function soapRequestWithRetry(request: SoapRequest, retryOptions?: RetryOptions): Promise<SoapResult> {
  return retry(
    () => soapRequest(request),
    retryOptions ?? SOAP_RETRY_OPTIONS,
    `SOAP ${request.action}`
  );
}
