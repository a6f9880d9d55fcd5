/**
 * Error hierarchy for the household client.
 *
 * Only command failures are surfaced to callers; the other classes are raised
 * and handled inside the discovery, subscription, decode and topology paths.
 */

import type { EventCategory } from '../types/household.js';

/**
 * Base error class for all household client errors
 */
export class HouseholdError extends Error {
  constructor(message: string, public readonly code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HouseholdError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Error thrown when a device id is not known to the registry
 */
export class DeviceNotFoundError extends HouseholdError {
  constructor(public readonly deviceId: string) {
    super(`Device not found: ${deviceId}`, 'DEVICE_NOT_FOUND');
    this.name = 'DeviceNotFoundError';
  }
}

/**
 * Probe send or socket failure. Logged and retried on the next interval.
 */
export class DiscoveryError extends HouseholdError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DISCOVERY_FAILED', options);
    this.name = 'DiscoveryError';
  }
}

export type SubscriptionErrorCode =
  | 'SUBSCRIPTION_EXPIRED'
  | 'DEVICE_OFFLINE'
  | 'TIMEOUT'
  | 'REJECTED';

/**
 * SUBSCRIBE, renewal or UNSUBSCRIBE failure for one device
 */
export class SubscriptionError extends HouseholdError {
  constructor(
    message: string,
    public readonly reason: SubscriptionErrorCode,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, reason, options);
    this.name = 'SubscriptionError';
  }
}

/**
 * Malformed event payload. Dropped and counted, never propagated.
 */
export class DecodeError extends HouseholdError {
  constructor(
    message: string,
    public readonly deviceId: string,
    public readonly category: EventCategory,
    options?: { cause?: unknown }
  ) {
    super(message, 'DECODE_FAILED', options);
    this.name = 'DecodeError';
  }
}

/**
 * A derived topology broke a group invariant, or coordinator claims kept
 * disagreeing for longer than the conflict window
 */
export class TopologyInconsistencyError extends HouseholdError {
  constructor(message: string, public readonly deviceIds: readonly string[] = []) {
    super(message, 'TOPOLOGY_INCONSISTENT');
    this.name = 'TopologyInconsistencyError';
  }
}

/**
 * Failure reported by the command transport collaborator
 */
export class TransportError extends HouseholdError {
  constructor(message: string, code = 'TRANSPORT_FAILED', options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'TransportError';
  }
}

/**
 * Outbound command failure surfaced to the caller of sendCommand
 */
export class CommandError extends HouseholdError {
  constructor(
    message: string,
    public readonly deviceId: string,
    public readonly action: string,
    code = 'COMMAND_FAILED',
    options?: { cause?: unknown }
  ) {
    super(message, code, options);
    this.name = 'CommandError';
  }
}

/**
 * Error thrown when a SOAP request fails
 */
export class SOAPError extends TransportError {
  constructor(
    message: string,
    public readonly service: string,
    public readonly action: string,
    public readonly faultCode?: string,
    public readonly detail?: unknown
  ) {
    super(message, faultCode ?? 'SOAP_FAULT');
    this.name = 'SOAPError';
  }

  /**
   * Create a SOAPError from a SOAP fault response
   */
  static fromFault(
    service: string,
    action: string,
    fault: { faultcode?: string; faultstring?: string; detail?: unknown }
  ): SOAPError {
    const message = fault.faultstring || 'SOAP fault';
    return new SOAPError(message, service, action, fault.faultcode, fault.detail);
  }
}

/**
 * UPnP error carried in a SOAP fault detail
 */
export class UPnPError extends SOAPError {
  constructor(
    service: string,
    action: string,
    public readonly errorCode: string,
    public readonly errorDescription?: string
  ) {
    super(errorDescription || `UPnP error ${errorCode}`, service, action, errorCode);
    this.name = 'UPnPError';
  }

  static readonly ErrorCodes = {
    INVALID_ACTION: '401',
    INVALID_ARGS: '402',
    ACTION_FAILED: '501',
    ARGUMENT_VALUE_INVALID: '600',
    ARGUMENT_VALUE_OUT_OF_RANGE: '601',
    OPTIONAL_ACTION_NOT_IMPLEMENTED: '602',
    OUT_OF_MEMORY: '603',
    ACTION_NOT_AUTHORIZED: '606',
    TRANSITION_NOT_AVAILABLE: '701',
    TRANSPORT_IS_LOCKED: '717',
    CONTENT_BUSY: '727',
    INVALID_INSTANCE_ID: '730'
  } as const;
}

/**
 * Error thrown when an operation exceeds its time budget
 */
export class TimeoutError extends HouseholdError {
  constructor(
    operation: string,
    public readonly timeoutMs: number
  ) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export function isHouseholdError(error: unknown): error is HouseholdError {
  return error instanceof HouseholdError;
}

/**
 * Get a readable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}
