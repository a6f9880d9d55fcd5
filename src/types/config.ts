export interface DiscoveryConfig {
  /** Fixed probe interval */
  intervalMs: number;
  /** Devices not refreshed within this many intervals are marked unreachable */
  livenessIntervals: number;
  /** MX value sent with each probe (seconds the device may wait before answering) */
  mx: number;
  /** Fetch the device description for new devices */
  describeDevices: boolean;
}

export interface CallbackConfig {
  /** Address devices use to reach the sink; detected from the interfaces when unset */
  host?: string;
  port: number;
  path: string;
}

export interface SubscriptionConfig {
  /** Requested subscription duration in seconds */
  timeoutSeconds: number;
  /** Renewal completes at least this long before expiry */
  renewalMarginMs: number;
  /** Per-request budget for SUBSCRIBE / renew / UNSUBSCRIBE */
  requestTimeoutMs: number;
  /** Consecutive failures before a subscription is marked degraded */
  maxAttempts: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
  backoffFactor: number;
}

export interface TopologyConfig {
  /** How long an unreachable device keeps its place before its group is dissolved */
  graceMs: number;
  /** How long conflicting coordinator claims may persist before being reported */
  conflictWindowMs: number;
}

export interface ClientConfig {
  logLevel: string;
  debugCategories?: string[];
  httpTimeoutMs: number;
  discovery: DiscoveryConfig;
  callback: CallbackConfig;
  subscription: SubscriptionConfig;
  topology: TopologyConfig;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};
