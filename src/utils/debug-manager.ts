import logger from './logger.js';

export interface DebugCategories {
  discovery: boolean;
  subscription: boolean;
  callback: boolean;
  decode: boolean;
  topology: boolean;
  command: boolean;
  soap: boolean;
}

export type DebugCategory = keyof DebugCategories;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface DebugSettings {
  logLevel?: string;
  debugCategories?: string[];
}

const LOG_LEVELS: readonly string[] = ['error', 'warn', 'info', 'debug', 'trace'];

const CATEGORY_NAMES: readonly DebugCategory[] = [
  'discovery', 'subscription', 'callback', 'decode', 'topology', 'command', 'soap'
];

function isLogLevel(level: string): level is LogLevel {
  return level === 'silent' || LOG_LEVELS.includes(level);
}

export class DebugManager {
  private categories: DebugCategories;

  constructor(settings?: DebugSettings) {
    this.categories = {
      discovery: false,    // SSDP traffic and registry changes
      subscription: false, // SUBSCRIBE / renew / UNSUBSCRIBE lifecycle
      callback: false,     // inbound NOTIFY handling
      decode: false,       // event payload parsing
      topology: false,     // group derivation and snapshot publication
      command: true,       // outbound commands
      soap: false          // SOAP envelopes
    };

    if (settings) {
      this.initFromSettings(settings);
    }
  }

  private initFromSettings(settings: DebugSettings): void {
    if (settings.logLevel && isLogLevel(settings.logLevel.toLowerCase())) {
      logger.level = settings.logLevel.toLowerCase();
    }

    if (settings.debugCategories && settings.debugCategories.length > 0) {
      const requested = settings.debugCategories.map(c => c.toLowerCase());

      // '*' or 'all' enables every category
      if (requested.includes('*') || requested.includes('all')) {
        this.enableAll();
      } else {
        for (const category of requested) {
          if (this.isValidCategory(category)) {
            this.categories[category] = true;
          }
        }
      }
    }

    logger.debug('Debug configuration:', {
      logLevel: logger.level,
      categories: this.enabledCategories().join(', ') || 'none'
    });
  }

  private isValidCategory(category: string): category is DebugCategory {
    return CATEGORY_NAMES.some(name => name === category);
  }

  private enabledCategories(): DebugCategory[] {
    return CATEGORY_NAMES.filter(c => this.categories[c]);
  }

  isEnabled(category: DebugCategory): boolean {
    return this.categories[category];
  }

  setCategory(category: DebugCategory, enabled: boolean): void {
    this.categories[category] = enabled;
    logger.info(`Debug category '${category}' ${enabled ? 'enabled' : 'disabled'}`);
  }

  setLogLevel(level: LogLevel): void {
    if (!isLogLevel(level)) {
      throw new Error(`Invalid log level: ${String(level)}`);
    }
    logger.level = level;
  }

  getCategories(): DebugCategories {
    return { ...this.categories };
  }

  enableAll(): void {
    for (const category of CATEGORY_NAMES) {
      this.categories[category] = true;
    }
  }

  disableAll(): void {
    for (const category of CATEGORY_NAMES) {
      this.categories[category] = false;
    }
  }

  debug(category: DebugCategory, message: string, meta?: unknown): void {
    if (this.categories[category] && this.shouldLog('debug')) {
      logger.debug(`[${category.toUpperCase()}] ${message}`, withCategory(meta, category));
    }
  }

  info(category: DebugCategory, message: string, meta?: unknown): void {
    if (this.categories[category] && this.shouldLog('info')) {
      logger.info(`[${category.toUpperCase()}] ${message}`, withCategory(meta, category));
    }
  }

  warn(category: DebugCategory, message: string, meta?: unknown): void {
    if (this.categories[category] && this.shouldLog('warn')) {
      logger.warn(`[${category.toUpperCase()}] ${message}`, withCategory(meta, category));
    }
  }

  error(category: DebugCategory, message: string, meta?: unknown): void {
    if (this.categories[category] && this.shouldLog('error')) {
      logger.error(`[${category.toUpperCase()}] ${message}`, withCategory(meta, category));
    }
  }

  trace(category: DebugCategory, message: string, meta?: unknown): void {
    if (this.categories[category] && this.shouldLog('trace')) {
      logger.trace(`[${category.toUpperCase()}] ${message}`, withCategory(meta, category));
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(logger.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);
    return currentLevelIndex >= 0 && messageLevelIndex <= currentLevelIndex;
  }
}

function withCategory(meta: unknown, category: DebugCategory): Record<string, unknown> {
  if (meta instanceof Error) {
    return { err: meta, category };
  }
  return typeof meta === 'object' && meta !== null ? { ...meta, category } : { data: meta, category };
}

let debugManagerInstance: DebugManager | null = null;

/**
 * Configure the shared debug manager. Later calls replace the categories.
 */
export function initializeDebugManager(settings: DebugSettings): DebugManager {
  debugManagerInstance = new DebugManager(settings);
  return debugManagerInstance;
}

function currentDebugManager(): DebugManager {
  if (!debugManagerInstance) {
    debugManagerInstance = new DebugManager();
  }
  return debugManagerInstance;
}

// Modules hold on to this proxy; it always forwards to the latest instance
export const debugManager = new Proxy({} as DebugManager, {
  get(_target, prop) {
    const instance = currentDebugManager();
    const value: unknown = Reflect.get(instance, prop, instance);
    return typeof value === 'function' ? value.bind(instance) : value;
  }
});
