/**
 * Trackline Engine Logger
 *
 * Centralized logging utility for the engine and the CLI.
 *
 * Features:
 * - Runtime configurable log levels
 * - Module namespaces (xm-reader, timeline, usage, export, cli, etc.)
 * - Optional module allow-list
 * - Structured logging support (objects are passed through untouched)
 * - Safe production defaults (error-only)
 *
 * Usage:
 * ```typescript
 * import { createLogger } from './util/logger.js';
 *
 * const log = createLogger('timeline');
 *
 * log.debug('Replaying order', 3);
 * log.info({ event: 'pattern', rows: 64 });
 * log.warn('Order entry points at a missing pattern');
 * log.error('Failed to decode module', error);
 * ```
 */

export type LogLevel = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  level: LogLevel;
  modules?: string[];
  timestamps?: boolean;
}

export interface Logger {
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

// ---------- State ----------
let config: LoggerConfig = {
  level: 'error', // Safe production default
  modules: undefined,
  timestamps: true,
};

const moduleSet = new Set<string>();

const levelOrder: LogLevel[] = ['none', 'error', 'warn', 'info', 'debug'];

// ---------- Configuration ----------

/**
 * Configure global logging settings.
 *
 * @example
 * ```typescript
 * configureLogging({
 *   level: 'debug',
 *   modules: ['xm-reader', 'timeline'],
 *   timestamps: false
 * });
 * ```
 */
export function configureLogging(opts: Partial<LoggerConfig>): void {
  config = { ...config, ...opts };
  if (opts.modules) {
    moduleSet.clear();
    opts.modules.forEach(m => moduleSet.add(m));
  }

  if (shouldLog('info')) {
    console.info('[Trackline] Logging configured:', config);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return levelOrder.some(level => level === value);
}

/**
 * Load logging configuration from environment variables.
 * Looks for: TRACKLINE_LOGLEVEL=debug, TRACKLINE_DEBUG=xm-reader,timeline
 */
export function loadLoggingFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const rawLevel = env.TRACKLINE_LOGLEVEL?.trim().toLowerCase();
  const level = rawLevel && isLogLevel(rawLevel) ? rawLevel : undefined;
  const modulesStr = env.TRACKLINE_DEBUG;
  const modules = modulesStr ? modulesStr.split(',').map(m => m.trim()).filter(Boolean) : undefined;

  if (level || modules) {
    configureLogging({
      // naming modules without a level implies debug output for them
      level: level ?? (modules ? 'debug' : config.level),
      modules,
    });
  }
}

/**
 * Get current logging configuration.
 */
export function getLoggingConfig(): Readonly<LoggerConfig> {
  return { ...config };
}

/**
 * Restore the default configuration (error-only, all modules).
 */
export function resetLogging(): void {
  config = { level: 'error', modules: undefined, timestamps: true };
  moduleSet.clear();
}

// ---------- Helpers ----------

function shouldLog(level: LogLevel, module?: string): boolean {
  const levelIndex = levelOrder.indexOf(level);
  const configIndex = levelOrder.indexOf(config.level);

  if (levelIndex > configIndex) return false;
  if (module && moduleSet.size > 0 && !moduleSet.has(module)) return false;

  return true;
}

function formatTimestamp(): string {
  if (!config.timestamps) return '';
  return `${new Date().toISOString()} `;
}

function output(level: Exclude<LogLevel, 'none'>, module: string, args: unknown[]): void {
  const prefix = `${formatTimestamp()}[${module}]`;
  switch (level) {
    case 'error':
      console.error(prefix, ...args);
      break;
    case 'warn':
      console.warn(prefix, ...args);
      break;
    case 'info':
      console.info(prefix, ...args);
      break;
    case 'debug':
      console.log(prefix, ...args);
      break;
  }
}

// ---------- Public Logger Factory ----------

/**
 * Create a namespaced logger for a specific module.
 *
 * @param module - Module name (e.g., 'xm-reader', 'timeline', 'cli')
 */
export function createLogger(module: string): Logger {
  return {
    error: (...args: unknown[]) => {
      if (shouldLog('error', module)) {
        output('error', module, args);
      }
    },
    warn: (...args: unknown[]) => {
      if (shouldLog('warn', module)) {
        output('warn', module, args);
      }
    },
    info: (...args: unknown[]) => {
      if (shouldLog('info', module)) {
        output('info', module, args);
      }
    },
    debug: (...args: unknown[]) => {
      if (shouldLog('debug', module)) {
        output('debug', module, args);
      }
    },
  };
}

export default createLogger;
