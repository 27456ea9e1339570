/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Conversion logger - consistent console logging across packages
 *
 * Log levels:
 * - error: Always logged - failures that end a run
 * - warn: Always logged - skipped elements, fallbacks, integrity problems
 * - info: Logged when STB_IFC_DEBUG=true - run progress and statistics
 * - debug: Logged when STB_IFC_DEBUG=true - per-element decisions
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Component name (e.g., 'StoryAnalyzer', 'IntegrationService') */
  component: string;
  /** Operation being performed (e.g., 'classify', 'dedupe') */
  operation?: string;
  /** Element id if applicable */
  elementId?: string;
  /** Element type if applicable */
  elementType?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export interface Logger {
  error(message: string, error?: unknown, ctx?: Partial<LogContext>): void;
  warn(message: string, ctx?: Partial<LogContext>): void;
  info(message: string, ctx?: Partial<LogContext>): void;
  debug(message: string, data?: unknown, ctx?: Partial<LogContext>): void;
  caught(message: string, error: unknown, ctx?: Partial<LogContext>): void;
}

export function isDebugEnabled(): boolean {
  return process.env.STB_IFC_DEBUG === 'true';
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.elementId !== undefined) {
    prefix += ` #${ctx.elementId}`;
  }
  if (ctx.elementType) {
    prefix += ` (${ctx.elementType})`;
  }
  return prefix;
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ''}`;
  }
  return String(error);
}

/**
 * Create a logger instance for a specific component
 */
export function createLogger(component: string): Logger {
  return {
    /**
     * Log an error - always visible in console
     */
    error(message, error, ctx) {
      const prefix = formatContext({ component, ...ctx });
      const details: unknown[] = [];
      if (error !== undefined) details.push(formatError(error));
      if (ctx?.data !== undefined) details.push(ctx.data);
      console.error(error !== undefined ? `${prefix} ${message}:` : `${prefix} ${message}`, ...details);
    },

    /**
     * Log a warning - always visible in console
     */
    warn(message, ctx) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    info(message, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    debug(message, data, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log a caught error that the caller recovers from
     */
    caught(message, error, ctx) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      console.debug(`${prefix} ${message} (recovered):`, formatError(error));
    },
  };
}
