/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * meshlink logger - consistent console output across packages
 *
 * Log levels:
 * - error: Always logged - failures the caller will see as a rejected request
 * - warn: Always logged - recoverable issues (timeouts that are retried, resets)
 * - info: Logged when MESHLINK_DEBUG is set - server replies, connections
 * - debug: Logged when MESHLINK_DEBUG is set - encoded frames and sizes
 * - caught: Logged when MESHLINK_DEBUG is set - errors that were recovered from
 *
 * Enable debug logging with MESHLINK_DEBUG=true in the environment.
 */

export interface LogContext {
  /** Component name (e.g., 'Client', 'ZmqTransport', 'Urdf') */
  component: string;
  /** Operation being performed (e.g., 'set_object', 'connect') */
  operation?: string;
  /** Scene path the operation targets */
  path?: string;
  /** Additional context data */
  data?: Record<string, unknown>;
}

export type Logger = ReturnType<typeof createLogger>;

function isDebugEnabled(): boolean {
  if (typeof process !== 'undefined' && process.env) {
    return process.env.MESHLINK_DEBUG === 'true';
  }
  return false;
}

function formatContext(ctx: LogContext): string {
  let prefix = `[${ctx.component}]`;
  if (ctx.operation) {
    prefix += ` ${ctx.operation}`;
  }
  if (ctx.path !== undefined) {
    prefix += ` ${ctx.path}`;
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
export function createLogger(component: string) {
  return {
    error(message: string, error?: unknown, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (error !== undefined) {
        if (ctx?.data !== undefined) {
          console.error(`${prefix} ${message}:`, formatError(error), ctx.data);
        } else {
          console.error(`${prefix} ${message}:`, formatError(error));
        }
      } else if (ctx?.data !== undefined) {
        console.error(`${prefix} ${message}`, ctx.data);
      } else {
        console.error(`${prefix} ${message}`);
      }
    },

    warn(message: string, ctx?: Partial<LogContext>) {
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.warn(`${prefix} ${message}`, ctx.data);
      } else {
        console.warn(`${prefix} ${message}`);
      }
    },

    /**
     * Log info - only visible when MESHLINK_DEBUG=true
     */
    info(message: string, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (ctx?.data !== undefined) {
        console.log(`${prefix} ${message}`, ctx.data);
      } else {
        console.log(`${prefix} ${message}`);
      }
    },

    /**
     * Log debug - only visible when MESHLINK_DEBUG=true
     */
    debug(message: string, data?: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      if (data !== undefined) {
        console.debug(`${prefix} ${message}`, data);
      } else {
        console.debug(`${prefix} ${message}`);
      }
    },

    /**
     * Log an error that was handled and recovered from
     */
    caught(message: string, error: unknown, ctx?: Partial<LogContext>) {
      if (!isDebugEnabled()) return;
      const prefix = formatContext({ component, ...ctx });
      console.debug(`${prefix} ${message} (recovered):`, formatError(error));
    },
  };
}
