/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Component-scoped console logging
 *
 * Warnings always print. Info and debug lines print only while UMBRA_DEBUG=true,
 * which render workers inherit from the process that spawns them.
 */

export type LogLevel = 'warn' | 'info' | 'debug';

/** Where a line comes from, printed after the component name */
export interface LogContext {
  operation?: string;
  /** Input line number, for parsers */
  line?: number;
}

export interface Logger {
  warn(message: string, ctx?: LogContext): void;
  info(message: string, ctx?: LogContext): void;
  /** `data` is printed after the message as is */
  debug(message: string, data?: unknown, ctx?: LogContext): void;
}

const SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  warn: (...args) => console.warn(...args),
  info: (...args) => console.log(...args),
  debug: (...args) => console.debug(...args),
};

export function isDebugEnabled(): boolean {
  return process.env.UMBRA_DEBUG === 'true';
}

/**
 * Turn info/debug output on or off for this process and the workers it spawns
 * afterwards.
 */
export function setDebugEnabled(enabled: boolean): void {
  if (enabled) {
    process.env.UMBRA_DEBUG = 'true';
  } else {
    delete process.env.UMBRA_DEBUG;
  }
}

/** `[Component] operation (line N)` */
export function formatPrefix(component: string, ctx: LogContext = {}): string {
  let prefix = `[${component}]`;
  if (ctx.operation) prefix += ` ${ctx.operation}`;
  if (ctx.line !== undefined) prefix += ` (line ${ctx.line})`;
  return prefix;
}

export function createLogger(component: string): Logger {
  const emit = (level: LogLevel, message: string, data: unknown, ctx: LogContext | undefined): void => {
    if (level !== 'warn' && !isDebugEnabled()) return;
    const line = `${formatPrefix(component, ctx)} ${message}`;
    if (data === undefined) {
      SINKS[level](line);
    } else {
      SINKS[level](line, data);
    }
  };

  return {
    warn: (message, ctx) => emit('warn', message, undefined, ctx),
    info: (message, ctx) => emit('info', message, undefined, ctx),
    debug: (message, data, ctx) => emit('debug', message, data, ctx),
  };
}
