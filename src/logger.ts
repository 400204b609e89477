import { pino, type Logger as PinoLogger } from 'pino';
import type { ServerNotification } from '@modelcontextprotocol/sdk/types.js';
import { config } from './config.js';

export const baseLogger: PinoLogger = pino({ name: 'sefaria-library-mcp', level: config.logLevel });

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

/** Four-level logging contract used by every operation. No level gating. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export type LogCallback = (message: string) => void;

export type LogCapability = Logger | LogCallback | null | undefined;

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error'];

const PINO_METHOD = { debug: 'debug', info: 'info', warning: 'warn', error: 'error' } as const satisfies Record<LogLevel, string>;

function mirror(sink: PinoLogger, level: LogLevel, message: string) {
  sink[PINO_METHOD[level]](`[${level.toUpperCase()}] ${message}`);
}

class CallbackLogger implements Logger {
  constructor(private readonly callback: LogCallback, private readonly sink: PinoLogger) {}

  private emit(level: LogLevel, message: string) {
    this.callback(message);
    mirror(this.sink, level, message);
  }

  debug(message: string) { this.emit('debug', message); }
  info(message: string) { this.emit('info', message); }
  warning(message: string) { this.emit('warning', message); }
  error(message: string) { this.emit('error', message); }
}

class SinkLogger implements Logger {
  constructor(private readonly sink: PinoLogger) {}

  debug(message: string) { mirror(this.sink, 'debug', message); }
  info(message: string) { mirror(this.sink, 'info', message); }
  warning(message: string) { mirror(this.sink, 'warning', message); }
  error(message: string) { mirror(this.sink, 'error', message); }
}

const conformsToLogger = (capability: LogCapability): capability is Logger =>
  typeof capability === 'object' &&
  capability !== null &&
  LEVELS.every(level => typeof capability[level] === 'function');

/**
 * Normalizes whatever logging capability a caller hands in.
 *
 * A conforming logger is returned as is. A bare callback is wrapped so every
 * level goes to the callback and is mirrored to `sink`, since the host may
 * not show the callback's output to operators. Anything else logs to `sink`
 * only.
 */
export function ensureLogger(capability?: LogCapability, sink: PinoLogger = baseLogger): Logger {
  if (conformsToLogger(capability)) return capability;
  if (typeof capability === 'function') return new CallbackLogger(capability, sink);
  return new SinkLogger(sink);
}

type NotificationSender = {
  sendNotification: (notification: ServerNotification) => Promise<void>;
};

/** Log callback that forwards messages to the MCP client as log notifications. */
export function mcpLogCallback(extra: NotificationSender, loggerName = 'sefaria'): LogCallback {
  return message => {
    extra
      .sendNotification({ method: 'notifications/message', params: { level: 'info', logger: loggerName, data: message } })
      .catch(err => baseLogger.debug({ err }, 'log notification not delivered'));
  };
}
