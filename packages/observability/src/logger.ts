/**
 * Structured logging with Pino and OpenTelemetry trace correlation
 */

import pino from 'pino';
import { trace } from '@opentelemetry/api';
import { getObservabilityConfig, type ObservabilityConfig } from './config.js';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'key', 'auth', 'credential'];

/**
 * Logger used across docdesk packages
 *
 * - silent under NODE_ENV=test unless an explicit destination is given
 * - pino-pretty on stderr in development
 * - JSON with trace_id/span_id of the active span otherwise
 * - message and payload sanitization in production
 */
export class ObservabilityLogger {
  private pino: pino.Logger;
  private config: ObservabilityConfig;
  private isProduction: boolean;
  private hasTransports = false;

  constructor(config?: ObservabilityConfig, destination?: pino.DestinationStream) {
    this.config = config ?? getObservabilityConfig();
    this.isProduction = this.config.environment === 'production';
    this.pino = this.createPinoLogger(destination);
  }

  private createPinoLogger(destination?: pino.DestinationStream): pino.Logger {
    if (destination) {
      return pino(this.baseOptions(), destination);
    }

    // Keep test output concise
    if (this.config.environment === 'test') {
      return pino({ level: 'silent' }, pino.destination('/dev/null'));
    }

    if (this.config.exporters.console) {
      this.hasTransports = true;
      // Custom formatters are not allowed alongside transports
      return pino({
        level: this.config.level,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2
          }
        }
      });
    }

    return pino(this.baseOptions());
  }

  private baseOptions(): pino.LoggerOptions {
    return {
      level: this.config.level,
      base: { service: this.config.service.name },
      formatters: {
        level: (label) => ({ level: label }),
        log: (object) => this.addTraceContext(object)
      }
    };
  }

  /**
   * Add OpenTelemetry trace context to log entries
   */
  private addTraceContext(logObject: Record<string, unknown>): Record<string, unknown> {
    const span = trace.getActiveSpan();
    if (span) {
      const spanContext = span.spanContext();
      return {
        ...logObject,
        trace_id: spanContext.traceId,
        span_id: spanContext.spanId,
        trace_flags: spanContext.traceFlags
      };
    }
    return logObject;
  }

  private sanitizeForProduction(message: string, data?: unknown): { message: string; data?: unknown } {
    if (!this.isProduction) {
      return { message, data };
    }

    const sanitizedMessage = message
      .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g, '[EMAIL]')
      .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [TOKEN]')
      .replace(/[A-Za-z0-9\-._~+/]{32,}/g, '[TOKEN]');

    return { message: sanitizedMessage, data: this.sanitizeValue(data, new WeakSet()) };
  }

  private sanitizeValue(value: unknown, visited: WeakSet<object>): unknown {
    if (typeof value !== 'object' || value === null) {
      return value;
    }

    if (visited.has(value)) {
      return '[Circular Reference]';
    }
    visited.add(value);

    if (Array.isArray(value)) {
      return value.map(item => this.sanitizeValue(item, visited));
    }

    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = this.sanitizeValue(entry, visited);
      }
    }
    return sanitized;
  }

  private toRecord(data: unknown): Record<string, unknown> {
    if (data === undefined || data === null) {
      return {};
    }
    if (typeof data === 'object' && !Array.isArray(data)) {
      return { ...data };
    }
    return { data };
  }

  // Transports bypass formatters, so trace context is merged by hand
  private withTrace(data: unknown): Record<string, unknown> {
    const record = this.toRecord(data);
    return this.hasTransports ? this.addTraceContext(record) : record;
  }

  debug(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.debug(this.withTrace(sanitized.data), sanitized.message);
  }

  info(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.info(this.withTrace(sanitized.data), sanitized.message);
  }

  warn(message: string, data?: unknown): void {
    const sanitized = this.sanitizeForProduction(message, data);
    this.pino.warn(this.withTrace(sanitized.data), sanitized.message);
  }

  error(message: string, error?: Error | unknown): void {
    const { message: sanitizedMessage } = this.sanitizeForProduction(message);

    if (error instanceof Error) {
      const errorInfo = this.isProduction
        ? { name: error.name, message: 'Internal server error' }
        : { name: error.name, message: error.message, stack: error.stack };
      this.pino.error(this.withTrace({ err: errorInfo }), sanitizedMessage);
    } else {
      const { data: sanitizedError } = this.sanitizeForProduction('', error);
      this.pino.error(this.withTrace(sanitizedError), sanitizedMessage);
    }
  }

  // OAuth-specific logging methods
  oauthDebug(message: string, data?: unknown): void {
    this.debug(`[OAuth] ${message}`, data);
  }

  oauthInfo(message: string, data?: unknown): void {
    this.info(`[OAuth] ${message}`, data);
  }

  oauthWarn(message: string, data?: unknown): void {
    this.warn(`[OAuth] ${message}`, data);
  }

  oauthError(message: string, error?: Error | unknown): void {
    this.error(`[OAuth] ${message}`, error);
  }
}

let loggerInstance: ObservabilityLogger | null = null;

export function getLogger(): ObservabilityLogger {
  if (!loggerInstance) {
    loggerInstance = new ObservabilityLogger();
  }
  return loggerInstance;
}

export const logger = getLogger();
