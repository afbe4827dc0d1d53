/**
 * @docdesk/observability
 * Pino logging with OpenTelemetry trace context, plus span helpers
 */

export {
  getObservabilityConfig,
  detectEnvironment,
  detectLogLevel,
  type ObservabilityConfig,
  type LogLevel
} from './config.js';
export { logger, getLogger, ObservabilityLogger } from './logger.js';
export { withSpan, getCurrentTraceId, addAttributesToCurrentSpan } from './tracing.js';
