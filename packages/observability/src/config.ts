/**
 * Observability configuration with environment detection
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface ObservabilityConfig {
  environment: 'development' | 'production' | 'test';
  level: LogLevel;
  exporters: {
    /** Human-readable output through pino-pretty on stderr */
    console: boolean;
  };
  service: {
    name: string;
    version: string;
  };
}

/**
 * Detect deployment environment
 */
export function detectEnvironment(): 'development' | 'production' | 'test' {
  if (process.env.NODE_ENV === 'test') {
    return 'test';
  }
  if (process.env.NODE_ENV === 'production') {
    return 'production';
  }
  return 'development';
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolve the log level: LOG_LEVEL wins, then the environment default
 */
export function detectLogLevel(environment: ObservabilityConfig['environment']): LogLevel {
  const requested = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && isLogLevel(requested)) {
    return requested;
  }
  return environment === 'development' ? 'debug' : 'info';
}

/**
 * Get observability configuration based on environment
 */
export function getObservabilityConfig(): ObservabilityConfig {
  const environment = detectEnvironment();

  return {
    environment,
    level: detectLogLevel(environment),
    exporters: {
      console: environment === 'development',
    },
    service: {
      name: process.env.OTEL_SERVICE_NAME ?? 'docdesk',
      version: process.env.npm_package_version ?? '0.1.0',
    },
  };
}
