/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Built-in redaction of credential-bearing fields
 * - Output to stderr so stdout stays free for host processes
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  recipe?: string;
  taskId?: string;
  host?: string;
  url?: string;
  stage?: string;
  transport?: string;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

function parseLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: parseLevel(process.env.LOG_LEVEL),
  prettyPrint: process.env.LOG_PRETTY === 'true',
  destination: 'stderr',
};

/**
 * Paths to redact from logs.
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  '*.set-cookie',
  '*.Set-Cookie',
  '*.proxy-authorization',
  '*.x-api-key',
  'headers.authorization',
  'headers.cookie',
  'requestHeaders.authorization',
  'requestHeaders.cookie',
  'responseHeaders.set-cookie',

  '*.password',
  '*.secret',
  '*.apiKey',
  '*.api_key',
  '*.token',
  '*.accessToken',
  '*.access_token',
  '*.refreshToken',
  '*.refresh_token',
  '*.credentials',

  'session.cookies',
  'storageState.cookies',
  'storageState.origins',
];

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'recipe-replay-engine',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;
  return pino(options, destination);
}

let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper
 *
 * Resolves the base logger on every call so configureLogger() takes effect
 * for loggers created at module load.
 */
export class Logger {
  private cached: PinoLogger | null = null;
  private readonly component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this.cached = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    return this.cached ?? baseLogger.child({ component: this.component });
  }

  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component);
    childLogger.cached = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context ?? {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context ?? {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context ?? {}, message);
  }

  /**
   * Accepts unknown for error since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error !== undefined) {
      const err = context.error instanceof Error
        ? { message: context.error.message, name: context.error.name, stack: context.error.stack }
        : { message: String(context.error) };
      this.logger.error({ ...context, error: undefined, err }, message);
    } else {
      this.logger.error(context ?? {}, message);
    }
  }

  timed(message: string, startTime: number, context?: LogContext): void {
    this.info(message, { ...context, durationMs: Date.now() - startTime });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  egress: new Logger('EgressPolicy'),
  recorder: new Logger('NetworkRecorder'),
  ranker: new Logger('CandidateRanker'),
  analyzer: new Logger('RecipeAnalyzer'),
  validator: new Logger('RecipeValidator'),
  minimizer: new Logger('RequestMinimizer'),
  verifier: new Logger('RecipeVerifier'),
  transport: new Logger('Transport'),
  runner: new Logger('RecipeRunner'),
  pipeline: new Logger('LearningPipeline'),
  engine: new Logger('RecipeEngine'),
  store: new Logger('RecipeStore'),
  artifacts: new Logger('ArtifactStore'),
  sessions: new Logger('BrowserSessionPool'),

  rateLimiter: new Logger('RateLimiter'),
  retry: new Logger('Retry'),

  create: (component: string) => new Logger(component),
};

export default logger;
