import path from 'path';
import winston from 'winston';

export interface LogContext {
  requestId?: string;
  userId?: string;
  guildId?: string;
  component?: string;
  operation?: string;
  metadata?: Record<string, unknown>;
}

class StructuredLogger {
  private logger: winston.Logger;

  constructor() {
    this.logger = this.createLogger();
  }

  private createLogger(): winston.Logger {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf((info) => {
            const { timestamp, level, message, requestId, component, operation, ...meta } = info;
            let logLine = `${String(timestamp)} [${level}]`;

            if (component) logLine += ` [${String(component)}]`;
            if (operation) logLine += ` [${String(operation)}]`;
            if (requestId) logLine += ` [${String(requestId)}]`;

            logLine += `: ${String(message)}`;

            const metaKeys = Object.keys(meta);
            if (metaKeys.length > 0) {
              logLine += ` ${JSON.stringify(meta)}`;
            }

            return logLine;
          })
        )
      })
    ];

    if (this.fileLoggingEnabled()) {
      transports.push(...this.createFileTransports('logs'));
    }

    return winston.createLogger({
      level: process.env['LOG_LEVEL'] || 'info',
      format: winston.format.combine(
        winston.format.timestamp({
          format: 'YYYY-MM-DD HH:mm:ss.SSS'
        }),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports
    });
  }

  private fileLoggingEnabled(): boolean {
    return process.env['NODE_ENV'] !== 'test' && process.env['LOG_TO_FILE'] !== 'false';
  }

  private createFileTransports(logDir: string): winston.transport[] {
    return [
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true
      }),

      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true
      }),

      new winston.transports.File({
        filename: path.join(logDir, 'crafty-api.log'),
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json(),
          winston.format((info) => (info['component'] === 'CraftyClient' ? info : false))()
        ),
        maxsize: 10 * 1024 * 1024,
        maxFiles: 3,
        tailable: true
      })
    ];
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.logger.error(message, {
      ...context,
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : undefined
    });
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }

  craftyApiRequest(method: string, endpoint: string, context?: LogContext): void {
    this.debug('Crafty API request', {
      ...context,
      component: 'CraftyClient',
      operation: 'api_request',
      metadata: {
        endpoint,
        method
      }
    });
  }

  craftyApiResponse(endpoint: string, status: number, responseTime: number, context?: LogContext): void {
    this.debug('Crafty API response', {
      ...context,
      component: 'CraftyClient',
      operation: 'api_response',
      metadata: {
        endpoint,
        status,
        responseTime
      }
    });
  }

  channelCooldown(channelName: string, remainingMs: number, context?: LogContext): void {
    this.info('Skipping channel rename, cooldown not reached', {
      ...context,
      component: 'ChannelStatusManager',
      operation: 'rename_cooldown',
      metadata: {
        channelName,
        remainingMs
      }
    });
  }

  validationError(field: string, rule: string, value: unknown, context?: LogContext): void {
    this.warn('Validation error', {
      ...context,
      component: 'Validator',
      operation: 'validation',
      metadata: {
        field,
        rule,
        value: typeof value === 'object' ? JSON.stringify(value) : value
      }
    });
  }

  performance(operation: string, duration: number, context?: LogContext): void {
    this.info('Performance metric', {
      ...context,
      operation: 'performance',
      metadata: {
        operation,
        duration,
        unit: 'ms'
      }
    });
  }
}

export const logger = new StructuredLogger();
