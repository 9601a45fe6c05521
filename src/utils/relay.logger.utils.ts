import winston from 'winston';
import type { Request } from 'express';

// Environment variables
const NODE_ENV = process.env.NODE_ENV || 'development';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const SERVICE_NAME = process.env.SERVICE_NAME || 'whatsapp-assistant-relay';

const isDevelopment = NODE_ENV === 'development';
const isTest = NODE_ENV === 'test';

// Custom log format for structured logging
const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss.SSS'
  }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
  winston.format.printf((info) => {
    const { timestamp, level, message, service, context, userId, threadId, ...meta } = info;

    const logEntry = {
      timestamp,
      level: level.toUpperCase(),
      service: service || SERVICE_NAME,
      message,
      ...(context ? { context } : {}),
      ...(userId ? { userId } : {}),
      ...(threadId ? { threadId } : {}),
      ...(Object.keys(meta).length > 0 && { meta })
    };

    return JSON.stringify(logEntry);
  })
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'HH:mm:ss.SSS'
  }),
  winston.format.colorize(),
  winston.format.errors({ stack: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, context, userId, threadId, service, environment, ...meta } = info;

    let logMessage = `[${timestamp}] ${level}:`;
    if (context) logMessage += ` [${context}]`;
    logMessage += ` ${message}`;

    if (userId) logMessage += ` [User: ${userId}]`;
    if (threadId) logMessage += ` [Thread: ${threadId}]`;

    if (Object.keys(meta).length > 0) {
      logMessage += `\n${JSON.stringify(meta, null, 2)}`;
    }

    return logMessage;
  })
);

export const logger = winston.createLogger({
  level: LOG_LEVEL,
  format: logFormat,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: NODE_ENV
  },
  transports: [
    new winston.transports.Console({
      format: isDevelopment ? consoleFormat : logFormat,
      level: LOG_LEVEL
    })
  ],
  exitOnError: false,
  silent: isTest
});

export interface LoggerSettings {
  level: string;
  service: string;
  environment: string;
}

/**
 * Re-apply level, service name and output format once the validated
 * environment is known. The module-level logger only sees the shell env.
 */
export const configureLogger = (settings: LoggerSettings): void => {
  logger.level = settings.level;
  logger.silent = settings.environment === 'test';
  logger.defaultMeta = {
    service: settings.service,
    environment: settings.environment
  };

  logger.clear();
  logger.add(new winston.transports.Console({
    format: settings.environment === 'development' ? consoleFormat : logFormat,
    level: settings.level
  }));
};

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// Custom logging methods with context
export class Logger {
  constructor(private readonly context?: string) {}

  private log(level: LogLevel, message: string, meta?: object) {
    logger.log(level, message, {
      ...meta,
      ...(this.context ? { context: this.context } : {})
    });
  }

  error(message: string, meta?: object): void {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: object): void {
    this.log('warn', message, meta);
  }

  info(message: string, meta?: object): void {
    this.log('info', message, meta);
  }

  debug(message: string, meta?: object): void {
    this.log('debug', message, meta);
  }

  // ========================================
  // MESSAGE LOGGING
  // ========================================

  messageReceived(details: {
    userId: string;
    contactName: string;
    messageLength: number;
  }): void {
    this.log('info', `Message received from ${details.contactName}`, {
      event: 'message',
      action: 'received',
      userId: details.userId,
      messageLength: details.messageLength
    });
  }

  replyDelivered(details: {
    userId: string;
    contactName: string;
    replyLength: number;
    duration: number;
  }): void {
    this.log('info', `Reply delivered to ${details.contactName}`, {
      event: 'message',
      action: 'delivered',
      userId: details.userId,
      replyLength: details.replyLength,
      duration: details.duration
    });
  }

  // ========================================
  // CONVERSATION LOGGING
  // ========================================

  conversationCreated(details: {
    userId: string;
    threadId: string;
    trackedCount: number;
  }): void {
    this.log('info', 'Created new conversation thread', {
      event: 'conversation',
      action: 'created',
      userId: details.userId,
      threadId: details.threadId,
      trackedCount: details.trackedCount
    });
  }

  conversationEvicted(details: {
    userId: string;
    threadId: string;
    reason: 'ttl' | 'capacity';
  }): void {
    this.log('debug', 'Conversation thread evicted', {
      event: 'conversation',
      action: 'evicted',
      userId: details.userId,
      threadId: details.threadId,
      reason: details.reason
    });
  }

  // ========================================
  // ASSISTANT RUN LOGGING
  // ========================================

  jobFinished(details: {
    threadId: string;
    runId: string;
    outcome: string;
    attempts: number;
    status?: string;
  }): void {
    const level: LogLevel = details.outcome === 'completed' ? 'info' : 'error';

    this.log(level, `Assistant run finished: ${details.outcome}`, {
      event: 'run',
      threadId: details.threadId,
      runId: details.runId,
      outcome: details.outcome,
      attempts: details.attempts,
      status: details.status
    });
  }

  // ========================================
  // WEBHOOK LOGGING
  // ========================================

  webhookHandled(details: {
    kind: 'ignored' | 'processed' | 'malformed';
    reason?: string;
    messages?: number;
    statuses?: number;
    failed?: number;
  }): void {
    const level: LogLevel = details.kind === 'malformed' || (details.failed ?? 0) > 0 ? 'warn' : 'info';

    this.log(level, `Webhook ${details.kind}`, {
      event: 'webhook',
      ...details
    });
  }
}

// Helper function to create contextual logger
export const createLogger = (context?: string): Logger => {
  return new Logger(context);
};

// Helper function to extract request ID from request object
export const getRequestId = (req: Request): string => {
  const header = req.headers['x-request-id'];
  if (typeof header === 'string' && header.length > 0) {
    return header;
  }
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
};

// Stream for morgan access logs
export const httpLogStream = {
  write: (line: string): void => {
    logger.info(line.trim(), { http: true });
  }
};

// Startup logging
export const logStartup = (port: number, environment: string) => {
  logger.info('Relay service starting up', {
    startup: true,
    port,
    environment,
    nodeVersion: process.version,
    pid: process.pid
  });
};

// Shutdown logging
export const logShutdown = (reason: string) => {
  logger.info('Relay service shutting down', {
    shutdown: true,
    reason,
    uptime: process.uptime()
  });
};
