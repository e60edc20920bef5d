import winston from 'winston';
import path from 'path';
import fs from 'fs';

const logToFile = process.env.LOG_TO_FILE !== 'false';
const silent = process.env.LOG_SILENT === 'true';

// Create logs directory if file logging is on
const logsDir = path.join(process.cwd(), 'logs');
if (logToFile && !silent && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format (more readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({ format: consoleFormat }),
  ];

  if (logToFile && !silent) {
    transports.push(
      // All logs
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log'),
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      }),
      // Errors only
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error',
        maxsize: 10485760,
        maxFiles: 5,
      }),
      // Trade log (orders, fills, sells)
      new winston.transports.File({
        filename: path.join(logsDir, 'trade.log'),
        level: 'info',
        maxsize: 10485760,
        maxFiles: 10,
      })
    );
  }

  return transports;
}

// Create logger instance
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  silent,
  transports: buildTransports(),
});

// Specialized logging functions
export const logTrade = (action: string, data: Record<string, unknown>) => {
  logger.info(`[TRADE] ${action}`, { trade: data, timestamp: new Date().toISOString() });
};

export const logSellSignal = (signal: string, data: Record<string, unknown>) => {
  logger.warn(`[SELL] ${signal}`, { sell: data, timestamp: new Date().toISOString() });
};

export const logCooldown = (action: string, data: Record<string, unknown>) => {
  logger.info(`[COOLDOWN] ${action}`, { cooldown: data, timestamp: new Date().toISOString() });
};

export const logCycle = (stage: string, data: Record<string, unknown>) => {
  logger.info(`[CYCLE] ${stage}`, { cycle: data, timestamp: new Date().toISOString() });
};

// Export default logger
export default logger;
