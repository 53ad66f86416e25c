import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

// Define log format
const logFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(({ timestamp, level, message, stack }) => {
        return stack
            ? `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`
            : `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
);

// Create the logger. Results go to stdout, so every log level goes to stderr.
const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                winston.format.printf(({ timestamp, level, message }) => {
                    return `${timestamp} ${level}: ${message}`;
                })
            ),
        }),
    ],
});

let fileLoggingDir: string | undefined;

/**
 * Also write logs to rotating files under `logsDir`
 */
export function enableFileLogging(logsDir: string): void {
    const resolved = path.resolve(logsDir);
    if (fileLoggingDir === resolved) return;

    if (!fs.existsSync(resolved)) {
        fs.mkdirSync(resolved, { recursive: true });
    }

    logger.add(new DailyRotateFile({
        filename: path.join(resolved, 'diffcov-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '14d',
        format: logFormat,
    }));
    logger.add(new winston.transports.File({
        filename: path.join(resolved, 'error.log'),
        level: 'error',
        format: logFormat,
    }));
    fileLoggingDir = resolved;
}

export function setLogLevel(level: string): void {
    logger.level = level;
}

export default logger;
