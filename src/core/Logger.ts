import winston from 'winston';
import path from 'path';
import fs from 'fs';

const LOG_FOLDER = process.env.LOG_FOLDER || './logs';

if (!fs.existsSync(LOG_FOLDER)) {
  fs.mkdirSync(LOG_FOLDER, { recursive: true });
}

// Lookup tokens travel in the query string, so URLs are covered by the token pattern.
// A value runs until whitespace, a quote or the next query parameter.
const SENSITIVE_PATTERNS = [
  /apikey[=:]\s*["']?[^"'\s&]+["']?/gi,
  /token[=:]\s*["']?[^"'\s&]+["']?/gi,
  /password[=:]\s*["']?[^"'\s&]+["']?/gi,
  /secret[=:]\s*["']?[^"'\s&]+["']?/gi,
];

/**
 * Replace credential values in a log message with a placeholder
 */
export function redactSensitiveData(message: string): string {
  let filtered = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    filtered = filtered.replace(pattern, (match) => {
      const [key] = match.split(/[=:]/);
      return `${key}=***REDACTED***`;
    });
  }
  return filtered;
}

const filterSensitiveData = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactSensitiveData(info.message);
  }
  return info;
});

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.printf(({ timestamp, level, message, module }) => {
    const modulePrefix = module ? `[${module}]` : '';
    return `${timestamp} ${level} ${modulePrefix} ${message}`;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  filterSensitiveData(),
  winston.format.json()
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
    new winston.transports.File({
      filename: path.join(LOG_FOLDER, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(LOG_FOLDER, 'combined.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ],
});

export function createLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

export default logger;
