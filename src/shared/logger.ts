import winston from 'winston'
import { loadLoggingConfig } from './config.js'

const createLogger = () => {
  const config = loadLoggingConfig()

  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    })
  ]

  if (config.filePath) {
    const fileTransportOptions: winston.transports.FileTransportOptions = {
      filename: config.filePath,
      level: config.level,
      maxFiles: config.maxFiles || 5, // Default to 5 rotated files
      tailable: true,
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.printf(({ timestamp, level, message, service, stack, ...meta }) => {
          let log = `${timestamp} [${service}] ${level}: ${message}`;
          if (stack) {
            log += `\n${stack}`;
          }
          const additionalMeta = Object.keys(meta).length ? JSON.stringify(meta) : '';
          if (additionalMeta) {
            log += ` ${additionalMeta}`;
          }
          return log;
        })
      )
    }

    if (config.maxSizeMB) {
      fileTransportOptions.maxsize = config.maxSizeMB * 1024 * 1024;
    }

    transports.push(new winston.transports.File(fileTransportOptions))
  }

  return winston.createLogger({
    level: config.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: 'celestia-da' },
    transports
  })
}

export const logger = createLogger()
