import winston from 'winston'
import { env } from './env.js'

const { combine, timestamp, printf, colorize, errors } = winston.format

const logFormat = printf(
  ({ level, message, timestamp, stack }) =>
    `${String(timestamp)} [${level}] ${String(stack ?? message)}`
)

export const logger = winston.createLogger({
  level: env.logLevel,
  format: combine(errors({ stack: true }), timestamp(), logFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), timestamp(), logFormat),
    }),
  ],
})
