import { pino } from 'pino'
import type { Logger as PinoLogger } from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type Logger = PinoLogger

export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    return pino({
        name: 'incident-trail',
        level: config.logLevel,
        transport: {
            target: 'pino-pretty',
            options: { colorize: true, destination: 2, ignore: 'pid,hostname,name' },
        },
    })
}

export function createSilentLogger(): Logger {
    return pino({ level: 'silent' })
}
