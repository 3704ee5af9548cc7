/**
 * Structured logging for the decision core.
 *
 * Console transport only: the core writes no files of its own.
 * Hosts that want persistent logs add a transport to CoreAI_logger.
 */

import winston from 'winston'

const jsonFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format.json()
)

const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : ''
        return `${timestamp} ${level}: ${message}${metaStr}`
    })
)

export const CoreAI_logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: jsonFormat,
    defaultMeta: { service: 'tick-priority-brain' },
    transports: [
        new winston.transports.Console({
            format:
                process.env.NODE_ENV === 'production' ? jsonFormat : consoleFormat,
        }),
    ],
})

export type CoreAI_Logger = winston.Logger

export function CoreAI_componentLogger(component: string): CoreAI_Logger {
    return CoreAI_logger.child({ component })
}

/**
 * Emits a warning once per distinct key until the key is cleared.
 * Used for conditions that would otherwise repeat every tick.
 */
export class CoreAI_OnceWarner {
    private emitted: Set<string> = new Set()

    constructor(private readonly log: CoreAI_Logger) {}

    warn(key: string, message: string, meta: Record<string, unknown> = {}): void {
        if (this.emitted.has(key)) return

        this.emitted.add(key)
        this.log.warn(message, meta)
    }

    clear(key: string): void {
        this.emitted.delete(key)
    }

    reset(): void {
        this.emitted.clear()
    }
}
