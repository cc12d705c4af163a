import pino, { type Logger } from 'pino';
import type { Config } from './config';

/**
 * Root logger shared by the HTTP server and the booking core
 */
export function createLogger(config: Pick<Config, 'LOG_LEVEL' | 'LOG_PRETTY'>): Logger {
    if (!config.LOG_PRETTY) {
        return pino({ level: config.LOG_LEVEL });
    }
    return pino({
        level: config.LOG_LEVEL,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                ignore: 'pid,hostname',
                translateTime: 'SYS:dd-mm-yyyy HH:MM:ss'
            }
        }
    });
}
