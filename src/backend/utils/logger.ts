import pino from 'pino';
import { loadConfig } from '../config/env';

export type Logger = pino.Logger;

export interface LogConfig {
    level: string;
    pretty: boolean;
}

/**
 * Creates the application logger.
 * Pretty printing runs pino-pretty as a transport; otherwise raw JSON lines.
 */
export function createLogger(config: LogConfig): Logger {
    return pino({
        level: config.level,
        ...(config.pretty && {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                },
            },
        }),
    });
}

const appConfig = loadConfig();

/**
 * Process-wide root logger. Components take a child of it.
 */
export const rootLogger: Logger = createLogger({
    level: appConfig.logLevel,
    pretty: appConfig.logPretty,
});

export function getLogger(component: string): Logger {
    return rootLogger.child({ component });
}
