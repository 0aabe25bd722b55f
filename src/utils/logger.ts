import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Root logger, configured once at startup via `initLogger()`.
 * Modules log through children tagged with their component name.
 */
let rootLogger: pino.Logger | null = null;
const children = new Map<string, pino.Logger>();

/**
 * Initialize the root logger. Should be called once at CLI startup.
 * Component loggers are cached per root, so callers fetch them at use time.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    rootLogger = jsonLogs
        ? pino({ name: 'prepubgraph', level })
        : pino({
            name: 'prepubgraph',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });

    children.clear();
    return rootLogger;
}

function envLevel(): LogLevel {
    const value = process.env['PREPUBGRAPH_LOG_LEVEL'];
    return value === 'error' || value === 'warn' || value === 'debug' ? value : 'info';
}

/**
 * Get the logger for a component (or the root logger when no component is given).
 * If not initialized, creates a root logger at `PREPUBGRAPH_LOG_LEVEL` (default info).
 */
export function getLogger(component?: string): pino.Logger {
    if (!rootLogger) {
        rootLogger = initLogger({ level: envLevel() });
    }
    if (!component) return rootLogger;

    let child = children.get(component);
    if (!child) {
        child = rootLogger.child({ component });
        children.set(component, child);
    }
    return child;
}
