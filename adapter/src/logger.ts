import pino from 'pino';

export type Logger = pino.Logger;

/** The chat host owns stdout; only problems are worth a line by default */
export function createAdapterLogger(level: pino.LevelWithSilent = 'warn'): Logger {
    return pino({
        name: 'maps-adapter',
        level,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}
