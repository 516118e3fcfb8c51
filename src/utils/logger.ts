import winston from 'winston';
import config, { configWarnings } from '../config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const logFormat = printf(({ level, message, timestamp, stack }) =>
    `${timestamp} [${level}] ${stack || message}`
);

export const logger = winston.createLogger({
    level: config.logLevel,
    silent: process.env.NODE_ENV === 'test',
    format: combine(errors({ stack: true }), timestamp(), logFormat),
    transports: [
        new winston.transports.Console({
            format: combine(colorize(), timestamp(), logFormat),
        }),
    ],
});

// Lets morgan write access lines through winston: app.use(morgan('combined', { stream: morganStream }))
export const morganStream = {
    write: (message: string) => {
        logger.info(message.trim());
    },
};

for (const warning of configWarnings) {
    logger.warn(`[CONFIG] ${warning}`);
}
