import pino, { type Logger } from "pino";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.VITEST !== undefined || process.env.NODE_ENV === "test";

const logger: Logger = pino({
    level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
    transport:
        isProduction || isTest
            ? undefined
            : {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    ignore: "pid,hostname",
                    translateTime: "SYS:standard"
                }
            }
});

export const logInfo = (message: string, ...args: unknown[]) => {
    logger.info(message, ...args);
};
export const logWarn = (message: string, ...args: unknown[]) => {
    logger.warn(message, ...args);
};
export const logError = (message: string, ...args: unknown[]) => {
    logger.error(message, ...args);
};

export type { Logger };
export default logger;
