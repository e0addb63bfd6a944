import { pino, type DestinationStream, type Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
    level?: LogLevel;
    /** defaults to stdout */
    destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    const pinoOptions = {
        level: options.level ?? "info",
        base: { service: "ecoscore" },
    };
    return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}
