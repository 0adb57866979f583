import pino from "pino";
import dotenv from "dotenv";

dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

function levelFor(env: string | undefined): pino.LevelWithSilent {
    if (env === "test") return "silent";
    return env === "development" ? "debug" : "info";
}

export function createLogger(env: string | undefined = process.env.NODE_ENV): pino.Logger {
    return pino({
        level: levelFor(env),
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { pid: process.pid, service: "weather-balance-service" },
        transport: env === "development"
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "yyyy-mm-dd HH:MM:ss",
                    ignore: "pid,hostname",
                },
            }
            : undefined,
    });
}

export const logger = createLogger();
