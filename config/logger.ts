import pino from "pino";

const isDev = process.env.NODE_ENV !== "production";
const isTest = process.env.NODE_ENV === "test";

const baseOptions: pino.LoggerOptions = {
  name: "tandem-router",
  level: process.env.LOG_LEVEL ?? "info",
};

export const logger =
  isDev && !isTest
    ? pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            singleLine: true,
            destination: 2,
          },
        },
      })
    : pino(baseOptions, pino.destination(2));
