export { defaultLogger, type Logger, type LogLevel, silentLogger } from "./logger";
export * from "./result";
export { SerialQueue } from "./serial-queue";
