import { format } from "util";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

/**
 * 调整日志等级，命令行的 --debug 会调用它
 * @param level - 新的日志等级
 */
export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function timestamp() {
  return new Date().toISOString().replace("T", " ").split(".")[0];
}

function output(level: LogLevel, message: unknown, args: unknown[]) {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentLevel]) return;
  const text = format(message, ...args);
  const line = `${LEVEL_COLORS[level]}[${timestamp()}] [${level.toUpperCase()}]\x1b[0m ${text}`;
  if (level === "warn" || level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
}

const logger = {
  debug: (message: unknown, ...args: unknown[]) =>
    output("debug", message, args),
  info: (message: unknown, ...args: unknown[]) => output("info", message, args),
  warn: (message: unknown, ...args: unknown[]) => output("warn", message, args),
  error: (message: unknown, ...args: unknown[]) =>
    output("error", message, args),
};

export default logger;
