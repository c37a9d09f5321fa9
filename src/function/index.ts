import logger from "../log/index.ts";
import { errorMessage } from "../planning/errors.ts";

// 等待函数
export function wait(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * 通用的请求重试封装，失败后按指数退避重试
 * @param fn - 要执行的请求函数
 * @param label - 日志中显示的请求名称
 * @param maxRetries - 最大重试次数
 * @param initialDelay - 初始延迟时间（毫秒）
 * @returns 请求结果
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  label: string,
  maxRetries = 3,
  initialDelay = 5000
): Promise<T> {
  let attempt = 0;
  let delay = initialDelay;

  while (true) {
    try {
      return await fn();
    } catch (err) {
      attempt++;
      // 最后一次尝试失败，抛出原始错误
      if (attempt > maxRetries) throw err;
      logger.warn(
        `${label} 请求失败（第 ${attempt}/${maxRetries} 次尝试）。${Math.round(
          delay / 1000
        )} 秒后重试: ${errorMessage(err)}`
      );
      await wait(delay);
      delay = Math.min(delay * 2, 10000);
    }
  }
}

/**
 * 给 Promise 加上超时
 * @param promise - 原始 Promise
 * @param ms - 超时时间（毫秒）
 * @param message - 超时时的错误信息
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message = `操作超时（${ms} 毫秒）`
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

const SIZE_UNITS: Record<string, number> = {
  b: 1,
  kb: 1024,
  kib: 1024,
  mb: 1024 ** 2,
  mib: 1024 ** 2,
  gb: 1024 ** 3,
  gib: 1024 ** 3,
  tb: 1024 ** 4,
  tib: 1024 ** 4,
  pb: 1024 ** 5,
  pib: 1024 ** 5,
};

/**
 * 解析站点显示的大小，单位按 1024 进制
 * @param text - 如 `1.5 GB`、`700MiB`、`1,024 KB`，纯数字视为字节
 * @returns 字节数
 */
export function parseSize(text: string): number {
  const match = text
    .trim()
    .replace(/,/g, "")
    .match(/^(\d+(?:\.\d+)?)\s*([a-z]*)$/i);
  if (!match) throw new Error(`无法解析大小: ${text}`);
  const factor = SIZE_UNITS[(match[2] || "b").toLowerCase()];
  if (factor === undefined) throw new Error(`未知的大小单位: ${text}`);
  return Math.round(Number(match[1]) * factor);
}

const DISPLAY_UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * 格式化字节数
 * @returns 如 `20.00 GB`
 */
export function formatBytes(bytes: number): string {
  let exponent = 0;
  while (
    exponent < DISPLAY_UNITS.length - 1 &&
    Math.abs(bytes) >= 1024 ** (exponent + 1)
  ) {
    exponent++;
  }
  if (exponent === 0) return `${bytes} B`;
  return `${(bytes / 1024 ** exponent).toFixed(2)} ${DISPLAY_UNITS[exponent]}`;
}

/**
 * 错误处理函数：输出错误并让进程以非零状态退出
 * @param error
 */
export function ErrorHandler(error: unknown) {
  let errorText;
  if (error instanceof Error) {
    errorText = `name: ${error.name}\nmessage: ${error.message}\nstack: ${error.stack}`;
  } else {
    errorText = JSON.stringify(error, null, 2);
  }
  logger.error(`错误信息:\n${errorText}`);
  process.exitCode = 1;
}
