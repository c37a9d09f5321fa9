import type { PlanAction } from "../types/planning.ts";
import type { TorrentKey } from "../types/torrent.ts";

/** 本项目所有错误的基类 */
export class SeedplanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 站点请求失败（网络、登录失效等），可以跳过受影响的种子继续运行 */
export class FetchFailure extends SeedplanError {
  readonly site: string;
  readonly key: TorrentKey | null;

  constructor(
    site: string,
    key: TorrentKey | null,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.site = site;
    this.key = key;
  }
}

/** 无法获取种子的文件清单，该种子本次不会被下载 */
export class ManifestUnavailable extends SeedplanError {
  readonly key: TorrentKey;

  constructor(key: TorrentKey, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.key = key;
  }
}

/** 试图删除受保护的种子，或删除仍被其它种子依赖的文件 */
export class UnsafeEviction extends SeedplanError {
  readonly hash: string;

  constructor(hash: string, message: string) {
    super(message);
    this.hash = hash;
  }
}

/** 执行计划中的某一步时客户端或站点出错 */
export class ExecutionFailure extends SeedplanError {
  readonly action: PlanAction;

  constructor(action: PlanAction, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.action = action;
  }
}

/**
 * 取出错误信息，非 Error 的值转为 JSON
 * @param error - 任意被抛出的值
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return JSON.stringify(error);
}
