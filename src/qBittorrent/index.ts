import { QBittorrent } from "@ctrl/qbittorrent";
import pLimit from "p-limit";
import { withRetry } from "../function/index.ts";
import logger from "../log/index.ts";
import { errorMessage } from "../planning/errors.ts";
import type { ClientAdapter, StartOptions } from "../types/site.ts";
import type {
  FileManifest,
  LocalState,
  LocalTorrent,
  TorrentKey,
  TorrentRecord,
} from "../types/torrent.ts";

/** 带有该标签的种子不会被删除 */
export const KEEP_TAG = "keep";

/** qBittorrent 种子列表中用到的字段 */
export type QBTorrentRow = {
  hash: string;
  name: string;
  /** 逗号分隔的标签 */
  tags: string;
  save_path: string;
  size: number;
  total_size: number;
  amount_left: number;
  progress: number;
  /** UNIX 时间戳（秒） */
  added_on: number;
  completion_on: number;
  num_complete: number;
  num_incomplete: number;
  upspeed: number;
  uploaded: number;
  downloaded: number;
};

export type QBTorrentFile = {
  /** 相对保存路径的文件路径 */
  name: string;
  size: number;
};

export type QBAddOptions = {
  savepath?: string;
  tags?: string;
  rename?: string;
  skip_checking?: "true" | "false";
  /** qBittorrent 4.x */
  paused?: "true" | "false";
  /** qBittorrent 5.x */
  stopped?: "true" | "false";
};

/** sync/maindata 中用到的部分 */
export type QBMainData = {
  /** 全局状态，free_space_on_disk 为默认保存路径所在磁盘的剩余空间 */
  server_state?: { [key: string]: unknown };
};

/** 用到的 qBittorrent Web API，@ctrl/qbittorrent 的 QBittorrent 满足该接口 */
export interface QBApi {
  login(): Promise<boolean>;
  getAppVersion(): Promise<string>;
  getSyncMainData(): Promise<QBMainData>;
  listTorrents(options?: { tag?: string }): Promise<QBTorrentRow[]>;
  torrentFiles(hash: string): Promise<QBTorrentFile[]>;
  addTorrent(torrent: Buffer, options?: QBAddOptions): Promise<boolean>;
  removeTorrent(hashes: string, deleteFiles?: boolean): Promise<boolean>;
}

export type QBSettings = {
  host: string;
  username: string;
  password: string;
};

/** 创建并登录 qBittorrent 客户端实例
 * @returns 已登录的 QBittorrent 实例
 */
export async function createQBClient(settings: QBSettings) {
  const client = new QBittorrent({
    baseUrl: settings.host,
    username: settings.username,
    password: settings.password,
  });

  try {
    await client.login();
    return client;
  } catch (err) {
    throw new Error(
      "qBittorrent链接失败: 请检查Web UI是否开启或密码是否正确。",
      { cause: err }
    );
  }
}

/**
 * 本工具添加的种子在客户端中的名字
 * @returns 如 `[byr-12345]标题`
 */
export function localName(record: TorrentRecord): string {
  return `[${record.key.site}-${record.key.id}]${record.title}`;
}

/**
 * 从客户端中的种子名还原站点和种子 ID
 * @returns 不是本工具添加的种子返回 null
 */
export function parseLocalName(
  name: string
): { key: TorrentKey; title: string } | null {
  const match = name.match(/^\[([a-z][a-z0-9]*)-(\d+)\](.*)$/);
  if (!match) return null;
  return { key: { site: match[1], id: match[2] }, title: match[3] };
}

function parseTags(tags: string): string[] {
  return tags
    .split(",")
    .map((tag) => tag.trim())
    .filter(Boolean);
}

function localState(row: QBTorrentRow): LocalState {
  const complete = row.amount_left === 0 && row.progress >= 1;
  if (parseTags(row.tags).includes(KEEP_TAG)) return { kind: "protected", complete };
  return complete ? { kind: "seeding" } : { kind: "downloading" };
}

export type QBClientAdapterOptions = {
  /** 新下载的种子的保存路径 */
  downloadDir: string;
  /** 失败重试的初始延迟（毫秒） */
  retryDelay?: number;
  /** 同时查询文件列表的种子数 */
  concurrency?: number;
  /** 当前时间（Unix 秒） */
  now?: () => number;
};

/** 通过 qBittorrent Web API 管理本地种子 */
export class QBClientAdapter implements ClientAdapter {
  private readonly api: QBApi;
  private readonly downloadDir: string;
  private readonly retryDelay: number;
  private readonly concurrency: number;
  private readonly now: () => number;

  constructor(api: QBApi, options: QBClientAdapterOptions) {
    this.api = api;
    this.downloadDir = options.downloadDir;
    this.retryDelay = options.retryDelay ?? 5000;
    this.concurrency = options.concurrency ?? 4;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  /**
   * 通用的 QB 请求重试封装
   * @param fn - 要执行的请求函数
   */
  private qbRequestWithRetry<T>(fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, "QB", 3, this.retryDelay);
  }

  /** 登录状态失效（如 qBittorrent 重启）时重新登录 */
  private async ensureSession() {
    try {
      await this.api.getAppVersion();
    } catch {
      logger.debug("qBittorrent 会话失效，重新登录");
      await this.qbRequestWithRetry(() => this.api.login());
    }
  }

  /** 由本工具添加（名字形如 `[站点-ID]标题`）的种子 */
  async listLocalTorrents(): Promise<LocalTorrent[]> {
    await this.ensureSession();
    const rows = await this.qbRequestWithRetry(() => this.api.listTorrents());
    const managed = rows.flatMap((row) => {
      const parsed = parseLocalName(row.name);
      return parsed ? [{ row, ...parsed }] : [];
    });

    const now = this.now();
    const toLocal = (
      { row, key, title }: (typeof managed)[number],
      manifest: FileManifest
    ): LocalTorrent => ({
      key,
      title,
      manifest,
      sizeBytes: row.total_size,
      scoreInputs: {
        seeders: row.num_complete,
        leechers: row.num_incomplete,
        finished: 0,
        liveDays: Math.max(0, (now - row.added_on) / (24 * 60 * 60)),
        promotions: [],
        uploadedBytes: row.uploaded,
        downloadedBytes: row.downloaded,
      },
      origin: key.site,
      hash: row.hash,
      savePath: row.save_path,
      state: localState(row),
      amountLeft: row.amount_left,
      completedOn: row.completion_on,
      upSpeed: row.upspeed,
    });

    const limit = pLimit(this.concurrency);
    const results = await Promise.allSettled(
      managed.map((item) =>
        limit(async () => {
          const files = await this.qbRequestWithRetry(() =>
            this.api.torrentFiles(item.row.hash)
          );
          return toLocal(
            item,
            files.map((file) => ({ path: file.name.replace(/\\/g, "/"), size: file.size }))
          );
        })
      )
    );

    return results.map((result, i) => {
      if (result.status === "fulfilled") return result.value;
      // 拿不到文件列表的种子按清单未知处理，只占用声明的大小
      logger.warn(
        `获取种子 ${managed[i].row.name} 的文件列表失败:`,
        errorMessage(result.reason)
      );
      return toLocal(managed[i], []);
    });
  }

  /** qBittorrent 所在机器上的磁盘剩余空间，客户端可以在远程 */
  async freeSpaceBytes(): Promise<number> {
    await this.ensureSession();
    const data = await this.qbRequestWithRetry(() => this.api.getSyncMainData());
    const free = data.server_state?.free_space_on_disk;
    if (typeof free !== "number" || !Number.isFinite(free)) {
      throw new Error("qBittorrent 未返回磁盘剩余空间");
    }
    return free;
  }

  private async add(torrent: Buffer, options: QBAddOptions) {
    const ok = await this.qbRequestWithRetry(() =>
      this.api.addTorrent(torrent, options)
    );
    if (!ok) throw new Error(`qBittorrent 拒绝添加种子 ${options.rename ?? ""}`);
  }

  async startDownload(
    record: TorrentRecord,
    torrent: Buffer,
    options: StartOptions = {}
  ): Promise<void> {
    const addOptions: QBAddOptions = {
      savepath: this.downloadDir,
      tags: record.key.site,
      rename: localName(record),
    };
    if (options.skipChecking) addOptions.skip_checking = "true";
    if (options.paused) {
      addOptions.paused = "true";
      addOptions.stopped = "true";
    }
    await this.add(torrent, addOptions);
  }

  async registerCrossSeed(
    record: TorrentRecord,
    torrent: Buffer,
    existing: LocalTorrent
  ): Promise<void> {
    await this.add(torrent, {
      savepath: existing.savePath,
      tags: record.key.site,
      rename: localName(record),
      skip_checking: "true",
    });
  }

  async stop(local: LocalTorrent): Promise<void> {
    await this.qbRequestWithRetry(() => this.api.removeTorrent(local.hash, false));
  }

  async stopAndDelete(local: LocalTorrent): Promise<void> {
    await this.qbRequestWithRetry(() => this.api.removeTorrent(local.hash, true));
  }
}
