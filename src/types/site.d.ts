import type {
  FileManifest,
  LocalTorrent,
  TorrentKey,
  TorrentRecord,
} from "./torrent.ts";

/** 站点种子列表的排序方式 */
export type CandidateSort = "seeders" | "leechers" | "time" | "size";

/** 拉取候选种子时的筛选条件 */
export type CandidateFilter = {
  /** 排序字段，默认按下载人数 */
  sort?: CandidateSort;
  /** 抓取的页数，默认只取第一页 */
  pages?: number;
};

/** 一个站点（PT tracker）的访问接口，每个实例持有自己的会话 */
export interface TrackerAdapter {
  /** 站点标签，如 byr */
  readonly site: string;
  listCandidates(filter?: CandidateFilter): Promise<TorrentRecord[]>;
  fetchManifest(key: TorrentKey): Promise<FileManifest>;
  /** 用于辅种匹配的热门种子 */
  listHotTorrents(): Promise<TorrentRecord[]>;
  /** 下载 .torrent 文件 */
  downloadTorrent(key: TorrentKey): Promise<Buffer>;
}

/** 添加下载时的选项 */
export type StartOptions = {
  /** 添加后暂停 */
  paused?: boolean;
  /** 文件已经在保存路径中，跳过哈希校验 */
  skipChecking?: boolean;
};

/** BT 客户端的访问接口 */
export interface ClientAdapter {
  listLocalTorrents(): Promise<LocalTorrent[]>;
  freeSpaceBytes(): Promise<number>;
  startDownload(
    record: TorrentRecord,
    torrent: Buffer,
    options?: StartOptions
  ): Promise<void>;
  /** 添加种子并跳过校验，直接复用 existing 的文件 */
  registerCrossSeed(
    record: TorrentRecord,
    torrent: Buffer,
    existing: LocalTorrent
  ): Promise<void>;
  /** 只删除任务，保留文件 */
  stop(local: LocalTorrent): Promise<void>;
  /** 删除任务和文件 */
  stopAndDelete(local: LocalTorrent): Promise<void>;
}
