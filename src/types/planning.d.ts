import type { FileManifest, LocalTorrent, TorrentRecord } from "./torrent.ts";

/** 比较文件清单时的选项 */
export type IdentityOptions = {
  /** 路径比较是否区分大小写 */
  caseSensitive: boolean;
  /** 只按大小比较时允许的相对误差，如 0.01 */
  sizeTolerance: number;
};

export type IdentityVerdict = "identical" | "different" | "ambiguous";

/** 内容一致的一组种子 */
export type ContentCluster<T extends TorrentRecord = TorrentRecord> = {
  /** 在当次计算中的序号 */
  id: number;
  members: T[];
  /** 文件清单签名，清单未知时为 null */
  signature: string | null;
  /** 去重后的实际占用（字节） */
  effectiveSize: number;
};

/** 删除种子的方式 */
export type EvictionMode =
  /** 最后一个引用该内容的种子：删除任务并删除文件 */
  | "reclaim"
  /** 还有其它种子引用同一份文件：只删除任务 */
  | "detach";

export type DownloadAction = {
  type: "download";
  candidate: TorrentRecord;
  score: number;
};

export type EvictAction = {
  type: "evict";
  record: LocalTorrent;
  mode: EvictionMode;
  /** 预计释放的空间 */
  freedBytes: number;
  /** 被删除时的评分 */
  score: number;
  /** 为哪个候选种子腾出的空间 */
  forKey: string;
};

export type CrossSeedAction = {
  type: "cross-seed";
  candidate: TorrentRecord;
  /** 已经下载完成、文件将被复用的本地种子 */
  existing: LocalTorrent;
  score: number;
};

export type PlanAction = DownloadAction | EvictAction | CrossSeedAction;

export type SkipReason =
  | "already-local"
  | "already-resident"
  | "manifest-unavailable"
  /** 排名靠后，没有抓取文件清单 */
  | "not-shortlisted"
  | "low-score"
  | "download-budget"
  | "storage-budget";

export type SkippedCandidate = {
  candidate: TorrentRecord;
  score: number;
  reason: SkipReason;
};

export type PlanWarning =
  | {
      kind: "ambiguous-identity";
      candidate: TorrentRecord;
      /** 大小接近但无法比较文件清单的本地种子 */
      local: LocalTorrent;
    }
  | {
      kind: "manifest-unavailable";
      candidate: TorrentRecord;
      reason: string;
    };

export type Plan = {
  actions: PlanAction[];
  storageBudgetBytes: number;
  downloadBudgetBytes: number;
  occupiedBefore: number;
  occupiedAfter: number;
  downloadedBytes: number;
  /** 辅种的种子声明大小之和，不占用额外空间 */
  crossSeededBytes: number;
  skipped: SkippedCandidate[];
  warnings: PlanWarning[];
};

/** 已经排序的候选种子 */
export type RankedCandidate = {
  record: TorrentRecord;
  score: number;
};

/** 文件清单抓取结果 */
export type ManifestLookup =
  | { ok: true; manifest: FileManifest }
  | { ok: false; reason: string };
