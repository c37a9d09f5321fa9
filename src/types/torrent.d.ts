/** 种子中的单个文件 */
export type FileEntry = {
  /** 相对路径（含种子根目录名），统一使用 `/` 分隔 */
  path: string;
  /** 文件大小（字节） */
  size: number;
};

/** 种子的文件清单，按种子内的顺序排列 */
export type FileManifest = FileEntry[];

/** 站点促销类型 */
export type Promotion = "free" | "two_up" | "half_down" | "thirty_down";

/** 种子在某个站点上的唯一标识 */
export type TorrentKey = {
  /** 站点标签，如 byr、tju */
  site: string;
  /** 站点内的种子 ID */
  id: string;
};

/** 评分所需的种子属性 */
export type ScoreInputs = {
  /** 做种人数 */
  seeders: number;
  /** 下载人数 */
  leechers: number;
  /** 已完成次数 */
  finished: number;
  /** 存活时间（天） */
  liveDays: number;
  /** 促销标签 */
  promotions: Promotion[];
  /** 当前用户在该种子上的上传量（字节） */
  uploadedBytes: number;
  /** 当前用户在该种子上的下载量（字节） */
  downloadedBytes: number;
};

/** 站点或本地的种子记录 */
export type TorrentRecord = {
  key: TorrentKey;
  /** 种子标题 */
  title: string;
  /** 文件清单，尚未抓取时为 null */
  manifest: FileManifest | null;
  /** 站点声明的总大小（字节） */
  sizeBytes: number;
  scoreInputs: ScoreInputs;
  /** 来源站点 */
  origin: string;
};

/**
 * 本地种子状态。
 * protected 即客户端中带有 keep 标签的种子，与下载进度无关。
 */
export type LocalState =
  | { kind: "downloading" }
  | { kind: "seeding" }
  | { kind: "protected"; complete: boolean };

/** qBittorrent 中由本工具管理的种子 */
export type LocalTorrent = TorrentRecord & {
  manifest: FileManifest;
  /** 客户端中的种子 hash */
  hash: string;
  /** 保存路径 */
  savePath: string;
  state: LocalState;
  /** 剩余字节数 */
  amountLeft: number;
  /** 完成时间（UNIX 时间戳，秒），未完成为 0 或负数 */
  completedOn: number;
  /** 当前上传速度（字节/秒） */
  upSpeed: number;
};
