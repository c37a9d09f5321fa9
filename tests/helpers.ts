import { vi } from "vitest";
import { loadConfig, type AppConfig } from "../src/config/index.ts";
import { formatKey, manifestSize } from "../src/planning/identity.ts";
import type { ScoringPolicy } from "../src/planning/scoring.ts";
import type {
  CandidateFilter,
  ClientAdapter,
  StartOptions,
  TrackerAdapter,
} from "../src/types/site.ts";
import type {
  FileManifest,
  LocalTorrent,
  ScoreInputs,
  TorrentKey,
  TorrentRecord,
} from "../src/types/torrent.ts";

export const GB = 1024 ** 3;

/** 以 root 为根目录、文件大小依次为 sizes 的清单 */
export function manifestOf(root: string, sizes: number[]): FileManifest {
  return sizes.map((size, i) => ({ path: `${root}/file${i}.bin`, size }));
}

export function inputs(overrides: Partial<ScoreInputs> = {}): ScoreInputs {
  return {
    seeders: 5,
    leechers: 10,
    finished: 0,
    liveDays: 0,
    promotions: [],
    uploadedBytes: 0,
    downloadedBytes: 0,
    ...overrides,
  };
}

type RecordOptions = {
  title?: string;
  size?: number;
  manifest?: FileManifest | null;
  scoreInputs?: Partial<ScoreInputs>;
};

export function makeRecord(
  site: string,
  id: string,
  options: RecordOptions = {}
): TorrentRecord {
  const manifest = options.manifest ?? null;
  return {
    key: { site, id },
    title: options.title ?? `${site} ${id}`,
    manifest,
    sizeBytes: options.size ?? (manifest ? manifestSize(manifest) : GB),
    scoreInputs: inputs(options.scoreInputs),
    origin: site,
  };
}

export function makeLocal(
  site: string,
  id: string,
  manifest: FileManifest,
  overrides: Partial<LocalTorrent> = {}
): LocalTorrent {
  return {
    key: { site, id },
    title: `${site} ${id}`,
    manifest,
    sizeBytes: manifestSize(manifest),
    scoreInputs: inputs(),
    origin: site,
    hash: `hash-${site}-${id}`,
    savePath: "/downloads",
    state: { kind: "seeding" },
    amountLeft: 0,
    completedOn: 0,
    upSpeed: 0,
    ...overrides,
  };
}

type Bencodable = string | number | Bencodable[] | { [key: string]: Bencodable };

/** 只支持 ASCII 字符串的 bencode 编码 */
export function bencode(value: Bencodable): string {
  if (typeof value === "number") return `i${value}e`;
  if (typeof value === "string") return `${value.length}:${value}`;
  if (Array.isArray(value)) return `l${value.map(bencode).join("")}e`;
  const keys = Object.keys(value).sort();
  return `d${keys.map((key) => bencode(key) + bencode(value[key])).join("")}e`;
}

/**
 * 生成多文件种子
 * @param files - 路径（用 `/` 分隔，不含根目录）与大小
 */
export function torrentFile(name: string, files: [path: string, size: number][]): Buffer {
  return Buffer.from(
    bencode({
      announce: "http://tracker.example/announce",
      info: {
        files: files.map(([path, length]) => ({ length, path: path.split("/") })),
        name,
        "piece length": 16384,
        pieces: "p".repeat(20),
      },
    }),
    "ascii"
  );
}

/** 按种子标识返回固定分数的评分策略 */
export class FixedPolicy implements ScoringPolicy {
  constructor(
    private readonly candidateScores: Record<string, number> = {},
    private readonly residentScores: Record<string, number | null> = {}
  ) {}

  score(record: TorrentRecord): number {
    return this.candidateScores[formatKey(record.key)] ?? 0;
  }

  residentScore(local: LocalTorrent): number | null {
    const key = formatKey(local.key);
    return key in this.residentScores ? this.residentScores[key] : 0;
  }
}

/** 测试用配置，上限 100 GiB，单次下载 50 GiB，只启用 byr */
export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    QBITTORRENT_HOST: "http://localhost:8080",
    QBITTORRENT_USERNAME: "admin",
    QBITTORRENT_PASSWORD: "test-secret",
    DOWNLOAD_DIR: "/downloads",
    MAX_TOTAL_SIZE: "100 GiB",
    MAX_DOWNLOAD_SIZE: "50 GiB",
    EVICTION_MARGIN: "0",
    BYR_COOKIE: "test-cookie",
    ...overrides,
  });
}

/**
 * 内存中的站点
 * @param records - 候选和热门种子列表
 * @param manifests - 按种子 ID 返回的文件清单，缺少的种子抓取时报错
 */
export function fakeTracker(
  site: string,
  records: TorrentRecord[],
  manifests: Record<string, FileManifest> = {}
) {
  return {
    site,
    listCandidates: vi.fn(async (_filter?: CandidateFilter) => records),
    listHotTorrents: vi.fn(async () => records),
    fetchManifest: vi.fn(async (key: TorrentKey) => {
      const manifest = manifests[key.id];
      if (!manifest) throw new Error(`种子 ${formatKey(key)} 不存在`);
      return manifest;
    }),
    downloadTorrent: vi.fn(async (key: TorrentKey) => Buffer.from(`torrent ${formatKey(key)}`)),
  } satisfies TrackerAdapter;
}

/** 内存中的客户端，所有操作都会成功 */
export function fakeClient(locals: LocalTorrent[] = [], freeSpace = 1024 * GB) {
  return {
    listLocalTorrents: vi.fn(async () => locals),
    freeSpaceBytes: vi.fn(async () => freeSpace),
    startDownload: vi.fn(
      async (_record: TorrentRecord, _torrent: Buffer, _options?: StartOptions) => {}
    ),
    registerCrossSeed: vi.fn(
      async (_record: TorrentRecord, _torrent: Buffer, _existing: LocalTorrent) => {}
    ),
    stop: vi.fn(async (_local: LocalTorrent) => {}),
    stopAndDelete: vi.fn(async (_local: LocalTorrent) => {}),
  } satisfies ClientAdapter;
}
