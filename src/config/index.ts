import { z } from "zod";
import { parseSize } from "../function/index.ts";
import { errorMessage } from "../planning/errors.ts";
import type { ScorerConfig } from "../planning/scoring.ts";
import type { IdentityOptions } from "../types/planning.ts";

/** 如 `2 TiB`、`500GB`，按 1024 进制 */
const size = z.string().transform((value, ctx) => {
  try {
    return parseSize(value);
  } catch (err) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
    return z.NEVER;
  }
});

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

/** 逗号分隔的列表 */
const list = z.string().transform((value) =>
  Array.from(
    new Set(
      value
        .split(",")
        .map((item) => item.trim())
        .filter(Boolean)
    )
  )
);

const envSchema = z.object({
  QBITTORRENT_HOST: z.string().url(),
  QBITTORRENT_USERNAME: z.string(),
  QBITTORRENT_PASSWORD: z.string(),
  DOWNLOAD_DIR: z.string(),
  MAX_TOTAL_SIZE: size,
  MAX_DOWNLOAD_SIZE: size.optional(),
  EVICTION_MARGIN: z.coerce.number().nonnegative().default(0),
  SHORTLIST_SIZE: z.coerce.number().int().positive().default(20),
  MIN_SCORE: z.coerce.number().default(0),
  CANDIDATE_PAGES: z.coerce.number().int().positive().default(1),
  CASE_SENSITIVE_PATHS: flag.default("true"),
  SIZE_TOLERANCE: z.coerce.number().min(0).max(1).default(0.01),
  SCORING_FREE_WEIGHT: z.coerce.number().nonnegative().default(1),
  SCORING_COST_RECOVERY_DAYS: z.coerce.number().positive().default(7),
  SCORING_REMOVAL_EXEMPTION_DAYS: z.coerce.number().nonnegative().default(15),
  SITES: list.default("byr"),
  SITE_REQUEST_TIMEOUT: z.coerce.number().int().positive().default(30 * 1000),
  SITE_REQUEST_INTERVAL: z.coerce.number().int().nonnegative().default(500),
  MANIFEST_CONCURRENCY: z.coerce.number().int().positive().default(2),
  MANIFEST_TIMEOUT: z.coerce.number().int().positive().default(120 * 1000),
  PROTECTED_KEYS: list.default(""),
  MONGODB_URI: z.string().optional(),
});

export type AppConfig = {
  qbittorrent: { host: string; username: string; password: string };
  /** 新种子的保存路径 */
  downloadDir: string;
  /** 允许占用的总空间 */
  maxTotalSize: number;
  /** 单次运行最多下载的字节数 */
  maxDownloadSize: number;
  evictionMargin: number;
  /** 每次运行最多抓取多少个候选的文件清单 */
  shortlistSize: number;
  minScore: number;
  /** 每个站点抓取的列表页数 */
  candidatePages: number;
  identity: IdentityOptions;
  scoring: ScorerConfig;
  sites: { site: string; cookie: string }[];
  siteRequestTimeout: number;
  siteRequestInterval: number;
  manifestConcurrency: number;
  manifestTimeout: number;
  /** 不允许删除的种子，形如 `byr-12345` */
  protectedKeys: Set<string>;
  mongodbUri: string | undefined;
};

/**
 * 读取并校验环境变量
 * @param env - 环境变量，默认为 process.env
 * @throws 缺少必需的配置或格式错误时抛出错误
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // .env 中留空的变量视为未设置
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`环境变量配置错误:\n${issues}`);
  }
  const parsed = result.data;

  const siteNames = new Set(parsed.SITES.map((site) => site.toLowerCase()));
  const sites = Array.from(siteNames, (site) => {
    const cookie = present[`${site.toUpperCase()}_COOKIE`];
    if (!cookie) {
      throw new Error(`缺少${site.toUpperCase()}_COOKIE环境变量`);
    }
    return { site, cookie };
  });

  return {
    qbittorrent: {
      host: parsed.QBITTORRENT_HOST,
      username: parsed.QBITTORRENT_USERNAME,
      password: parsed.QBITTORRENT_PASSWORD,
    },
    downloadDir: parsed.DOWNLOAD_DIR,
    maxTotalSize: parsed.MAX_TOTAL_SIZE,
    maxDownloadSize: parsed.MAX_DOWNLOAD_SIZE ?? Math.floor(parsed.MAX_TOTAL_SIZE / 50),
    evictionMargin: parsed.EVICTION_MARGIN,
    shortlistSize: parsed.SHORTLIST_SIZE,
    minScore: parsed.MIN_SCORE,
    candidatePages: parsed.CANDIDATE_PAGES,
    identity: {
      caseSensitive: parsed.CASE_SENSITIVE_PATHS,
      sizeTolerance: parsed.SIZE_TOLERANCE,
    },
    scoring: {
      freeWeight: parsed.SCORING_FREE_WEIGHT,
      costRecoveryDays: parsed.SCORING_COST_RECOVERY_DAYS,
      removalExemptionDays: parsed.SCORING_REMOVAL_EXEMPTION_DAYS,
    },
    sites,
    siteRequestTimeout: parsed.SITE_REQUEST_TIMEOUT,
    siteRequestInterval: parsed.SITE_REQUEST_INTERVAL,
    manifestConcurrency: parsed.MANIFEST_CONCURRENCY,
    manifestTimeout: parsed.MANIFEST_TIMEOUT,
    protectedKeys: new Set(parsed.PROTECTED_KEYS),
    mongodbUri: parsed.MONGODB_URI,
  };
}
