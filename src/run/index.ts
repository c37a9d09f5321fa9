import type { AppConfig } from "../config/index.ts";
import pLimit from "p-limit";
import { withTimeout } from "../function/index.ts";
import logger from "../log/index.ts";
import { errorMessage } from "../planning/errors.ts";
import { formatKey } from "../planning/identity.ts";
import { StorageLedger } from "../planning/ledger.ts";
import { planSelection } from "../planning/planner.ts";
import { rankCandidates, type ScoringPolicy } from "../planning/scoring.ts";
import type { ManifestLookup, Plan } from "../types/planning.ts";
import type { ClientAdapter, TrackerAdapter } from "../types/site.ts";
import type { LocalTorrent, TorrentRecord } from "../types/torrent.ts";

export type RunContext = {
  config: AppConfig;
  trackers: TrackerAdapter[];
  client: ClientAdapter;
  policy: ScoringPolicy;
  /** 当前时间（Unix 秒） */
  now?: () => number;
};

export type PlanResult = {
  plan: Plan;
  /** 规划时使用的本地快照，执行时用来复查删除是否安全 */
  ledger: StorageLedger;
};

/**
 * 并行地从所有站点拉取种子，失效的站点会被跳过
 * @param trackers - 站点
 * @param label - 日志中的名称
 * @param fetch - 对单个站点的请求
 */
export async function collectFromTrackers(
  trackers: readonly TrackerAdapter[],
  label: string,
  fetch: (tracker: TrackerAdapter) => Promise<TorrentRecord[]>
): Promise<TorrentRecord[]> {
  const results = await Promise.allSettled(
    trackers.map((tracker) =>
      fetch(tracker).catch((err: unknown) => {
        logger.warn(`[${tracker.site}] ${label}获取失败:`, errorMessage(err));
        return [];
      })
    )
  );
  const records = results.flatMap((result) =>
    result.status === "fulfilled" ? result.value : []
  );
  logger.debug(
    `${label}获取完成 - ${trackers.map((t) => t.site).join(", ")}: ${records.length}`
  );
  return records;
}

/**
 * 抓取一组种子的文件清单。
 * 单个种子失败（网络、超时、解析错误）只会记录在结果中，不影响其它种子。
 * @returns 键为 formatKey 的抓取结果
 */
export async function prefetchManifests(
  records: readonly TorrentRecord[],
  trackers: readonly TrackerAdapter[],
  concurrency: number,
  timeout: number
): Promise<Map<string, ManifestLookup>> {
  const bySite = new Map(trackers.map((tracker) => [tracker.site, tracker]));
  const limit = pLimit(concurrency);
  const results = await Promise.allSettled(
    records.map((record) =>
      limit(async () => {
        const tracker = bySite.get(record.key.site);
        if (!tracker) throw new Error(`未配置站点 ${record.key.site}`);
        return await withTimeout(
          tracker.fetchManifest(record.key),
          timeout,
          `获取 ${formatKey(record.key)} 的文件清单超时`
        );
      })
    )
  );

  const manifests = new Map<string, ManifestLookup>();
  results.forEach((result, i) => {
    const key = formatKey(records[i].key);
    if (result.status === "fulfilled") {
      manifests.set(key, { ok: true, manifest: result.value });
    } else {
      const reason = errorMessage(result.reason);
      logger.warn(`获取 ${key} 的文件清单失败:`, reason);
      manifests.set(key, { ok: false, reason });
    }
  });
  return manifests;
}

/**
 * 用站点列表中的最新数据替换本地种子的评分属性
 * @param locals - 客户端中的种子
 * @param listed - 站点列表中的种子
 */
export function refreshScoreInputs(
  locals: readonly LocalTorrent[],
  listed: readonly TorrentRecord[]
): LocalTorrent[] {
  const byKey = new Map(listed.map((record) => [formatKey(record.key), record]));
  return locals.map((local) => {
    const remote = byKey.get(formatKey(local.key));
    return remote ? { ...local, scoreInputs: remote.scoreInputs } : local;
  });
}

/**
 * 存储上限：配置的上限与磁盘实际能容纳的大小中较小的一个
 * @param maxTotalSize - 配置的空间上限
 * @param freeSpace - 磁盘剩余空间
 */
export function storageBudget(
  maxTotalSize: number,
  ledger: StorageLedger,
  freeSpace: number
): number {
  return Math.min(maxTotalSize, ledger.occupiedBytes() + freeSpace);
}

export type BuildPlanOptions = {
  /** 只考虑免费种子 */
  freeOnly?: boolean;
};

/**
 * 收集本地和站点的快照，再生成下载和删除计划。
 * 只读取，不会对客户端做任何修改。
 */
export async function buildPlan(
  ctx: RunContext,
  options: BuildPlanOptions = {}
): Promise<PlanResult> {
  const { config, trackers, client, policy } = ctx;
  const now = ctx.now?.() ?? Math.floor(Date.now() / 1000);

  const [locals, freeSpace, listed] = await Promise.all([
    client.listLocalTorrents(),
    client.freeSpaceBytes(),
    collectFromTrackers(trackers, "候选种子", (tracker) =>
      tracker.listCandidates({ sort: "leechers", pages: config.candidatePages })
    ),
  ]);

  const ledger = new StorageLedger(refreshScoreInputs(locals, listed), config.identity);
  // 本地种子的评分仍然使用完整的列表刷新
  const candidates = options.freeOnly
    ? listed.filter((record) => record.scoreInputs.promotions.includes("free"))
    : listed;
  const ranked = rankCandidates(candidates, policy);

  // 只为排名靠前、可能被下载的候选抓取文件清单
  const shortlist = ranked
    .filter(({ record, score }) => !ledger.has(record.key) && score > config.minScore)
    .slice(0, config.shortlistSize)
    .map(({ record }) => record);
  const manifests = await prefetchManifests(
    shortlist,
    trackers,
    config.manifestConcurrency,
    config.manifestTimeout
  );

  const storageBudgetBytes = storageBudget(config.maxTotalSize, ledger, freeSpace);
  logger.debug(
    `本地种子 ${locals.length} 个，候选 ${ranked.length} 个，短名单 ${shortlist.length} 个`
  );

  const plan = planSelection(
    { candidates: ranked, ledger, manifests, policy },
    {
      storageBudgetBytes,
      downloadBudgetBytes: config.maxDownloadSize,
      evictionMargin: config.evictionMargin,
      protectedKeys: config.protectedKeys,
      minScore: config.minScore,
      now,
    }
  );
  return { plan, ledger };
}
