import { withTimeout } from "../function/index.ts";
import { ManifestUnavailable, errorMessage } from "../planning/errors.ts";
import { formatKey, isKnownManifest, manifestSize } from "../planning/identity.ts";
import { StorageLedger } from "../planning/ledger.ts";
import { planSelection } from "../planning/planner.ts";
import type { FileManifest, TorrentKey, TorrentRecord } from "../types/torrent.ts";
import {
  collectFromTrackers,
  refreshScoreInputs,
  storageBudget,
  type PlanResult,
  type RunContext,
} from "./index.ts";

const KEY_PATTERN = /^([a-z][a-z0-9]*)-(\d+)$/i;

/**
 * 解析 `byr-12345` 形式的种子标识
 * @param text - 命令行参数
 */
export function parseKey(text: string): TorrentKey {
  const match = KEY_PATTERN.exec(text.trim());
  if (!match) {
    throw new Error(`无效的种子标识: ${text}（格式为 站点-种子ID，如 byr-12345）`);
  }
  return { site: match[1].toLowerCase(), id: match[2] };
}

/** 站点列表中找不到该种子时，用文件清单拼出一条记录 */
function recordFromManifest(key: TorrentKey, manifest: FileManifest): TorrentRecord {
  return {
    key,
    title: manifest[0].path.split("/")[0],
    manifest,
    sizeBytes: manifestSize(manifest),
    scoreInputs: {
      seeders: 0,
      leechers: 0,
      finished: 0,
      liveDays: 0,
      promotions: [],
      uploadedBytes: 0,
      downloadedBytes: 0,
    },
    origin: key.site,
  };
}

/**
 * 为手动指定的种子生成下载计划。
 * 该种子的评分视为无穷大，空间不足时按删除顺序腾出空间；受保护的种子仍然不会被删除。
 */
export async function buildDownloadPlan(
  ctx: RunContext,
  key: TorrentKey
): Promise<PlanResult> {
  const { config, trackers, client, policy } = ctx;
  const now = ctx.now?.() ?? Math.floor(Date.now() / 1000);
  const tracker = trackers.find((t) => t.site === key.site);
  if (!tracker) throw new Error(`未配置站点 ${key.site}`);

  const [locals, freeSpace, listed, manifest] = await Promise.all([
    client.listLocalTorrents(),
    client.freeSpaceBytes(),
    collectFromTrackers(trackers, "候选种子", (t) =>
      t.listCandidates({ sort: "leechers", pages: config.candidatePages })
    ),
    withTimeout(
      tracker.fetchManifest(key),
      config.manifestTimeout,
      `获取 ${formatKey(key)} 的文件清单超时`
    ).catch((err: unknown) => {
      throw new ManifestUnavailable(
        key,
        `无法获取 ${formatKey(key)} 的文件清单: ${errorMessage(err)}`,
        { cause: err }
      );
    }),
  ]);
  if (!isKnownManifest(manifest)) {
    throw new ManifestUnavailable(key, `${formatKey(key)} 的文件清单为空`);
  }

  const ledger = new StorageLedger(refreshScoreInputs(locals, listed), config.identity);
  const listing = listed.find((record) => formatKey(record.key) === formatKey(key));
  const record = listing ? { ...listing, manifest } : recordFromManifest(key, manifest);

  const storageBudgetBytes = storageBudget(config.maxTotalSize, ledger, freeSpace);
  const plan = planSelection(
    {
      candidates: [{ record, score: Number.POSITIVE_INFINITY }],
      ledger,
      manifests: new Map(),
      policy,
    },
    {
      storageBudgetBytes,
      // 手动下载不受单次下载量限制
      downloadBudgetBytes: Math.max(config.maxDownloadSize, record.sizeBytes),
      evictionMargin: config.evictionMargin,
      protectedKeys: config.protectedKeys,
      minScore: config.minScore,
      now,
    }
  );
  return { plan, ledger };
}
