import type {
  ContentCluster,
  ManifestLookup,
  Plan,
  PlanAction,
  PlanWarning,
  SkippedCandidate,
} from "../types/planning.ts";
import type { LocalTorrent, TorrentRecord } from "../types/torrent.ts";
import { formatKey, isKnownManifest, sizesClose } from "./identity.ts";
import {
  StorageLedger,
  asPendingLocal,
  completedMember,
  hasSiteMember,
} from "./ledger.ts";
import type { ScoringPolicy } from "./scoring.ts";

export type CrossSeedInput = {
  /** 各站点的热门种子 */
  hot: readonly TorrentRecord[];
  ledger: StorageLedger;
  /** 已抓取的文件清单，键为 formatKey */
  manifests: ReadonlyMap<string, ManifestLookup>;
  policy: ScoringPolicy;
};

export type CrossSeedOptions = {
  /** 允许占用的总空间 */
  storageBudgetBytes: number;
  /** 本次运行登记的辅种声明大小上限 */
  downloadBudgetBytes: number;
};

/** 大小与候选接近、可能可以辅种的本地簇 */
function sizeMatches(
  record: TorrentRecord,
  ledger: StorageLedger,
  residentKeys: ReadonlySet<string>
): ContentCluster<LocalTorrent>[] {
  return ledger.clusters.filter(
    (cluster) =>
      completedMember(cluster, residentKeys) !== undefined &&
      !hasSiteMember(cluster, record.key.site) &&
      sizesClose(cluster.effectiveSize, record.sizeBytes, ledger.options.sizeTolerance)
  );
}

/**
 * 按大小初筛值得抓取文件清单的热门种子。
 * 本地已有的种子、只与同站点种子大小相近的种子不会入选，结果保持输入顺序。
 */
export function shortlistCrossSeeds(
  hot: readonly TorrentRecord[],
  ledger: StorageLedger
): TorrentRecord[] {
  const residentKeys = new Set(ledger.records.map((local) => formatKey(local.key)));
  const seen = new Set<string>();
  return hot.filter((record) => {
    const key = formatKey(record.key);
    if (residentKeys.has(key) || seen.has(key)) return false;
    seen.add(key);
    return sizeMatches(record, ledger, residentKeys).length > 0;
  });
}

/**
 * 找出与本地已完成种子内容一致的其它站点种子，生成只包含辅种的计划。
 *
 * 只有文件清单一致才会辅种；清单拿不到时大小相近只产生警告。
 * 辅种加入已有的簇，不产生新的占用，但声明大小计入本次的下载量上限；
 * 加入后占用超出存储上限的辅种同样跳过。
 */
export function matchCrossSeeds(input: CrossSeedInput, options: CrossSeedOptions): Plan {
  let ledger = input.ledger;
  const occupiedBefore = ledger.occupiedBytes();
  const residentKeys = new Set(ledger.records.map((local) => formatKey(local.key)));
  const actions: PlanAction[] = [];
  const warnings: PlanWarning[] = [];
  const skipped: SkippedCandidate[] = [];
  let crossSeededBytes = 0;

  for (const record of shortlistCrossSeeds(input.hot, input.ledger)) {
    const key = formatKey(record.key);
    const lookup: ManifestLookup | undefined = isKnownManifest(record.manifest)
      ? { ok: true, manifest: record.manifest }
      : input.manifests.get(key);

    if (!lookup || !lookup.ok || !isKnownManifest(lookup.manifest)) {
      for (const cluster of sizeMatches(record, ledger, residentKeys)) {
        const local = completedMember(cluster, residentKeys);
        if (local) warnings.push({ kind: "ambiguous-identity", candidate: record, local });
      }
      continue;
    }

    const manifest = lookup.manifest;
    const match = ledger.findResidentMatch(manifest);
    if (!match || hasSiteMember(match, record.key.site)) continue;
    const existing = completedMember(match, residentKeys);
    if (!existing) continue;

    const resolved: TorrentRecord = { ...record, manifest };
    const score = input.policy.score(resolved);
    if (crossSeededBytes + record.sizeBytes > options.downloadBudgetBytes) {
      skipped.push({ candidate: resolved, score, reason: "download-budget" });
      continue;
    }
    const next = ledger.with(asPendingLocal(resolved, manifest, existing));
    if (next.occupiedBytes() > options.storageBudgetBytes) {
      skipped.push({ candidate: resolved, score, reason: "storage-budget" });
      continue;
    }

    actions.push({ type: "cross-seed", candidate: resolved, existing, score });
    ledger = next;
    crossSeededBytes += record.sizeBytes;
  }

  return {
    actions,
    storageBudgetBytes: options.storageBudgetBytes,
    downloadBudgetBytes: options.downloadBudgetBytes,
    occupiedBefore,
    occupiedAfter: ledger.occupiedBytes(),
    downloadedBytes: 0,
    crossSeededBytes,
    skipped,
    warnings,
  };
}
