import type {
  ContentCluster,
  ManifestLookup,
  Plan,
  PlanAction,
  PlanWarning,
  RankedCandidate,
  SkippedCandidate,
} from "../types/planning.ts";
import type { FileManifest, LocalTorrent, TorrentRecord } from "../types/torrent.ts";
import { formatKey, isKnownManifest, manifestSize, sizesClose } from "./identity.ts";
import {
  StorageLedger,
  asPendingLocal,
  completedMember,
  hasSiteMember,
  isProtected,
} from "./ledger.ts";
import type { ScoringPolicy } from "./scoring.ts";

export type PlannerOptions = {
  /** 允许占用的总空间 */
  storageBudgetBytes: number;
  /** 本次运行最多下载的字节数 */
  downloadBudgetBytes: number;
  /** 候选分数须比被删除的簇高出多少 */
  evictionMargin: number;
  /** 不允许删除的种子，形如 `byr-12345` */
  protectedKeys?: ReadonlySet<string>;
  /** 分数不高于该值的候选直接跳过 */
  minScore?: number;
  /** 当前时间（Unix 秒） */
  now: number;
};

export type PlanInput = {
  /** 已排序的候选 */
  candidates: readonly RankedCandidate[];
  ledger: StorageLedger;
  /** 预先抓取的文件清单，键为 formatKey */
  manifests: ReadonlyMap<string, ManifestLookup>;
  policy: ScoringPolicy;
};

type EvictableCluster = {
  cluster: ContentCluster<LocalTorrent>;
  score: number;
  firstKey: string;
};

/** 未抓取过文件清单的候选返回 null */
function resolveManifest(
  record: TorrentRecord,
  manifests: ReadonlyMap<string, ManifestLookup>
): ManifestLookup | null {
  if (isKnownManifest(record.manifest)) {
    return { ok: true, manifest: record.manifest };
  }
  const lookup = manifests.get(formatKey(record.key));
  if (!lookup) return null;
  if (lookup.ok && !isKnownManifest(lookup.manifest)) {
    return { ok: false, reason: "文件清单为空" };
  }
  return lookup;
}

/**
 * 根据排好序的候选生成下载、删除和辅种计划。
 *
 * 计划只依赖传入的快照，不做任何 I/O；相同的输入总是得到相同的计划。
 * 删除总是紧挨在它所腾出空间的下载之前，执行时按顺序进行即可。
 */
export function planSelection(input: PlanInput, options: PlannerOptions): Plan {
  const { candidates, manifests, policy } = input;
  const protectedKeys = options.protectedKeys ?? new Set<string>();
  const minScore = options.minScore ?? 0;

  let ledger = input.ledger;
  const occupiedBefore = ledger.occupiedBytes();
  const residentKeys = new Set(ledger.records.map((local) => formatKey(local.key)));

  // 受保护或处于保护期的种子没有分数，不参与删除
  const residentScores = new Map<string, number>();
  for (const local of ledger.records) {
    if (isProtected(local, protectedKeys)) continue;
    const score = policy.residentScore(local, options.now);
    if (score !== null) residentScores.set(formatKey(local.key), score);
  }

  const actions: PlanAction[] = [];
  const skipped: SkippedCandidate[] = [];
  const warnings: PlanWarning[] = [];
  const seen = new Set<string>();
  let downloadedBytes = 0;
  let crossSeededBytes = 0;

  const evictableClusters = (): EvictableCluster[] => {
    const result: EvictableCluster[] = [];
    for (const cluster of ledger.clusters) {
      const scores = cluster.members.map((member) =>
        residentScores.get(formatKey(member.key))
      );
      if (scores.some((score) => score === undefined)) continue;
      result.push({
        cluster,
        score: Math.max(...scores.map((score) => score ?? -Infinity)),
        firstKey: cluster.members.map((member) => formatKey(member.key)).sort()[0],
      });
    }
    return result.sort((a, b) =>
      a.score !== b.score
        ? a.score - b.score
        : a.firstKey < b.firstKey
        ? -1
        : a.firstKey > b.firstKey
        ? 1
        : 0
    );
  };

  /** 按分数从低到高选出能腾出足够空间的簇，做不到则返回 null */
  const chooseVictims = (
    score: number,
    shortfall: number
  ): ContentCluster<LocalTorrent>[] | null => {
    const chosen: ContentCluster<LocalTorrent>[] = [];
    let freed = 0;
    for (const entry of evictableClusters()) {
      if (!(score - entry.score > options.evictionMargin)) break;
      chosen.push(entry.cluster);
      freed += entry.cluster.effectiveSize;
      if (freed >= shortfall) return chosen;
    }
    return null;
  };

  const evict = (cluster: ContentCluster<LocalTorrent>, forKey: string) => {
    const members = [...cluster.members].sort((a, b) => {
      const keyA = formatKey(a.key);
      const keyB = formatKey(b.key);
      return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
    });
    for (const member of members) {
      const { bytes, mode } = ledger.wouldFreeBytes(member.key);
      actions.push({
        type: "evict",
        record: member,
        mode,
        freedBytes: bytes,
        score: residentScores.get(formatKey(member.key)) ?? 0,
        forKey,
      });
      ledger = ledger.without(member.key);
    }
  };

  for (const { record, score } of candidates) {
    const key = formatKey(record.key);
    if (seen.has(key)) continue;
    seen.add(key);

    if (residentKeys.has(key)) {
      skipped.push({ candidate: record, score, reason: "already-local" });
      continue;
    }
    if (score <= minScore) {
      skipped.push({ candidate: record, score, reason: "low-score" });
      continue;
    }

    const lookup = resolveManifest(record, manifests);
    if (!lookup) {
      skipped.push({ candidate: record, score, reason: "not-shortlisted" });
      continue;
    }
    if (!lookup.ok) {
      warnings.push({ kind: "manifest-unavailable", candidate: record, reason: lookup.reason });
      skipped.push({ candidate: record, score, reason: "manifest-unavailable" });
      continue;
    }
    const manifest: FileManifest = lookup.manifest;
    const resolved: TorrentRecord = { ...record, manifest };

    const match = ledger.findResidentMatch(manifest);
    if (match) {
      const existing = completedMember(match, residentKeys);
      if (existing && !hasSiteMember(match, record.key.site)) {
        actions.push({ type: "cross-seed", candidate: resolved, existing, score });
        ledger = ledger.with(asPendingLocal(resolved, manifest, existing));
        crossSeededBytes += record.sizeBytes;
      } else {
        skipped.push({ candidate: resolved, score, reason: "already-resident" });
      }
      continue;
    }

    for (const local of ledger.records) {
      if (
        !isKnownManifest(local.manifest) &&
        sizesClose(local.sizeBytes, record.sizeBytes, ledger.options.sizeTolerance)
      ) {
        warnings.push({ kind: "ambiguous-identity", candidate: resolved, local });
      }
    }

    if (downloadedBytes + record.sizeBytes > options.downloadBudgetBytes) {
      skipped.push({ candidate: resolved, score, reason: "download-budget" });
      continue;
    }

    const needed = manifestSize(manifest);
    const occupied = ledger.occupiedBytes();
    if (occupied + needed > options.storageBudgetBytes) {
      const victims = chooseVictims(
        score,
        occupied + needed - options.storageBudgetBytes
      );
      if (!victims) {
        skipped.push({ candidate: resolved, score, reason: "storage-budget" });
        continue;
      }
      for (const cluster of victims) evict(cluster, key);
    }

    actions.push({ type: "download", candidate: resolved, score });
    ledger = ledger.with(asPendingLocal(resolved, manifest));
    downloadedBytes += record.sizeBytes;
  }

  return {
    actions,
    storageBudgetBytes: options.storageBudgetBytes,
    downloadBudgetBytes: options.downloadBudgetBytes,
    occupiedBefore,
    occupiedAfter: ledger.occupiedBytes(),
    downloadedBytes,
    crossSeededBytes,
    skipped,
    warnings,
  };
}
