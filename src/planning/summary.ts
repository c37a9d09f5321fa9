import { formatBytes } from "../function/index.ts";
import type {
  Plan,
  PlanAction,
  PlanWarning,
  SkipReason,
} from "../types/planning.ts";
import type { TorrentRecord } from "../types/torrent.ts";
import { formatKey } from "./identity.ts";
import { isProtected, type StorageLedger } from "./ledger.ts";
import type { ScoringPolicy } from "./scoring.ts";

const SKIP_REASONS: Record<SkipReason, string> = {
  "already-local": "已在客户端中",
  "already-resident": "相同内容已在本地",
  "manifest-unavailable": "无法获取文件清单",
  "not-shortlisted": "不在短名单内",
  "low-score": "评分过低",
  "download-budget": "超出本次下载量上限",
  "storage-budget": "空间不足且没有可删除的种子",
};

function label(record: TorrentRecord) {
  return `[${formatKey(record.key)}] ${record.title}`;
}

/** 手动指定下载的种子评分为无穷大 */
export function formatScore(score: number): string {
  return Number.isFinite(score) ? score.toFixed(2) : "∞";
}

/** 计划中的一行 */
export function describeAction(action: PlanAction): string {
  switch (action.type) {
    case "download":
      return `[下载] ${label(action.candidate)} (${formatBytes(
        action.candidate.sizeBytes
      )}, 评分 ${formatScore(action.score)})`;
    case "evict":
      return action.mode === "reclaim"
        ? `[删除] ${label(action.record)} (释放 ${formatBytes(
            action.freedBytes
          )}, 评分 ${formatScore(action.score)})`
        : `[移除任务] ${label(action.record)} (保留文件, 评分 ${formatScore(action.score)})`;
    case "cross-seed":
      return `[辅种] ${label(action.candidate)} <- ${label(action.existing)} (${formatBytes(
        action.candidate.sizeBytes
      )})`;
  }
}

function describeWarning(warning: PlanWarning): string {
  switch (warning.kind) {
    case "ambiguous-identity":
      return `${label(warning.candidate)}: 与本地种子 ${label(
        warning.local
      )} 大小相近，但无法比较文件清单`;
    case "manifest-unavailable":
      return `${label(warning.candidate)}: ${warning.reason}`;
  }
}

/**
 * 将计划渲染为便于阅读的文本，用于试运行输出和日志
 * @param plan - planSelection 或 matchCrossSeeds 生成的计划
 */
export function summarizePlan(plan: Plan): string {
  const evictions = plan.actions.filter((action) => action.type === "evict");
  const downloads = plan.actions.filter((action) => action.type === "download");
  const crossSeeds = plan.actions.filter((action) => action.type === "cross-seed");
  const freed = evictions.reduce(
    (sum, action) => sum + (action.type === "evict" ? action.freedBytes : 0),
    0
  );

  const lines = [
    `存储上限: ${formatBytes(plan.storageBudgetBytes)}，本次下载上限: ${formatBytes(
      plan.downloadBudgetBytes
    )}`,
    `当前占用: ${formatBytes(plan.occupiedBefore)} -> 计划后占用: ${formatBytes(
      plan.occupiedAfter
    )}`,
    `删除 ${evictions.length} 个种子（释放 ${formatBytes(freed)}），下载 ${
      downloads.length
    } 个种子（${formatBytes(plan.downloadedBytes)}），辅种 ${
      crossSeeds.length
    } 个种子（${formatBytes(plan.crossSeededBytes)}）`,
  ];

  if (plan.actions.length === 0) {
    lines.push("没有需要执行的操作");
  } else {
    lines.push("操作:");
    for (const action of plan.actions) lines.push(`  ${describeAction(action)}`);
  }

  // 短名单以外的候选只计数
  const listed = plan.skipped.filter(({ reason }) => reason !== "not-shortlisted");
  const unlisted = plan.skipped.length - listed.length;
  if (listed.length > 0) {
    lines.push(`跳过 ${listed.length} 个候选:`);
    for (const { candidate, reason } of listed) {
      lines.push(`  ${label(candidate)}: ${SKIP_REASONS[reason]}`);
    }
  }
  if (unlisted > 0) lines.push(`另有 ${unlisted} 个候选不在短名单内`);

  if (plan.warnings.length > 0) {
    lines.push("警告:");
    for (const warning of plan.warnings) lines.push(`  ${describeWarning(warning)}`);
  }

  return lines.join("\n");
}

/**
 * 本地种子的空间占用和删除优先级，按删除的先后排列
 * @param now - 当前时间（Unix 秒）
 */
export function describeLedger(
  ledger: StorageLedger,
  policy: ScoringPolicy,
  protectedKeys: ReadonlySet<string>,
  now: number
): string {
  const rows = ledger.clusters.map((cluster) => {
    const members = cluster.members.map((member) => {
      if (isProtected(member, protectedKeys)) return { member, note: "保护", score: null };
      const score = policy.residentScore(member, now);
      return {
        member,
        note: score === null ? "暂不删除" : `评分 ${score.toFixed(2)}`,
        score,
      };
    });
    const evictable = members.every(({ score }) => score !== null);
    const score = evictable
      ? Math.max(...members.map(({ score }) => score ?? -Infinity))
      : Infinity;
    return { cluster, members, score };
  });
  rows.sort((a, b) => a.score - b.score || a.cluster.id - b.cluster.id);

  const lines = [
    `本地种子 ${ledger.records.length} 个，去重后 ${ledger.clusters.length} 份内容，共占用 ${formatBytes(
      ledger.occupiedBytes()
    )}`,
  ];
  for (const { cluster, members } of rows) {
    lines.push(`${formatBytes(cluster.effectiveSize)}`);
    for (const { member, note } of members) {
      lines.push(`  ${label(member)} (${note})`);
    }
  }
  return lines.join("\n");
}
