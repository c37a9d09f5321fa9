import logger from "../log/index.ts";
import {
  ExecutionFailure,
  UnsafeEviction,
  errorMessage,
} from "../planning/errors.ts";
import { formatKey } from "../planning/identity.ts";
import { StorageLedger, asPendingLocal, isProtected } from "../planning/ledger.ts";
import { describeAction } from "../planning/summary.ts";
import type { EvictAction, Plan, PlanAction } from "../types/planning.ts";
import type { ClientAdapter, StartOptions, TrackerAdapter } from "../types/site.ts";
import type { TorrentKey } from "../types/torrent.ts";

export type ExecutionContext = {
  client: ClientAdapter;
  trackers: readonly TrackerAdapter[];
  /** 规划时的本地快照 */
  ledger: StorageLedger;
  protectedKeys: ReadonlySet<string>;
  /** 添加下载时的选项，只作用于 download 操作 */
  downloadOptions?: StartOptions;
};

export type ExecutionReport = {
  completed: PlanAction[];
  failed: { action: PlanAction; error: ExecutionFailure | UnsafeEviction } | null;
  /** 因前面的操作失败而没有执行的操作 */
  remaining: PlanAction[];
};

/**
 * 执行前复查删除操作：受保护的种子不删，仍有其它种子引用的文件不删
 * @param action - 删除操作
 * @param ledger - 执行到这一步时的本地状态
 */
export function checkEviction(
  action: EvictAction,
  ledger: StorageLedger,
  protectedKeys: ReadonlySet<string>
) {
  const { record } = action;
  if (isProtected(record, protectedKeys)) {
    throw new UnsafeEviction(record.hash, `拒绝删除受保护的种子 ${formatKey(record.key)}`);
  }
  const cluster = ledger.clusterOf(record.key);
  if (!cluster) {
    throw new UnsafeEviction(record.hash, `种子 ${formatKey(record.key)} 不在本地`);
  }
  if (action.mode === "reclaim" && cluster.members.length > 1) {
    const others = cluster.members
      .filter((member) => formatKey(member.key) !== formatKey(record.key))
      .map((member) => formatKey(member.key))
      .join(", ");
    throw new UnsafeEviction(
      record.hash,
      `拒绝删除 ${formatKey(record.key)} 的文件，仍被 ${others} 使用`
    );
  }
}

/**
 * 按顺序执行计划，遇到第一个错误即停止
 * @param plan - 要执行的计划
 * @param ctx - 客户端、站点和规划时的快照
 * @returns 已完成、失败和未执行的操作
 */
export async function executePlan(
  plan: Plan,
  ctx: ExecutionContext
): Promise<ExecutionReport> {
  const trackers = new Map(ctx.trackers.map((tracker) => [tracker.site, tracker]));
  let ledger = ctx.ledger;
  const completed: PlanAction[] = [];

  const fetchTorrent = (key: TorrentKey) => {
    const tracker = trackers.get(key.site);
    if (!tracker) throw new Error(`未配置站点 ${key.site}`);
    return tracker.downloadTorrent(key);
  };

  for (const [index, action] of plan.actions.entries()) {
    logger.info(describeAction(action));
    try {
      switch (action.type) {
        case "evict":
          checkEviction(action, ledger, ctx.protectedKeys);
          if (action.mode === "reclaim") {
            await ctx.client.stopAndDelete(action.record);
          } else {
            await ctx.client.stop(action.record);
          }
          ledger = ledger.without(action.record.key);
          break;
        case "download": {
          const torrent = await fetchTorrent(action.candidate.key);
          await ctx.client.startDownload(action.candidate, torrent, ctx.downloadOptions ?? {});
          if (action.candidate.manifest) {
            ledger = ledger.with(asPendingLocal(action.candidate, action.candidate.manifest));
          }
          break;
        }
        case "cross-seed": {
          const torrent = await fetchTorrent(action.candidate.key);
          await ctx.client.registerCrossSeed(action.candidate, torrent, action.existing);
          if (action.candidate.manifest) {
            ledger = ledger.with(
              asPendingLocal(action.candidate, action.candidate.manifest, action.existing)
            );
          }
          break;
        }
      }
      completed.push(action);
    } catch (err) {
      const error =
        err instanceof UnsafeEviction
          ? err
          : new ExecutionFailure(action, `执行失败: ${errorMessage(err)}`, { cause: err });
      logger.error(error.message);
      return {
        completed,
        failed: { action, error },
        remaining: plan.actions.slice(index + 1),
      };
    }
  }

  return { completed, failed: null, remaining: [] };
}

/**
 * 执行结果的文字说明
 * @param report - executePlan 的返回值
 */
export function summarizeReport(report: ExecutionReport): string {
  const lines = [`已完成 ${report.completed.length} 个操作`];
  if (report.failed) {
    lines.push(`失败: ${describeAction(report.failed.action)}`);
    lines.push(`  原因: ${report.failed.error.message}`);
    if (report.remaining.length > 0) {
      lines.push(`未执行 ${report.remaining.length} 个操作:`);
      for (const action of report.remaining) lines.push(`  ${describeAction(action)}`);
    }
  }
  return lines.join("\n");
}
