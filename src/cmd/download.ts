import type { AppConfig } from "../config/index.ts";
import logger from "../log/index.ts";
import { summarizePlan } from "../planning/summary.ts";
import { createRunContext } from "../run/context.ts";
import { buildDownloadPlan, parseKey } from "../run/download.ts";
import { executePlan, summarizeReport } from "../run/execute.ts";
import type { CommandFlags } from "./index.ts";

/**
 * 处理 download 命令：下载指定的种子，空间不足时删除评分低的种子
 */
export default async function handleDownload(
  config: AppConfig,
  flags: CommandFlags,
  args: readonly string[]
) {
  const [target] = args;
  if (!target) throw new Error("缺少种子标识，用法: seedplan download <站点-种子ID>");
  const key = parseKey(target);

  const { ctx, close } = await createRunContext(config);
  try {
    const { plan, ledger } = await buildDownloadPlan(ctx, key);
    logger.info(`计划:\n${summarizePlan(plan)}`);
    if (plan.actions.length === 0) {
      logger.warn(`${target} 不会被下载`);
      return;
    }
    if (flags.dryRun) {
      logger.info("试运行，不执行任何操作");
      return;
    }

    const report = await executePlan(plan, {
      client: ctx.client,
      trackers: ctx.trackers,
      ledger,
      protectedKeys: config.protectedKeys,
      downloadOptions: { paused: flags.paused, skipChecking: flags.exists },
    });
    logger.info(summarizeReport(report));
    if (report.failed) process.exitCode = 1;
  } finally {
    await close();
  }
}
