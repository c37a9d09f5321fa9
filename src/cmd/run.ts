import type { AppConfig } from "../config/index.ts";
import logger from "../log/index.ts";
import { summarizePlan } from "../planning/summary.ts";
import { createRunContext } from "../run/context.ts";
import { executePlan, summarizeReport } from "../run/execute.ts";
import { buildPlan } from "../run/index.ts";
import type { CommandFlags } from "./index.ts";

/**
 * 处理 run 命令：规划并执行下载和删除
 */
export default async function handleRun(config: AppConfig, flags: CommandFlags) {
  const { ctx, close } = await createRunContext(config);
  try {
    const { plan, ledger } = await buildPlan(ctx, { freeOnly: flags.freeOnly });
    logger.info(`计划:\n${summarizePlan(plan)}`);
    if (flags.dryRun) {
      logger.info("试运行，不执行任何操作");
      return;
    }

    const report = await executePlan(plan, {
      client: ctx.client,
      trackers: ctx.trackers,
      ledger,
      protectedKeys: config.protectedKeys,
    });
    logger.info(summarizeReport(report));
    if (report.failed) process.exitCode = 1;
  } finally {
    await close();
  }
}
