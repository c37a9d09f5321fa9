import type { AppConfig } from "../config/index.ts";
import logger from "../log/index.ts";
import { summarizePlan } from "../planning/summary.ts";
import { createRunContext } from "../run/context.ts";
import { executePlan, summarizeReport } from "../run/execute.ts";
import { buildCrossSeedPlan } from "../run/hitchhike.ts";
import type { CommandFlags } from "./index.ts";

/**
 * 处理 hitchhike 命令：为本地已完成的种子寻找其它站点的同内容种子并辅种
 */
export default async function handleHitchhike(config: AppConfig, flags: CommandFlags) {
  const { ctx, close } = await createRunContext(config);
  try {
    const { plan, ledger } = await buildCrossSeedPlan(ctx);
    logger.info(`辅种计划:\n${summarizePlan(plan)}`);
    if (flags.dryRun || plan.actions.length === 0) return;

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
