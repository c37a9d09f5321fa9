import type { AppConfig } from "../config/index.ts";
import { formatBytes } from "../function/index.ts";
import logger from "../log/index.ts";
import { StorageLedger } from "../planning/ledger.ts";
import { describeLedger } from "../planning/summary.ts";
import { createRunContext } from "../run/context.ts";

/**
 * 处理 stat 命令：列出本地种子的占用和删除优先级
 */
export default async function handleStat(config: AppConfig) {
  const { ctx, close } = await createRunContext(config);
  try {
    const [locals, freeSpace] = await Promise.all([
      ctx.client.listLocalTorrents(),
      ctx.client.freeSpaceBytes(),
    ]);
    const ledger = new StorageLedger(locals, config.identity);
    const now = Math.floor(Date.now() / 1000);
    logger.info(
      `空间上限 ${formatBytes(config.maxTotalSize)}，磁盘剩余 ${formatBytes(freeSpace)}\n` +
        describeLedger(ledger, ctx.policy, config.protectedKeys, now)
    );
  } finally {
    await close();
  }
}
