import logger from "../log/index.ts";
import { matchCrossSeeds, shortlistCrossSeeds } from "../planning/crossSeed.ts";
import { StorageLedger } from "../planning/ledger.ts";
import {
  collectFromTrackers,
  prefetchManifests,
  storageBudget,
  type PlanResult,
  type RunContext,
} from "./index.ts";

/**
 * 在各站点的热门种子中寻找与本地已完成种子内容一致的种子，生成辅种计划
 */
export async function buildCrossSeedPlan(ctx: RunContext): Promise<PlanResult> {
  const { config, trackers, client, policy } = ctx;

  const [locals, freeSpace, hot] = await Promise.all([
    client.listLocalTorrents(),
    client.freeSpaceBytes(),
    collectFromTrackers(trackers, "热门种子", (tracker) => tracker.listHotTorrents()),
  ]);
  const ledger = new StorageLedger(locals, config.identity);

  const shortlist = shortlistCrossSeeds(hot, ledger);
  logger.debug(`热门种子 ${hot.length} 个，大小相近的 ${shortlist.length} 个`);
  const manifests = await prefetchManifests(
    shortlist,
    trackers,
    config.manifestConcurrency,
    config.manifestTimeout
  );

  const plan = matchCrossSeeds(
    { hot, ledger, manifests, policy },
    {
      storageBudgetBytes: storageBudget(config.maxTotalSize, ledger, freeSpace),
      downloadBudgetBytes: config.maxDownloadSize,
    }
  );
  return { plan, ledger };
}
