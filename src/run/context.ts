import type { AppConfig } from "../config/index.ts";
import {
  MemoryManifestStore,
  MongoManifestStore,
  type ManifestStore,
} from "../database/index.ts";
import { connectDatabase } from "../database/initDb.ts";
import { DefaultScorer } from "../planning/scoring.ts";
import { QBClientAdapter, createQBClient } from "../qBittorrent/index.ts";
import { createTrackers, withManifestCache } from "../sites/index.ts";
import type { RunContext } from "./index.ts";

/**
 * 按配置连接 qBittorrent、各站点和（可选的）数据库
 * @returns 运行上下文，以及结束时释放连接的函数
 */
export async function createRunContext(config: AppConfig) {
  const qb = await createQBClient(config.qbittorrent);
  const client = new QBClientAdapter(qb, { downloadDir: config.downloadDir });

  let store: ManifestStore = new MemoryManifestStore();
  let close = async () => {};
  if (config.mongodbUri) {
    const { client: mongo, db } = await connectDatabase(config.mongodbUri);
    store = new MongoManifestStore(db);
    close = async () => {
      await mongo.close();
    };
  }

  const ctx: RunContext = {
    config,
    trackers: createTrackers(config).map((tracker) => withManifestCache(tracker, store)),
    client,
    policy: new DefaultScorer(config.scoring),
  };
  return { ctx, close };
}
