import type { Db } from "mongodb";
import type { FileManifest, TorrentKey } from "../types/torrent.ts";
import { manifestCollection } from "./initDb.ts";

/**
 * 缓存种子的文件清单，已存在时覆盖
 * @param db - 数据库
 * @param key - 种子标识
 * @param manifest - 文件清单
 */
export async function saveManifest(
  db: Db,
  key: TorrentKey,
  manifest: FileManifest
) {
  await manifestCollection(db).updateOne(
    { site: key.site, id: key.id },
    { $set: { manifest, updatedAt: new Date() } },
    { upsert: true }
  );
}
