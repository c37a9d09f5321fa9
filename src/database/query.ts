import type { Db } from "mongodb";
import type { FileManifest, TorrentKey } from "../types/torrent.ts";
import { manifestCollection } from "./initDb.ts";

/**
 * 查询缓存的文件清单
 * @param db - 数据库
 * @param key - 种子标识
 * @returns 文件清单，未缓存时返回 null
 */
export async function findManifest(
  db: Db,
  key: TorrentKey
): Promise<FileManifest | null> {
  const doc = await manifestCollection(db).findOne(
    { site: key.site, id: key.id },
    { projection: { _id: 0, manifest: 1 } }
  );
  return doc?.manifest ?? null;
}
