import { MongoClient, type Db } from "mongodb";
import logger from "../log/index.ts";
import { errorMessage } from "../planning/errors.ts";
import type { ManifestDocument } from "../types/database.ts";

/**
 * 文件清单缓存集合
 * @param db - 数据库
 */
export function manifestCollection(db: Db) {
  return db.collection<ManifestDocument>("manifests");
}

/**
 * 连接数据库并为 manifests 集合创建 (site, id) 唯一索引
 * @param uri - MongoDB 连接字符串
 * @returns 客户端（用于结束时关闭）和数据库
 */
export async function connectDatabase(uri: string) {
  logger.info("正在连接数据库...");
  const client = new MongoClient(uri);
  try {
    await client.connect();
    logger.info("数据库连接成功");
  } catch (err) {
    logger.error("数据库连接失败:", errorMessage(err));
    throw new Error("数据库连接失败", { cause: err });
  }

  const db = client.db("seedplan");
  try {
    await manifestCollection(db).createIndex(
      { site: 1, id: 1 },
      { unique: true, name: "site_id_unique_idx" }
    );
  } catch (err) {
    logger.error("为 manifests 创建索引时出错", errorMessage(err));
    await client.close();
    throw err;
  }

  return { client, db };
}
