import type { Db } from "mongodb";
import logger from "../log/index.ts";
import { errorMessage } from "../planning/errors.ts";
import { formatKey } from "../planning/identity.ts";
import type { FileManifest, TorrentKey } from "../types/torrent.ts";
import { saveManifest } from "./create.ts";
import { findManifest } from "./query.ts";

/** 文件清单缓存，同一个种子的清单只需从站点抓取一次 */
export interface ManifestStore {
  get(key: TorrentKey): Promise<FileManifest | null>;
  set(key: TorrentKey, manifest: FileManifest): Promise<void>;
}

/**
 * 存放在 MongoDB 中的缓存。
 * 数据库出错只影响缓存命中，不会中断运行。
 */
export class MongoManifestStore implements ManifestStore {
  private readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  async get(key: TorrentKey) {
    try {
      return await findManifest(this.db, key);
    } catch (err) {
      logger.warn(`读取 ${formatKey(key)} 的清单缓存失败:`, errorMessage(err));
      return null;
    }
  }

  async set(key: TorrentKey, manifest: FileManifest) {
    try {
      await saveManifest(this.db, key, manifest);
    } catch (err) {
      logger.warn(`写入 ${formatKey(key)} 的清单缓存失败:`, errorMessage(err));
    }
  }
}

/** 只在本次运行内有效的缓存，未配置 MONGODB_URI 时使用 */
export class MemoryManifestStore implements ManifestStore {
  private readonly manifests = new Map<string, FileManifest>();

  async get(key: TorrentKey) {
    return this.manifests.get(formatKey(key)) ?? null;
  }

  async set(key: TorrentKey, manifest: FileManifest) {
    this.manifests.set(formatKey(key), manifest);
  }
}
