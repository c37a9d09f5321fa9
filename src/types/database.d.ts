import type { FileManifest } from "./torrent.ts";

/** manifests 集合中的文档：一个站点种子的文件清单缓存 */
export type ManifestDocument = {
  /** 站点标签 */
  site: string;
  /** 站点内的种子 ID */
  id: string;
  manifest: FileManifest;
  /** 写入时间 */
  updatedAt: Date;
};
