import parseTorrent, { type Instance } from "parse-torrent";
import type { FileManifest } from "../types/torrent.ts";

/**
 * 把 parse-torrent 的解析结果转为文件清单
 * @param parsed - parse-torrent 的解析结果
 * @returns 按种子内顺序排列的文件清单，路径统一为 `/` 分隔
 */
export function manifestFromParsed(parsed: Instance): FileManifest {
  if (parsed.files && parsed.files.length > 0) {
    return parsed.files.map((file) => ({
      path: file.path.replace(/\\/g, "/"),
      size: file.length,
    }));
  }
  // 单文件种子
  if (parsed.name !== undefined && parsed.length !== undefined) {
    return [{ path: parsed.name, size: parsed.length }];
  }
  return [];
}

/**
 * 解析 .torrent 文件内容
 * @param torrent - 种子文件
 * @throws 内容不是合法的种子文件时抛出错误
 */
export async function readManifest(torrent: Uint8Array): Promise<FileManifest> {
  const parsed = await parseTorrent(torrent);
  return manifestFromParsed(parsed);
}
