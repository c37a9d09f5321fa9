import type { AxiosAdapter } from "axios";
import type { ManifestStore } from "../database/index.ts";
import logger from "../log/index.ts";
import { formatKey } from "../planning/identity.ts";
import type { TrackerAdapter } from "../types/site.ts";
import { byr } from "./byr.ts";
import { NexusTracker, type NexusSiteDefinition } from "./nexus.ts";
import { NexusSession } from "./session.ts";
import { tju } from "./tju.ts";

export const SITE_DEFINITIONS: Record<string, NexusSiteDefinition> = {
  byr,
  tju,
};

export type TrackerSettings = {
  sites: { site: string; cookie: string }[];
  /** 单次请求超时（毫秒） */
  siteRequestTimeout: number;
  /** 请求间隔（毫秒） */
  siteRequestInterval: number;
};

/**
 * 为每个启用的站点创建独立会话的适配器
 * @param settings - 站点配置
 * @param adapter - 自定义 axios 适配器，测试时使用
 */
export function createTrackers(
  settings: TrackerSettings,
  adapter?: AxiosAdapter
): TrackerAdapter[] {
  return settings.sites.map(({ site, cookie }) => {
    const definition = SITE_DEFINITIONS[site];
    if (!definition) {
      throw new Error(
        `不支持的站点: ${site}（可选: ${Object.keys(SITE_DEFINITIONS).join(", ")}）`
      );
    }
    const session = new NexusSession({
      site,
      baseUrl: definition.baseUrl,
      cookie,
      timeout: settings.siteRequestTimeout,
      interval: settings.siteRequestInterval,
      adapter,
    });
    return new NexusTracker(definition, session);
  });
}

/**
 * 给站点加上文件清单缓存
 * @param tracker - 站点
 * @param store - 缓存
 */
export function withManifestCache(
  tracker: TrackerAdapter,
  store: ManifestStore
): TrackerAdapter {
  return {
    site: tracker.site,
    listCandidates: (filter) => tracker.listCandidates(filter),
    listHotTorrents: () => tracker.listHotTorrents(),
    downloadTorrent: (key) => tracker.downloadTorrent(key),
    async fetchManifest(key) {
      const cached = await store.get(key);
      if (cached && cached.length > 0) {
        logger.debug(`使用缓存的文件清单: ${formatKey(key)}`);
        return cached;
      }
      const manifest = await tracker.fetchManifest(key);
      await store.set(key, manifest);
      return manifest;
    },
  };
}
