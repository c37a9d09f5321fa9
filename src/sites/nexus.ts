import * as cheerio from "cheerio";
import { parseSize } from "../function/index.ts";
import logger from "../log/index.ts";
import { ManifestUnavailable, errorMessage } from "../planning/errors.ts";
import { formatKey } from "../planning/identity.ts";
import type {
  CandidateFilter,
  CandidateSort,
  TrackerAdapter,
} from "../types/site.ts";
import type {
  FileManifest,
  Promotion,
  TorrentKey,
  TorrentRecord,
} from "../types/torrent.ts";
import { readManifest } from "./manifest.ts";
import type { NexusSession } from "./session.ts";

/** 存活时间单元格的内容 */
export type TimeCell = {
  text: string;
  /** 单元格中 `span[title]` 的 title，通常是完整的发布时间 */
  spanTitle: string | undefined;
  /** 按 `<br>` 等节点拆开的文本 */
  lines: string[];
};

/** 不同 NexusPHP 站点之间的差异 */
export type NexusSiteDefinition = {
  /** 站点标签 */
  site: string;
  /** 可读的站点名 */
  name: string;
  baseUrl: string;
  /** 从存活时间单元格中取出发布时间 */
  uploadedAt: (cell: TimeCell) => Date | null;
};

/** torrents.php 表格中一行的原始文本 */
export type ListedRow = {
  href: string;
  title: string;
  promotions: Promotion[];
  time: TimeCell;
  size: string;
  seeders: string;
  leechers: string;
  finished: string;
};

/** torrents.php 的 sort 参数 */
const SORT_FIELDS: Record<CandidateSort, number> = {
  time: 4,
  size: 5,
  seeders: 7,
  leechers: 8,
};

// 高亮背景、文字标记、图标三种促销标记方式
const PROMOTION_SELECTORS: readonly (readonly [string, Promotion[]])[] = [
  ["tr.free_bg, font.free, img.pro_free", ["free"]],
  ["tr.twoup_bg, font.twoup, img.pro_2up", ["two_up"]],
  ["tr.twoupfree_bg, font.twoupfree, img.pro_free2up", ["free", "two_up"]],
  ["tr.halfdown_bg, font.halfdown, img.pro_50pctdown", ["half_down"]],
  [
    "tr.twouphalfdown_bg, font.twouphalfdown, img.pro_50pctdown2up",
    ["half_down", "two_up"],
  ],
  [
    "tr.thirtypercentdown_bg, font.thirtypercent, img.pro_30pctdown",
    ["thirty_down"],
  ],
];

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * 从 torrents.php 页面提取种子表格。
 *
 * 表格各列依次是：类型、标题、评论数、存活时间、大小、做种数、下载数、完成数、发布者。
 * 标题列里嵌套的 table.torrentname 以及表头行都会被跳过。
 */
export function extractRows(html: string): ListedRow[] {
  const $ = cheerio.load(html);
  const rows: ListedRow[] = [];

  $("table.torrents tr").each((_, row) => {
    const cells = $(row).children("td");
    if (cells.length < 9) return;
    const link = cells.eq(1).find('a[href^="details.php"]').first();
    const href = link.attr("href");
    if (!href) return;

    const matched = PROMOTION_SELECTORS.find(
      ([selector]) => $(row).is(selector) || $(row).find(selector).length > 0
    );
    const timeCell = cells.eq(3);

    rows.push({
      href,
      title: (link.attr("title") ?? link.text()).trim(),
      promotions: matched ? [...matched[1]] : [],
      time: {
        text: timeCell.text().trim(),
        spanTitle: timeCell.find("span[title]").first().attr("title"),
        lines: timeCell
          .contents()
          .toArray()
          .map((node) => $(node).text().trim())
          .filter(Boolean),
      },
      size: cells.eq(4).text().trim(),
      seeders: cells.eq(5).text().trim(),
      leechers: cells.eq(6).text().trim(),
      finished: cells.eq(7).text().trim(),
    });
  });

  return rows;
}

function count(text: string): number {
  const value = Number.parseInt(text.replace(/,/g, ""), 10);
  return Number.isNaN(value) ? 0 : value;
}

/**
 * 把表格行转为种子记录，无法识别的行返回 null
 * @param now - 用于计算存活时间的当前时间
 */
export function toRecord(
  row: ListedRow,
  definition: NexusSiteDefinition,
  now: Date
): TorrentRecord | null {
  const id = new URLSearchParams(row.href.split("?")[1] ?? "").get("id");
  if (!id) return null;

  let sizeBytes: number;
  try {
    sizeBytes = parseSize(row.size);
  } catch (err) {
    logger.debug(`[${definition.site}] 跳过种子 ${id}:`, errorMessage(err));
    return null;
  }

  const uploadedAt = definition.uploadedAt(row.time);
  const liveDays =
    uploadedAt && !Number.isNaN(uploadedAt.getTime())
      ? Math.max(0, (now.getTime() - uploadedAt.getTime()) / DAY_MS)
      : 0;

  return {
    key: { site: definition.site, id },
    title: row.title,
    manifest: null,
    sizeBytes,
    scoreInputs: {
      seeders: count(row.seeders),
      leechers: count(row.leechers),
      finished: count(row.finished),
      liveDays,
      promotions: row.promotions,
      uploadedBytes: 0,
      downloadedBytes: 0,
    },
    origin: definition.site,
  };
}

/**
 * 解析 torrents.php 页面
 * @param html - 页面 HTML
 * @param definition - 站点定义
 * @param now - 当前时间
 */
export function parseTorrentTable(
  html: string,
  definition: NexusSiteDefinition,
  now: Date
): TorrentRecord[] {
  return extractRows(html)
    .map((row) => toRecord(row, definition, now))
    .filter((record): record is TorrentRecord => record !== null);
}

function dedupe(records: TorrentRecord[]): TorrentRecord[] {
  const seen = new Set<string>();
  return records.filter((record) => {
    const key = formatKey(record.key);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/** 基于 NexusPHP 的站点 */
export class NexusTracker implements TrackerAdapter {
  readonly site: string;
  private readonly definition: NexusSiteDefinition;
  private readonly session: NexusSession;
  private readonly now: () => Date;

  constructor(
    definition: NexusSiteDefinition,
    session: NexusSession,
    now: () => Date = () => new Date()
  ) {
    this.site = definition.site;
    this.definition = definition;
    this.session = session;
    this.now = now;
  }

  private async listPage(page: number, sort: CandidateSort) {
    const html = await this.session.getHtml(
      `torrents.php?page=${page}&sort=${SORT_FIELDS[sort]}&type=desc`
    );
    return parseTorrentTable(html, this.definition, this.now());
  }

  async listCandidates(filter: CandidateFilter = {}): Promise<TorrentRecord[]> {
    const sort = filter.sort ?? "leechers";
    const pages = filter.pages ?? 1;
    const records: TorrentRecord[] = [];
    for (let page = 0; page < pages; page++) {
      records.push(...(await this.listPage(page, sort)));
    }
    logger.debug(`[${this.site}] 获取到 ${records.length} 个候选种子`);
    return dedupe(records);
  }

  /** 做种人数和下载人数最多的种子，最可能在其它站点也有 */
  async listHotTorrents(): Promise<TorrentRecord[]> {
    const bySeeders = await this.listPage(0, "seeders");
    const byLeechers = await this.listPage(0, "leechers");
    return dedupe([...bySeeders, ...byLeechers]);
  }

  async downloadTorrent(key: TorrentKey): Promise<Buffer> {
    if (key.site !== this.site) {
      throw new Error(`种子 ${formatKey(key)} 不属于站点 ${this.site}`);
    }
    return await this.session.getBuffer(`download.php?id=${key.id}`, key);
  }

  async fetchManifest(key: TorrentKey): Promise<FileManifest> {
    const torrent = await this.downloadTorrent(key);
    try {
      return await readManifest(torrent);
    } catch (err) {
      throw new ManifestUnavailable(
        key,
        `解析种子 ${formatKey(key)} 失败: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }
}
