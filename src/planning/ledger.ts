import type {
  ContentCluster,
  EvictionMode,
  IdentityOptions,
} from "../types/planning.ts";
import type {
  FileManifest,
  LocalTorrent,
  TorrentKey,
  TorrentRecord,
} from "../types/torrent.ts";
import {
  DEFAULT_IDENTITY_OPTIONS,
  clusterRecords,
  formatKey,
  isKnownManifest,
  manifestSignature,
} from "./identity.ts";

export type EvictionEstimate = {
  /** 删除后真正释放的空间 */
  bytes: number;
  mode: EvictionMode;
};

/** 种子是否已经下载完成，可以作为辅种的文件来源 */
export function isComplete(local: LocalTorrent): boolean {
  switch (local.state.kind) {
    case "seeding":
      return true;
    case "protected":
      return local.state.complete;
    case "downloading":
      return false;
  }
}

/**
 * 种子是否受保护：带 keep 标签，或在配置的保护列表中
 * @param protectedKeys - 形如 `byr-12345` 的种子标识集合
 */
export function isProtected(
  local: LocalTorrent,
  protectedKeys: ReadonlySet<string>
): boolean {
  return local.state.kind === "protected" || protectedKeys.has(formatKey(local.key));
}

/**
 * 本地的种子以及按内容去重后的空间占用。
 *
 * 每次都从完整的种子列表重新聚类，增删种子会得到一个新的账本。
 */
export class StorageLedger {
  readonly records: readonly LocalTorrent[];
  readonly clusters: readonly ContentCluster<LocalTorrent>[];
  readonly options: IdentityOptions;
  private readonly clusterByKey = new Map<string, ContentCluster<LocalTorrent>>();
  private readonly clusterBySignature = new Map<string, ContentCluster<LocalTorrent>>();

  constructor(
    records: readonly LocalTorrent[],
    options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS
  ) {
    this.records = records;
    this.options = options;
    this.clusters = clusterRecords(records, options);
    for (const cluster of this.clusters) {
      for (const member of cluster.members) {
        this.clusterByKey.set(formatKey(member.key), cluster);
      }
      if (cluster.signature !== null) {
        this.clusterBySignature.set(cluster.signature, cluster);
      }
    }
  }

  /** 去重后的总占用空间 */
  occupiedBytes(): number {
    return this.clusters.reduce((sum, cluster) => sum + cluster.effectiveSize, 0);
  }

  has(key: TorrentKey): boolean {
    return this.clusterByKey.has(formatKey(key));
  }

  clusterOf(key: TorrentKey): ContentCluster<LocalTorrent> | undefined {
    return this.clusterByKey.get(formatKey(key));
  }

  /**
   * 删除某个种子能释放的空间。
   * 只有簇内最后一个种子才能连同文件一起删除，否则释放 0 字节。
   */
  wouldFreeBytes(key: TorrentKey): EvictionEstimate {
    const cluster = this.clusterOf(key);
    if (!cluster) {
      throw new Error(`种子 ${formatKey(key)} 不在本地`);
    }
    if (cluster.members.length === 1) {
      return { bytes: cluster.effectiveSize, mode: "reclaim" };
    }
    return { bytes: 0, mode: "detach" };
  }

  /** 查找与给定文件清单内容一致的本地簇 */
  findResidentMatch(
    manifest: FileManifest
  ): ContentCluster<LocalTorrent> | undefined {
    if (!isKnownManifest(manifest)) return undefined;
    return this.clusterBySignature.get(manifestSignature(manifest, this.options));
  }

  with(record: LocalTorrent): StorageLedger {
    return new StorageLedger([...this.records, record], this.options);
  }

  without(key: TorrentKey): StorageLedger {
    const target = formatKey(key);
    return new StorageLedger(
      this.records.filter((record) => formatKey(record.key) !== target),
      this.options
    );
  }
}

/**
 * 簇中可作为辅种文件来源的种子
 * @param residentKeys - 只在这些种子中挑选（排除本次计划里新加入的）
 */
export function completedMember(
  cluster: ContentCluster<LocalTorrent>,
  residentKeys: ReadonlySet<string>
): LocalTorrent | undefined {
  return cluster.members.find(
    (member) => isComplete(member) && residentKeys.has(formatKey(member.key))
  );
}

/** 簇中是否已经有来自该站点的种子 */
export function hasSiteMember(
  cluster: ContentCluster<LocalTorrent>,
  site: string
): boolean {
  return cluster.members.some((member) => member.key.site === site);
}

/**
 * 把计划要添加的种子当作本地种子记入账本
 * @param record - 站点上的种子
 * @param manifest - 已经抓取到的文件清单
 * @param existing - 辅种时复用其文件的本地种子
 */
export function asPendingLocal(
  record: TorrentRecord,
  manifest: FileManifest,
  existing?: LocalTorrent
): LocalTorrent {
  return {
    ...record,
    manifest,
    hash: "",
    savePath: existing?.savePath ?? "",
    state: { kind: "downloading" },
    amountLeft: existing ? 0 : record.sizeBytes,
    completedOn: 0,
    upSpeed: 0,
  };
}
