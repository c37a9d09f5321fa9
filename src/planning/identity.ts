import type {
  ContentCluster,
  IdentityOptions,
  IdentityVerdict,
} from "../types/planning.ts";
import type {
  FileManifest,
  TorrentKey,
  TorrentRecord,
} from "../types/torrent.ts";

export const DEFAULT_IDENTITY_OPTIONS: IdentityOptions = {
  caseSensitive: true,
  sizeTolerance: 0.01,
};

/**
 * 种子在所有站点间唯一的字符串形式，也用作排序依据
 * @param key - 种子标识
 * @returns 形如 `byr-12345`
 */
export function formatKey(key: TorrentKey): string {
  return `${key.site}-${key.id}`;
}

function normalizePath(path: string, caseSensitive: boolean) {
  const unified = path.replace(/\\/g, "/");
  return caseSensitive ? unified : unified.toLowerCase();
}

/** 清单为空（如磁力链接尚未取得元数据）时视同未知 */
export function isKnownManifest(
  manifest: FileManifest | null
): manifest is FileManifest {
  return manifest !== null && manifest.length > 0;
}

/** 文件清单的总大小 */
export function manifestSize(manifest: FileManifest): number {
  return manifest.reduce((sum, file) => sum + file.size, 0);
}

const signatureCache = new WeakMap<FileManifest, Map<boolean, string>>();

/**
 * 文件清单的规范形式：去重、排序后的 (路径, 大小) 集合。
 * 两个清单签名相同当且仅当两者的 (路径, 大小) 集合相等。
 */
export function manifestSignature(
  manifest: FileManifest,
  options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS
): string {
  let cached = signatureCache.get(manifest);
  const hit = cached?.get(options.caseSensitive);
  if (hit !== undefined) return hit;

  const entries = new Set(
    manifest.map(
      (file) => `${normalizePath(file.path, options.caseSensitive)}\0${file.size}`
    )
  );
  const signature = Array.from(entries).sort().join("\n");

  if (!cached) {
    cached = new Map();
    signatureCache.set(manifest, cached);
  }
  cached.set(options.caseSensitive, signature);
  return signature;
}

/**
 * 判断两个文件清单是否对应同一份磁盘内容。
 * 未知的清单（尚未抓取）与任何清单都不相同。
 */
export function identical(
  a: FileManifest | null,
  b: FileManifest | null,
  options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS
): boolean {
  if (!isKnownManifest(a) || !isKnownManifest(b)) return false;
  return manifestSignature(a, options) === manifestSignature(b, options);
}

/**
 * 两个大小是否在允许的相对误差内
 * @param tolerance - 相对误差，0 表示必须完全相等
 */
export function sizesClose(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance * Math.max(a, b);
}

/**
 * 比较两个种子记录。
 *
 * 双方都有文件清单时按清单给出确定结论；缺少清单时退回到只比较声明大小，
 * 大小接近只会得到 ambiguous，调用方必须把它当作警告而不是匹配。
 */
export function resolveIdentity(
  a: TorrentRecord,
  b: TorrentRecord,
  options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS
): IdentityVerdict {
  if (isKnownManifest(a.manifest) && isKnownManifest(b.manifest)) {
    return identical(a.manifest, b.manifest, options) ? "identical" : "different";
  }
  return sizesClose(a.sizeBytes, b.sizeBytes, options.sizeTolerance)
    ? "ambiguous"
    : "different";
}

/** 按下标的并查集 */
export class DisjointSet {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.rank = new Array<number>(size).fill(0);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    // 路径压缩
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  union(a: number, b: number) {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    if (this.rank[rootA] < this.rank[rootB]) {
      this.parent[rootA] = rootB;
    } else if (this.rank[rootA] > this.rank[rootB]) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootB] = rootA;
      this.rank[rootA]++;
    }
  }
}

/**
 * 将记录划分为内容一致的簇。
 *
 * 每条记录恰好属于一个簇；没有文件清单（或清单为空）的记录单独成簇。
 * 簇按最小成员下标排序，簇内成员保持输入顺序，结果只取决于输入。
 */
export function clusterRecords<T extends TorrentRecord>(
  records: readonly T[],
  options: IdentityOptions = DEFAULT_IDENTITY_OPTIONS
): ContentCluster<T>[] {
  const set = new DisjointSet(records.length);
  const signatures = records.map((record) =>
    isKnownManifest(record.manifest)
      ? manifestSignature(record.manifest, options)
      : null
  );

  // 签名相等即 identical，同一签名的记录并入第一个出现的记录
  const firstBySignature = new Map<string, number>();
  signatures.forEach((signature, i) => {
    if (signature === null) return;
    const first = firstBySignature.get(signature);
    if (first === undefined) {
      firstBySignature.set(signature, i);
    } else {
      set.union(first, i);
    }
  });

  const groups = new Map<number, number[]>();
  for (let i = 0; i < records.length; i++) {
    const root = set.find(i);
    const group = groups.get(root);
    if (group) {
      group.push(i);
    } else {
      groups.set(root, [i]);
    }
  }

  return Array.from(groups.values()).map((indexes, id) => {
    const members = indexes.map((i) => records[i]);
    const representative = members[0];
    return {
      id,
      members,
      signature: signatures[indexes[0]],
      effectiveSize: isKnownManifest(representative.manifest)
        ? manifestSize(representative.manifest)
        : representative.sizeBytes,
    };
  });
}
