import type { RankedCandidate } from "../types/planning.ts";
import type {
  LocalTorrent,
  Promotion,
  ScoreInputs,
  TorrentRecord,
} from "../types/torrent.ts";
import { formatKey } from "./identity.ts";

/**
 * 评分策略。
 *
 * score 给站点上的候选种子打分，分数越高越值得下载；
 * residentScore 给本地种子打分，返回 null 表示该种子暂时不能删除。
 */
export interface ScoringPolicy {
  score(record: TorrentRecord): number;
  /**
   * @param now - 当前时间（Unix 秒）
   */
  residentScore(local: LocalTorrent, now: number): number | null;
}

export type ScorerConfig = {
  /** 促销折扣的权重，0 表示不考虑促销 */
  freeWeight: number;
  /** 下载量回本所需的天数，分数低于 1/天数 的候选不值得下载 */
  costRecoveryDays: number;
  /** 下载完成后多少天内不删除 */
  removalExemptionDays: number;
};

export const DEFAULT_SCORER_CONFIG: ScorerConfig = {
  freeWeight: 1,
  costRecoveryDays: 7,
  removalExemptionDays: 15,
};

export type Point = readonly [x: number, y: number];

const GB = 1024 ** 3;
const DAY = 24 * 60 * 60;
/** 上传速度超过 5 KiB/s 的种子仍在活跃做种 */
const ACTIVE_UPLOAD_SPEED = 5 * 1024;

/** 文件大小（GB）的权重，小文件和超大文件都不划算 */
const FILE_SIZE_WEIGHTS: readonly Point[] = [
  [0, 0.1],
  [2, 1.0],
  [15, 1.0],
  [60, 0.1],
  [500, 0.01],
];

const LEECHER_WEIGHTS: readonly Point[] = [
  [0, 0.1],
  [2, 0.6],
  [6, 0.9],
  [10, 1.0],
];

/** 按优先级排列，只取第一个命中的折扣 */
const DOWNLOAD_DISCOUNTS: readonly (readonly [Promotion, number])[] = [
  ["free", 1.0],
  ["half_down", 0.5],
  ["thirty_down", 0.7],
];

/**
 * 分段线性插值，超出范围时取端点的值
 * @param points - 按 x 升序排列的折点
 */
export function piecewiseLinear(points: readonly Point[], x: number): number {
  if (points.length === 0) return 0;
  const [firstX, firstY] = points[0];
  if (x <= firstX) return firstY;
  for (let i = 1; i < points.length; i++) {
    const [x1, y1] = points[i];
    if (x <= x1) {
      const [x0, y0] = points[i - 1];
      return y0 + ((y1 - y0) * (x - x0)) / (x1 - x0);
    }
  }
  return points[points.length - 1][1];
}

export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

/**
 * 默认的评分方式：按做种人数、下载人数、完成数、存活时间和促销估计单位时间内的上传收益。
 */
export class DefaultScorer implements ScoringPolicy {
  readonly config: ScorerConfig;

  constructor(config: Partial<ScorerConfig> = {}) {
    this.config = { ...DEFAULT_SCORER_CONFIG, ...config };
  }

  score(record: TorrentRecord): number {
    return this.estimate(record.scoreInputs, record.sizeBytes, true);
  }

  residentScore(local: LocalTorrent, now: number): number | null {
    if (local.upSpeed > ACTIVE_UPLOAD_SPEED) return null;
    if (local.amountLeft > 0) return null;
    if (local.completedOn + this.config.removalExemptionDays * DAY > now) {
      return null;
    }
    // 只剩自己在做种时不删
    if (local.scoreInputs.seeders <= 1) return null;
    return this.estimate(local.scoreInputs, local.sizeBytes, false);
  }

  /**
   * @param costRecovery - 为 true 时，收益不足以在 costRecoveryDays 天内回本的种子记 0 分
   */
  estimate(inputs: ScoreInputs, sizeBytes: number, costRecovery: boolean): number {
    const { seeders, leechers, finished, liveDays, promotions } = inputs;
    if (seeders <= 0 || leechers <= 0) return 0;

    // 老种的完成数参考价值较低
    const finishedRatio = 0.5 * sigmoid(-liveDays + 30) + 0.5;
    let value =
      ((finishedRatio * finished + leechers * 1.5) / (liveDays + 2) + leechers) /
      (seeders + leechers + 1);
    value *= piecewiseLinear(LEECHER_WEIGHTS, leechers);

    if (promotions.includes("two_up")) value *= 2;
    const discount = DOWNLOAD_DISCOUNTS.find(([promotion]) =>
      promotions.includes(promotion)
    );
    if (discount) value *= 1 + this.config.freeWeight * discount[1];

    // 热门种子不在乎大小
    const sizeRatio = sigmoid((finishedRatio + finished) / (liveDays + 1) - 20);
    value *=
      (1 - sizeRatio) * piecewiseLinear(FILE_SIZE_WEIGHTS, sizeBytes / GB) +
      sizeRatio;

    if (costRecovery && value < 1 / this.config.costRecoveryDays) return 0;
    return value;
  }
}

function isFree(record: TorrentRecord): boolean {
  return record.scoreInputs.promotions.includes("free");
}

/**
 * 候选种子的排序规则：分数高者优先，同分时免费优先，再按大小升序，最后按种子标识。
 */
export function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  const freeA = isFree(a.record);
  if (freeA !== isFree(b.record)) return freeA ? -1 : 1;
  if (a.record.sizeBytes !== b.record.sizeBytes) {
    return a.record.sizeBytes - b.record.sizeBytes;
  }
  const keyA = formatKey(a.record.key);
  const keyB = formatKey(b.record.key);
  return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
}

/**
 * 给候选种子打分并排序
 * @param records - 站点上的候选种子
 * @param policy - 评分策略
 */
export function rankCandidates(
  records: readonly TorrentRecord[],
  policy: ScoringPolicy
): RankedCandidate[] {
  return records
    .map((record) => {
      const score = policy.score(record);
      return { record, score: Number.isNaN(score) ? -Infinity : score };
    })
    .sort(compareRanked);
}
