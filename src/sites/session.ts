import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type ResponseType,
} from "axios";
import { wait, withRetry } from "../function/index.ts";
import logger from "../log/index.ts";
import { FetchFailure, errorMessage } from "../planning/errors.ts";
import type { TorrentKey } from "../types/torrent.ts";

export type NexusSessionOptions = {
  /** 站点标签 */
  site: string;
  /** 站点根地址，以 `/` 结尾 */
  baseUrl: string;
  /** 浏览器中复制的登录 Cookie */
  cookie: string;
  /** 单次请求超时（毫秒） */
  timeout?: number;
  /** 两次请求之间的最小间隔（毫秒） */
  interval?: number;
  /** 失败后的重试次数 */
  retries?: number;
  /** 首次重试前的等待时间（毫秒） */
  retryDelay?: number;
  /** 自定义 axios 适配器，测试时使用 */
  adapter?: AxiosAdapter;
};

const USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

/**
 * 一个 NexusPHP 站点的登录会话。
 *
 * 同一会话内的请求排队进行，相邻两次请求至少间隔 interval 毫秒；
 * 未登录时站点会返回重定向，这里当作失败处理。
 */
export class NexusSession {
  readonly site: string;
  private readonly http: AxiosInstance;
  private readonly interval: number;
  private readonly retries: number;
  private readonly retryDelay: number;
  private lastRequestedAt = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: NexusSessionOptions) {
    this.site = options.site;
    this.interval = options.interval ?? 500;
    this.retries = options.retries ?? 3;
    this.retryDelay = options.retryDelay ?? 5000;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeout ?? 30 * 1000,
      maxRedirects: 0,
      validateStatus: (status) => status === 200,
      headers: {
        Cookie: options.cookie,
        "User-Agent": USER_AGENT,
      },
      adapter: options.adapter,
    });
  }

  /** 等待轮到自己发起请求 */
  private throttle(): Promise<void> {
    const turn = this.queue.then(async () => {
      const elapsed = Date.now() - this.lastRequestedAt;
      if (elapsed < this.interval) await wait(this.interval - elapsed);
      this.lastRequestedAt = Date.now();
    });
    this.queue = turn;
    return turn;
  }

  private async get(
    path: string,
    responseType: ResponseType,
    key: TorrentKey | null
  ): Promise<unknown> {
    try {
      return await withRetry(
        async () => {
          await this.throttle();
          logger.debug(`[${this.site}] 正在请求 ${path || "/"}`);
          const res = await this.http.get<unknown>(path, { responseType });
          return res.data;
        },
        this.site,
        this.retries,
        this.retryDelay
      );
    } catch (err) {
      throw new FetchFailure(
        this.site,
        key,
        `[${this.site}] 请求 ${path || "/"} 失败: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  /** 获取页面 HTML */
  async getHtml(path: string): Promise<string> {
    const data = await this.get(path, "text", null);
    if (typeof data !== "string") {
      throw new FetchFailure(this.site, null, `[${this.site}] ${path} 返回的不是文本`);
    }
    return data;
  }

  /**
   * 获取二进制内容，如 .torrent 文件
   * @param key - 请求所属的种子，出错时带在错误中
   */
  async getBuffer(path: string, key: TorrentKey | null = null): Promise<Buffer> {
    const data = await this.get(path, "arraybuffer", key);
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (data instanceof Uint8Array) return Buffer.from(data);
    throw new FetchFailure(this.site, key, `[${this.site}] ${path} 返回的不是二进制内容`);
  }
}
