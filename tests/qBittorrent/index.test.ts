import { afterEach, describe, expect, it, vi } from "vitest";
import logger from "../../src/log/index.ts";
import {
  QBClientAdapter,
  localName,
  parseLocalName,
  type QBApi,
  type QBMainData,
  type QBTorrentRow,
} from "../../src/qBittorrent/index.ts";
import { makeLocal, makeRecord, manifestOf } from "../helpers.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

const ADDED_ON = 1_000_000;
const DAY = 86400;

function row(overrides: Partial<QBTorrentRow>): QBTorrentRow {
  return {
    hash: "hash",
    name: "",
    tags: "",
    save_path: "/downloads",
    size: 100,
    total_size: 100,
    amount_left: 0,
    progress: 1,
    added_on: ADDED_ON,
    completion_on: ADDED_ON + 3600,
    num_complete: 4,
    num_incomplete: 2,
    upspeed: 0,
    uploaded: 500,
    downloaded: 100,
    ...overrides,
  };
}

function fakeApi(rows: QBTorrentRow[] = []) {
  const api = {
    login: vi.fn(async () => true),
    getAppVersion: vi.fn(async () => "v4.6.0"),
    getSyncMainData: vi.fn(async (): Promise<QBMainData> => ({
      server_state: { free_space_on_disk: 4096, dl_info_speed: 0 },
    })),
    listTorrents: vi.fn(async () => rows),
    torrentFiles: vi.fn(async (hash: string) => {
      if (hash === "broken") throw new Error("Not Found");
      return [{ name: "Movie\\a.mkv", size: 60 }, { name: "Movie/b.srt", size: 40 }];
    }),
    addTorrent: vi.fn(async (_torrent: Buffer, _options?: object) => true),
    removeTorrent: vi.fn(async (_hash: string, _deleteFiles?: boolean) => true),
  } satisfies QBApi;
  return api;
}

function adapterFor(api: QBApi) {
  return new QBClientAdapter(api, {
    downloadDir: "/downloads",
    retryDelay: 1,
    now: () => ADDED_ON + 2 * DAY,
  });
}

describe("local names", () => {
  it("round-trips the site key through the torrent name", () => {
    const name = localName(makeRecord("byr", "123", { title: "[合集] 测试" }));
    expect(name).toBe("[byr-123][合集] 测试");
    expect(parseLocalName(name)).toEqual({ key: { site: "byr", id: "123" }, title: "[合集] 测试" });
  });

  it("ignores torrents added by hand", () => {
    expect(parseLocalName("Some.Movie.2023.1080p")).toBeNull();
    expect(parseLocalName("[BYR-1]大写站点")).toBeNull();
  });
});

describe("QBClientAdapter.listLocalTorrents", () => {
  it("maps managed torrents to local records", async () => {
    const api = fakeApi([
      row({ hash: "a", name: "[byr-1]Movie", tags: "byr", upspeed: 2048 }),
      row({ hash: "b", name: "Unmanaged" }),
      row({ hash: "c", name: "[tju-2]Show", tags: "tju, keep", amount_left: 50, progress: 0.5 }),
    ]);
    const locals = await adapterFor(api).listLocalTorrents();

    expect(locals).toHaveLength(2);
    expect(locals[0]).toEqual({
      key: { site: "byr", id: "1" },
      title: "Movie",
      manifest: [
        { path: "Movie/a.mkv", size: 60 },
        { path: "Movie/b.srt", size: 40 },
      ],
      sizeBytes: 100,
      scoreInputs: {
        seeders: 4,
        leechers: 2,
        finished: 0,
        liveDays: 2,
        promotions: [],
        uploadedBytes: 500,
        downloadedBytes: 100,
      },
      origin: "byr",
      hash: "a",
      savePath: "/downloads",
      state: { kind: "seeding" },
      amountLeft: 0,
      completedOn: ADDED_ON + 3600,
      upSpeed: 2048,
    });
    expect(locals[1].state).toEqual({ kind: "protected", complete: false });
    expect(api.torrentFiles).not.toHaveBeenCalledWith("b");
  });

  it("treats a torrent without a file list as unknown content", async () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
    const api = fakeApi([row({ hash: "broken", name: "[byr-3]Broken", total_size: 700 })]);
    const [local] = await adapterFor(api).listLocalTorrents();

    expect(local.manifest).toEqual([]);
    expect(local.sizeBytes).toBe(700);
    expect(api.torrentFiles).toHaveBeenCalledTimes(4);
    expect(warn).toHaveBeenLastCalledWith("获取种子 [byr-3]Broken 的文件列表失败:", "Not Found");
  });

  it("limits how many file lists are requested at once", async () => {
    const api = fakeApi(
      ["1", "2", "3", "4", "5", "6"].map((id) => row({ hash: id, name: `[byr-${id}]T${id}` }))
    );
    let running = 0;
    let peak = 0;
    api.torrentFiles.mockImplementation(async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return [{ name: "a.mkv", size: 100 }];
    });
    const adapter = new QBClientAdapter(api, { downloadDir: "/downloads", concurrency: 2 });

    const locals = await adapter.listLocalTorrents();
    expect(locals.map((local) => local.key.id)).toEqual(["1", "2", "3", "4", "5", "6"]);
    expect(peak).toBe(2);
  });

  it("logs in again when the session has expired", async () => {
    const api = fakeApi();
    api.getAppVersion.mockRejectedValueOnce(new Error("Forbidden"));
    await adapterFor(api).listLocalTorrents();
    expect(api.login).toHaveBeenCalledTimes(1);
  });
});

describe("QBClientAdapter actions", () => {
  const torrent = Buffer.from("torrent");
  const record = makeRecord("byr", "9", { title: "New" });

  it("adds downloads to the download directory", async () => {
    const api = fakeApi();
    await adapterFor(api).startDownload(record, torrent);
    expect(api.addTorrent).toHaveBeenCalledWith(torrent, {
      savepath: "/downloads",
      tags: "byr",
      rename: "[byr-9]New",
    });
  });

  it("adds cross-seeds next to the existing files without checking", async () => {
    const api = fakeApi();
    const existing = makeLocal("tju", "2", manifestOf("Show", [100]), { savePath: "/data/tju" });
    await adapterFor(api).registerCrossSeed(record, torrent, existing);
    expect(api.addTorrent).toHaveBeenCalledWith(torrent, {
      savepath: "/data/tju",
      tags: "byr",
      rename: "[byr-9]New",
      skip_checking: "true",
    });
  });

  it("can add a download paused over files that already exist", async () => {
    const api = fakeApi();
    await adapterFor(api).startDownload(record, torrent, { paused: true, skipChecking: true });
    expect(api.addTorrent).toHaveBeenCalledWith(torrent, {
      savepath: "/downloads",
      tags: "byr",
      rename: "[byr-9]New",
      skip_checking: "true",
      paused: "true",
      stopped: "true",
    });
  });

  it("fails when qBittorrent rejects the torrent", async () => {
    const api = fakeApi();
    api.addTorrent.mockResolvedValue(false);
    await expect(adapterFor(api).startDownload(record, torrent)).rejects.toThrow(
      "qBittorrent 拒绝添加种子 [byr-9]New"
    );
  });

  it("removes torrents with or without their files", async () => {
    const api = fakeApi();
    const adapter = adapterFor(api);
    const local = makeLocal("byr", "1", manifestOf("Old", [100]));
    await adapter.stop(local);
    await adapter.stopAndDelete(local);
    expect(api.removeTorrent.mock.calls).toEqual([
      ["hash-byr-1", false],
      ["hash-byr-1", true],
    ]);
  });

  it("asks qBittorrent for the free disk space", async () => {
    const api = fakeApi();
    await expect(adapterFor(api).freeSpaceBytes()).resolves.toBe(4096);
    expect(api.getSyncMainData).toHaveBeenCalledTimes(1);
  });

  it("fails when qBittorrent does not report free space", async () => {
    const api = fakeApi();
    api.getSyncMainData.mockResolvedValue({ server_state: {} });
    await expect(adapterFor(api).freeSpaceBytes()).rejects.toThrow(
      "qBittorrent 未返回磁盘剩余空间"
    );
  });
});
