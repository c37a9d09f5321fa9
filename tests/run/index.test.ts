import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import logger from "../../src/log/index.ts";
import { formatKey } from "../../src/planning/identity.ts";
import {
  buildPlan,
  collectFromTrackers,
  prefetchManifests,
  refreshScoreInputs,
  type RunContext,
} from "../../src/run/index.ts";
import {
  FixedPolicy,
  GB,
  fakeClient,
  fakeTracker,
  makeLocal,
  makeRecord,
  manifestOf,
  testConfig,
} from "../helpers.ts";

beforeEach(() => {
  vi.spyOn(logger, "debug").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("collectFromTrackers", () => {
  it("skips trackers that fail", async () => {
    const warn = vi.spyOn(logger, "warn").mockImplementation(() => {});
    const byr = fakeTracker("byr", [makeRecord("byr", "1")]);
    const tju = fakeTracker("tju", []);
    tju.listCandidates.mockRejectedValue(new Error("登录失效"));

    const records = await collectFromTrackers([byr, tju], "候选种子", (tracker) =>
      tracker.listCandidates()
    );

    expect(records.map((record) => formatKey(record.key))).toEqual(["byr-1"]);
    expect(warn).toHaveBeenCalledWith("[tju] 候选种子获取失败:", "登录失效");
  });
});

describe("prefetchManifests", () => {
  it("records every outcome by torrent key", async () => {
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    const manifest = manifestOf("One", [GB]);
    const tracker = fakeTracker("byr", []);
    tracker.fetchManifest.mockImplementation(async (key) => {
      if (key.id === "3") return await new Promise<never>(() => {});
      if (key.id === "1") return manifest;
      throw new Error(`种子 ${formatKey(key)} 不存在`);
    });

    const records = [
      makeRecord("byr", "1"),
      makeRecord("byr", "2"),
      makeRecord("byr", "3"),
      makeRecord("hdc", "4"),
    ];
    const manifests = await prefetchManifests(records, [tracker], 2, 20);

    expect(Object.fromEntries(manifests)).toEqual({
      "byr-1": { ok: true, manifest },
      "byr-2": { ok: false, reason: "种子 byr-2 不存在" },
      "byr-3": { ok: false, reason: "获取 byr-3 的文件清单超时" },
      "hdc-4": { ok: false, reason: "未配置站点 hdc" },
    });
  });

  it("fetches at most the given number of manifests at once", async () => {
    const tracker = fakeTracker("byr", []);
    let running = 0;
    let peak = 0;
    tracker.fetchManifest.mockImplementation(async (key) => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return manifestOf(key.id, [GB]);
    });

    const records = ["1", "2", "3", "4", "5"].map((id) => makeRecord("byr", id));
    const manifests = await prefetchManifests(records, [tracker], 2, 1000);

    expect(peak).toBe(2);
    expect([...manifests.keys()]).toEqual(["byr-1", "byr-2", "byr-3", "byr-4", "byr-5"]);
  });
});

describe("refreshScoreInputs", () => {
  it("takes peer counts from the site listing", () => {
    const manifest = manifestOf("Local", [GB]);
    const listedLocal = makeLocal("byr", "1", manifest);
    const unlisted = makeLocal("tju", "2", manifest);
    const listing = makeRecord("byr", "1", { scoreInputs: { seeders: 42, leechers: 7 } });

    const [refreshed, untouched] = refreshScoreInputs([listedLocal, unlisted], [listing]);
    expect(refreshed.scoreInputs).toBe(listing.scoreInputs);
    expect(refreshed.hash).toBe("hash-byr-1");
    expect(untouched).toBe(unlisted);
  });
});

describe("buildPlan", () => {
  const listing = [
    makeRecord("byr", "1", { size: 20 * GB, scoreInputs: { seeders: 42 } }),
    makeRecord("byr", "10", { size: 50 * GB }),
    makeRecord("byr", "11", { size: 30 * GB }),
    makeRecord("byr", "12", { size: 10 * GB }),
  ];
  const manifests = {
    "10": manifestOf("M10", [50 * GB]),
    "11": manifestOf("M11", [30 * GB]),
    "12": manifestOf("M12", [10 * GB]),
  };
  const policy = new FixedPolicy(
    { "byr-1": 99, "byr-10": 50, "byr-11": 40, "byr-12": 30 },
    { "byr-1": 10 }
  );

  function context(freeSpace: number, records = listing) {
    const tracker = fakeTracker("byr", records, manifests);
    const ctx: RunContext = {
      config: testConfig({ SHORTLIST_SIZE: "2" }),
      trackers: [tracker],
      client: fakeClient([makeLocal("byr", "1", manifestOf("Low", [20 * GB]))], freeSpace),
      policy,
      now: () => 0,
    };
    return { ctx, tracker };
  }

  function outcome(plan: Awaited<ReturnType<typeof buildPlan>>["plan"]) {
    return {
      actions: plan.actions.map((action) =>
        action.type === "evict"
          ? `evict ${formatKey(action.record.key)}`
          : `${action.type} ${formatKey(action.candidate.key)}`
      ),
      skipped: plan.skipped.map(({ candidate, reason }) => `${formatKey(candidate.key)} ${reason}`),
    };
  }

  it("fetches manifests for the shortlist only and plans within the budgets", async () => {
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    const { ctx, tracker } = context(1000 * GB);
    const { plan, ledger } = await buildPlan(ctx);

    expect(tracker.listCandidates).toHaveBeenCalledWith({ sort: "leechers", pages: 1 });
    expect(tracker.fetchManifest.mock.calls.map(([key]) => formatKey(key))).toEqual([
      "byr-10",
      "byr-11",
    ]);
    expect(ledger.records[0].scoreInputs.seeders).toBe(42);
    expect(plan.storageBudgetBytes).toBe(100 * GB);
    expect(plan.downloadBudgetBytes).toBe(50 * GB);
    expect(outcome(plan)).toEqual({
      actions: ["download byr-10"],
      skipped: ["byr-1 already-local", "byr-11 download-budget", "byr-12 not-shortlisted"],
    });
    expect(plan.occupiedAfter).toBe(70 * GB);
  });

  it("limits storage to what the disk can hold", async () => {
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    const { ctx } = context(10 * GB);
    const { plan } = await buildPlan(ctx);

    expect(plan.storageBudgetBytes).toBe(30 * GB);
    expect(outcome(plan)).toEqual({
      actions: ["evict byr-1", "download byr-11"],
      skipped: ["byr-1 already-local", "byr-10 storage-budget", "byr-12 not-shortlisted"],
    });
  });

  it("considers only free torrents when asked to", async () => {
    const records = listing.map((record) =>
      record.key.id === "11"
        ? { ...record, scoreInputs: { ...record.scoreInputs, promotions: ["free" as const] } }
        : record
    );
    const { ctx, tracker } = context(1000 * GB, records);
    const { plan } = await buildPlan(ctx, { freeOnly: true });

    expect(tracker.fetchManifest.mock.calls.map(([key]) => formatKey(key))).toEqual(["byr-11"]);
    expect(outcome(plan)).toEqual({
      actions: ["download byr-11"],
      skipped: [],
    });
    expect(plan.occupiedAfter).toBe(50 * GB);
  });
});
