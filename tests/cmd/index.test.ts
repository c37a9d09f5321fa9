import { describe, expect, it } from "vitest";
import { COMMANDS, runCommand } from "../../src/cmd/index.ts";

const testEnv = {
  QBITTORRENT_HOST: "http://localhost:8080",
  QBITTORRENT_USERNAME: "admin",
  QBITTORRENT_PASSWORD: "test-secret",
  DOWNLOAD_DIR: "/downloads",
  MAX_TOTAL_SIZE: "100 GiB",
  BYR_COOKIE: "test-cookie",
};

describe("runCommand", () => {
  it("knows the available commands", () => {
    expect(COMMANDS).toEqual(["run", "download", "hitchhike", "stat"]);
  });

  it("rejects unknown commands before reading the configuration", async () => {
    await expect(runCommand("purge", { dryRun: true }, {})).rejects.toThrow(
      "未知命令: purge（可用命令: run, download, hitchhike, stat）"
    );
  });

  it("reports configuration errors", async () => {
    await expect(runCommand("stat", { dryRun: true }, {})).rejects.toThrow("环境变量配置错误");
  });

  it("requires a torrent for the download command", async () => {
    await expect(runCommand("download", { dryRun: true }, testEnv)).rejects.toThrow(
      "缺少种子标识，用法: seedplan download <站点-种子ID>"
    );
  });
});
