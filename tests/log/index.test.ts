import { afterEach, describe, expect, it, vi } from "vitest";
import logger, { getLogLevel, setLogLevel } from "../../src/log/index.ts";

const initialLevel = getLogLevel();

afterEach(() => {
  setLogLevel(initialLevel);
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("drops messages below the current level", () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    setLogLevel("info");

    logger.debug("调试信息");
    logger.info("共 %d 个种子", 3);

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(String(stdout.mock.calls[0][0])).toMatch(/\[INFO\]\x1b\[0m 共 3 个种子\n$/);
  });

  it("writes warnings and errors to stderr", () => {
    const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    setLogLevel("debug");

    logger.debug("调试信息");
    logger.warn("警告");
    logger.error("错误");

    expect(stdout).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenCalledTimes(2);
  });
});
