import { describe, expect, it } from "vitest";
import { manifestFromParsed, readManifest } from "../../src/sites/manifest.ts";
import { torrentFile } from "../helpers.ts";

describe("manifestFromParsed", () => {
  it("uses the file list of a multi-file torrent", () => {
    expect(
      manifestFromParsed({
        infoHash: "0".repeat(40),
        name: "Demo",
        length: 300,
        files: [
          { path: "Demo\\a.bin", name: "a.bin", length: 100, offset: 0 },
          { path: "Demo/sub/b.bin", name: "b.bin", length: 200, offset: 100 },
        ],
      })
    ).toEqual([
      { path: "Demo/a.bin", size: 100 },
      { path: "Demo/sub/b.bin", size: 200 },
    ]);
  });

  it("falls back to name and length", () => {
    expect(manifestFromParsed({ infoHash: "0".repeat(40), name: "movie.mkv", length: 42 })).toEqual([
      { path: "movie.mkv", size: 42 },
    ]);
    expect(manifestFromParsed({ infoHash: "0".repeat(40) })).toEqual([]);
  });
});

describe("readManifest", () => {
  it("reads the files of a .torrent file", async () => {
    const torrent = torrentFile("Demo", [
      ["a.bin", 100],
      ["sub/b.bin", 200],
    ]);
    await expect(readManifest(torrent)).resolves.toEqual([
      { path: "Demo/a.bin", size: 100 },
      { path: "Demo/sub/b.bin", size: 200 },
    ]);
  });

  it("rejects data that is not a torrent", async () => {
    await expect(readManifest(Buffer.from("this is not a torrent file"))).rejects.toThrow();
  });
});
