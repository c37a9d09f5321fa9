import { defineConfig } from "tsup";
import fs from "fs/promises";
import path from "path";

async function modifyPackageJson() {
  // eslint-disable-next-line no-console
  console.log("🛠️  正在生成生产环境的 package.json...");

  const filePath = path.resolve("package.json");
  const newFilePath = path.resolve("dist/package.json");

  const raw = await fs.readFile(filePath, "utf-8");
  const pkg: Record<string, unknown> = JSON.parse(raw);

  // dist 目录下直接运行 index.js
  pkg.bin = { seedplan: "index.js" };
  pkg.scripts = {
    start: "node --enable-source-maps index.js run",
    dry: "node --enable-source-maps index.js run --dry-run",
    debug: "node --enable-source-maps index.js run --debug",
  };

  delete pkg.devDependencies;

  await fs.writeFile(newFilePath, JSON.stringify(pkg, null, 2), "utf-8");

  // eslint-disable-next-line no-console
  console.log(`✅ 已生成 ${newFilePath}`);
}

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  target: "node20",
  dts: false,
  sourcemap: true,
  clean: true,
  banner: {
    js: "#!/usr/bin/env node",
  },
  onSuccess: async () => {
    await modifyPackageJson();
  },
});
