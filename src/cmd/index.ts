import { loadConfig, type AppConfig } from "../config/index.ts";
import handleDownload from "./download.ts";
import handleHitchhike from "./hitchhike.ts";
import handleRun from "./run.ts";
import handleStat from "./stat.ts";

export type CommandFlags = {
  /** 只生成计划，不执行 */
  dryRun: boolean;
  /** 只下载免费种子 */
  freeOnly?: boolean;
  /** 添加后暂停 */
  paused?: boolean;
  /** 文件已经在下载目录中，跳过校验 */
  exists?: boolean;
};

type CommandHandler = (
  config: AppConfig,
  flags: CommandFlags,
  args: readonly string[]
) => Promise<void>;

const handlers: Record<string, CommandHandler> = {
  // 下载热门种子，空间不足时删除低分种子
  run: handleRun,
  // 下载指定的种子
  download: handleDownload,
  // 辅种
  hitchhike: handleHitchhike,
  // 查看本地种子
  stat: handleStat,
};

export const COMMANDS = Object.keys(handlers);

/**
 * 读取配置并执行命令
 * @param command - 命令名
 * @param flags - 命令行选项
 * @param env - 环境变量
 * @param args - 命令后的其余参数
 */
export async function runCommand(
  command: string,
  flags: CommandFlags,
  env: NodeJS.ProcessEnv = process.env,
  args: readonly string[] = []
) {
  const handler = handlers[command.toLowerCase()];
  if (!handler) {
    throw new Error(`未知命令: ${command}（可用命令: ${COMMANDS.join(", ")}）`);
  }
  await handler(loadConfig(env), flags, args);
}
