import "dotenv/config";
import meow from "meow";
import { COMMANDS, runCommand } from "./cmd/index.ts";
import { ErrorHandler } from "./function/index.ts";
import { setLogLevel } from "./log/index.ts";

const cli = meow(
  `
  用法
    $ seedplan <命令> [选项]

  命令
    run           下载热门种子，空间不足时删除评分低的种子（默认）
    download <站点-种子ID>
                  下载指定的种子，空间不足时删除评分低的种子
    hitchhike     为本地已完成的种子在其它站点辅种
    stat          查看本地种子的占用和删除优先级

  选项
    --dry-run, -n   只输出计划，不执行
    --free-only, -f run 只下载免费种子
    --paused, -p    download 添加后暂停
    --exists, -e    download 文件已在下载目录中，跳过校验
    --debug         输出调试日志

  配置通过环境变量或当前目录的 .env 文件提供，见 .env.example

  示例
    $ seedplan run --dry-run
    $ seedplan hitchhike
    $ seedplan download byr-12345 --paused
`,
  {
    importMeta: import.meta,
    flags: {
      dryRun: {
        type: "boolean",
        shortFlag: "n",
        default: false,
      },
      freeOnly: {
        type: "boolean",
        shortFlag: "f",
        default: false,
      },
      paused: {
        type: "boolean",
        shortFlag: "p",
        default: false,
      },
      exists: {
        type: "boolean",
        shortFlag: "e",
        default: false,
      },
      debug: {
        type: "boolean",
        default: false,
      },
    },
  }
);

if (cli.flags.debug) setLogLevel("debug");

const [command = "run", ...args] = cli.input;
if (!COMMANDS.includes(command.toLowerCase())) {
  cli.showHelp(2);
}

runCommand(
  command,
  {
    dryRun: cli.flags.dryRun,
    freeOnly: cli.flags.freeOnly,
    paused: cli.flags.paused,
    exists: cli.flags.exists,
  },
  process.env,
  args
).catch(ErrorHandler);
