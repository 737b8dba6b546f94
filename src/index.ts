import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerOrganize } from "./app/Organize";
import { registerResolveDate } from "./app/ResolveDate";

const logger = createDefaultLoggerFromEnv();
const cli = cac("media-date-sorter");

registerOrganize(cli, logger);
registerResolveDate(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(logger);
}
