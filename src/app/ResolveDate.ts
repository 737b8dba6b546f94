import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { classifyExtension, formatDateFolder } from "@/utils/helper";

import { buildDateResolver } from "./buildServices";

export function registerResolveDate(cli: CAC, baseLogger: Logger) {
  cli
    .command("resolve-date <...files>", "顯示檔案會被歸入的日期與其來源")
    .action(async (files: string[]) => {
      const logger = baseLogger.extend("resolve-date");
      const { exifService, dateResolver } = buildDateResolver(logger);
      try {
        for (const file of files) {
          const kind = classifyExtension(path.extname(file));
          if (!kind) {
            logger.warn({ file })`不支援的副檔名，略過`;
            continue;
          }
          const date = await dateResolver.resolve(file, kind);
          const folder = formatDateFolder(date);
          logger.info({
            emoji: "📅",
            file,
            source: date.source,
          })`${path.basename(file)} → ${folder} (${date.source})`;
        }
      } finally {
        await dispose(exifService);
      }
    });
}
