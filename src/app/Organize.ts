import type { CAC } from "cac";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import {
  ProgressReporterCli,
  summarizeStats,
} from "@/services/ProgressReporter";
import type { DuplicatePolicy } from "@/types";
import { expandHome, toPositiveInt } from "@/utils/helper";

import { buildOrganizeService } from "./buildServices";

type OrganizeOptions = {
  target?: string;
  workers?: number | string;
  ioWorkers?: number | string;
  duplicates?: string;
  report?: boolean;
  progress?: boolean;
};

function parseDuplicatePolicy(
  value: string | undefined
): DuplicatePolicy | undefined {
  if (value === undefined) return undefined;
  if (value === "keep" || value === "delete") return value;
  throw new Error(`--duplicates 只接受 keep 或 delete: ${value}`);
}

export function registerOrganize(cli: CAC, baseLogger: Logger) {
  cli
    .command("organize <source>", "依拍攝日期把照片與影片搬到 YYYY-MM-DD 資料夾")
    .option("--target <path>", "目標根目錄，預設為來源目錄")
    .option("--workers <n>", "第一階段（計算路徑）工作數")
    .option("--io-workers <n>", "第二階段（搬移）工作數")
    .option("--duplicates <policy>", "重複檔案處理方式 keep | delete")
    .option("--report", "輸出 JSON 報告", { default: false })
    .option("--no-progress", "不顯示進度條")
    .action(async (source: string, options: OrganizeOptions) => {
      const logger = baseLogger.extend("organize");
      const sourceRoot = path.resolve(expandHome(source));
      const targetRoot = path.resolve(expandHome(options.target ?? source));
      logger.info({
        emoji: "📁",
      })`來源: ${sourceRoot} → 目標: ${targetRoot}`;

      const { exifService, organizer, duplicatePolicy } = buildOrganizeService(
        logger,
        {
          workers: toPositiveInt(options.workers, "--workers"),
          ioWorkers: toPositiveInt(options.ioWorkers, "--io-workers"),
          duplicatePolicy: parseDuplicatePolicy(options.duplicates),
        }
      );
      logger.info({ duplicatePolicy })`重複檔案處理方式: ${duplicatePolicy}`;

      try {
        // 1) 掃描
        const scanner = new FileSystemScannerDefault({ logger });
        const scanRes = await scanner.scan(sourceRoot);
        if (isErr(scanRes)) {
          logger.error({
            emoji: "❌",
            error: scanRes.error,
          })`掃描來源目錄失敗`;
          process.exitCode = 1;
          return;
        }
        const { files } = scanRes.value;
        if (files.length === 0) {
          logger.warn("來源目錄沒有可處理的媒體檔");
          return;
        }

        // 2) 整理，Ctrl+C 時停止派送新工作
        await mkdir(targetRoot, { recursive: true });
        const controller = new AbortController();
        const onInterrupt = () => {
          logger.warn({ emoji: "⏹️" })`收到中斷訊號，等待進行中的工作結束`;
          controller.abort();
        };
        process.once("SIGINT", onInterrupt);
        const result = await organizer
          .organize({
            files,
            targetRoot,
            signal: controller.signal,
            progress: new ProgressReporterCli({ enabled: options.progress }),
          })
          .finally(() => process.off("SIGINT", onInterrupt));

        // 3) 摘要
        const summary = summarizeStats(result.stats, files.length, targetRoot);
        for (const line of summary) logger.info(line);
        if (options.report) {
          await new DumpWriterDefault(logger).dump("organize-report", {
            sourceRoot,
            targetRoot,
            duplicatePolicy,
            cancelled: result.cancelled,
            stats: result.stats,
            skippedDirectories: scanRes.value.skippedDirectories,
            unreadable: scanRes.value.unreadable,
            outcomes: result.outcomes,
          });
        }
      } finally {
        await dispose(exifService);
      }
    });
}
