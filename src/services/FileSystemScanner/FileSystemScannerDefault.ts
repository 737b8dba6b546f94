import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { skippedDirectoryNames } from "@/constants";
import { classifyExtension, errorMessage } from "@/utils/helper";

import type {
  FileSystemScanner,
  ScanError,
  ScanResult,
} from "./FileSystemScanner";

export function isSkippedDirectory(name: string) {
  if (name.startsWith(".")) return true;
  return skippedDirectoryNames.some((n) => n === name);
}

export class FileSystemScannerDefault implements FileSystemScanner {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("FileSystemScanner");
  }

  async scan(rootPath: string): Promise<Result<ScanResult, ScanError>> {
    const root = path.resolve(rootPath);
    try {
      const rootStat = await stat(root);
      if (!rootStat.isDirectory()) {
        return err({ type: "SCAN_FAILED", message: `不是資料夾: ${root}` });
      }
      // 先讀一次根目錄，無權限時整個掃描視為失敗
      await readdir(root);
    } catch (e) {
      return err({ type: "SCAN_FAILED", message: errorMessage(e) });
    }

    const result: ScanResult = {
      files: [],
      skippedDirectories: [],
      unreadable: [],
      unclassified: 0,
    };
    await this.walk(root, result);
    this.logger.info({
      files: result.files.length,
      skippedDirectories: result.skippedDirectories.length,
      unreadable: result.unreadable.length,
      unclassified: result.unclassified,
    })`掃描完成，找到 ${result.files.length} 個媒體檔`;
    return ok(result);
  }

  private async walk(dir: string, result: ScanResult): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (e) {
      this.logger.warn({ dir, error: errorMessage(e) })`無法讀取資料夾`;
      result.unreadable.push(dir);
      return;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (isSkippedDirectory(entry.name)) {
          this.logger.debug({ dir: fullPath })`略過系統資料夾`;
          result.skippedDirectories.push(fullPath);
          continue;
        }
        await this.walk(fullPath, result);
        continue;
      }
      if (!entry.isFile()) continue;

      const extension = path.extname(entry.name).toLowerCase();
      const kind = classifyExtension(extension);
      if (!kind) {
        result.unclassified++;
        continue;
      }
      try {
        const { size } = await stat(fullPath);
        result.files.push({
          fileName: entry.name,
          fullPath,
          extension,
          kind,
          size,
        });
      } catch (e) {
        this.logger.warn({ fullPath, error: errorMessage(e) })`無法讀取檔案資訊`;
        result.unreadable.push(fullPath);
      }
    }
  }
}
