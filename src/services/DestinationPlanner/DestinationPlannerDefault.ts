import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { MediaFile, PlanOutcome } from "@/types";
import {
  errorCode,
  errorMessage,
  exists,
  formatDateFolder,
} from "@/utils/helper";

import type { MediaDateResolver } from "../MediaDateResolver";
import type { CollisionResolver } from "./CollisionResolver";
import type { DestinationPlanner } from "./DestinationPlanner";

/**
 * 產生搬移計畫：
 *   1) 確認來源仍存在
 *   2) 解析日期 → targetRoot/YYYY-MM-DD
 *   3) 目標已存在時比對內容：相同視為重複，不同則另取檔名
 */
export class DestinationPlannerDefault implements DestinationPlanner {
  private readonly dateResolver: MediaDateResolver;
  private readonly collisions: CollisionResolver;
  private readonly logger: Logger;

  constructor(deps: {
    dateResolver: MediaDateResolver;
    collisions: CollisionResolver;
    logger: Logger;
  }) {
    this.dateResolver = deps.dateResolver;
    this.collisions = deps.collisions;
    this.logger = deps.logger.extend("DestinationPlanner");
  }

  async plan(file: MediaFile, targetRoot: string): Promise<PlanOutcome> {
    const sourcePath = file.fullPath;
    try {
      if (!(await exists(sourcePath))) return this.vanished(file);

      const resolvedDate = await this.dateResolver.resolve(
        sourcePath,
        file.kind
      );
      const dateFolder = formatDateFolder(resolvedDate);
      const targetDir = path.join(targetRoot, dateFolder);
      // recursive：已存在不算錯誤，多個工作同時建立也安全
      await mkdir(targetDir, { recursive: true });

      const desired = path.join(targetDir, file.fileName);
      const resolution = await this.collisions.resolve(sourcePath, desired);
      switch (resolution.type) {
        case "free":
          resolution.release();
          return {
            status: "planned",
            plan: {
              sourcePath,
              destinationPath: resolution.path,
              dateFolder,
              fileSize: file.size,
              resolvedDate,
            },
          };
        case "self":
          this.logger.debug({ sourcePath })`已在正確位置`;
          return { status: "skipped", sourcePath, reason: "already-in-place" };
        case "duplicate":
          await this.collisions.settleDuplicate(
            sourcePath,
            resolution.occupant
          );
          return { status: "skipped", sourcePath, reason: "duplicate" };
        case "exhausted":
          this.logger.error({
            sourcePath,
            attempts: resolution.attempts,
          })`無法產生不重複的目標檔名`;
          return {
            status: "failed",
            sourcePath,
            error: `嘗試 ${resolution.attempts} 次仍無可用檔名`,
          };
      }
    } catch (error) {
      // 規劃途中來源被移走（比對內容時 stat 失敗等）仍視為略過
      if (errorCode(error) === "ENOENT" && !(await exists(sourcePath))) {
        return this.vanished(file);
      }
      this.logger.error({
        sourcePath,
        error: errorMessage(error),
      })`計算目標路徑失敗 ${file.fileName}`;
      return { status: "failed", sourcePath, error: errorMessage(error) };
    }
  }

  private vanished(file: MediaFile): PlanOutcome {
    this.logger.warn({
      sourcePath: file.fullPath,
    })`檔案已消失，略過 ${file.fileName}`;
    return { status: "skipped", sourcePath: file.fullPath, reason: "vanished" };
  }
}
