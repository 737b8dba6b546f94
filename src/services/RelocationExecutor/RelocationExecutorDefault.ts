import { randomBytes } from "node:crypto";
import { constants } from "node:fs";
import * as fsPromises from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DestinationPlan, ExecuteOutcome } from "@/types";
import { errorCode, errorMessage, exists } from "@/utils/helper";

import {
  type CollisionResolver,
  PathReservations,
} from "../DestinationPlanner";
import type { RelocationExecutor } from "./RelocationExecutor";

export type RelocationFs = Pick<
  typeof fsPromises,
  "link" | "rename" | "copyFile" | "unlink" | "rm"
>;

/** 不支援硬連結的檔案系統（FAT、exFAT 等）回傳的錯誤碼 */
const linkUnsupportedCodes = new Set([
  "EPERM",
  "ENOTSUP",
  "EOPNOTSUPP",
  "ENOSYS",
]);

/** 目標在放入前被外部程式佔用時，重新挑檔名的次數上限 */
const placeRounds = 3;

export class RelocationExecutorDefault implements RelocationExecutor {
  private readonly collisions: CollisionResolver;
  private readonly logger: Logger;
  private readonly fs: RelocationFs;
  private readonly reservations = new PathReservations();

  constructor(deps: {
    collisions: CollisionResolver;
    logger: Logger;
    fs?: RelocationFs;
  }) {
    this.collisions = deps.collisions;
    this.logger = deps.logger.extend("RelocationExecutor");
    this.fs = deps.fs ?? fsPromises;
  }

  async execute(plan: DestinationPlan): Promise<ExecuteOutcome> {
    const { sourcePath, dateFolder } = plan;
    const fileName = path.basename(sourcePath);
    try {
      if (!(await exists(sourcePath))) {
        return this.vanished(sourcePath);
      }

      for (let round = 0; round < placeRounds; round++) {
        // 規劃與執行之間目標可能已被其他計畫或外部程式佔用，這裡重新檢查
        const resolution = await this.collisions.resolve(
          sourcePath,
          plan.destinationPath,
          this.reservations
        );
        switch (resolution.type) {
          case "self":
            return {
              status: "skipped",
              sourcePath,
              reason: "already-in-place",
            };
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
          case "free": {
            let placed: boolean;
            try {
              placed = await this.move(sourcePath, resolution.path);
            } finally {
              resolution.release();
            }
            if (!placed) {
              this.logger.debug({
                destinationPath: resolution.path,
              })`目標在放入前被佔用，重新挑選檔名`;
              continue;
            }
            const placedName = path.basename(resolution.path);
            this.logger.info({
              emoji: "✓",
            })`已移動: ${fileName} -> ${dateFolder}/${placedName}`;
            return {
              status: "moved",
              sourcePath,
              destinationPath: resolution.path,
            };
          }
        }
      }
      this.logger.error({ sourcePath })`目標反覆被佔用，放棄搬移`;
      return {
        status: "failed",
        sourcePath,
        error: `連續 ${placeRounds} 次目標被佔用`,
      };
    } catch (error) {
      if (errorCode(error) === "ENOENT" && !(await exists(sourcePath))) {
        return this.vanished(sourcePath);
      }
      this.logger.error({
        sourcePath,
        error: errorMessage(error),
      })`移動失敗: ${fileName}`;
      return { status: "failed", sourcePath, error: errorMessage(error) };
    }
  }

  private vanished(sourcePath: string): ExecuteOutcome {
    this.logger.warn({
      sourcePath,
    })`來源檔案已消失，略過 ${path.basename(sourcePath)}`;
    return { status: "skipped", sourcePath, reason: "vanished" };
  }

  /**
   * 搬移到 destinationPath，不覆蓋既有檔案。
   * 目標已存在（EEXIST）時回傳 false，由呼叫端重新挑檔名。
   */
  private async move(sourcePath: string, destinationPath: string) {
    try {
      const how = await this.place(sourcePath, destinationPath);
      if (how === "renamed") return true;
    } catch (error) {
      switch (errorCode(error)) {
        case "EEXIST":
          return false;
        case "EXDEV":
          try {
            await this.copyAcrossDevices(sourcePath, destinationPath);
          } catch (copyError) {
            if (errorCode(copyError) === "EEXIST") return false;
            throw copyError;
          }
          break;
        default:
          throw error;
      }
    }
    await this.removeSource(sourcePath);
    return true;
  }

  /**
   * 以硬連結放到 to，目標已存在時 link 會以 EEXIST 失敗。
   * 不支援硬連結的檔案系統退回 rename，此時無法防止外部程式同時寫入同名檔。
   */
  private async place(
    from: string,
    to: string
  ): Promise<"linked" | "renamed"> {
    try {
      await this.fs.link(from, to);
      return "linked";
    } catch (error) {
      const code = errorCode(error);
      if (code === undefined || !linkUnsupportedCodes.has(code)) throw error;
    }
    await this.fs.rename(from, to);
    return "renamed";
  }

  /**
   * 跨裝置時先複製到同目錄的暫存檔，再放到最終檔名，
   * 最終檔名不會出現不完整的檔案。
   */
  private async copyAcrossDevices(sourcePath: string, destinationPath: string) {
    const suffix = randomBytes(4).toString("hex");
    const tempPath = path.join(
      path.dirname(destinationPath),
      `.${path.basename(destinationPath)}.${suffix}.partial`
    );
    try {
      await this.fs.copyFile(sourcePath, tempPath, constants.COPYFILE_EXCL);
      await this.place(tempPath, destinationPath);
    } finally {
      await this.fs.rm(tempPath, { force: true });
    }
  }

  /** 目標已就位才刪除來源，刪不掉時只警告，結果仍算已搬移 */
  private async removeSource(sourcePath: string) {
    try {
      await this.fs.unlink(sourcePath);
    } catch (error) {
      if (errorCode(error) === "ENOENT") return;
      this.logger.warn({
        sourcePath,
        error: errorMessage(error),
      })`已放到目標，但無法刪除來源 ${path.basename(sourcePath)}`;
    }
  }
}
