import { createHash } from "node:crypto";
import type { Stats } from "node:fs";
import { stat, unlink } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DuplicatePolicy } from "@/types";
import { errorCode, errorMessage } from "@/utils/helper";

import type { ContentFingerprinter } from "../ContentFingerprinter";
import type { PathReservations } from "./PathReservations";

export type Occupancy = "free" | "self" | "duplicate" | "different";

export type Resolution =
  | { type: "free"; path: string; release: () => void }
  | { type: "self"; path: string }
  | { type: "duplicate"; occupant: string }
  | { type: "exhausted"; attempts: number };

/** 流水號 `_1` ~ `_10` 之後改用短雜湊，總嘗試次數上限 */
export const counterAttempts = 10;
export const maxAttempts = 100;

const noop = () => {};

/**
 * 產生第 attempt 個候選檔名：
 *   0      → 原檔名
 *   1..10  → name_1.ext ...
 *   11..   → name_<6 碼雜湊>.ext
 */
export function candidateName(fileName: string, attempt: number) {
  if (attempt === 0) return fileName;
  const ext = path.extname(fileName);
  const base = fileName.slice(0, fileName.length - ext.length);
  if (attempt <= counterAttempts) return `${base}_${attempt}${ext}`;
  const suffix = createHash("md5")
    .update(`${base}${Date.now()}${attempt}`)
    .digest("hex")
    .slice(0, 6);
  return `${base}_${suffix}${ext}`;
}

/**
 * 處理目標路徑已被佔用的情況。
 * 每個候選路徑都重新檢查，只與「當下」佔用該路徑的檔案比對。
 */
export class CollisionResolver {
  private readonly fingerprinter: ContentFingerprinter;
  private readonly duplicatePolicy: DuplicatePolicy;
  private readonly logger: Logger;

  constructor(deps: {
    fingerprinter: ContentFingerprinter;
    duplicatePolicy: DuplicatePolicy;
    logger: Logger;
  }) {
    this.fingerprinter = deps.fingerprinter;
    this.duplicatePolicy = deps.duplicatePolicy;
    this.logger = deps.logger.extend("CollisionResolver");
  }

  async examine(sourcePath: string, candidate: string): Promise<Occupancy> {
    if (path.resolve(sourcePath) === path.resolve(candidate)) return "self";
    let occupant: Stats;
    try {
      occupant = await stat(candidate);
    } catch (error) {
      if (errorCode(error) === "ENOENT") return "free";
      throw error;
    }
    const source = await stat(sourcePath);
    if (source.dev === occupant.dev && source.ino === occupant.ino) {
      return "self";
    }
    const same = await this.fingerprinter.sameContent(sourcePath, candidate);
    return same ? "duplicate" : "different";
  }

  /**
   * 由 desired 開始逐一嘗試候選路徑。
   * 有 reservations 時，回傳的 free 路徑在 release 之前不會被行程內其他工作取得。
   */
  async resolve(
    sourcePath: string,
    desired: string,
    reservations?: PathReservations
  ): Promise<Resolution> {
    const dir = path.dirname(desired);
    const fileName = path.basename(desired);

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const candidate = path.join(dir, candidateName(fileName, attempt));
      const release = reservations
        ? await reservations.acquire(candidate)
        : noop;

      let occupancy: Occupancy;
      try {
        occupancy = await this.examine(sourcePath, candidate);
      } catch (error) {
        release();
        throw error;
      }

      switch (occupancy) {
        case "free":
          if (attempt > 0) {
            this.logger.debug({
              from: fileName,
              to: path.basename(candidate),
            })`目標檔名已被佔用，改用新檔名`;
          }
          return { type: "free", path: candidate, release };
        case "self":
          release();
          return { type: "self", path: candidate };
        case "duplicate":
          release();
          return { type: "duplicate", occupant: candidate };
        case "different":
          release();
          break;
      }
    }
    return { type: "exhausted", attempts: maxAttempts };
  }

  /**
   * 依設定處理已確認重複的來源檔。
   * keep：保留原處；delete：刪除來源檔。
   */
  async settleDuplicate(sourcePath: string, occupant: string) {
    if (this.duplicatePolicy === "keep") {
      this.logger.info({
        emoji: "♻️",
        sourcePath,
        occupant,
      })`重複檔案，保留來源不搬移`;
      return;
    }
    try {
      await unlink(sourcePath);
      this.logger.info({
        emoji: "🗑️",
        sourcePath,
        occupant,
      })`重複檔案，已刪除來源`;
    } catch (error) {
      this.logger.warn({
        sourcePath,
        error: errorMessage(error),
      })`刪除重複來源失敗，保留原處`;
    }
  }
}
