import path from "node:path";

import pLimit from "p-limit";

import type { Logger } from "~shared/Logger";

import type {
  DestinationPlan,
  FileOutcome,
  MediaFile,
  PlanOutcome,
} from "@/types";
import { errorMessage } from "@/utils/helper";

import type { DestinationPlanner } from "../DestinationPlanner";
import { ProcessingStats } from "../ProcessingStats";
import type { RelocationExecutor } from "../RelocationExecutor";
import type {
  MediaOrganizeService,
  OrganizeRequest,
  OrganizeResult,
} from "./MediaOrganizeService";

/** 第一階段工作數：每百個檔案加一，介於 4 ~ 32 */
export function defaultPlanWorkers(fileCount: number) {
  return Math.min(32, Math.max(4, Math.floor(fileCount / 100) + 1));
}

/** 第二階段以磁碟 I/O 為主，上限 8 */
export function defaultExecuteWorkers(planWorkers: number) {
  return Math.min(planWorkers, 8);
}

function assertWorkerCount(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} 必須為正整數: ${value}`);
  }
}

/**
 * 兩階段流程：
 *   1) 併發計算每個檔案的目標路徑（讀中繼資料為主）
 *   2) 第一階段全部結束後，再併發搬移
 * 取消時尚未開始的工作不會啟動，進行中的工作會做完。
 */
export class MediaOrganizeServiceDefault implements MediaOrganizeService {
  private readonly planner: DestinationPlanner;
  private readonly executor: RelocationExecutor;
  private readonly logger: Logger;
  private readonly workers?: number;
  private readonly ioWorkers?: number;
  private readonly now?: () => number;

  constructor(deps: {
    planner: DestinationPlanner;
    executor: RelocationExecutor;
    logger: Logger;
    workers?: number;
    ioWorkers?: number;
    now?: () => number;
  }) {
    if (deps.workers !== undefined) assertWorkerCount("workers", deps.workers);
    if (deps.ioWorkers !== undefined) {
      assertWorkerCount("ioWorkers", deps.ioWorkers);
    }
    this.planner = deps.planner;
    this.executor = deps.executor;
    this.logger = deps.logger.extend("MediaOrganize");
    this.workers = deps.workers;
    this.ioWorkers = deps.ioWorkers;
    this.now = deps.now;
  }

  async organize(request: OrganizeRequest): Promise<OrganizeResult> {
    const { files, targetRoot, signal, progress } = request;
    const stats = new ProcessingStats(this.now);
    const outcomes: FileOutcome[] = [];
    const plans: DestinationPlan[] = [];

    const planWorkers = this.workers ?? defaultPlanWorkers(files.length);
    const executeWorkers = this.ioWorkers ?? defaultExecuteWorkers(planWorkers);
    this.logger.info({
      event: "start",
      files: files.length,
      planWorkers,
      executeWorkers,
    })`開始整理 ${files.length} 個檔案 → ${targetRoot}`;

    // 第一階段
    progress?.phaseStarted("plan", files.length);
    const planLimit = pLimit(planWorkers);
    await Promise.all(
      files.map((file) =>
        planLimit(async () => {
          if (signal?.aborted) return;
          const outcome = await this.planOne(file, targetRoot);
          if (outcome.status === "planned") {
            plans.push(outcome.plan);
          } else {
            stats.record(outcome);
            outcomes.push(outcome);
          }
          progress?.advanced("plan", file.fileName);
        })
      )
    );
    progress?.phaseFinished("plan");
    this.logger.debug({
      planned: plans.length,
      settled: outcomes.length,
    })`路徑計算完成`;

    // 第二階段
    if (!signal?.aborted && plans.length > 0) {
      progress?.phaseStarted("execute", plans.length);
      const executeLimit = pLimit(executeWorkers);
      await Promise.all(
        plans.map((plan) =>
          executeLimit(async () => {
            if (signal?.aborted) return;
            const outcome = await this.executeOne(plan);
            stats.record(outcome, plan.fileSize);
            outcomes.push(outcome);
            progress?.advanced("execute", path.basename(plan.sourcePath));
          })
        )
      );
      progress?.phaseFinished("execute");
    }

    const cancelled = signal?.aborted ?? false;
    const snapshot = stats.snapshot();
    if (cancelled) {
      this.logger.warn({
        processed: snapshot.processed,
        total: files.length,
      })`已取消，完成 ${snapshot.processed}/${files.length} 個檔案`;
    } else {
      this.logger.info({
        event: "done",
        moved: snapshot.moved,
        skipped: snapshot.skipped,
        failed: snapshot.failed,
      })`整理完成`;
    }
    return { stats: snapshot, outcomes, plans, cancelled };
  }

  /** planner 不應 reject，這裡再保底一次，單一檔案的錯誤不影響整批 */
  private async planOne(
    file: MediaFile,
    targetRoot: string
  ): Promise<PlanOutcome> {
    try {
      return await this.planner.plan(file, targetRoot);
    } catch (error) {
      this.logger.error({
        sourcePath: file.fullPath,
        error: errorMessage(error),
      })`計算路徑時發生未預期錯誤`;
      return {
        status: "failed",
        sourcePath: file.fullPath,
        error: errorMessage(error),
      };
    }
  }

  private async executeOne(plan: DestinationPlan): Promise<FileOutcome> {
    try {
      return await this.executor.execute(plan);
    } catch (error) {
      this.logger.error({
        sourcePath: plan.sourcePath,
        error: errorMessage(error),
      })`搬移時發生未預期錯誤`;
      return {
        status: "failed",
        sourcePath: plan.sourcePath,
        error: errorMessage(error),
      };
    }
  }
}
