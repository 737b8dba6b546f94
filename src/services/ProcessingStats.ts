import type { FileOutcome } from "@/types";

export type StatsSnapshot = {
  moved: number;
  skipped: number;
  failed: number;
  processed: number;
  elapsedSeconds: number;
  filesPerSecond: number;
  /** 只有記錄過位元組時才有 */
  totalBytes?: number;
  megabytesPerSecond?: number;
};

/**
 * 各工作共用的統計。
 * 事件迴圈一次只跑一段程式，遞增不需另外上鎖。
 */
export class ProcessingStats {
  private movedCount = 0;
  private skippedCount = 0;
  private failedCount = 0;
  private bytes = 0;
  private bytesRecorded = false;
  readonly startedAt: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  get processed() {
    return this.movedCount + this.skippedCount + this.failedCount;
  }

  moved(bytes?: number) {
    this.movedCount++;
    if (bytes !== undefined) {
      this.bytes += bytes;
      this.bytesRecorded = true;
    }
  }

  skipped() {
    this.skippedCount++;
  }

  failed() {
    this.failedCount++;
  }

  record(outcome: FileOutcome, bytes?: number) {
    switch (outcome.status) {
      case "moved":
        this.moved(bytes);
        return;
      case "skipped":
        this.skipped();
        return;
      case "failed":
        this.failed();
        return;
    }
  }

  snapshot(): StatsSnapshot {
    const elapsedSeconds = Math.max(0, (this.now() - this.startedAt) / 1000);
    const processed = this.processed;
    const snapshot: StatsSnapshot = {
      moved: this.movedCount,
      skipped: this.skippedCount,
      failed: this.failedCount,
      processed,
      elapsedSeconds,
      filesPerSecond: elapsedSeconds > 0 ? processed / elapsedSeconds : 0,
    };
    if (this.bytesRecorded) {
      snapshot.totalBytes = this.bytes;
      snapshot.megabytesPerSecond =
        elapsedSeconds > 0 ? this.bytes / 1024 / 1024 / elapsedSeconds : 0;
    }
    return snapshot;
  }
}
