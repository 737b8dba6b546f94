import path from "node:path";

import { Presets, SingleBar } from "cli-progress";

import type {
  OrganizePhase,
  OrganizeProgress,
} from "./MediaOrganizeService";
import type { StatsSnapshot } from "./ProcessingStats";

const barFormat =
  "[{bar}] {percentage}% ({value}/{total}) {duration_formatted} {filename}";

const phaseLabels: Record<OrganizePhase, string> = {
  plan: "🔎 計算路徑",
  execute: "🚚 搬移檔案",
};

/**
 * 以 cli-progress 在 stderr 顯示每個階段的進度條。
 * stderr 不是 TTY 時不顯示。
 */
export class ProgressReporterCli implements OrganizeProgress {
  private bar?: SingleBar;
  private readonly stream: NodeJS.WriteStream;
  private readonly enabled: boolean;

  constructor(options?: { enabled?: boolean; stream?: NodeJS.WriteStream }) {
    this.stream = options?.stream ?? process.stderr;
    this.enabled = (options?.enabled ?? true) && this.stream.isTTY === true;
  }

  phaseStarted(phase: OrganizePhase, total: number) {
    if (!this.enabled) return;
    this.bar?.stop();
    this.bar = new SingleBar(
      {
        format: `${phaseLabels[phase]} ${barFormat}`,
        barCompleteChar: "█",
        barIncompleteChar: "░",
        hideCursor: true,
        stream: this.stream,
      },
      Presets.shades_classic
    );
    this.bar.start(total, 0, { filename: "" });
  }

  advanced(_phase: OrganizePhase, fileName: string) {
    this.bar?.increment(1, { filename: `→ ${fileName}` });
  }

  phaseFinished(_phase: OrganizePhase) {
    this.bar?.stop();
    this.bar = undefined;
  }
}

/** 最終摘要，每個元素一行 */
export function summarizeStats(
  snapshot: StatsSnapshot,
  total: number,
  targetRoot: string
): string[] {
  const percent = total > 0 ? (snapshot.processed / total) * 100 : 100;
  const rule = "=".repeat(60);
  const speed = [`${snapshot.filesPerSecond.toFixed(1)} 檔案/秒`];
  if (snapshot.megabytesPerSecond !== undefined) {
    speed.push(`${snapshot.megabytesPerSecond.toFixed(1)} MB/秒`);
  }
  return [
    rule,
    `耗時: ${snapshot.elapsedSeconds.toFixed(1)} 秒`,
    `已處理: ${snapshot.processed}/${total} (${percent.toFixed(1)}%)`,
    `已移動: ${snapshot.moved}`,
    `略過/重複: ${snapshot.skipped}`,
    `失敗: ${snapshot.failed}`,
    `速度: ${speed.join(" | ")}`,
    `目標位置: ${path.resolve(targetRoot)}`,
    rule,
  ];
}
