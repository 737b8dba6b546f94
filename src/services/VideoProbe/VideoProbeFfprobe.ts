import { execa } from "execa";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorCode, errorMessage } from "@/utils/helper";

import type { ProbeError, VideoProbe } from "./VideoProbe";

/** 依序查詢的容器標籤，含 QuickTime 專屬鍵 */
export const creationTimeTagKeys = [
  "creation_time",
  "creation_date",
  "com.apple.quicktime.creationdate",
] as const;

export function buildFfprobeArgs(filePath: string) {
  return [
    "-v",
    "error",
    ...creationTimeTagKeys.flatMap((key) => [
      "-show_entries",
      `format_tags=${key}`,
    ]),
    "-of",
    "default=nokey=1:noprint_wrappers=1",
    filePath,
  ];
}

function isTimedOut(error: unknown) {
  return (
    typeof error === "object" &&
    error !== null &&
    "timedOut" in error &&
    error.timedOut === true
  );
}

export class VideoProbeFfprobe implements VideoProbe {
  private readonly command: string;
  private readonly timeoutMs: number;

  constructor(options: { command?: string; timeoutMs?: number } = {}) {
    this.command = options.command ?? "ffprobe";
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  async probeCreationTimes(
    filePath: string
  ): Promise<Result<string[], ProbeError>> {
    try {
      const { stdout } = await execa(this.command, buildFfprobeArgs(filePath), {
        timeout: this.timeoutMs,
        stdin: "ignore",
      });
      const lines = stdout
        .split(/\r?\n/)
        .map((l) => l.trim())
        .filter((l) => l !== "");
      return ok(lines);
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return err({
          type: "PROBE_UNAVAILABLE",
          message: `找不到 ${this.command}`,
        });
      }
      if (isTimedOut(error)) {
        return err({
          type: "PROBE_TIMEOUT",
          message: `${this.command} 超過 ${this.timeoutMs}ms 未回應: ${filePath}`,
        });
      }
      return err({ type: "PROBE_FAILED", message: errorMessage(error) });
    }
  }
}
