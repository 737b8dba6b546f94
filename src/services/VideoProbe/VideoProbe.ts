import type { Result } from "~shared/utils/Result";

export type ProbeError =
  | { type: "PROBE_UNAVAILABLE"; message: string }
  | { type: "PROBE_TIMEOUT"; message: string }
  | { type: "PROBE_FAILED"; message: string };

export interface VideoProbe {
  /**
   * 讀取影片容器中的建立時間標籤，每個非空值一行。
   * 探測程式不存在、逾時或非零結束都以 err 回傳，不會丟出例外。
   */
  probeCreationTimes(filePath: string): Promise<Result<string[], ProbeError>>;
}
