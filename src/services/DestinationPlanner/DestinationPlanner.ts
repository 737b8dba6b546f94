import type { MediaFile, PlanOutcome } from "@/types";

export interface DestinationPlanner {
  /**
   * 決定單一檔案的目標路徑，必要時建立日期資料夾。
   * 不會 reject，錯誤以 failed 表示。
   */
  plan(file: MediaFile, targetRoot: string): Promise<PlanOutcome>;
}
