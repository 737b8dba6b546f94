import type { DestinationPlan, ExecuteOutcome } from "@/types";

export interface RelocationExecutor {
  /**
   * 執行搬移。搬移前重新確認來源與目標，不會 reject。
   */
  execute(plan: DestinationPlan): Promise<ExecuteOutcome>;
}
