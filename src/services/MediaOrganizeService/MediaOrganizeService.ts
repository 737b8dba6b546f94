import type { DestinationPlan, FileOutcome, MediaFile } from "@/types";

import type { StatsSnapshot } from "../ProcessingStats";

export type OrganizePhase = "plan" | "execute";

/** 進度回報，由呼叫端決定如何呈現 */
export interface OrganizeProgress {
  phaseStarted(phase: OrganizePhase, total: number): void;
  advanced(phase: OrganizePhase, fileName: string): void;
  phaseFinished(phase: OrganizePhase): void;
}

export type OrganizeRequest = {
  files: readonly MediaFile[];
  targetRoot: string;
  signal?: AbortSignal;
  progress?: OrganizeProgress;
};

export type OrganizeResult = {
  stats: StatsSnapshot;
  /** 每個有結果的檔案一筆，依完成順序；取消後未開始的檔案不會出現 */
  outcomes: FileOutcome[];
  /** 第一階段產生的計畫，依完成順序 */
  plans: DestinationPlan[];
  cancelled: boolean;
};

export interface MediaOrganizeService {
  organize(request: OrganizeRequest): Promise<OrganizeResult>;
}
