import type { BatchReport } from "@/services/BatchReport";
import type { LoadIssue } from "@/services/PhotoBatchLoader";
import type { PhotoRecord } from "@/types";

import type { PipelineSpec } from "./PipelineSpec";
import type { RunState } from "./RunState";
import type { StageSettings } from "./Stage";

export type RunOptions = {
  settings: StageSettings;
  signal?: AbortSignal;
  dryRun?: boolean;
  /** 載入批次時的問題，一併寫入報告 */
  issues?: readonly LoadIssue[];
  onStateChange?: (state: RunState) => void;
};

export interface PipelineOrchestrator {
  /**
   * 依序執行各階段。任一階段回報系統性錯誤時中止，
   * 之後的階段不執行，紀錄在那些階段維持 pending。
   */
  run(
    records: PhotoRecord[],
    spec: PipelineSpec,
    options: RunOptions
  ): Promise<BatchReport>;
}
