import type { Semaphore } from "async-mutex";

import type { Logger } from "~shared/Logger";
import type { Result } from "~shared/utils/Result";

import type { PhotoRecord, StageFailure, StageName } from "@/types";

/** 使用者輸入的時區，實際偏移依每筆紀錄的時間點解析 */
export type TimezoneSetting = {
  identifier: string;
  dst: boolean;
};

export type StageSettings = {
  /** 相機時區；未指定時由中繼資料偵測或 GPS 時間推算 */
  cameraTimezone?: TimezoneSetting;
  /** set-time 寫入的目標時區 */
  targetTimezone?: TimezoneSetting;
  trackFiles: readonly string[];
  timeRangeSeconds: number;
};

export type StageContext = {
  logger: Logger;
  signal: AbortSignal;
  /** 只更新記憶體中的狀態，不寫入標籤也不搬移檔案 */
  dryRun: boolean;
  /** 限制同時呼叫外部工具的數量 */
  semaphore: Semaphore;
  settings: StageSettings;
};

export interface Stage {
  readonly name: StageName;

  /**
   * 處理整批紀錄並更新每筆的 stages[name]。
   * 單筆失敗記錄在紀錄上；回傳 err 代表整個階段失敗，流程應中止。
   */
  run(
    records: PhotoRecord[],
    context: StageContext
  ): Promise<Result<void, StageFailure>>;
}
