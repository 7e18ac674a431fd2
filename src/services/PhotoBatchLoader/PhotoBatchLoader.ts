import type { Result } from "~shared/utils/Result";

import type { TimezoneSetting } from "@/services/Pipeline/Stage";
import type { PhotoRecord, StageFailure } from "@/types";

export type LoadIssue = {
  path: string;
  kind: "SCAN_FAILED" | "IO_ERROR";
  message: string;
};

export type PhotoBatch = {
  /** 依路徑排序 */
  records: PhotoRecord[];
  /** 無法納入批次的檔案或目錄 */
  issues: LoadIssue[];
  /** 掃描時一併找到的 .gpx 檔 */
  trackFiles: string[];
};

export type LoadOptions = {
  /** 目錄或單一檔案 */
  paths: readonly string[];
  extensions: readonly string[];
  /** 檔案內的時間已是 UTC（例如先前已執行 shift-to-utc） */
  assumeUtc?: boolean;
  /**
   * 明確指定的相機時區，用來在記憶體中推算尚未轉換紀錄的 UTC 時間。
   * 優先於檔案內的時區標籤。
   */
  cameraTimezone?: TimezoneSetting;
  signal?: AbortSignal;
};

export interface PhotoBatchLoader {
  /**
   * 掃描路徑並讀取中繼資料，建立批次紀錄。
   * 單一檔案讀取失敗列入 issues；外部工具無法使用時整批失敗。
   */
  load(options: LoadOptions): Promise<Result<PhotoBatch, StageFailure>>;
}
