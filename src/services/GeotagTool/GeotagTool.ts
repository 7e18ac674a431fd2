import type { Result } from "~shared/utils/Result";

import type { Coordinate } from "@/types";

export type GeotagTarget = {
  path: string;
  /** 拍攝的真實時間點，用來對照軌跡 */
  utcTime: Date;
};

export type GeotagOutcome =
  | { status: "tagged"; coordinate: Coordinate }
  | { status: "unmatched"; message: string }
  | {
      status: "failed";
      error: { kind: "IO_ERROR" | "TOOL_ERROR"; message: string };
    };

export type GeotagError = { type: "TOOL_ERROR"; message: string };

export type GeotagOptions = {
  /** 照片時間可超出軌跡頭尾的秒數 */
  timeRangeSeconds: number;
  signal?: AbortSignal;
};

export interface GeotagTool {
  /**
   * 以軌跡檔為每個檔案寫入座標。
   * 工具不可用或軌跡檔不存在時整批失敗；個別檔案的結果放在 Map 中，
   * 取消後尚未處理的檔案不會出現在結果裡。
   */
  geotagBatch(
    targets: readonly GeotagTarget[],
    trackFiles: readonly string[],
    options: GeotagOptions
  ): Promise<Result<Map<string, GeotagOutcome>, GeotagError>>;
}
