import type { PhotoRecord, RecordError } from "@/types";
import type { TimezoneOffset } from "@/services/TimezoneResolver";

/** toUtc：相機時間 → UTC；toLocal：UTC → 目標時區時間 */
export type ShiftDirection = "toUtc" | "toLocal";

export type ShiftComputation =
  | { status: "noop"; reason: string }
  | {
      status: "shifted";
      localTime: Date;
      utcTime: Date;
      shiftedToUtc: boolean;
    }
  | { status: "failed"; error: RecordError };

export type ShiftedComputation = Extract<ShiftComputation, { status: "shifted" }>;

export type ShiftBatchResult = {
  shifted: PhotoRecord[];
  unchanged: PhotoRecord[];
  failed: Array<{ record: PhotoRecord; error: RecordError }>;
};

export interface TimestampShiftService {
  /** 計算單筆位移結果，不修改紀錄 */
  computeShift(
    record: Readonly<PhotoRecord>,
    offset: TimezoneOffset,
    direction: ShiftDirection
  ): ShiftComputation;

  applyShift(record: PhotoRecord, computation: ShiftedComputation): void;

  /**
   * 對整批紀錄套用同一個位移。
   * 已位移過的紀錄不會再次位移；無法解析時間的紀錄列入 failed，不影響其他紀錄。
   */
  shiftBatch(
    records: PhotoRecord[],
    offset: TimezoneOffset,
    direction: ShiftDirection
  ): ShiftBatchResult;
}
