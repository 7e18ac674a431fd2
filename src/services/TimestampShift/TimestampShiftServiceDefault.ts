import { addMinutes } from "date-fns";

import type { TimezoneOffset } from "@/services/TimezoneResolver";
import type { PhotoRecord } from "@/types";

import type {
  ShiftBatchResult,
  ShiftComputation,
  ShiftDirection,
  ShiftedComputation,
  TimestampShiftService,
} from "./TimestampShiftService";
import { parseWallClock } from "./WallClock";

export class TimestampShiftServiceDefault implements TimestampShiftService {
  computeShift(
    record: Readonly<PhotoRecord>,
    offset: TimezoneOffset,
    direction: ShiftDirection
  ): ShiftComputation {
    if (direction === "toUtc") {
      if (record.shiftedToUtc) {
        return { status: "noop", reason: "已是 UTC 時間" };
      }
      const local = record.localTime ?? parseWallClock(record.captureTimeRaw);
      if (!local || Number.isNaN(local.getTime())) {
        return {
          status: "failed",
          error: {
            kind: "TIMESTAMP_PARSE_ERROR",
            message: `無法解析拍攝時間: ${record.captureTimeRaw ?? "(無)"}`,
          },
        };
      }
      const utc = addMinutes(local, -offset.minutes);
      return {
        status: "shifted",
        localTime: new Date(utc.getTime()),
        utcTime: utc,
        shiftedToUtc: true,
      };
    }

    if (!record.shiftedToUtc) {
      return { status: "noop", reason: "尚未轉換為 UTC" };
    }
    const utc = record.utcTime ?? record.localTime;
    if (!utc || Number.isNaN(utc.getTime())) {
      return {
        status: "failed",
        error: {
          kind: "TIMESTAMP_PARSE_ERROR",
          message: `缺少 UTC 時間: ${record.path}`,
        },
      };
    }
    return {
      status: "shifted",
      localTime: addMinutes(utc, offset.minutes),
      utcTime: new Date(utc.getTime()),
      shiftedToUtc: false,
    };
  }

  applyShift(record: PhotoRecord, computation: ShiftedComputation) {
    record.localTime = computation.localTime;
    record.utcTime = computation.utcTime;
    record.shiftedToUtc = computation.shiftedToUtc;
  }

  shiftBatch(
    records: PhotoRecord[],
    offset: TimezoneOffset,
    direction: ShiftDirection
  ): ShiftBatchResult {
    const result: ShiftBatchResult = { shifted: [], unchanged: [], failed: [] };
    for (const record of records) {
      const computation = this.computeShift(record, offset, direction);
      switch (computation.status) {
        case "noop":
          result.unchanged.push(record);
          break;
        case "failed":
          result.failed.push({ record, error: computation.error });
          break;
        case "shifted":
          this.applyShift(record, computation);
          result.shifted.push(record);
          break;
      }
    }
    return result;
  }
}
