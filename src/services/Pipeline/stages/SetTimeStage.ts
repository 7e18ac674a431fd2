import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { MetadataTool } from "@/services/MetadataTool";
import { type TimestampShiftService, formatWallClock } from "@/services/TimestampShift";
import {
  type TimezoneOffset,
  type TimezoneResolver,
  formatOffset,
} from "@/services/TimezoneResolver";
import type { PhotoRecord, StageFailure } from "@/types";

import { type RecordStep, forEachRecord, skipped, success } from "../forEachRecord";
import type { Stage, StageContext } from "../Stage";

/** 把 UTC 時間轉為目標時區的當地時間，並寫入時區標籤 */
export class SetTimeStage implements Stage {
  readonly name = "set-time";

  constructor(
    private readonly deps: {
      resolver: TimezoneResolver;
      shifter: TimestampShiftService;
      metadataTool: MetadataTool;
    }
  ) {}

  async run(
    records: PhotoRecord[],
    context: StageContext
  ): Promise<Result<void, StageFailure>> {
    const target = context.settings.targetTimezone;
    if (!target) {
      return err({ kind: "UNKNOWN_TIMEZONE", message: "set-time 需要指定目標時區" });
    }
    // 先確認時區可解析，避免寫到一半才失敗
    const checked = this.deps.resolver.resolve(target.identifier, { dst: target.dst });
    if (isErr(checked)) {
      return err({ kind: "UNKNOWN_TIMEZONE", message: checked.error.message });
    }
    context.logger.info({
      emoji: "🕒",
      timezone: checked.value.label,
    })`目標時區 ${checked.value.label}`;

    return forEachRecord(this.name, records, context, async (record) => {
      if (!record.shiftedToUtc) return skipped("尚未轉換為 UTC");
      // IANA 時區依拍攝當下是否為夏令時間決定偏移
      const resolved = this.deps.resolver.resolve(target.identifier, {
        dst: target.dst,
        at: record.utcTime ?? record.localTime ?? undefined,
      });
      if (isErr(resolved)) {
        return err({ kind: "UNKNOWN_TIMEZONE", message: resolved.error.message });
      }
      return this.setTime(record, resolved.value, context);
    });
  }

  private async setTime(
    record: PhotoRecord,
    offset: TimezoneOffset,
    context: StageContext
  ): Promise<RecordStep> {
    const computation = this.deps.shifter.computeShift(record, offset, "toLocal");
    if (computation.status === "noop") return skipped(computation.reason);
    if (computation.status === "failed") {
      return ok({ status: "failed", error: computation.error });
    }
    const zoneOffset = formatOffset(offset.minutes);
    if (!context.dryRun) {
      const written = await this.deps.metadataTool.writeTags(record.path, {
        captureTime: formatWallClock(computation.localTime),
        zone: {
          offset: zoneOffset,
          standardOffset: formatOffset(offset.standardMinutes),
          dst: offset.dst,
          cityCode: offset.cityCode,
        },
      });
      if (isErr(written)) {
        if (written.error.type === "TOOL_ERROR") {
          return err({ kind: "TOOL_ERROR", message: written.error.message });
        }
        return ok({
          status: "failed",
          error: { kind: "IO_ERROR", message: written.error.message },
        });
      }
    }
    this.deps.shifter.applyShift(record, computation);
    record.cameraOffset = zoneOffset;
    record.cameraDst = offset.dst;
    return success(context.dryRun);
  }
}
