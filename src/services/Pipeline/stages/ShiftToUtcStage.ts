import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { MetadataTool } from "@/services/MetadataTool";
import { type TimestampShiftService, formatWallClock } from "@/services/TimestampShift";
import {
  type TimezoneOffset,
  type TimezoneResolver,
  resolveAtWallClock,
} from "@/services/TimezoneResolver";
import type { PhotoRecord, StageFailure } from "@/types";

import { detectCameraZone, groupByRoot, recordCameraZone } from "../cameraZones";
import { type RecordStep, forEachRecord, skipped, success } from "../forEachRecord";
import type { Stage, StageContext, TimezoneSetting } from "../Stage";

type ShiftDeps = {
  resolver: TimezoneResolver;
  shifter: TimestampShiftService;
  metadataTool: MetadataTool;
};

/**
 * 把相機時間轉為 UTC 並清除時區標籤。
 * 相機時區：明確指定 > 紀錄本身的時區標籤 > 同一根目錄偵測到的時區 > GPS 時間推算。
 */
export class ShiftToUtcStage implements Stage {
  readonly name = "shift-to-utc";

  constructor(private readonly deps: ShiftDeps) {}

  async run(
    records: PhotoRecord[],
    context: StageContext
  ): Promise<Result<void, StageFailure>> {
    const explicit = context.settings.cameraTimezone;
    const pending = records.filter((r) => !r.shiftedToUtc);
    const rootZones = new Map<string, TimezoneOffset>();
    if (!explicit) {
      const detected = this.detectRootZones(pending);
      if (isErr(detected)) return detected;
      for (const [root, offset] of detected.value) {
        rootZones.set(root, offset);
        context.logger.info({
          emoji: "🕒",
          root,
          source: offset.source,
        })`${root} 的相機時區為 ${offset.label}`;
      }
    }

    return forEachRecord(this.name, records, context, async (record) => {
      if (record.shiftedToUtc) return skipped("已是 UTC 時間");
      const offset = explicit
        ? this.resolveExplicit(explicit, record)
        : this.recordZone(record, rootZones);
      if (isErr(offset)) return offset;
      return this.shiftRecord(record, offset.value, context);
    });
  }

  private async shiftRecord(
    record: PhotoRecord,
    offset: TimezoneOffset,
    context: StageContext
  ): Promise<RecordStep> {
    const computation = this.deps.shifter.computeShift(record, offset, "toUtc");
    if (computation.status === "noop") return skipped(computation.reason);
    if (computation.status === "failed") {
      context.logger.warn({ path: record.path })`${computation.error.message}`;
      return ok({ status: "failed", error: computation.error });
    }
    if (!context.dryRun) {
      const written = await this.deps.metadataTool.writeTags(record.path, {
        captureTime: formatWallClock(computation.localTime),
        zone: null,
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
    record.cameraOffset = undefined;
    record.cameraTimeZone = undefined;
    return success(context.dryRun);
  }

  private resolveExplicit(
    setting: TimezoneSetting,
    record: PhotoRecord
  ): Result<TimezoneOffset, StageFailure> {
    const resolved = record.localTime
      ? resolveAtWallClock(
          this.deps.resolver,
          setting.identifier,
          record.localTime,
          setting.dst
        )
      : this.deps.resolver.resolve(setting.identifier, { dst: setting.dst });
    if (isErr(resolved)) {
      return err({ kind: "UNKNOWN_TIMEZONE", message: resolved.error.message });
    }
    return resolved;
  }

  private recordZone(
    record: PhotoRecord,
    rootZones: ReadonlyMap<string, TimezoneOffset>
  ): Result<TimezoneOffset, StageFailure> {
    const zone =
      recordCameraZone(this.deps.resolver, record) ?? rootZones.get(record.root);
    if (!zone) {
      return err({
        kind: "UNKNOWN_TIMEZONE",
        message: `無法判斷 ${record.path} 的相機時區`,
      });
    }
    return ok(zone);
  }

  private detectRootZones(
    pending: readonly PhotoRecord[]
  ): Result<Map<string, TimezoneOffset>, StageFailure> {
    const zones = new Map<string, TimezoneOffset>();
    for (const [root, records] of groupByRoot(pending)) {
      const zone = detectCameraZone(this.deps.resolver, records);
      if (!zone) {
        return err({
          kind: "UNKNOWN_TIMEZONE",
          message: `無法判斷 ${root} 的相機時區，請指定相機時區`,
        });
      }
      zones.set(root, zone);
    }
    return ok(zones);
  }
}
