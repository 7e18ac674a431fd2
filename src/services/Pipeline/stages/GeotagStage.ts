import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { GeotagTarget, GeotagTool } from "@/services/GeotagTool";
import type { PhotoRecord, StageFailure } from "@/types";

import { cancelled } from "../forEachRecord";
import type { Stage, StageContext } from "../Stage";

/** 依軌跡檔寫入座標；已有座標或時間未知的紀錄略過 */
export class GeotagStage implements Stage {
  readonly name = "geotag";

  constructor(private readonly deps: { geotagTool: GeotagTool }) {}

  async run(
    records: PhotoRecord[],
    context: StageContext
  ): Promise<Result<void, StageFailure>> {
    const { trackFiles, timeRangeSeconds } = context.settings;
    if (trackFiles.length === 0) {
      context.logger.warn({ emoji: "🛰️" })`沒有軌跡檔，略過 geotag`;
      for (const record of records) {
        record.stages[this.name] = { status: "skipped", note: "沒有軌跡檔" };
      }
      return ok();
    }

    const targets: GeotagTarget[] = [];
    const byPath = new Map<string, PhotoRecord>();
    for (const record of records) {
      if (record.coordinate) {
        record.stages[this.name] = { status: "skipped", note: "已有座標" };
      } else if (!record.utcTime) {
        record.stages[this.name] = { status: "skipped", note: "缺少 UTC 時間" };
      } else if (context.dryRun) {
        record.stages[this.name] = { status: "skipped", note: "dry-run" };
      } else {
        targets.push({ path: record.path, utcTime: record.utcTime });
        byPath.set(record.path, record);
      }
    }
    if (targets.length === 0) return ok();

    context.logger.info({
      emoji: "🛰️",
      tracks: trackFiles,
    })`以 ${trackFiles.length} 個軌跡檔標記 ${targets.length} 個檔案`;
    const result = await this.deps.geotagTool.geotagBatch(targets, trackFiles, {
      timeRangeSeconds,
      signal: context.signal,
    });
    if (isErr(result)) {
      return err({ kind: "TOOL_ERROR", message: result.error.message });
    }

    let toolFailure: StageFailure | undefined;
    for (const [filePath, record] of byPath) {
      const outcome = result.value.get(filePath);
      if (!outcome) {
        // 取消時維持 pending
        if (!context.signal.aborted) {
          record.stages[this.name] = { status: "skipped", note: "工具未回報結果" };
        }
        continue;
      }
      switch (outcome.status) {
        case "tagged":
          record.coordinate = outcome.coordinate;
          record.stages[this.name] = { status: "success" };
          break;
        case "unmatched":
          record.stages[this.name] = { status: "skipped", note: outcome.message };
          break;
        case "failed":
          if (outcome.error.kind === "TOOL_ERROR") {
            toolFailure ??= { kind: "TOOL_ERROR", message: outcome.error.message };
            break;
          }
          record.stages[this.name] = {
            status: "failed",
            error: { kind: "IO_ERROR", message: outcome.error.message },
          };
          break;
      }
    }
    if (toolFailure) return err(toolFailure);
    if (context.signal.aborted) return err(cancelled(this.name));
    return ok();
  }
}
