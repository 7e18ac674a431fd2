import { Semaphore } from "async-mutex";
import type { ExifTool } from "exiftool-vendored";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import {
  type MetadataTool,
  errorMessage,
} from "@/services/MetadataTool";
import { formatWallClock } from "@/services/TimestampShift";
import { exists } from "@/utils/helper";

import type {
  GeotagError,
  GeotagOptions,
  GeotagOutcome,
  GeotagTarget,
  GeotagTool,
} from "./GeotagTool";

/** exiftool 找不到對應軌跡點時的訊息 */
const UNMATCHED_RE =
  /no writable tags|too far|no track points|not in track|time is before|time is after/i;

export class GeotagToolExifTool implements GeotagTool {
  private readonly logger: Logger;
  private readonly semaphore: Semaphore;

  constructor(
    private readonly deps: {
      exiftool: ExifTool;
      metadataTool: MetadataTool;
      logger: Logger;
      concurrency: number;
    }
  ) {
    this.logger = deps.logger.extend("GeotagToolExifTool");
    this.semaphore = new Semaphore(deps.concurrency);
  }

  async geotagBatch(
    targets: readonly GeotagTarget[],
    trackFiles: readonly string[],
    options: GeotagOptions
  ): Promise<Result<Map<string, GeotagOutcome>, GeotagError>> {
    const probe = await this.deps.metadataTool.probe();
    if (isErr(probe)) {
      return err({ type: "TOOL_ERROR", message: probe.error.message });
    }
    for (const track of trackFiles) {
      if (!(await exists(track))) {
        return err({ type: "TOOL_ERROR", message: `軌跡檔不存在: ${track}` });
      }
    }

    const outcomes = new Map<string, GeotagOutcome>();
    await Promise.all(
      targets.map((target) =>
        this.semaphore.runExclusive(async () => {
          if (options.signal?.aborted) return;
          outcomes.set(
            target.path,
            await this.geotagOne(target, trackFiles, options)
          );
        })
      )
    );
    this.logger.debug({
      targets: targets.length,
      done: outcomes.size,
    })`geotag 完成 ${outcomes.size}/${targets.length}`;
    return ok(outcomes);
  }

  private async geotagOne(
    target: GeotagTarget,
    trackFiles: readonly string[],
    options: GeotagOptions
  ): Promise<GeotagOutcome> {
    if (!(await exists(target.path))) {
      return {
        status: "failed",
        error: { kind: "IO_ERROR", message: `檔案不存在: ${target.path}` },
      };
    }
    const writeArgs = [
      ...trackFiles.flatMap((track) => ["-geotag", track]),
      `-Geotime=${formatWallClock(target.utcTime)}Z`,
      "-api",
      `GeoMaxExtSecs=${options.timeRangeSeconds}`,
      "-overwrite_original",
    ];
    try {
      await this.deps.exiftool.write(target.path, {}, { writeArgs });
    } catch (error) {
      const message = errorMessage(error);
      if (UNMATCHED_RE.test(message)) return { status: "unmatched", message };
      return { status: "failed", error: { kind: "TOOL_ERROR", message } };
    }

    const tags = await this.deps.metadataTool.readTags(target.path);
    if (isErr(tags)) {
      return {
        status: "failed",
        error: { kind: tags.error.type, message: tags.error.message },
      };
    }
    if (!tags.value.coordinate) {
      return { status: "unmatched", message: "軌跡中沒有對應的時間點" };
    }
    return { status: "tagged", coordinate: tags.value.coordinate };
  }
}
