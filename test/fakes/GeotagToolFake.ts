import { type Result, err, ok } from "~shared/utils/Result";

import type {
  GeotagError,
  GeotagOptions,
  GeotagOutcome,
  GeotagTarget,
  GeotagTool,
} from "@/services/GeotagTool";
import type { Coordinate } from "@/types";

export type TrackPoint = { time: Date; coordinate: Coordinate };

/** 取時間最接近的軌跡點，超出 timeRangeSeconds 視為沒有對應 */
export class GeotagToolFake implements GeotagTool {
  reachable = true;
  readonly calls: Array<{ targets: GeotagTarget[]; trackFiles: string[] }> = [];
  readonly failingPaths = new Set<string>();
  /** 不回報任何結果的路徑 */
  readonly silentPaths = new Set<string>();

  constructor(private readonly points: TrackPoint[] = []) {}

  async geotagBatch(
    targets: readonly GeotagTarget[],
    trackFiles: readonly string[],
    options: GeotagOptions
  ): Promise<Result<Map<string, GeotagOutcome>, GeotagError>> {
    if (!this.reachable) {
      return err({ type: "TOOL_ERROR", message: "exiftool unreachable" });
    }
    this.calls.push({ targets: [...targets], trackFiles: [...trackFiles] });
    const outcomes = new Map<string, GeotagOutcome>();
    for (const target of targets) {
      if (options.signal?.aborted) break;
      if (this.silentPaths.has(target.path)) continue;
      if (this.failingPaths.has(target.path)) {
        outcomes.set(target.path, {
          status: "failed",
          error: { kind: "IO_ERROR", message: `Cannot write: ${target.path}` },
        });
        continue;
      }
      const nearest = this.nearest(target.utcTime);
      if (
        !nearest ||
        Math.abs(nearest.time.getTime() - target.utcTime.getTime()) >
          options.timeRangeSeconds * 1000
      ) {
        outcomes.set(target.path, { status: "unmatched", message: "no track point" });
        continue;
      }
      outcomes.set(target.path, { status: "tagged", coordinate: nearest.coordinate });
    }
    return ok(outcomes);
  }

  private nearest(time: Date) {
    let best: TrackPoint | undefined;
    for (const point of this.points) {
      const gap = Math.abs(point.time.getTime() - time.getTime());
      if (!best || gap < Math.abs(best.time.getTime() - time.getTime())) best = point;
    }
    return best;
  }
}
