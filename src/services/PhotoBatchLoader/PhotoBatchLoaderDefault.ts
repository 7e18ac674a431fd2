import { Semaphore } from "async-mutex";
import { addMinutes } from "date-fns";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { trackExtensions } from "@/constants";
import type { FileSystemScanner } from "@/services/FileSystemScanner";
import type { MetadataTool, PhotoTags } from "@/services/MetadataTool";
import { parseWallClock } from "@/services/TimestampShift";
import { type TimezoneResolver, resolveAtWallClock } from "@/services/TimezoneResolver";
import type { PhotoRecord, StageFailure } from "@/types";

import { createPhotoRecord } from "./createPhotoRecord";
import type {
  LoadIssue,
  LoadOptions,
  PhotoBatch,
  PhotoBatchLoader,
} from "./PhotoBatchLoader";

export class PhotoBatchLoaderDefault implements PhotoBatchLoader {
  private readonly logger: Logger;
  private readonly semaphore: Semaphore;

  constructor(
    private readonly deps: {
      scanner: FileSystemScanner;
      metadataTool: MetadataTool;
      resolver: TimezoneResolver;
      logger: Logger;
      concurrency: number;
    }
  ) {
    this.logger = deps.logger.extend("PhotoBatchLoader");
    this.semaphore = new Semaphore(deps.concurrency);
  }

  async load(options: LoadOptions): Promise<Result<PhotoBatch, StageFailure>> {
    const probe = await this.deps.metadataTool.probe();
    if (isErr(probe)) {
      return err({ kind: "TOOL_ERROR", message: probe.error.message });
    }

    const issues: LoadIssue[] = [];
    const media = new Map<string, string>();
    const tracks = new Set<string>();
    for (const input of options.paths) {
      const resolved = path.resolve(input);
      const scanned = await this.deps.scanner.scan(resolved, {
        mediaExts: options.extensions,
        trackExts: trackExtensions,
      });
      if (isErr(scanned)) {
        issues.push({
          path: resolved,
          kind: "SCAN_FAILED",
          message: scanned.error.message,
        });
        continue;
      }
      // 直接指定檔案時，以所在目錄為根
      const root = scanned.value.media.includes(resolved)
        ? path.dirname(resolved)
        : resolved;
      for (const file of scanned.value.media) {
        if (!media.has(file)) media.set(file, root);
      }
      for (const track of scanned.value.tracks) tracks.add(track);
    }
    this.logger.info({
      emoji: "🔎",
      media: media.size,
      tracks: tracks.size,
    })`掃描完成，共 ${media.size} 個檔案、${tracks.size} 個軌跡檔`;

    const records: PhotoRecord[] = [];
    const halt: { failure?: StageFailure } = {};
    await Promise.all(
      [...media].map(([filePath, root]) =>
        this.semaphore.runExclusive(async () => {
          if (halt.failure) return;
          if (options.signal?.aborted) {
            halt.failure = { kind: "CANCELLED", message: "讀取中繼資料時被取消" };
            return;
          }
          const tags = await this.deps.metadataTool.readTags(filePath);
          if (isErr(tags)) {
            if (tags.error.type === "TOOL_ERROR") {
              halt.failure ??= { kind: "TOOL_ERROR", message: tags.error.message };
              return;
            }
            issues.push({ path: filePath, kind: "IO_ERROR", message: tags.error.message });
            return;
          }
          const record = this.toRecord(filePath, root, tags.value, options);
          if (isErr(record)) {
            halt.failure ??= record.error;
            return;
          }
          records.push(record.value);
        })
      )
    );
    if (halt.failure) return err(halt.failure);

    records.sort((a, b) => compareText(a.path, b.path));
    issues.sort((a, b) => compareText(a.path, b.path));
    if (issues.length > 0) {
      this.logger.warn({ count: issues.length })`有 ${issues.length} 個檔案無法讀取`;
    }
    return ok({ records, issues, trackFiles: [...tracks].sort() });
  }

  private toRecord(
    filePath: string,
    root: string,
    tags: PhotoTags,
    options: LoadOptions
  ): Result<PhotoRecord, StageFailure> {
    const localTime = parseWallClock(tags.captureTime) ?? null;
    const record = createPhotoRecord({
      path: filePath,
      root,
      captureTimeRaw: tags.captureTime,
      cameraOffset: tags.offsetTime,
      cameraTimeZone: tags.timeZone,
      cameraDst: tags.daylightSavings,
      gpsTimeRaw: tags.gpsTime,
      localTime,
      coordinate: tags.coordinate ?? null,
    });
    if (!localTime) return ok(record);

    if (options.assumeUtc) {
      record.utcTime = new Date(localTime.getTime());
      record.shiftedToUtc = true;
      return ok(record);
    }

    let offsetMinutes: number | undefined;
    if (options.cameraTimezone) {
      const { identifier, dst } = options.cameraTimezone;
      const resolved = resolveAtWallClock(this.deps.resolver, identifier, localTime, dst);
      if (isErr(resolved)) {
        return err({ kind: "UNKNOWN_TIMEZONE", message: resolved.error.message });
      }
      offsetMinutes = resolved.value.minutes;
    } else {
      const detected = this.deps.resolver.detect({
        offsetTime: tags.offsetTime,
        timeZone: tags.timeZone,
        dst: tags.daylightSavings,
      });
      // 沒有時區標籤時 utcTime 保持未知，交給 shift-to-utc 判斷
      if (!isErr(detected)) offsetMinutes = detected.value.minutes;
    }
    if (offsetMinutes !== undefined) {
      record.utcTime = addMinutes(localTime, -offsetMinutes);
    }
    return ok(record);
  }
}

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);
