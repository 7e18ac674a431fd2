import { ExifDateTime, ExifTool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import type { Coordinate } from "@/types";
import { exists } from "@/utils/helper";

import type { MetadataTool } from "./MetadataTool";
import type { MetadataError, PhotoTags, TagsUpdate } from "./PhotoTags";

export class MetadataToolExifTool implements MetadataTool {
  constructor(private readonly exiftool: ExifTool) {}

  static create(options: { concurrency: number; taskTimeoutMillis: number }) {
    return new MetadataToolExifTool(
      new ExifTool({
        maxProcs: options.concurrency,
        taskTimeoutMillis: options.taskTimeoutMillis,
      })
    );
  }

  get instance() {
    return this.exiftool;
  }

  async probe(): Promise<Result<string, MetadataError>> {
    try {
      return ok(await this.exiftool.version());
    } catch (error) {
      return err({
        type: "TOOL_ERROR",
        message: `無法啟動 ExifTool: ${errorMessage(error)}`,
      });
    }
  }

  async readTags(filePath: string): Promise<Result<PhotoTags, MetadataError>> {
    if (!(await exists(filePath))) {
      return err({ type: "IO_ERROR", message: `檔案不存在: ${filePath}` });
    }
    try {
      const tags: Record<string, unknown> = { ...(await this.exiftool.read(filePath)) };
      return ok({
        filePath,
        captureTime: dateString(tags.DateTimeOriginal) ?? dateString(tags.CreateDate),
        offsetTime: stringTag(tags.OffsetTimeOriginal),
        timeZone: stringTag(tags.TimeZone),
        daylightSavings: stringTag(tags.DaylightSavings) === "On",
        gpsTime: dateString(tags.GPSDateTime),
        coordinate: coordinateOf(tags),
      });
    } catch (error) {
      return err({
        type: "TOOL_ERROR",
        message: `讀取中繼資料失敗: ${filePath}: ${errorMessage(error)}`,
      });
    }
  }

  async writeTags(
    filePath: string,
    update: TagsUpdate
  ): Promise<Result<void, MetadataError>> {
    if (!(await exists(filePath))) {
      return err({ type: "IO_ERROR", message: `檔案不存在: ${filePath}` });
    }
    const writeArgs = ["-overwrite_original"];
    if (update.zone === null) {
      writeArgs.push(
        "-OffsetTime=",
        "-OffsetTimeOriginal=",
        "-OffsetTimeDigitized=",
        "-TimeZone=",
        "-TimeZoneCity="
      );
    } else if (update.zone) {
      const { offset, standardOffset, dst, cityCode } = update.zone;
      writeArgs.push(
        `-OffsetTime=${offset}`,
        `-OffsetTimeOriginal=${offset}`,
        `-OffsetTimeDigitized=${offset}`,
        `-TimeZone=${standardOffset}`,
        `-DaylightSavings#=${dst ? 1 : 0}`
      );
      if (cityCode !== undefined) writeArgs.push(`-TimeZoneCity#=${cityCode}`);
    }
    try {
      await this.exiftool.write(
        filePath,
        update.captureTime === undefined ? {} : { AllDates: update.captureTime },
        { writeArgs }
      );
      return ok();
    } catch (error) {
      return err({
        type: "TOOL_ERROR",
        message: `寫入中繼資料失敗: ${filePath}: ${errorMessage(error)}`,
      });
    }
  }

  async end() {
    await this.exiftool.end();
  }
}

function stringTag(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  return undefined;
}

/** ExifDateTime 優先取原始字串，保留相機寫入的牆上時間 */
function dateString(value: unknown): string | undefined {
  if (value instanceof ExifDateTime) {
    return value.rawValue ?? value.toISOString();
  }
  return stringTag(value);
}

function numberTag(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

function coordinateOf(tags: Record<string, unknown>): Coordinate | undefined {
  const latitude = numberTag(tags.GPSLatitude);
  const longitude = numberTag(tags.GPSLongitude);
  if (latitude === undefined || longitude === undefined) return undefined;
  const altitude = numberTag(tags.GPSAltitude);
  return altitude === undefined ? { latitude, longitude } : { latitude, longitude, altitude };
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
