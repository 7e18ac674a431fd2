import { isErr } from "~shared/utils/Result";

import { parseWallClock } from "@/services/TimestampShift";
import type { TimezoneOffset, TimezoneResolver } from "@/services/TimezoneResolver";
import type { PhotoRecord } from "@/types";

const byPath = (a: PhotoRecord, b: PhotoRecord) =>
  a.path < b.path ? -1 : a.path > b.path ? 1 : 0;

export function groupByRoot(records: readonly PhotoRecord[]) {
  const groups = new Map<string, PhotoRecord[]>();
  for (const record of [...records].sort(byPath)) {
    const list = groups.get(record.root) ?? [];
    list.push(record);
    groups.set(record.root, list);
  }
  return groups;
}

/** 紀錄本身的時區標籤 */
export function recordCameraZone(
  resolver: TimezoneResolver,
  record: PhotoRecord
): TimezoneOffset | undefined {
  if (!record.cameraOffset && !record.cameraTimeZone) return undefined;
  const detected = resolver.detect({
    offsetTime: record.cameraOffset,
    timeZone: record.cameraTimeZone,
    dst: record.cameraDst,
  });
  return isErr(detected) ? undefined : detected.value;
}

/**
 * 依路徑順序取第一個有時區標籤的檔案；都沒有時，
 * 以第一個同時有拍攝時間與 GPS 時間的檔案推算。
 */
export function detectCameraZone(
  resolver: TimezoneResolver,
  records: readonly PhotoRecord[]
): TimezoneOffset | undefined {
  const sorted = [...records].sort(byPath);
  for (const record of sorted) {
    const zone = recordCameraZone(resolver, record);
    if (zone) return zone;
  }
  for (const record of sorted) {
    const gps = parseWallClock(record.gpsTimeRaw);
    const local = record.localTime ?? parseWallClock(record.captureTimeRaw);
    if (!gps || !local) continue;
    const inferred = resolver.infer(local, gps);
    if (!isErr(inferred)) return inferred.value;
  }
  return undefined;
}
