import { describe, expect, test } from "vitest";

import { expectOk } from "~shared/testkit/ExpectResult";

import { createPhotoRecord } from "@/services/PhotoBatchLoader";
import {
  TimestampShiftServiceDefault,
  formatWallClock,
  parseWallClock,
} from "@/services/TimestampShift";

import { buildTestResolver } from "~test/fakes/buildPipelineFixture";

const resolver = buildTestResolver();

function offsetOf(identifier: string) {
  const result = resolver.resolve(identifier);
  expectOk(result);
  return result.value;
}

function buildRecords(raws: Array<string | undefined>) {
  return raws.map((captureTimeRaw, i) =>
    createPhotoRecord({
      path: `/photos/IMG_${String(i + 1).padStart(4, "0")}.jpg`,
      root: "/photos",
      captureTimeRaw,
    })
  );
}

const raws = ["2024:05:01 10:00:01", "2024:05:01 10:00:01", "2024:05:01 10:05:00"];

describe("TimestampShiftServiceDefault", () => {
  const shifter = new TimestampShiftServiceDefault();

  test("+02:00 轉為 UTC", () => {
    const records = buildRecords(raws);
    const result = shifter.shiftBatch(records, offsetOf("+02:00"), "toUtc");

    expect(result.shifted).toHaveLength(3);
    expect(records.map((r) => r.utcTime?.toISOString())).toEqual([
      "2024-05-01T08:00:01.000Z",
      "2024-05-01T08:00:01.000Z",
      "2024-05-01T08:05:00.000Z",
    ]);
    expect(records.every((r) => r.shiftedToUtc)).toBe(true);
    expect(records[0]?.localTime?.getTime()).toBe(records[0]?.utcTime?.getTime());
  });

  test.each(["+02:00", "-05:30", "+13:45", "UTC", "-12:00"])(
    "toUtc 再 toLocal 還原原本的時間 (%s)",
    (identifier) => {
      const offset = offsetOf(identifier);
      const records = buildRecords(raws);
      shifter.shiftBatch(records, offset, "toUtc");
      const back = shifter.shiftBatch(records, offset, "toLocal");

      expect(back.shifted).toHaveLength(3);
      expect(records.map((r) => r.localTime?.getTime())).toEqual(
        raws.map((raw) => parseWallClock(raw)?.getTime())
      );
      expect(records.every((r) => !r.shiftedToUtc)).toBe(true);
    }
  );

  test("已轉為 UTC 的批次再次 toUtc 不會改變", () => {
    const offset = offsetOf("+02:00");
    const records = buildRecords(raws);
    shifter.shiftBatch(records, offset, "toUtc");
    const before = records.map((r) => [r.localTime?.getTime(), r.utcTime?.getTime()]);

    const again = shifter.shiftBatch(records, offset, "toUtc");

    expect(again.shifted).toHaveLength(0);
    expect(again.unchanged).toHaveLength(3);
    expect(records.map((r) => [r.localTime?.getTime(), r.utcTime?.getTime()])).toEqual(
      before
    );
  });

  test("無法解析的時間只影響該筆", () => {
    const records = buildRecords(["2024:05:01 10:00:01", "not a date", undefined]);
    const result = shifter.shiftBatch(records, offsetOf("+02:00"), "toUtc");

    expect(result.shifted).toEqual([records[0]]);
    expect(result.failed.map((f) => f.error.kind)).toEqual([
      "TIMESTAMP_PARSE_ERROR",
      "TIMESTAMP_PARSE_ERROR",
    ]);
    expect(records[1]?.shiftedToUtc).toBe(false);
    expect(records[1]?.utcTime).toBeNull();
  });

  test("尚未轉為 UTC 的紀錄 toLocal 不動作", () => {
    const [record] = buildRecords(["2024:05:01 10:00:01"]);
    if (!record) throw new Error("missing record");
    const computation = shifter.computeShift(record, offsetOf("+02:00"), "toLocal");
    expect(computation.status).toBe("noop");
  });

  test("toLocal 保留 UTC 時間", () => {
    const [record] = buildRecords(["2024:05:01 10:00:01"]);
    if (!record) throw new Error("missing record");
    shifter.shiftBatch([record], offsetOf("+02:00"), "toUtc");
    shifter.shiftBatch([record], offsetOf("Taipei"), "toLocal");

    expect(record.utcTime?.toISOString()).toBe("2024-05-01T08:00:01.000Z");
    expect(formatWallClock(record.localTime ?? new Date(NaN))).toBe(
      "2024:05:01 16:00:01"
    );
  });
});

describe("WallClock", () => {
  test.each([
    ["2024:05:01 10:00:01", Date.UTC(2024, 4, 1, 10, 0, 1)],
    ["2024-05-01T10:00:01+02:00", Date.UTC(2024, 4, 1, 10, 0, 1)],
    ["2024:05:01 10:00:01.25", Date.UTC(2024, 4, 1, 10, 0, 1, 250)],
    ["2024:05:01 10:00:01Z", Date.UTC(2024, 4, 1, 10, 0, 1)],
    ["2024:02:29 23:59:59", Date.UTC(2024, 1, 29, 23, 59, 59)],
  ])("解析 %s", (raw, expected) => {
    expect(parseWallClock(raw)?.getTime()).toBe(expected);
  });

  test.each([
    "0000:00:00 00:00:00",
    "2023:02:29 10:00:00",
    "2024:13:01 10:00:00",
    "2024:05:01 24:00:00",
    "2024:05:01",
    "garbage",
    "",
  ])("拒絕 %j", (raw) => {
    expect(parseWallClock(raw)).toBeUndefined();
  });

  test("以 UTC 欄位格式化", () => {
    const date = new Date(Date.UTC(2024, 4, 1, 8, 0, 1));
    expect(formatWallClock(date)).toBe("2024:05:01 08:00:01");
    expect(formatWallClock(date, "yyyy-MM-dd_HH-mm-ss")).toBe("2024-05-01_08-00-01");
  });
});
