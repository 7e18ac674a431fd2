import path from "node:path";
import { describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import {
  optionInt,
  optionList,
  optionText,
  parseSuffixes,
  resolvePaths,
  toTimezoneSetting,
} from "@/app/cliOptions";
import { exitCodeOf } from "@/app/PipelineCommands";
import { buildBatchReport } from "@/services/BatchReport";
import { createPhotoRecord } from "@/services/PhotoBatchLoader";

describe("cliOptions", () => {
  test("optionText 保留時區正負號", () => {
    expect(optionText(2)).toBe("+2");
    expect(optionText(-5)).toBe("-5");
    expect(optionText(" Europe/Rome ")).toBe("Europe/Rome");
    expect(optionText("")).toBeUndefined();
    expect(optionText(undefined)).toBeUndefined();
  });

  test("optionList 攤平重複參數", () => {
    expect(optionList(["a.gpx", " b.gpx ", ""])).toEqual(["a.gpx", "b.gpx"]);
    expect(optionList(undefined)).toEqual([]);
    expect(optionList(3)).toEqual(["3"]);
  });

  test("optionInt 只接受正整數", () => {
    expect(optionInt("8", 4)).toBe(8);
    expect(optionInt(0, 4)).toBe(4);
    expect(optionInt("abc", 4)).toBe(4);
  });

  test("parseSuffixes 拆開逗號，空白時使用預設", () => {
    expect(parseSuffixes("jpg, HEIC")).toEqual(["jpg", "HEIC"]);
    expect(parseSuffixes(["jpg", "cr3,mp4"])).toEqual(["jpg", "cr3", "mp4"]);
    expect(parseSuffixes(undefined)).toEqual([".jpg", ".mp4"]);
  });

  test("toTimezoneSetting", () => {
    expect(toTimezoneSetting(8, false)).toEqual({ identifier: "+8", dst: false });
    expect(toTimezoneSetting("Rome", true)).toEqual({ identifier: "Rome", dst: true });
    expect(toTimezoneSetting(undefined, true)).toBeUndefined();
  });

  test("resolvePaths 轉為絕對路徑", () => {
    expect(resolvePaths(["/photos", "relative"])).toEqual([
      "/photos",
      path.resolve("relative"),
    ]);
  });
});

describe("exitCodeOf", () => {
  const times = {
    dryRun: false,
    startedAt: new Date("2024-05-02T00:00:00Z"),
    finishedAt: new Date("2024-05-02T00:00:01Z"),
  };

  function failedRecord() {
    const record = createPhotoRecord({ path: "/photos/IMG_0001.jpg", root: "/photos" });
    record.stages["shift-to-utc"] = {
      status: "failed",
      error: { kind: "TIMESTAMP_PARSE_ERROR", message: "無法解析拍攝時間: (無)" },
    };
    return record;
  }

  test("全部成功為 0", () => {
    const report = buildBatchReport({
      ...times,
      state: { status: "completed" },
      pipeline: ["shift-to-utc"],
      records: [],
    });
    expect(exitCodeOf(buildTestLogger(), report, true)).toBe(0);
  });

  test("有檔案失敗時預設為 0，strict 為 2", () => {
    const report = buildBatchReport({
      ...times,
      state: { status: "completed" },
      pipeline: ["shift-to-utc"],
      records: [failedRecord()],
    });
    expect(exitCodeOf(buildTestLogger(), report, false)).toBe(0);
    expect(exitCodeOf(buildTestLogger(), report, true)).toBe(2);
  });

  test("流程中止為 1", () => {
    const report = buildBatchReport({
      ...times,
      state: {
        status: "aborted",
        stage: "geotag",
        reason: { kind: "TOOL_ERROR", message: "exiftool unreachable" },
      },
      pipeline: ["geotag"],
      records: [],
    });
    expect(exitCodeOf(buildTestLogger(), report, false)).toBe(1);
  });
});
