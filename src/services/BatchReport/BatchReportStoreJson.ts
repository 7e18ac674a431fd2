import { Value } from "@sinclair/typebox/value";
import { readFile } from "node:fs/promises";

import type { DumpWriter } from "~shared/DumpWriter";
import { type Result, err, ok } from "~shared/utils/Result";

import type { PhotoRecord } from "@/types";

import { type BatchReport, batchReportSchema } from "./BatchReportSchema";

export type ReportReadError =
  | { type: "READ_FAILED"; message: string }
  | { type: "INVALID_REPORT"; message: string };

export class BatchReportStoreJson {
  constructor(private readonly dumpWriter: DumpWriter) {}

  async read(filePath: string): Promise<Result<BatchReport, ReportReadError>> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(filePath, "utf8"));
    } catch (error) {
      return err({
        type: "READ_FAILED",
        message: `讀取報告失敗: ${filePath}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      });
    }
    if (!Value.Check(batchReportSchema, raw)) {
      const first = Value.Errors(batchReportSchema, raw).First();
      return err({
        type: "INVALID_REPORT",
        message: `報告格式錯誤: ${first ? `${first.path} ${first.message}` : filePath}`,
      });
    }
    return ok(raw);
  }

  /** 寫入報告並回傳檔案路徑 */
  async write(report: BatchReport): Promise<string> {
    return this.dumpWriter.dump(`batch-report-${report.status}`, report);
  }
}

function parseDate(value: string | null) {
  if (value === null) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * 以上次報告中的標記覆蓋剛讀取的紀錄（依目前路徑比對），
 * 讓重跑時能跳過已完成的工作。回傳套用的筆數。
 */
export function restoreMarkers(
  records: readonly PhotoRecord[],
  report: BatchReport
): number {
  const previous = new Map(report.records.map((r) => [r.path, r]));
  let restored = 0;
  for (const record of records) {
    const saved = previous.get(record.path);
    if (!saved) continue;
    record.originPath = saved.originPath;
    record.localTime = parseDate(saved.localTime) ?? record.localTime;
    record.utcTime = parseDate(saved.utcTime) ?? record.utcTime;
    record.shiftedToUtc = saved.shiftedToUtc;
    record.coordinate = record.coordinate ?? saved.coordinate;
    record.stages = { ...saved.stages };
    restored++;
  }
  return restored;
}
