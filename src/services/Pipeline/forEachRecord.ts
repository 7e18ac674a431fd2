import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { PhotoRecord, StageFailure, StageName, StageResult } from "@/types";

import type { StageContext } from "./Stage";

/** 單筆處理結果；err 代表系統性錯誤，整個階段要中止 */
export type RecordStep = Result<StageResult, StageFailure>;

export function cancelled(stage: StageName): StageFailure {
  return { kind: "CANCELLED", message: `${stage} 階段被取消` };
}

/**
 * 在 semaphore 限制下並行處理每筆紀錄，並把結果寫入 record.stages[stage]。
 * 每筆開始前檢查取消訊號；發生系統性錯誤後不再開始新的紀錄，
 * 尚未處理的紀錄維持 pending。
 */
export async function forEachRecord(
  stage: StageName,
  records: readonly PhotoRecord[],
  context: StageContext,
  handle: (record: PhotoRecord) => Promise<RecordStep>
): Promise<Result<void, StageFailure>> {
  const halt: { failure?: StageFailure } = {};
  await Promise.all(
    records.map((record) =>
      context.semaphore.runExclusive(async () => {
        if (halt.failure) return;
        if (context.signal.aborted) {
          halt.failure = cancelled(stage);
          return;
        }
        const step = await handle(record);
        if (isErr(step)) {
          halt.failure ??= step.error;
          return;
        }
        record.stages[stage] = step.value;
      })
    )
  );
  return halt.failure ? err(halt.failure) : ok();
}

export const success = (dryRun: boolean): RecordStep =>
  ok(dryRun ? { status: "success", note: "dry-run" } : { status: "success" });

export const skipped = (note: string): RecordStep =>
  ok({ status: "skipped", note });
