import type { LoadIssue } from "@/services/PhotoBatchLoader";
import type { FinishedRunState } from "@/services/Pipeline/RunState";
import type { PhotoRecord, StageName } from "@/types";

import type { BatchReport, ReportRecord, StageCounters } from "./BatchReportSchema";

export function serializeRecord(record: PhotoRecord): ReportRecord {
  return {
    ...record,
    localTime: record.localTime?.toISOString() ?? null,
    utcTime: record.utcTime?.toISOString() ?? null,
    stages: { ...record.stages },
  };
}

export function countStages(
  records: readonly PhotoRecord[],
  pipeline: readonly StageName[]
): Record<string, StageCounters> {
  const counters: Record<string, StageCounters> = {};
  for (const stage of pipeline) {
    const counter = { pending: 0, success: 0, skipped: 0, failed: 0 };
    for (const record of records) counter[record.stages[stage].status]++;
    counters[stage] = counter;
  }
  return counters;
}

export function buildBatchReport(input: {
  state: FinishedRunState;
  pipeline: readonly StageName[];
  dryRun: boolean;
  startedAt: Date;
  finishedAt: Date;
  records: readonly PhotoRecord[];
  issues?: readonly LoadIssue[];
}): BatchReport {
  const { state, pipeline, records } = input;
  const failures: BatchReport["failures"] = [];
  for (const record of records) {
    for (const stage of pipeline) {
      const result = record.stages[stage];
      if (result.status !== "failed") continue;
      failures.push({
        path: record.path,
        stage,
        kind: result.error.kind,
        message: result.error.message,
      });
    }
  }
  return {
    status: state.status,
    ...(state.status === "aborted"
      ? { abortedStage: state.stage, reason: state.reason }
      : {}),
    pipeline: [...pipeline],
    dryRun: input.dryRun,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    counters: countStages(records, pipeline),
    issues: [...(input.issues ?? [])],
    failures,
    records: records.map(serializeRecord),
  };
}
