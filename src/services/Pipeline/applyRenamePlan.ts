import path from "node:path";

import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { FileMover } from "@/services/FileMover";
import type {
  NamingScheme,
  PlanSubject,
  RenamePlan,
  RenamePlanner,
} from "@/services/RenamePlanner";
import type { MoveFile, PhotoRecord, StageFailure, StageName } from "@/types";

import { cancelled } from "./forEachRecord";
import type { StageContext } from "./Stage";

export type PlanDeps = {
  planner: RenamePlanner;
  fileMover: FileMover;
};

export type AppliedPlan = {
  plan: RenamePlan;
  /** 實際完成的搬移，附上該筆的掃描根目錄；dry-run 時為空 */
  moved: Array<MoveFile & { root: string }>;
};

/**
 * 先為整批算出完整計畫，再依計畫順序逐一搬移。
 * 計畫不合法時不搬移任何檔案；單筆搬移失敗只影響該筆。
 */
export async function applyRenamePlan(
  stage: StageName,
  scheme: NamingScheme,
  records: readonly PhotoRecord[],
  context: StageContext,
  deps: PlanDeps
): Promise<Result<AppliedPlan, StageFailure>> {
  const bySource = new Map<string, PhotoRecord>();
  const subjects: PlanSubject[] = [];
  for (const record of records) {
    if (!record.utcTime) {
      record.stages[stage] = { status: "skipped", note: "缺少 UTC 時間" };
      continue;
    }
    bySource.set(record.path, record);
    subjects.push({ source: record.path, utcTime: record.utcTime, root: record.root });
  }

  const targetDirs = new Set(subjects.map((s) => path.dirname(scheme.candidate(s))));
  const existing = await deps.fileMover.listExisting(targetDirs);
  if (isErr(existing)) {
    return err({ kind: "PLANNING_ERROR", message: existing.error.message });
  }

  const planned = deps.planner.plan(subjects, scheme, { occupied: existing.value });
  if (isErr(planned)) {
    const { message, paths } = planned.error;
    return err({
      kind: "PLANNING_ERROR",
      message: paths.length > 0 ? `${message} (${paths.join(", ")})` : message,
    });
  }
  const plan = planned.value;
  context.logger.info({
    emoji: "📝",
    moves: plan.moves.length,
    unchanged: plan.unchanged.length,
  })`${scheme.name} 計畫：搬移 ${plan.moves.length} 個，維持 ${plan.unchanged.length} 個`;

  for (const source of plan.unchanged) {
    const record = bySource.get(source);
    if (record) record.stages[stage] = { status: "skipped", note: "已在目標位置" };
  }

  const moved: AppliedPlan["moved"] = [];
  for (const move of plan.moves) {
    if (context.signal.aborted) return err(cancelled(stage));
    const record = bySource.get(move.from);
    if (!record) continue;
    if (context.dryRun) {
      record.path = move.to;
      record.stages[stage] = { status: "success", note: "dry-run" };
      continue;
    }
    const result = await deps.fileMover.move(move.from, move.to);
    if (isErr(result)) {
      context.logger.warn({ from: move.from, to: move.to })`${result.error.message}`;
      record.stages[stage] = {
        status: "failed",
        error: { kind: "IO_ERROR", message: result.error.message },
      };
      continue;
    }
    record.path = move.to;
    record.stages[stage] = { status: "success" };
    moved.push({ ...move, root: record.root });
  }
  return ok({ plan, moved });
}
