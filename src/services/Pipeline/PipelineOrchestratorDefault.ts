import { Semaphore } from "async-mutex";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { defaultConcurrency } from "@/constants";
import { type BatchReport, buildBatchReport, countStages } from "@/services/BatchReport";
import type { PhotoRecord, StageName } from "@/types";

import { cancelled } from "./forEachRecord";
import type { PipelineOrchestrator, RunOptions } from "./PipelineOrchestrator";
import type { PipelineSpec } from "./PipelineSpec";
import type { FinishedRunState, RunState } from "./RunState";
import type { Stage } from "./Stage";

export class PipelineOrchestratorDefault implements PipelineOrchestrator {
  private readonly logger: Logger;
  private readonly stages: ReadonlyMap<StageName, Stage>;

  constructor(
    private readonly deps: {
      stages: readonly Stage[];
      logger: Logger;
      concurrency?: number;
    }
  ) {
    this.logger = deps.logger.extend("PipelineOrchestrator");
    this.stages = new Map(deps.stages.map((stage) => [stage.name, stage]));
  }

  async run(
    records: PhotoRecord[],
    spec: PipelineSpec,
    options: RunOptions
  ): Promise<BatchReport> {
    for (const name of spec) {
      if (!this.stages.has(name)) throw new Error(`未註冊的階段: ${name}`);
    }
    const startedAt = new Date();
    const dryRun = options.dryRun ?? false;
    const signal = options.signal ?? new AbortController().signal;
    const semaphore = new Semaphore(this.deps.concurrency ?? defaultConcurrency);
    const transition = (next: RunState) => options.onStateChange?.(next);
    transition({ status: "not-started" });

    for (const record of records) {
      for (const name of spec) record.stages[name] = { status: "pending" };
    }
    this.logger.info({
      emoji: "🚀",
      pipeline: spec,
      records: records.length,
      dryRun,
    })`開始執行 ${spec.join(" → ")}，共 ${records.length} 筆`;

    let finished: FinishedRunState | undefined;
    for (const [stageIndex, name] of spec.entries()) {
      if (signal.aborted) {
        finished = { status: "aborted", stage: name, reason: cancelled(name) };
        break;
      }
      transition({ status: "running", stageIndex, stage: name });
      const stage = this.stages.get(name);
      if (!stage) throw new Error(`未註冊的階段: ${name}`);

      // 前面階段失敗的紀錄不再往下處理
      const active: PhotoRecord[] = [];
      for (const record of records) {
        const failedBefore = spec
          .slice(0, stageIndex)
          .some((previous) => record.stages[previous].status === "failed");
        if (failedBefore) {
          record.stages[name] = { status: "skipped", note: "前一階段失敗" };
        } else {
          active.push(record);
        }
      }

      const logger = this.logger.extend(name);
      const result = await stage.run(active, {
        logger,
        signal,
        dryRun,
        semaphore,
        settings: options.settings,
      });
      const counters = countStages(records, [name])[name];
      if (isErr(result)) {
        logger.error({
          emoji: "⛔",
          error: result.error,
          counters,
        })`${name} 階段中止: ${result.error.message}`;
        finished = { status: "aborted", stage: name, reason: result.error };
        break;
      }
      logger.info({ emoji: "✅", counters })`${name} 階段完成`;
    }

    const state: FinishedRunState = finished ?? { status: "completed" };
    transition(state);
    if (state.status === "aborted") {
      this.logger.warn({ stage: state.stage })`流程在 ${state.stage} 中止`;
    }
    return buildBatchReport({
      state,
      pipeline: spec,
      dryRun,
      startedAt,
      finishedAt: new Date(),
      records,
      issues: options.issues,
    });
  }
}
