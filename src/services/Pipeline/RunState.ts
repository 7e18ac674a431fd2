import type { StageFailure, StageName } from "@/types";

export type RunState =
  | { status: "not-started" }
  | { status: "running"; stageIndex: number; stage: StageName }
  | { status: "completed" }
  | { status: "aborted"; stage: StageName; reason: StageFailure };

export type FinishedRunState = Extract<RunState, { status: "completed" | "aborted" }>;
