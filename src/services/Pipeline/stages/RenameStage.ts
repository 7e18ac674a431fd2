import { isErr, ok } from "~shared/utils/Result";

import { renameScheme } from "@/services/RenamePlanner";
import type { PhotoRecord } from "@/types";

import { type PlanDeps, applyRenamePlan } from "../applyRenamePlan";
import type { Stage, StageContext } from "../Stage";

/** 以 UTC 時間重新命名為 yyyy-MM-dd_HH-mm-ss.<副檔名> */
export class RenameStage implements Stage {
  readonly name = "rename";

  constructor(private readonly deps: PlanDeps) {}

  async run(records: PhotoRecord[], context: StageContext) {
    const applied = await applyRenamePlan(
      this.name,
      renameScheme,
      records,
      context,
      this.deps
    );
    if (isErr(applied)) return applied;
    return ok();
  }
}
