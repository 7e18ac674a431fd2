import path from "node:path";

import { isErr, ok } from "~shared/utils/Result";

import { organizeScheme } from "@/services/RenamePlanner";
import type { PhotoRecord } from "@/types";

import { type PlanDeps, applyRenamePlan } from "../applyRenamePlan";
import type { Stage, StageContext } from "../Stage";

/** 依 UTC 日期把檔案搬到 <root>/<yyyy-MM-dd>/，完成後清除搬空的目錄 */
export class OrganizeStage implements Stage {
  readonly name = "organize";

  constructor(private readonly deps: PlanDeps) {}

  async run(records: PhotoRecord[], context: StageContext) {
    const applied = await applyRenamePlan(
      this.name,
      organizeScheme,
      records,
      context,
      this.deps
    );
    if (isErr(applied)) return applied;
    // 只處理檔案被搬離的目錄，不碰根目錄底下其他空目錄
    const vacated = new Map<string, Set<string>>();
    for (const move of applied.value.moved) {
      const dirs = vacated.get(move.root) ?? new Set<string>();
      dirs.add(path.dirname(move.from));
      vacated.set(move.root, dirs);
    }

    for (const [root, dirs] of vacated) {
      const pruned = await this.deps.fileMover.removeEmptyDirs(root, dirs);
      if (isErr(pruned)) {
        context.logger.warn({ root })`${pruned.error.message}`;
        continue;
      }
      if (pruned.value.length > 0) {
        context.logger.info({
          emoji: "🧹",
          dirs: pruned.value,
        })`已移除 ${pruned.value.length} 個空目錄`;
      }
    }
    return ok();
  }
}
