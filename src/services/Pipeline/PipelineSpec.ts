import { type StageName, stageNames } from "@/types";

/** 依固定順序排列的階段清單，建立後不可變 */
export type PipelineSpec = readonly StageName[];

export function isStageName(value: string): value is StageName {
  return stageNames.some((name) => name === value);
}

/**
 * 驗證階段清單是否為 shift-to-utc → organize → geotag → set-time → rename
 * 的子序列。不合法時拋出錯誤，這是呼叫端的程式錯誤。
 */
export function buildPipelineSpec(stages: readonly string[]): PipelineSpec {
  if (stages.length === 0) throw new Error("流程至少需要一個階段");
  const spec: StageName[] = [];
  let lastIndex = -1;
  for (const stage of stages) {
    if (!isStageName(stage)) throw new Error(`未知的階段: ${stage}`);
    const index = stageNames.indexOf(stage);
    if (index <= lastIndex) {
      throw new Error(`階段順序不正確: ${stages.join(" → ")}`);
    }
    lastIndex = index;
    spec.push(stage);
  }
  return Object.freeze(spec);
}

export const processPipeline = buildPipelineSpec(stageNames);
