import type { Result } from "~shared/utils/Result";

import type { MoveFile } from "@/types";

import type { NamingScheme, PlanSubject } from "./NamingScheme";

export type PlanEntry = {
  source: string;
  target: string;
  /** 0 表示沒有加上序號 */
  suffix: number;
};

export type RenamePlan = {
  scheme: string;
  /** 依來源路徑排序 */
  entries: PlanEntry[];
  /** 需要搬移的項目，已排好可安全依序執行的順序 */
  moves: MoveFile[];
  /** 已在目標位置的來源路徑 */
  unchanged: string[];
};

export type PlanningErrorReason =
  | "DUPLICATE_SOURCE"
  | "UNRESOLVED_COLLISION"
  | "CYCLE";

export type PlanningError = {
  type: "PLANNING_ERROR";
  reason: PlanningErrorReason;
  message: string;
  paths: string[];
};

export type PlanOptions = {
  /** 目標目錄中已存在的檔案，不屬於本批來源者視為已佔用 */
  occupied?: Iterable<string>;
};

export interface RenamePlanner {
  /**
   * 為整批檔案計算目標路徑。整份計畫要嘛完全合法，要嘛回傳錯誤，
   * 不會產生部分計畫，也不會動到檔案系統。
   */
  plan(
    subjects: readonly PlanSubject[],
    scheme: NamingScheme,
    options?: PlanOptions
  ): Result<RenamePlan, PlanningError>;
}
