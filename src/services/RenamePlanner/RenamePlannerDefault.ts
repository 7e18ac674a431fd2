import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { MoveFile } from "@/types";

import type { NamingScheme, PlanSubject } from "./NamingScheme";
import { withSuffix } from "./NamingScheme";
import type {
  PlanEntry,
  PlanOptions,
  PlanningError,
  PlanningErrorReason,
  RenamePlan,
  RenamePlanner,
} from "./RenamePlanner";

/** 以小寫比對，避免在不分大小寫的檔案系統上互相覆蓋 */
const keyOf = (p: string) => p.toLowerCase();

const compareText = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/** 依原檔名排序，檔名相同再比完整路徑；與掃描或完成順序無關 */
const bySourceName = (a: PlanSubject, b: PlanSubject) =>
  compareText(path.basename(a.source), path.basename(b.source)) ||
  compareText(a.source, b.source);

export class RenamePlannerDefault implements RenamePlanner {
  plan(
    subjects: readonly PlanSubject[],
    scheme: NamingScheme,
    options: PlanOptions = {}
  ): Result<RenamePlan, PlanningError> {
    // 1) 來源不可重複
    const sources = new Set<string>();
    for (const subject of subjects) {
      const key = keyOf(subject.source);
      if (sources.has(key)) {
        return planningError(
          "DUPLICATE_SOURCE",
          `來源重複: ${subject.source}`,
          [subject.source]
        );
      }
      sources.add(key);
    }

    // 只排除與來源完全相同的路徑；只差大小寫的是另一個檔案
    const exactSources = new Set(subjects.map((s) => s.source));
    const occupied = new Set<string>();
    for (const p of options.occupied ?? []) {
      if (!exactSources.has(p)) occupied.add(keyOf(p));
    }

    // 2) 計算候選路徑並依候選分組
    const claims = new Map<string, PlanSubject[]>();
    for (const subject of subjects) {
      const key = keyOf(scheme.candidate(subject));
      const claim = claims.get(key) ?? [];
      claim.push(subject);
      claims.set(key, claim);
    }

    // 3) 已經是候選名稱或其序號版本的來源保留原名，重跑時不再搬動
    const kept = new Map<PlanSubject, PlanEntry>();
    for (const [key, claim] of claims) {
      for (const subject of claim) {
        const entry = keptEntry(subject, scheme.candidate(subject));
        if (!entry) continue;
        const targetKey = keyOf(entry.target);
        if (targetKey !== key && claims.has(targetKey)) continue;
        if (entry.target !== subject.source && occupied.has(targetKey)) continue;
        kept.set(subject, entry);
      }
    }

    // 4) 其餘來源依檔名排序，第一個取得候選，之後加序號
    const taken = new Set<string>([
      ...claims.keys(),
      ...occupied,
      ...[...kept.values()].map((e) => keyOf(e.target)),
    ]);
    const maxSuffix = 2 * subjects.length + occupied.size + 2;
    const entries: PlanEntry[] = [...kept.values()];

    for (const key of [...claims.keys()].sort(compareText)) {
      const claim = claims.get(key);
      if (!claim) continue;
      const candidateFree =
        !occupied.has(key) && !claim.some((s) => kept.get(s)?.suffix === 0);
      const ordered = claim.filter((s) => !kept.has(s)).sort(bySourceName);
      for (const [index, subject] of ordered.entries()) {
        const candidate = scheme.candidate(subject);
        if (index === 0 && candidateFree) {
          entries.push({ source: subject.source, target: candidate, suffix: 0 });
          continue;
        }
        let n = 2;
        while (n <= maxSuffix && taken.has(keyOf(withSuffix(candidate, n)))) {
          n++;
        }
        if (n > maxSuffix) {
          return planningError(
            "UNRESOLVED_COLLISION",
            `無法為 ${subject.source} 找到不衝突的名稱`,
            claim.map((s) => s.source)
          );
        }
        const target = withSuffix(candidate, n);
        taken.add(keyOf(target));
        entries.push({ source: subject.source, target, suffix: n });
      }
    }

    // 5) 最終檢查：目標兩兩不同，且不覆蓋本批以外的檔案
    const targets = new Map<string, string>();
    for (const entry of entries) {
      const key = keyOf(entry.target);
      const other = targets.get(key);
      const overwrites = occupied.has(key) && entry.target !== entry.source;
      if (other !== undefined || overwrites) {
        return planningError(
          "UNRESOLVED_COLLISION",
          `目標路徑衝突: ${entry.target}`,
          other === undefined ? [entry.source] : [other, entry.source]
        );
      }
      targets.set(key, entry.source);
    }

    entries.sort((a, b) => compareText(a.source, b.source));

    // 6) 排定搬移順序，並偵測循環
    const ordered = orderMoves(entries);
    if (!ordered.ok) return ordered;

    return ok({
      scheme: scheme.name,
      entries,
      moves: ordered.value,
      unchanged: entries.filter((e) => e.source === e.target).map((e) => e.source),
    });
  }
}

/** 來源已是 candidate 或 candidate_N 時，回傳保留原名的項目 */
function keptEntry(subject: PlanSubject, candidate: string): PlanEntry | undefined {
  if (keyOf(subject.source) === keyOf(candidate)) {
    return { source: subject.source, target: candidate, suffix: 0 };
  }
  if (keyOf(path.dirname(subject.source)) !== keyOf(path.dirname(candidate))) {
    return undefined;
  }
  const ext = path.extname(candidate);
  const prefix = `${path.basename(candidate, ext)}_`;
  const name = path.basename(subject.source);
  const sourceExt = path.extname(name);
  const stem = name.slice(0, name.length - sourceExt.length);
  if (keyOf(sourceExt) !== keyOf(ext)) return undefined;
  if (keyOf(stem.slice(0, prefix.length)) !== keyOf(prefix)) return undefined;
  const digits = stem.slice(prefix.length);
  if (!/^[1-9][0-9]*$/.test(digits)) return undefined;
  const n = Number(digits);
  if (n < 2) return undefined;
  return { source: subject.source, target: withSuffix(candidate, n), suffix: n };
}

/**
 * 若某搬移的目標正是另一筆的來源，必須等那一筆先搬走。
 * 來源不重複，所以每筆最多依賴另一筆；剩下無法排入的即為循環。
 */
function orderMoves(entries: PlanEntry[]): Result<MoveFile[], PlanningError> {
  const moves = entries.filter((e) => e.source !== e.target);
  const bySource = new Map(moves.map((m) => [keyOf(m.source), m]));
  const dependents = new Map<string, PlanEntry[]>();
  const blocked = new Set<PlanEntry>();

  for (const move of moves) {
    const targetKey = keyOf(move.target);
    const blocker = bySource.get(targetKey);
    if (blocker && blocker !== move) {
      const list = dependents.get(keyOf(blocker.source)) ?? [];
      list.push(move);
      dependents.set(keyOf(blocker.source), list);
      blocked.add(move);
    }
  }

  const ready = moves.filter((m) => !blocked.has(m));
  const result: MoveFile[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => compareText(a.source, b.source));
    const next = ready.shift();
    if (!next) break;
    result.push({ from: next.source, to: next.target });
    for (const dependent of dependents.get(keyOf(next.source)) ?? []) {
      blocked.delete(dependent);
      ready.push(dependent);
    }
  }

  if (blocked.size > 0) {
    const paths = [...blocked].map((m) => m.source).sort(compareText);
    return planningError("CYCLE", `搬移形成循環: ${paths.join(", ")}`, paths);
  }
  return ok(result);
}

function planningError(
  reason: PlanningErrorReason,
  message: string,
  paths: string[]
): Result<never, PlanningError> {
  return err({ type: "PLANNING_ERROR", reason, message, paths });
}
