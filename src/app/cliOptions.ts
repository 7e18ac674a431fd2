import path from "node:path";

import { defaultMediaExtensions } from "@/constants";
import type { TimezoneSetting } from "@/services/Pipeline";
import { expandHome } from "@/utils/helper";

/**
 * cac 會把看起來像數字的參數轉成 number，例如 `-z +2` 得到 2，
 * 時區需要保留正負號。
 */
export function optionText(value: unknown): string | undefined {
  if (typeof value === "number") return value >= 0 ? `+${value}` : String(value);
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  return undefined;
}

/** 重複指定的參數會成為陣列 */
export function optionList(value: unknown): string[] {
  const values = Array.isArray(value) ? value : [value];
  return values.flatMap((v) => {
    if (typeof v === "string") return v.trim() === "" ? [] : [v.trim()];
    if (typeof v === "number") return [String(v)];
    return [];
  });
}

export function optionInt(value: unknown, fallback: number): number {
  const n = typeof value === "number" ? value : Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/** `jpg,JPG,mp4` → 副檔名清單 */
export function parseSuffixes(value: unknown): string[] {
  const list = optionList(value).flatMap((v) => v.split(","));
  const exts = list.map((e) => e.trim()).filter(Boolean);
  return exts.length > 0 ? exts : [...defaultMediaExtensions];
}

export function toTimezoneSetting(
  value: unknown,
  dst: unknown
): TimezoneSetting | undefined {
  const identifier = optionText(value);
  if (!identifier) return undefined;
  return { identifier, dst: dst === true };
}

export function resolvePaths(values: readonly string[]) {
  return values.map((p) => path.resolve(expandHome(p)));
}
