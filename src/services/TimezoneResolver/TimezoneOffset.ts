import { maxOffsetMinutes, minOffsetMinutes } from "@/constants";

export type TimezoneSource = "city" | "literal" | "iana" | "metadata" | "inferred";

export type TimezoneOffset = {
  /** 實際偏移（分鐘），已包含夏令時間 */
  readonly minutes: number;
  /** 不含夏令時間的標準偏移（分鐘） */
  readonly standardMinutes: number;
  readonly label: string;
  readonly dst: boolean;
  readonly source: TimezoneSource;
  /** 相機 TimeZoneCity 代碼，只有城市表中的城市才有 */
  readonly cityCode?: number;
};

const OFFSET_RE = /^(?:(?:UTC|GMT)\s*)?([+-])(\d{1,2})(?::?(\d{2}))?$/i;
const ZERO_RE = /^(?:UTC|GMT|Z)$/i;

/**
 * 解析 `+02:00`、`-0530`、`+2`、`UTC+05:30`、`Z` 等偏移字串，回傳分鐘數。
 */
export function parseOffset(value: string): number | undefined {
  const s = value.trim();
  if (ZERO_RE.test(s)) return 0;
  const m = OFFSET_RE.exec(s);
  if (!m) return undefined;
  const hours = Number(m[2]);
  const minutes = m[3] === undefined ? 0 : Number(m[3]);
  if (minutes >= 60) return undefined;
  const total = hours * 60 + minutes;
  return m[1] === "-" ? -total : total;
}

export function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? "-" : "+";
  const abs = Math.abs(minutes);
  const h = String(Math.floor(abs / 60)).padStart(2, "0");
  const m = String(abs % 60).padStart(2, "0");
  return `${sign}${h}:${m}`;
}

export function isPlausibleOffset(minutes: number) {
  return (
    Number.isInteger(minutes) &&
    minutes >= minOffsetMinutes &&
    minutes <= maxOffsetMinutes
  );
}
