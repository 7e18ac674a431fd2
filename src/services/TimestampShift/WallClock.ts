import { UTCDate } from "@date-fns/utc";
import { format } from "date-fns";

const WALL_CLOCK_RE =
  /^(\d{4})[:-](\d{2})[:-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,9}))?(?:\s*(?:Z|[+-]\d{2}:?\d{2}))?$/i;

export const exifDateTimePattern = "yyyy:MM:dd HH:mm:ss";

/**
 * 將中繼資料中的日期字串解析為「牆上時間」。
 * 回傳的 Date 以 UTC 欄位承載字串上的年月日時分秒，字尾的時區會被忽略。
 *
 * 支援：
 * - 2024:05:01 10:00:01
 * - 2024:05:01 10:00:01.250
 * - 2024-05-01T10:00:01+02:00
 *
 * 0000:00:00 00:00:00 或不存在的日期回傳 undefined。
 */
export function parseWallClock(raw: string | undefined): Date | undefined {
  if (!raw) return undefined;
  const m = WALL_CLOCK_RE.exec(raw.trim());
  if (!m) return undefined;

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const hour = Number(m[4]);
  const minute = Number(m[5]);
  const second = Number(m[6]);
  const millis = m[7] ? Number(m[7].slice(0, 3).padEnd(3, "0")) : 0;

  if (year < 1 || month < 1 || month > 12 || day < 1) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const d = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Date.UTC 會把 0..99 年視為 1900 年代
  d.setUTCFullYear(year);
  // 2 月 30 日之類的日期會被 Date 進位，比對欄位即可排除
  if (d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return undefined;
  return d;
}

/** 以 UTC 欄位格式化，適用於牆上時間與 UTC 時間 */
export function formatWallClock(
  date: Date,
  pattern: string = exifDateTimePattern
): string {
  return format(new UTCDate(date.getTime()), pattern);
}
