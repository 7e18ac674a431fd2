import { type Result, err, ok } from "~shared/utils/Result";

import type { TimezoneCityTable } from "./TimezoneCityTable";
import { normalizeCityName } from "./TimezoneCityTable";
import {
  type TimezoneOffset,
  formatOffset,
  isPlausibleOffset,
  parseOffset,
} from "./TimezoneOffset";
import type {
  CameraZoneHint,
  ResolveOptions,
  TimezoneResolver,
  UnknownTimezoneError,
} from "./TimezoneResolver";

const DST_MINUTES = 60;
const ROUNDING_MINUTES = 15;

export class TimezoneResolverDefault implements TimezoneResolver {
  constructor(private readonly table: TimezoneCityTable) {}

  resolve(
    identifier: string,
    options: ResolveOptions = {}
  ): Result<TimezoneOffset, UnknownTimezoneError> {
    const trimmed = identifier.trim();
    if (!trimmed) return unknown(identifier, "未提供時區");
    const dstMinutes = options.dst ? DST_MINUTES : 0;

    // 1) 城市表
    const city = this.table.cities.get(normalizeCityName(trimmed));
    if (city) {
      return checked(identifier, {
        minutes: city.offsetMinutes + dstMinutes,
        standardMinutes: city.offsetMinutes,
        label: city.name,
        dst: dstMinutes > 0,
        source: "city",
        cityCode: city.cityCode,
      });
    }

    // 2) 固定偏移字串
    const literal = parseOffset(trimmed);
    if (literal !== undefined) {
      return checked(identifier, {
        minutes: literal + dstMinutes,
        standardMinutes: literal,
        label: formatOffset(literal + dstMinutes),
        dst: dstMinutes > 0,
        source: "literal",
      });
    }

    // 3) IANA 時區，夏令時間由時區本身決定
    const at = options.at ?? new Date();
    const minutes = zoneOffsetMinutes(trimmed, at);
    if (minutes !== undefined) {
      const year = at.getUTCFullYear();
      const january = zoneOffsetMinutes(trimmed, new Date(Date.UTC(year, 0, 1)));
      const july = zoneOffsetMinutes(trimmed, new Date(Date.UTC(year, 6, 1)));
      const standardMinutes = Math.min(january ?? minutes, july ?? minutes);
      return checked(identifier, {
        minutes,
        standardMinutes,
        label: trimmed,
        dst: minutes > standardMinutes,
        source: "iana",
      });
    }

    return unknown(identifier, `無法辨識的時區: ${identifier}`);
  }

  infer(
    cameraLocal: Date,
    referenceUtc: Date
  ): Result<TimezoneOffset, UnknownTimezoneError> {
    const deltaMinutes = (cameraLocal.getTime() - referenceUtc.getTime()) / 60_000;
    if (!Number.isFinite(deltaMinutes)) {
      return unknown("inferred", "無效的參考時間，無法推算時區");
    }
    // 加 0 以避免 -0
    const minutes =
      Math.round(deltaMinutes / ROUNDING_MINUTES) * ROUNDING_MINUTES + 0;
    const label = formatOffset(minutes);
    return checked(label, {
      minutes,
      standardMinutes: minutes,
      label,
      dst: false,
      source: "inferred",
    });
  }

  detect(hint: CameraZoneHint): Result<TimezoneOffset, UnknownTimezoneError> {
    if (hint.offsetTime) {
      const minutes = parseOffset(hint.offsetTime);
      if (minutes !== undefined) {
        return checked(hint.offsetTime, {
          minutes,
          standardMinutes: hint.dst ? minutes - DST_MINUTES : minutes,
          label: formatOffset(minutes),
          dst: hint.dst,
          source: "metadata",
        });
      }
    }
    if (hint.timeZone) {
      const standard = parseOffset(hint.timeZone);
      if (standard !== undefined) {
        const minutes = standard + (hint.dst ? DST_MINUTES : 0);
        return checked(hint.timeZone, {
          minutes,
          standardMinutes: standard,
          label: formatOffset(minutes),
          dst: hint.dst,
          source: "metadata",
        });
      }
    }
    return unknown(
      hint.offsetTime ?? hint.timeZone ?? "",
      "中繼資料沒有可用的時區資訊"
    );
  }
}

function unknown(
  identifier: string,
  message: string
): Result<TimezoneOffset, UnknownTimezoneError> {
  return err({ type: "UNKNOWN_TIMEZONE", identifier, message });
}

function checked(
  identifier: string,
  offset: TimezoneOffset
): Result<TimezoneOffset, UnknownTimezoneError> {
  if (!isPlausibleOffset(offset.minutes)) {
    return unknown(
      identifier,
      `偏移 ${formatOffset(offset.minutes)} 超出 -12:00..+14:00`
    );
  }
  return ok(Object.freeze(offset));
}

function zoneOffsetMinutes(timeZone: string, at: Date): number | undefined {
  let fmt: Intl.DateTimeFormat;
  try {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
  } catch (error) {
    if (error instanceof RangeError) return undefined;
    throw error;
  }
  const parts = fmt.formatToParts(at);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((p) => p.type === type)?.value);
  const asIfUtc = Date.UTC(
    part("year"),
    part("month") - 1,
    part("day"),
    part("hour"),
    part("minute"),
    part("second")
  );
  const wholeSeconds = Math.floor(at.getTime() / 1000) * 1000;
  const minutes = Math.round((asIfUtc - wholeSeconds) / 60_000);
  return Number.isFinite(minutes) ? minutes : undefined;
}
