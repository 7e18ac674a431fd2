import { addMinutes } from "date-fns";

import { type Result, isErr } from "~shared/utils/Result";

import type { TimezoneOffset } from "./TimezoneOffset";
import type { TimezoneResolver, UnknownTimezoneError } from "./TimezoneResolver";

/**
 * 以當地牆上時間解析時區。wallClock 的 UTC 欄位即牆上時間，
 * 先減去標準偏移換算成大約的 UTC 時間點，再查 IANA 規則，
 * 夏令時間切換前後才會取到正確的偏移。
 */
export function resolveAtWallClock(
  resolver: TimezoneResolver,
  identifier: string,
  wallClock: Date,
  dst?: boolean
): Result<TimezoneOffset, UnknownTimezoneError> {
  const first = resolver.resolve(identifier, { dst, at: wallClock });
  if (isErr(first) || first.value.source !== "iana") return first;
  return resolver.resolve(identifier, {
    dst,
    at: addMinutes(wallClock, -first.value.standardMinutes),
  });
}
