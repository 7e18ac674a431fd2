import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";

import { type Result, err, ok } from "~shared/utils/Result";

import { isPlausibleOffset, parseOffset } from "./TimezoneOffset";

const cityTableSchema = t.Object({
  cities: t.Array(
    t.Object({
      name: t.String({ minLength: 1 }),
      cityCode: t.Optional(t.Integer({ minimum: 0 })),
      offset: t.String({ pattern: "^[+-]\\d{2}:\\d{2}$" }),
    })
  ),
});

export type TimezoneCityInput = (typeof cityTableSchema.static)["cities"][number];

export type TimezoneCity = {
  readonly name: string;
  readonly cityCode?: number;
  readonly offsetMinutes: number;
};

/**
 * 城市 → 偏移對照表。建立後不可變，由呼叫端注入 TimezoneResolver。
 */
export type TimezoneCityTable = {
  readonly cities: ReadonlyMap<string, TimezoneCity>;
};

export type CityTableError =
  | { type: "READ_FAILED"; message: string }
  | { type: "INVALID_TABLE"; message: string };

export const defaultCityTablePath = fileURLToPath(
  new URL("../../data/timezone-cities.json", import.meta.url)
);

export function normalizeCityName(name: string) {
  return name.trim().toLowerCase().replace(/[\s_]+/g, " ");
}

export function buildTimezoneCityTable(
  inputs: readonly TimezoneCityInput[]
): Result<TimezoneCityTable, CityTableError> {
  const cities = new Map<string, TimezoneCity>();
  for (const input of inputs) {
    const key = normalizeCityName(input.name);
    if (cities.has(key)) {
      return err({
        type: "INVALID_TABLE",
        message: `城市重複: ${input.name}`,
      });
    }
    const offsetMinutes = parseOffset(input.offset);
    if (offsetMinutes === undefined || !isPlausibleOffset(offsetMinutes)) {
      return err({
        type: "INVALID_TABLE",
        message: `城市 ${input.name} 的偏移不合法: ${input.offset}`,
      });
    }
    cities.set(
      key,
      Object.freeze({
        name: input.name,
        cityCode: input.cityCode,
        offsetMinutes,
      })
    );
  }
  return ok(Object.freeze({ cities }));
}

export async function loadTimezoneCityTable(
  filePath: string = defaultCityTablePath
): Promise<Result<TimezoneCityTable, CityTableError>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    return err({
      type: "READ_FAILED",
      message: `讀取城市時區表失敗: ${filePath}: ${
        error instanceof Error ? error.message : String(error)
      }`,
    });
  }
  if (!Value.Check(cityTableSchema, raw)) {
    const first = Value.Errors(cityTableSchema, raw).First();
    return err({
      type: "INVALID_TABLE",
      message: `城市時區表格式錯誤: ${first ? `${first.path} ${first.message}` : filePath}`,
    });
  }
  return buildTimezoneCityTable(raw.cities);
}
