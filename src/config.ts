import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envNumber } from "~shared/ConfigFactory";

import { defaultConcurrency } from "@/constants";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    /** 同時呼叫 exiftool 的數量，也是 exiftool 行程池大小 */
    PHOTO_PIPELINE_CONCURRENCY: envNumber({ default: defaultConcurrency }),
    PHOTO_PIPELINE_REPORT_DIR: t.String({ default: "dist/reports" }),
    /** 自訂城市時區表，格式同 src/data/timezone-cities.json */
    PHOTO_PIPELINE_TIMEZONE_TABLE: t.Optional(t.String()),
    PHOTO_PIPELINE_EXIFTOOL_TIMEOUT_MS: envNumber({ default: 120_000 }),
  })
);

export type AppConfig = ReturnType<typeof getAppConfig>;
