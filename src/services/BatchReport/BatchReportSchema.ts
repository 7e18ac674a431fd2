import { Type as t } from "@sinclair/typebox";

const stageNameSchema = t.Union([
  t.Literal("shift-to-utc"),
  t.Literal("organize"),
  t.Literal("geotag"),
  t.Literal("set-time"),
  t.Literal("rename"),
]);

const recordErrorSchema = t.Object({
  kind: t.Union([t.Literal("TIMESTAMP_PARSE_ERROR"), t.Literal("IO_ERROR")]),
  message: t.String(),
});

const stageFailureSchema = t.Object({
  kind: t.Union([
    t.Literal("UNKNOWN_TIMEZONE"),
    t.Literal("PLANNING_ERROR"),
    t.Literal("TOOL_ERROR"),
    t.Literal("CANCELLED"),
  ]),
  message: t.String(),
});

const stageResultSchema = t.Union([
  t.Object({ status: t.Literal("pending") }),
  t.Object({ status: t.Literal("success"), note: t.Optional(t.String()) }),
  t.Object({ status: t.Literal("skipped"), note: t.Optional(t.String()) }),
  t.Object({ status: t.Literal("failed"), error: recordErrorSchema }),
]);

const nullableDate = t.Union([t.String(), t.Null()]);

export const reportRecordSchema = t.Object({
  originPath: t.String(),
  path: t.String(),
  root: t.String(),
  captureTimeRaw: t.Optional(t.String()),
  cameraOffset: t.Optional(t.String()),
  cameraTimeZone: t.Optional(t.String()),
  cameraDst: t.Boolean(),
  gpsTimeRaw: t.Optional(t.String()),
  localTime: nullableDate,
  utcTime: nullableDate,
  shiftedToUtc: t.Boolean(),
  coordinate: t.Union([
    t.Object({
      latitude: t.Number(),
      longitude: t.Number(),
      altitude: t.Optional(t.Number()),
    }),
    t.Null(),
  ]),
  stages: t.Object({
    "shift-to-utc": stageResultSchema,
    organize: stageResultSchema,
    geotag: stageResultSchema,
    "set-time": stageResultSchema,
    rename: stageResultSchema,
  }),
});

const counterSchema = t.Integer({ minimum: 0 });

export const stageCountersSchema = t.Object({
  pending: counterSchema,
  success: counterSchema,
  skipped: counterSchema,
  failed: counterSchema,
});

export const batchReportSchema = t.Object({
  status: t.Union([t.Literal("completed"), t.Literal("aborted")]),
  abortedStage: t.Optional(stageNameSchema),
  reason: t.Optional(stageFailureSchema),
  pipeline: t.Array(stageNameSchema),
  dryRun: t.Boolean(),
  startedAt: t.String(),
  finishedAt: t.String(),
  counters: t.Record(t.String(), stageCountersSchema),
  issues: t.Array(
    t.Object({
      path: t.String(),
      kind: t.Union([t.Literal("SCAN_FAILED"), t.Literal("IO_ERROR")]),
      message: t.String(),
    })
  ),
  failures: t.Array(
    t.Object({
      path: t.String(),
      stage: stageNameSchema,
      kind: recordErrorSchema.properties.kind,
      message: t.String(),
    })
  ),
  records: t.Array(reportRecordSchema),
});

export type ReportRecord = typeof reportRecordSchema.static;
export type StageCounters = typeof stageCountersSchema.static;
export type BatchReport = typeof batchReportSchema.static;
