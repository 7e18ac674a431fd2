import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { defaultTimeRangeSeconds } from "@/constants";
import {
  type BatchReport,
  BatchReportStoreJson,
  restoreMarkers,
} from "@/services/BatchReport";
import {
  type PipelineSpec,
  type TimezoneSetting,
  buildPipelineSpec,
  processPipeline,
} from "@/services/Pipeline";
import type { TimezoneResolver } from "@/services/TimezoneResolver";

import {
  optionInt,
  optionList,
  parseSuffixes,
  resolvePaths,
  toTimezoneSetting,
} from "./cliOptions";
import { createPipelineRuntime } from "./PipelineRuntime";

type PipelineCommandOptions = {
  timezone?: unknown;
  cameraTimezone?: unknown;
  dst?: boolean;
  cameraDst?: boolean;
  suffix?: unknown;
  gps?: unknown;
  timeRange?: unknown;
  concurrency?: unknown;
  resume?: string;
  assumeUtc?: boolean;
  dryRun?: boolean;
  force?: boolean;
  strict?: boolean;
};

type CommandDefinition = {
  name: string;
  description: string;
  spec: PipelineSpec;
  /** -z 代表的時區 */
  timezoneRole: "camera" | "target";
  /** process 預設只模擬，需 --force 才會寫入 */
  dryRunByDefault?: boolean;
  assumeUtcByDefault?: boolean;
};

const commands: CommandDefinition[] = [
  {
    name: "process",
    description: "完整流程：轉 UTC、依日期整理、geotag、設定時區、重新命名",
    spec: processPipeline,
    timezoneRole: "target",
    dryRunByDefault: true,
  },
  {
    name: "shift-to-utc",
    description: "偵測相機時區並把拍攝時間轉為 UTC",
    spec: buildPipelineSpec(["shift-to-utc"]),
    timezoneRole: "camera",
  },
  {
    name: "organize",
    description: "依 UTC 日期整理到 yyyy-MM-dd 目錄",
    spec: buildPipelineSpec(["organize"]),
    timezoneRole: "camera",
  },
  {
    name: "geotag",
    description: "以 GPX 軌跡寫入座標",
    spec: buildPipelineSpec(["geotag"]),
    timezoneRole: "camera",
  },
  {
    name: "set-time",
    description: "把 UTC 時間轉為目標時區並寫入時區標籤",
    spec: buildPipelineSpec(["set-time"]),
    timezoneRole: "target",
    assumeUtcByDefault: true,
  },
  {
    name: "rename",
    description: "依 UTC 時間重新命名為 yyyy-MM-dd_HH-mm-ss",
    spec: buildPipelineSpec(["rename"]),
    timezoneRole: "camera",
  },
];

export function registerPipelineCommands(cli: CAC, baseLogger: Logger) {
  for (const definition of commands) {
    const command = cli
      .command(`${definition.name} <...paths>`, definition.description)
      .option(
        "-z, --timezone <tz>",
        definition.timezoneRole === "target"
          ? "目標時區：城市、+02:00 或 Europe/Rome（負偏移請寫成 -z=-05:00）"
          : "相機時區，優先於檔案內的時區標籤"
      )
      .option("--dst", "時區加上一小時夏令時間", { default: false })
      .option("-e, --suffix <list>", "要處理的副檔名（逗號分隔）", {
        default: "jpg,mp4",
      })
      .option("--concurrency <n>", "同時處理的檔案數")
      .option("--resume <report>", "讀取先前的報告，略過已完成的工作")
      .option("--strict", "有檔案失敗時以代碼 2 結束", { default: false });

    if (definition.name === "process") {
      command
        .option("--camera-timezone <tz>", "相機時區，未指定時從中繼資料偵測")
        .option("--camera-dst", "相機時區加上夏令時間", { default: false })
        .option("--force", "實際寫入與搬移檔案，未指定時只模擬", {
          default: false,
        });
    } else {
      command.option("--dry-run", "只模擬，不寫入也不搬移檔案", {
        default: false,
      });
    }
    if (definition.name === "process" || definition.name === "geotag") {
      command
        .option("-g, --gps <file>", "GPX 軌跡檔，可重複指定")
        .option("--time-range <seconds>", "照片時間可超出軌跡的秒數", {
          default: defaultTimeRangeSeconds,
        });
    }
    if (definition.assumeUtcByDefault) {
      command.option("--no-assume-utc", "檔案內的時間不是 UTC");
    } else if (definition.timezoneRole === "camera") {
      command.option("--assume-utc", "視檔案內的時間為 UTC", { default: false });
    }

    command.action(async (paths: string[], options: PipelineCommandOptions) => {
      process.exitCode = await runPipelineCommand(
        baseLogger.extend(definition.name),
        definition,
        paths,
        options
      );
    });
  }
}

async function runPipelineCommand(
  logger: Logger,
  definition: CommandDefinition,
  paths: string[],
  options: PipelineCommandOptions
): Promise<number> {
  const appConfig = getAppConfig();
  const config = {
    ...appConfig,
    PHOTO_PIPELINE_CONCURRENCY: optionInt(
      options.concurrency,
      appConfig.PHOTO_PIPELINE_CONCURRENCY
    ),
  };
  const runtime = await createPipelineRuntime(logger, config);
  if (isErr(runtime)) {
    logger.error({ emoji: "❌", error: runtime.error })`${runtime.error.message}`;
    return 1;
  }
  const { resolver, metadataTool, loader, orchestrator } = runtime.value;
  const store = new BatchReportStoreJson(
    new DumpWriterDefault(logger, config.PHOTO_PIPELINE_REPORT_DIR)
  );

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn({ emoji: "⏹️" })`收到中斷訊號，處理中的檔案完成後停止`;
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const zone = toTimezoneSetting(options.timezone, options.dst);
    const cameraTimezone =
      definition.timezoneRole === "camera"
        ? zone
        : toTimezoneSetting(options.cameraTimezone, options.cameraDst);
    const targetTimezone = definition.timezoneRole === "target" ? zone : undefined;
    if (definition.timezoneRole === "target" && !targetTimezone) {
      logger.error({ emoji: "❌" })`${definition.name} 需要以 -z 指定目標時區`;
      return 1;
    }
    // 檔案動到之前先確認時區都能解析
    for (const setting of [cameraTimezone, targetTimezone]) {
      if (setting && !checkTimezone(logger, resolver, setting)) return 1;
    }

    const dryRun = definition.dryRunByDefault
      ? options.force !== true
      : options.dryRun === true;
    if (dryRun) {
      logger.warn({ emoji: "🧪" })`模擬執行，不會寫入或搬移任何檔案`;
    }

    const batch = await loader.load({
      paths: resolvePaths(paths),
      extensions: parseSuffixes(options.suffix),
      assumeUtc: options.assumeUtc ?? definition.assumeUtcByDefault ?? false,
      cameraTimezone,
      signal: controller.signal,
    });
    if (isErr(batch)) {
      logger.error({ emoji: "❌", error: batch.error })`${batch.error.message}`;
      return 1;
    }
    const { records, issues, trackFiles } = batch.value;

    if (options.resume) {
      const previous = await store.read(options.resume);
      if (isErr(previous)) {
        logger.error({ emoji: "❌", error: previous.error })`${previous.error.message}`;
        return 1;
      }
      const restored = restoreMarkers(records, previous.value);
      logger.info({ emoji: "♻️", restored })`已從報告還原 ${restored} 筆紀錄的狀態`;
    }

    if (records.length === 0) {
      logger.warn({ emoji: "🟡", issues: issues.length })`沒有可處理的檔案`;
      return issues.length > 0 ? 1 : 0;
    }

    const report = await orchestrator.run(records, definition.spec, {
      settings: {
        cameraTimezone,
        targetTimezone,
        trackFiles: [...new Set([...resolvePaths(optionList(options.gps)), ...trackFiles])],
        timeRangeSeconds: optionInt(options.timeRange, defaultTimeRangeSeconds),
      },
      signal: controller.signal,
      dryRun,
      issues,
    });
    await store.write(report);
    return exitCodeOf(logger, report, options.strict === true);
  } finally {
    process.off("SIGINT", onSigint);
    await metadataTool.end();
  }
}

function checkTimezone(
  logger: Logger,
  resolver: TimezoneResolver,
  setting: TimezoneSetting
) {
  const resolved = resolver.resolve(setting.identifier, { dst: setting.dst });
  if (isErr(resolved)) {
    logger.error({ emoji: "❌", error: resolved.error })`${resolved.error.message}`;
    return false;
  }
  logger.info({
    emoji: "🕒",
    source: resolved.value.source,
  })`時區 ${setting.identifier} → ${resolved.value.label}`;
  return true;
}

/** 中止為 1；有檔案失敗時只警告，--strict 時為 2 */
export function exitCodeOf(logger: Logger, report: BatchReport, strict: boolean) {
  if (report.status === "aborted") {
    logger.error({
      emoji: "⛔",
      stage: report.abortedStage,
      reason: report.reason,
    })`流程在 ${report.abortedStage ?? "?"} 中止`;
    return 1;
  }
  if (report.failures.length > 0) {
    logger.warn({
      emoji: "⚠️",
      failures: report.failures.length,
    })`完成，但有 ${report.failures.length} 個檔案失敗`;
    return strict ? 2 : 0;
  }
  logger.info({ emoji: "🎉" })`全部完成`;
  return 0;
}
