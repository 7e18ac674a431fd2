import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { detectCameraZone, groupByRoot } from "@/services/Pipeline";
import { formatOffset } from "@/services/TimezoneResolver";

import { optionInt, parseSuffixes, resolvePaths } from "./cliOptions";
import { createPipelineRuntime } from "./PipelineRuntime";

type DetectTimezoneOptions = {
  suffix?: unknown;
  concurrency?: unknown;
};

export type DetectedZone = {
  root: string;
  files: number;
  offset?: string;
  dst?: boolean;
  source?: string;
};

export function registerDetectTimezone(cli: CAC, baseLogger: Logger) {
  cli
    .command("detect-timezone <...paths>", "從照片中繼資料偵測各目錄的相機時區")
    .option("-e, --suffix <list>", "要處理的副檔名（逗號分隔）", {
      default: "jpg,mp4",
    })
    .option("--concurrency <n>", "同時讀取的檔案數")
    .action(async (paths: string[], options: DetectTimezoneOptions) => {
      const logger = baseLogger.extend("detect-timezone");
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
        process.exitCode = 1;
        return;
      }
      const { resolver, loader, metadataTool } = runtime.value;
      try {
        const batch = await loader.load({
          paths: resolvePaths(paths),
          extensions: parseSuffixes(options.suffix),
        });
        if (isErr(batch)) {
          logger.error({ emoji: "❌", error: batch.error })`${batch.error.message}`;
          process.exitCode = 1;
          return;
        }

        const results: DetectedZone[] = [];
        for (const [root, records] of groupByRoot(batch.value.records)) {
          const zone = detectCameraZone(resolver, records);
          if (!zone) {
            logger.warn({ emoji: "❓", root })`${root}: 無法偵測時區`;
            results.push({ root, files: records.length });
            continue;
          }
          const offset = formatOffset(zone.minutes);
          logger.info({
            emoji: "🕒",
            root,
            source: zone.source,
          })`${root}: ${offset}，夏令時間 ${zone.dst ? "是" : "否"}`;
          results.push({
            root,
            files: records.length,
            offset,
            dst: zone.dst,
            source: zone.source,
          });
        }
        await new DumpWriterDefault(logger, config.PHOTO_PIPELINE_REPORT_DIR).dump(
          "detect-timezone",
          results
        );
        if (results.some((r) => r.offset === undefined)) process.exitCode = 1;
      } finally {
        await metadataTool.end();
      }
    });
}
