import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { AppConfig } from "@/config";
import { FileMoverDefault } from "@/services/FileMover";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { GeotagToolExifTool } from "@/services/GeotagTool";
import { MetadataToolExifTool } from "@/services/MetadataTool";
import { PhotoBatchLoaderDefault } from "@/services/PhotoBatchLoader";
import {
  GeotagStage,
  OrganizeStage,
  PipelineOrchestratorDefault,
  RenameStage,
  SetTimeStage,
  ShiftToUtcStage,
} from "@/services/Pipeline";
import { RenamePlannerDefault } from "@/services/RenamePlanner";
import { TimestampShiftServiceDefault } from "@/services/TimestampShift";
import {
  type CityTableError,
  TimezoneResolverDefault,
  loadTimezoneCityTable,
} from "@/services/TimezoneResolver";

export type PipelineRuntime = Awaited<ReturnType<typeof buildRuntime>>;

/** 組裝所有服務；exiftool 行程需在結束時以 metadataTool.end() 關閉 */
export async function createPipelineRuntime(
  logger: Logger,
  config: AppConfig
): Promise<Result<PipelineRuntime, CityTableError>> {
  const table = await loadTimezoneCityTable(config.PHOTO_PIPELINE_TIMEZONE_TABLE);
  if (isErr(table)) return err(table.error);
  return ok(buildRuntime(logger, config, new TimezoneResolverDefault(table.value)));
}

function buildRuntime(
  logger: Logger,
  config: AppConfig,
  resolver: TimezoneResolverDefault
) {
  const concurrency = config.PHOTO_PIPELINE_CONCURRENCY;
  const metadataTool = MetadataToolExifTool.create({
    concurrency,
    taskTimeoutMillis: config.PHOTO_PIPELINE_EXIFTOOL_TIMEOUT_MS,
  });
  const geotagTool = new GeotagToolExifTool({
    exiftool: metadataTool.instance,
    metadataTool,
    logger,
    concurrency,
  });
  const shifter = new TimestampShiftServiceDefault();
  const planner = new RenamePlannerDefault();
  const fileMover = new FileMoverDefault();

  const loader = new PhotoBatchLoaderDefault({
    scanner: new FileSystemScannerDefault(),
    metadataTool,
    resolver,
    logger,
    concurrency,
  });
  const orchestrator = new PipelineOrchestratorDefault({
    stages: [
      new ShiftToUtcStage({ resolver, shifter, metadataTool }),
      new OrganizeStage({ planner, fileMover }),
      new GeotagStage({ geotagTool }),
      new SetTimeStage({ resolver, shifter, metadataTool }),
      new RenameStage({ planner, fileMover }),
    ],
    logger,
    concurrency,
  });
  return { resolver, metadataTool, loader, orchestrator };
}
