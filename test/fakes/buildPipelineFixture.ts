import { Semaphore } from "async-mutex";

import { buildTestLogger } from "~shared/testkit/TestLogger";
import { expectOk } from "~shared/testkit/ExpectResult";

import { PhotoBatchLoaderDefault } from "@/services/PhotoBatchLoader";
import {
  GeotagStage,
  OrganizeStage,
  PipelineOrchestratorDefault,
  RenameStage,
  SetTimeStage,
  ShiftToUtcStage,
  type StageContext,
} from "@/services/Pipeline";
import { RenamePlannerDefault } from "@/services/RenamePlanner";
import { TimestampShiftServiceDefault } from "@/services/TimestampShift";
import {
  type TimezoneCityInput,
  TimezoneResolverDefault,
  buildTimezoneCityTable,
} from "@/services/TimezoneResolver";

import { FileMoverFake } from "./FileMoverFake";
import { FileSystemScannerFake } from "./FileSystemScannerFake";
import { GeotagToolFake, type TrackPoint } from "./GeotagToolFake";
import { MetadataToolFake } from "./MetadataToolFake";

export const testCities: TimezoneCityInput[] = [
  { name: "Rome", cityCode: 19, offset: "+01:00" },
  { name: "New York", cityCode: 28, offset: "-05:00" },
  { name: "Taipei", cityCode: 7, offset: "+08:00" },
];

export function buildTestResolver(cities: TimezoneCityInput[] = testCities) {
  const table = buildTimezoneCityTable(cities);
  expectOk(table);
  return new TimezoneResolverDefault(table.value);
}

/** 以記憶體中的假工具組裝完整流程 */
export function buildPipelineFixture(options: { points?: TrackPoint[] } = {}) {
  const logger = buildTestLogger();
  const resolver = buildTestResolver();
  const metadataTool = new MetadataToolFake();
  const fileMover = new FileMoverFake(metadataTool.files);
  const scanner = new FileSystemScannerFake(metadataTool.files);
  const geotagTool = new GeotagToolFake(options.points);
  const shifter = new TimestampShiftServiceDefault();
  const planner = new RenamePlannerDefault();

  const loader = new PhotoBatchLoaderDefault({
    scanner,
    metadataTool,
    resolver,
    logger,
    concurrency: 4,
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
    concurrency: 4,
  });

  return {
    logger,
    resolver,
    metadataTool,
    fileMover,
    scanner,
    geotagTool,
    loader,
    orchestrator,
  };
}

/** 單獨執行某個階段時使用的 context */
export function buildStageContext(overrides: Partial<StageContext> = {}): StageContext {
  return {
    logger: buildTestLogger(),
    signal: new AbortController().signal,
    dryRun: false,
    semaphore: new Semaphore(4),
    settings: { trackFiles: [], timeRangeSeconds: 600 },
    ...overrides,
  };
}
