import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { expectOk } from "~shared/testkit/ExpectResult";

import { FileMoverDefault } from "@/services/FileMover";
import { createPhotoRecord } from "@/services/PhotoBatchLoader";
import { RenameStage } from "@/services/Pipeline";
import { RenamePlannerDefault } from "@/services/RenamePlanner";

import { buildStageContext } from "~test/fakes/buildPipelineFixture";

describe("RenameStage", () => {
  let tmpDir = "";
  const stage = new RenameStage({
    planner: new RenamePlannerDefault(),
    fileMover: new FileMoverDefault(),
  });

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "rename-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("副檔名大小寫不同的既有檔案不會被覆蓋", async () => {
    await writeFile(join(tmpDir, "2024-05-01_08-00-01.JPG"), "batch photo");
    await writeFile(join(tmpDir, "2024-05-01_08-00-01.jpg"), "other");
    const record = createPhotoRecord({
      path: join(tmpDir, "2024-05-01_08-00-01.JPG"),
      root: tmpDir,
      utcTime: new Date("2024-05-01T08:00:01Z"),
      shiftedToUtc: true,
    });

    expectOk(await stage.run([record], buildStageContext()));

    expect(record.path).toBe(join(tmpDir, "2024-05-01_08-00-01_2.jpg"));
    expect(record.stages.rename).toEqual({ status: "success" });
    expect((await readdir(tmpDir)).sort()).toEqual([
      "2024-05-01_08-00-01.jpg",
      "2024-05-01_08-00-01_2.jpg",
    ]);
    expect(await readFile(join(tmpDir, "2024-05-01_08-00-01.jpg"), "utf8")).toBe("other");
    expect(await readFile(join(tmpDir, "2024-05-01_08-00-01_2.jpg"), "utf8")).toBe(
      "batch photo"
    );
  });
});
