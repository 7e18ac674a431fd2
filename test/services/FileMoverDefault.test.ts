import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileMoverDefault } from "@/services/FileMover";
import { exists } from "@/utils/helper";

describe("FileMoverDefault", () => {
  let tmpDir = "";
  const mover = new FileMoverDefault();

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "mover-"));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("搬移時建立目標目錄", async () => {
    const from = join(tmpDir, "IMG_0001.jpg");
    const to = join(tmpDir, "2024-05-01", "IMG_0001.jpg");
    await writeFile(from, "photo");

    expectOk(await mover.move(from, to));
    expect(await exists(from)).toBe(false);
    expect(await readFile(to, "utf8")).toBe("photo");
  });

  test("目標已存在時不覆蓋", async () => {
    const from = join(tmpDir, "a.jpg");
    const to = join(tmpDir, "b.jpg");
    await writeFile(from, "a");
    await writeFile(to, "b");

    const result = await mover.move(from, to);
    expectErr(result);
    expect(result.error.type).toBe("IO_ERROR");
    expect(await readFile(to, "utf8")).toBe("b");
    expect(await readFile(from, "utf8")).toBe("a");
  });

  test("來源不存在回傳錯誤", async () => {
    const result = await mover.move(join(tmpDir, "none.jpg"), join(tmpDir, "x.jpg"));
    expectErr(result);
    expect(result.error.type).toBe("IO_ERROR");
  });

  test("listExisting 略過不存在的目錄並排序", async () => {
    await mkdir(join(tmpDir, "d", "nested"), { recursive: true });
    await writeFile(join(tmpDir, "d", "b.jpg"), "");
    await writeFile(join(tmpDir, "d", "a.jpg"), "");

    const result = await mover.listExisting([
      join(tmpDir, "d"),
      join(tmpDir, "missing"),
      join(tmpDir, "d"),
    ]);
    expectOk(result);
    expect(result.value).toEqual([join(tmpDir, "d", "a.jpg"), join(tmpDir, "d", "b.jpg")]);
  });

  test("只差大小寫時不覆蓋另一個檔案", async () => {
    const from = join(tmpDir, "A.JPG");
    const to = join(tmpDir, "a.jpg");
    await writeFile(from, "batch");
    await writeFile(to, "other");

    const result = await mover.move(from, to);
    expectErr(result);
    expect(result.error.message).toBe(`目標已存在，不覆蓋: ${to}`);
    expect(await readFile(from, "utf8")).toBe("batch");
    expect(await readFile(to, "utf8")).toBe("other");
  });

  test("只差大小寫且目標不存在時可以改名", async () => {
    const from = join(tmpDir, "B.JPG");
    const to = join(tmpDir, "b.jpg");
    await writeFile(from, "batch");

    expectOk(await mover.move(from, to));
    expect(await readdir(tmpDir)).toEqual(["b.jpg"]);
  });

  test("removeEmptyDirs 只往上清除搬空的目錄，保留根目錄", async () => {
    await mkdir(join(tmpDir, "a", "b"), { recursive: true });
    await mkdir(join(tmpDir, "unrelated"), { recursive: true });
    await mkdir(join(tmpDir, "kept"), { recursive: true });
    await writeFile(join(tmpDir, "kept", "a.jpg"), "");

    const result = await mover.removeEmptyDirs(tmpDir, [
      join(tmpDir, "a", "b"),
      join(tmpDir, "kept"),
      tmpDir,
    ]);
    expectOk(result);
    expect(result.value).toEqual([join(tmpDir, "a", "b"), join(tmpDir, "a")]);
    expect(await exists(tmpDir)).toBe(true);
    expect(await exists(join(tmpDir, "unrelated"))).toBe(true);
    expect(await exists(join(tmpDir, "kept", "a.jpg"))).toBe(true);
  });

  test("removeEmptyDirs 不處理根目錄以外的目錄", async () => {
    await mkdir(join(tmpDir, "root"), { recursive: true });
    await mkdir(join(tmpDir, "elsewhere"), { recursive: true });

    const result = await mover.removeEmptyDirs(join(tmpDir, "root"), [
      join(tmpDir, "elsewhere"),
    ]);
    expectOk(result);
    expect(result.value).toEqual([]);
    expect(await exists(join(tmpDir, "elsewhere"))).toBe(true);
  });
});
