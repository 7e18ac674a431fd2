import kleur from "kleur";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";

import { LoggerConsole, MemoryTransport, RfsTransport } from "~shared/Logger";

function memoryLogger(level: "debug" | "warn" = "debug") {
  const transport = new MemoryTransport();
  const logger = new LoggerConsole(level, ["cli"], { run: 1 }, undefined, {
    transports: [transport],
    console: false,
  });
  return { logger, transport };
}

describe("LoggerConsole 主控台輸出", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("樣板值以綠色標示，context 附在行尾", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const logger = new LoggerConsole("info").extend("organize");

    logger.info({ emoji: "🧹", root: "/photos" })`已移除 ${2} 個空目錄`;

    expect(info).toHaveBeenCalledWith(
      `🧹 organize:info: 已移除 ${kleur.green("2")} 個空目錄 {"root":"/photos","__0":2}`
    );
  });

  test("子 logger 的 emoji 用於一般訊息，警告與事件各有自己的 emoji", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new LoggerConsole("info").extend("loader", { emoji: "📷" });

    logger.info("讀取中繼資料");
    logger.info({ event: "done" }, "讀取完成");
    logger.warn("有檔案無法讀取");

    expect(info.mock.calls).toEqual([
      ["📷 loader:info: 讀取中繼資料"],
      ["✅ loader:done: 讀取完成"],
    ]);
    expect(warn).toHaveBeenCalledWith("⚠️ loader:warn: 有檔案無法讀取");
  });

  test("帶有 error 時輸出堆疊", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const failure = new Error("exiftool 無回應");

    new LoggerConsole("info").error({ error: failure }, "geotag 中止");

    expect(error).toHaveBeenCalledWith(`❌ error: geotag 中止\n${failure.stack}`);
  });
});

describe("LoggerConsole 結構化紀錄", () => {
  test("extend 延伸路徑，append 只合併 context", () => {
    const { logger, transport } = memoryLogger();

    logger
      .extend("geotag", { stage: "geotag" })
      .append({ file: "IMG_0001.jpg" })
      .debug()`標記 ${1} 個檔案`;

    expect(transport.records).toEqual([
      {
        time: expect.any(String),
        level: "debug",
        path: ["cli", "geotag"],
        event: undefined,
        msg: "標記 1 個檔案",
        context: { run: 1, stage: "geotag", file: "IMG_0001.jpg", __0: 1 },
        err: undefined,
      },
    ]);
  });

  test("低於設定等級的紀錄不寫入", () => {
    const { logger, transport } = memoryLogger("warn");

    logger.debug("略過");
    logger.info("略過");
    logger.warn("保留");
    logger.error("保留");

    expect(transport.records.map((r) => r.level)).toEqual(["warn", "error"]);
  });

  test("error 等級沒有帶錯誤時以訊息建立錯誤", () => {
    const { logger, transport } = memoryLogger();

    logger.error()`失敗 ${3} 筆`;
    logger.error({ error: new Error("磁碟已滿") }, "搬移中止");

    const [generated, given] = transport.records;
    expect(generated?.err).toMatchObject({ name: "Error", message: "失敗 3 筆" });
    expect(given?.err?.message).toBe("磁碟已滿");
    expect(given?.context).toEqual({ run: 1 });
  });
});

describe("RfsTransport", () => {
  test("每筆紀錄寫成一行 JSON，close 後寫完", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "logger-"));
    const logger = new LoggerConsole("info", [], {}, undefined, {
      transports: [],
      console: false,
    });
    logger.attachTransport(new RfsTransport({ filename: "run.log", rfs: { path: dir } }));

    logger.info({ event: "start" }, "開始處理");
    logger.warn()`略過 ${1} 筆`;
    await logger.close();

    const text = await readFile(path.join(dir, "run.log"), "utf8");
    const lines: unknown[] = text
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(lines).toEqual([
      expect.objectContaining({ level: "info", event: "start", msg: "開始處理" }),
      expect.objectContaining({ level: "warn", msg: "略過 1 筆", context: { __0: 1 } }),
    ]);
    await rm(dir, { recursive: true, force: true });
  });
});
