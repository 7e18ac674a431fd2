import { LoggerConsole, MemoryTransport } from "~shared/Logger";

/**
 * 測試用 logger：預設不輸出到 console，所有紀錄存在 transport.records。
 * 設定 TEST_LOGGER_OUTPUT=true 可在除錯時看到輸出。
 */
export function buildTestLogger() {
  const transport = new MemoryTransport();
  const logger = new LoggerConsole("trace", [], {}, undefined, {
    transports: [transport],
    console: process.env.TEST_LOGGER_OUTPUT === "true",
  });
  return Object.assign(logger, { transport });
}
