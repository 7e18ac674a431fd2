import type { LogRecord, LogTransport } from "./types";

export class MemoryTransport implements LogTransport {
  readonly records: LogRecord[] = [];

  write(record: LogRecord) {
    this.records.push(record);
  }

  async close() {}
}
