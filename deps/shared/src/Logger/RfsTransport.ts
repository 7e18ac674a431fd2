import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import { toJson } from "./serialize";
import type { LogRecord, LogTransport } from "./types";

/** 以 rotating-file-stream 寫出 JSON Lines 日誌 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, options.rfs ?? {});
  }

  write(record: LogRecord) {
    this.stream.write(`${toJson(record)}\n`);
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.stream.end(() => resolve());
    });
  }
}
