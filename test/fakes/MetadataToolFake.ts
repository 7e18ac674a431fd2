import { setTimeout } from "node:timers/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  MetadataError,
  MetadataTool,
  PhotoTags,
  TagsUpdate,
} from "@/services/MetadataTool";

export type FakePhoto = Omit<PhotoTags, "filePath">;

/** 以記憶體模擬檔案與標籤；files 可與 FileMoverFake 共用 */
export class MetadataToolFake implements MetadataTool {
  readonly files = new Map<string, FakePhoto>();
  readonly writes: Array<{ path: string; update: TagsUpdate }> = [];
  reachable = true;
  ended = false;
  /** 讀取時回報 IO_ERROR 的路徑 */
  readonly failingReads = new Set<string>();
  /** 寫入時回報 IO_ERROR 的路徑 */
  readonly failingWrites = new Set<string>();
  /** 每次讀寫等待的毫秒數，0 時不讓出執行權 */
  latencyMs = 0;
  inFlight = 0;
  peakInFlight = 0;

  addPhoto(filePath: string, tags: Partial<FakePhoto> = {}) {
    this.files.set(filePath, { daylightSavings: false, ...tags });
  }

  async probe(): Promise<Result<string, MetadataError>> {
    if (!this.reachable) return err(toolUnreachable());
    return ok("fake");
  }

  async readTags(filePath: string): Promise<Result<PhotoTags, MetadataError>> {
    if (!this.reachable) return err(toolUnreachable());
    await this.occupy();
    const photo = this.files.get(filePath);
    if (!photo || this.failingReads.has(filePath)) {
      return err({ type: "IO_ERROR", message: `Cannot read: ${filePath}` });
    }
    return ok({ filePath, ...photo });
  }

  async writeTags(
    filePath: string,
    update: TagsUpdate
  ): Promise<Result<void, MetadataError>> {
    if (!this.reachable) return err(toolUnreachable());
    await this.occupy();
    const photo = this.files.get(filePath);
    if (!photo || this.failingWrites.has(filePath)) {
      return err({ type: "IO_ERROR", message: `Cannot write: ${filePath}` });
    }
    this.writes.push({ path: filePath, update });
    if (update.captureTime !== undefined) photo.captureTime = update.captureTime;
    if (update.zone === null) {
      photo.offsetTime = undefined;
      photo.timeZone = undefined;
    } else if (update.zone) {
      photo.offsetTime = update.zone.offset;
      photo.timeZone = update.zone.standardOffset;
      photo.daylightSavings = update.zone.dst;
    }
    return ok();
  }

  async end() {
    this.ended = true;
  }

  /** 模擬外部工具的處理時間並記錄同時進行的呼叫數 */
  private async occupy() {
    if (this.latencyMs === 0) return;
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      await setTimeout(this.latencyMs);
    } finally {
      this.inFlight--;
    }
  }
}

function toolUnreachable(): MetadataError {
  return { type: "TOOL_ERROR", message: "exiftool unreachable" };
}
