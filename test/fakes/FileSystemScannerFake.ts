import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
  ScanResult,
} from "@/services/FileSystemScanner";
import { normalizeExts } from "@/services/FileSystemScanner";

/** 從共用的檔案 Map 與軌跡清單列出 root 底下的檔案 */
export class FileSystemScannerFake<T> implements FileSystemScanner {
  readonly tracks = new Set<string>();

  constructor(private readonly files: Map<string, T>) {}

  async scan(
    rootPath: string,
    options: ScanOptions
  ): Promise<Result<ScanResult, ScanError>> {
    const under = (p: string) => p === rootPath || p.startsWith(`${rootPath}/`);
    const media = [...this.files.keys()].filter(under);
    const tracks = [...this.tracks].filter(under);
    if (media.length === 0 && tracks.length === 0) {
      return err({ type: "SCAN_FAILED", message: `ENOENT: ${rootPath}` });
    }
    const mediaExts = normalizeExts(options.mediaExts);
    return ok({
      media: media.filter((p) => mediaExts.has(path.extname(p).toLowerCase())).sort(),
      tracks: tracks.sort(),
    });
  }
}
