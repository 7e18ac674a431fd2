import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
  ScanResult,
} from "./FileSystemScanner";

export function normalizeExts(exts: readonly string[]) {
  return new Set(
    exts
      .map((e) => e.trim().toLowerCase())
      .filter((e) => e !== "" && e !== ".")
      .map((e) => (e.startsWith(".") ? e : `.${e}`))
  );
}

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options: ScanOptions
  ): Promise<Result<ScanResult, ScanError>> {
    const mediaExts = normalizeExts(options.mediaExts);
    const trackExts = normalizeExts(options.trackExts ?? []);
    const result: ScanResult = { media: [], tracks: [] };
    const classify = (filePath: string) => {
      const name = path.basename(filePath);
      // macOS 的 ._ 資源檔與隱藏檔不處理
      if (name.startsWith(".")) return;
      const ext = path.extname(name).toLowerCase();
      if (mediaExts.has(ext)) result.media.push(filePath);
      else if (trackExts.has(ext)) result.tracks.push(filePath);
    };

    try {
      const info = await stat(rootPath);
      if (info.isFile()) {
        classify(rootPath);
      } else {
        await this.walk(rootPath, options.recursive ?? true, classify);
      }
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: `${rootPath}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
    result.media.sort();
    result.tracks.sort();
    return ok(result);
  }

  private async walk(
    dir: string,
    recursive: boolean,
    visit: (filePath: string) => void
  ): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isFile()) visit(fullPath);
      else if (recursive && entry.isDirectory()) {
        await this.walk(fullPath, recursive, visit);
      }
    }
  }
}
