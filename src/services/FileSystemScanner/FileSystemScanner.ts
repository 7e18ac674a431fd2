import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 媒體副檔名，不分大小寫，可省略開頭的點 */
  mediaExts: readonly string[];
  /** 軌跡檔副檔名 */
  trackExts?: readonly string[];
  recursive?: boolean;
};

export type ScanResult = {
  /** 依路徑排序 */
  media: string[];
  tracks: string[];
};

export interface FileSystemScanner {
  /** rootPath 可以是目錄或單一檔案 */
  scan(
    rootPath: string,
    options: ScanOptions
  ): Promise<Result<ScanResult, ScanError>>;
}
