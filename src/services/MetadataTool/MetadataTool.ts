import type { Result } from "~shared/utils/Result";

import type { MetadataError, PhotoTags, TagsUpdate } from "./PhotoTags";

export interface MetadataTool {
  /** 確認外部工具可用，不可用時整個階段應中止 */
  probe(): Promise<Result<string, MetadataError>>;

  /**
   * 讀取檔案的時間、時區與座標標籤。
   * 檔案不存在回傳 IO_ERROR，工具本身出錯回傳 TOOL_ERROR。
   */
  readTags(filePath: string): Promise<Result<PhotoTags, MetadataError>>;

  writeTags(
    filePath: string,
    update: TagsUpdate
  ): Promise<Result<void, MetadataError>>;

  end(): Promise<void>;
}
