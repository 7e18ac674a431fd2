import type { Result } from "~shared/utils/Result";

export type FileMoveError = { type: "IO_ERROR"; message: string };

export interface FileMover {
  /** 搬移檔案並建立目標目錄；目標已存在時失敗，不會覆蓋 */
  move(from: string, to: string): Promise<Result<void, FileMoveError>>;

  /** 列出目錄中既有的檔案，不存在的目錄視為空 */
  listExisting(dirs: Iterable<string>): Promise<Result<string[], FileMoveError>>;

  /**
   * 從 dirs 逐層往上刪除已清空的目錄，不超出 root，root 本身保留。
   * 回傳刪除的目錄
   */
  removeEmptyDirs(
    root: string,
    dirs: Iterable<string>
  ): Promise<Result<string[], FileMoveError>>;
}
