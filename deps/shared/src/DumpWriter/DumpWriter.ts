export interface DumpWriter {
  /**
   * 將資料以 JSON 輸出為報告檔，回傳寫出的檔案路徑。
   */
  dump(name: string, data: unknown): Promise<string>;
}
