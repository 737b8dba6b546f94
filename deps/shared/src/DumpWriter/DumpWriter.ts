export interface DumpWriter {
  /**
   * 將資料輸出為 JSON 檔，回傳寫入的路徑。
   */
  dump(name: string, data: unknown): Promise<string>;
}
