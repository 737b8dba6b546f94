export interface ContentFingerprinter {
  /** 檔案開頭固定長度的雜湊，只用於兩個檔案的相等比對 */
  fingerprint(filePath: string): Promise<string>;

  /** 先比大小，大小相同才計算雜湊 */
  sameContent(a: string, b: string): Promise<boolean>;
}
