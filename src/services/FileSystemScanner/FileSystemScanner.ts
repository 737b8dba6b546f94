import type { Result } from "~shared/utils/Result";

import type { MediaFile } from "@/types";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanResult = {
  files: MediaFile[];
  /** 因隱藏或系統資料夾而略過的目錄 */
  skippedDirectories: string[];
  /** 無法讀取或 stat 的路徑，記錄後略過 */
  unreadable: string[];
  /** 副檔名不在清單內的檔案數 */
  unclassified: number;
};

export interface FileSystemScanner {
  /**
   * 遞迴列出 rootPath 下所有可辨識的媒體檔。
   * 只有 rootPath 本身無法讀取時回傳 err。
   */
  scan(rootPath: string): Promise<Result<ScanResult, ScanError>>;
}
