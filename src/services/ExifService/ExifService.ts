import type { Result } from "~shared/utils/Result";

import type { Exif, ReadError } from "./Exif";

export interface ExifService {
  /**
   * 嘗試讀取影像內嵌的日期標籤。
   * 沒有任何日期標籤時回傳 NO_EXIF_DATA。
   */
  readExif(filePath: string): Promise<Result<Exif, ReadError>>;
}
