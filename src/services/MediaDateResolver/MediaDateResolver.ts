import type { MediaKind, ResolvedDate } from "@/types";

export interface MediaDateResolver {
  /**
   * 取得媒體檔的歸檔日期。永遠回傳具體日期，不會 reject。
   */
  resolve(filePath: string, kind: MediaKind): Promise<ResolvedDate>;
}
