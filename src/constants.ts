export const rawExtensions = [
  ".nef",
  ".arw",
  ".cr2",
  ".cr3",
  ".dng",
  ".orf",
  ".rw2",
  ".raf",
] as const;

export const jpgExtensions = [".jpg", ".jpeg"] as const;

export const photoExtensions = [
  ...jpgExtensions,
  ".png",
  ".heic",
  ".heif",
  ".tif",
  ".tiff",
  ...rawExtensions,
] as const;

export const videoExtensions = [
  ".mp4",
  ".mov",
  ".avi",
  ".mkv",
  ".flv",
  ".wmv",
  ".3gp",
  ".m4v",
  ".mts",
  ".mpg",
  ".mpeg",
] as const;

/** 掃描時略過的系統資料夾；另外所有 `.` 開頭的資料夾都會略過 */
export const skippedDirectoryNames = [
  "@eaDir",
  "__MACOSX",
  "$RECYCLE.BIN",
  "System Volume Information",
] as const;

/** 無法取得任何日期時的歸檔日期 */
export const sentinelDate = { year: 1970, month: 1, day: 1 } as const;

/** 比對內容時只讀取檔案開頭的位元組數 */
export const fingerprintPrefixBytes = 1024 * 1024;
