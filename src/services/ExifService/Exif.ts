/**
 * 依優先順序排列的日期標籤。
 * 前三個為 EXIF 標準（原始拍攝、數位化、一般 DateTime），其餘為 IPTC/XMP 與相機廠商欄位。
 * exiftool 會把 0x9004 DateTimeDigitized 命名為 CreateDate、
 * 0x0132 DateTime 命名為 ModifyDate。
 */
export const dateTagNames = [
  "DateTimeOriginal",
  "SubSecDateTimeOriginal",
  "CreateDate",
  "DateTimeDigitized",
  "ModifyDate",
  "DateTime",
  "DateTimeCreated",
  "DigitalCreationDateTime",
  "SonyDateTime",
  "OlympusDateTime",
] as const;

export type DateTagName = (typeof dateTagNames)[number];

export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** 有值的日期標籤，保留原始文字 */
  dateTags: Partial<Record<DateTagName, string>>;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };
