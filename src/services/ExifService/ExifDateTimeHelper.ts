import { ExifDate, ExifDateTime } from "exiftool-vendored";

function pad(n: number) {
  return String(n).padStart(2, "0");
}

/**
 * 將 exiftool 回傳的標籤值轉為文字。
 * 規則：
 * 1) 字串直接使用（去除前後空白）。
 * 2) ExifDateTime / ExifDate 優先使用 rawValue，
 *    沒有時以 EXIF 格式 `YYYY:MM:DD HH:mm:ss` 重組。
 * 3) 其他型別或空字串回傳 undefined。
 */
export function toTagText(value: unknown): string | undefined {
  if (typeof value === "string") {
    const text = value.trim();
    return text === "" ? undefined : text;
  }
  if (value instanceof ExifDateTime) {
    const raw = value.rawValue?.trim();
    if (raw) return raw;
    const date = `${value.year}:${pad(value.month)}:${pad(value.day)}`;
    const time = `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`;
    return `${date} ${time}`;
  }
  if (value instanceof ExifDate) {
    const raw = value.rawValue?.trim();
    if (raw) return raw;
    return `${value.year}:${pad(value.month)}:${pad(value.day)}`;
  }
  return undefined;
}
