import { isValid, parse } from "date-fns";

import type { CalendarDate } from "@/types";

/** 影像日期標籤接受的格式，依序嘗試 */
export const imageDateFormats = [
  "yyyy:MM:dd HH:mm:ss", // EXIF
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss", // ISO
  "yyyy/MM/dd HH:mm:ss",
  "yyyy:MM:dd",
  "yyyy-MM-dd",
] as const;

/** 影片容器時間接受的格式，依序嘗試 */
export const videoDateFormats = [
  "yyyy-MM-dd'T'HH:mm:ss", // ISO (GoPro / iPhone)
  "yyyy-MM-dd HH:mm:ss",
  "yyyyMMdd", // Sony
  "yyyy/MM/dd HH:mm:ss",
  "dd-MMM-yyyy", // Nikon 01-JAN-2023
  "yyyy:MM:dd HH:mm:ss",
  "yyyyMMddHHmmss",
  "MMM dd yyyy HH:mm:ss",
] as const;

const CONTROL_CHARS_RE = /[\p{Cc}\p{Cf}]/gu;
// 時間之後的小數秒與時區：10:20:00.123+08:00、10:20:00Z
const TIME_SUFFIX_RE =
  /(\d{1,2}:\d{2}:\d{2})(?:[.,]\d+)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const referenceDate = new Date(2000, 0, 1);

export function normalizeDateText(text: string) {
  return text
    .replace(CONTROL_CHARS_RE, "")
    .trim()
    .replace(TIME_SUFFIX_RE, "$1");
}

/**
 * 依序以各格式解析，第一個成功者勝出，只保留日期。
 * 全部失敗回傳 undefined。
 */
export function parseDateText(
  text: string,
  formats: readonly string[]
): CalendarDate | undefined {
  const clean = normalizeDateText(text);
  if (clean === "") return undefined;
  for (const fmt of formats) {
    const parsed = parse(clean, fmt, referenceDate);
    if (isValid(parsed)) {
      return {
        year: parsed.getFullYear(),
        month: parsed.getMonth() + 1,
        day: parsed.getDate(),
      };
    }
  }
  return undefined;
}
