import type { CalendarDate } from "@/types";

export type FileNameDatePattern = {
  name: string;
  regex: RegExp;
};

const dashed: FileNameDatePattern = {
  name: "YYYY-MM-DD",
  regex: /(?<!\d)(\d{4})-(\d{2})-(\d{2})(?!\d)/g,
};
const underscored: FileNameDatePattern = {
  name: "YYYY_MM_DD",
  regex: /(?<!\d)(\d{4})_(\d{2})_(\d{2})(?!\d)/g,
};
const compact: FileNameDatePattern = {
  name: "YYYYMMDD",
  regex: /(?<!\d)(\d{4})(\d{2})(\d{2})(?!\d)/g,
};
const compactWithTime: FileNameDatePattern = {
  name: "YYYYMMDD[_-]HHMMSS",
  regex: /(?<!\d)(\d{4})(\d{2})(\d{2})[_-]?\d{6}(?!\d)/g,
};

/** 一般檔名：日期後可接時間 */
export const fileNameDatePatterns = [
  dashed,
  underscored,
  compact,
  compactWithTime,
] as const;

/** 影片檔名（不含副檔名） */
export const videoNameDatePatterns = [dashed, underscored, compact] as const;

export const yearRange = { min: 1900, max: 2100 } as const;

/**
 * 只檢查年月日範圍，不檢查該月實際天數。
 */
export function isSaneDate({ year, month, day }: CalendarDate) {
  return (
    year >= yearRange.min &&
    year <= yearRange.max &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= 31
  );
}

export function parseDateFromFileName(
  name: string,
  patterns: readonly FileNameDatePattern[] = fileNameDatePatterns
): CalendarDate | undefined {
  for (const pattern of patterns) {
    for (const match of name.matchAll(pattern.regex)) {
      const date = {
        year: Number(match[1]),
        month: Number(match[2]),
        day: Number(match[3]),
      };
      if (isSaneDate(date)) return date;
    }
  }
  return undefined;
}
