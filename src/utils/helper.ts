import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { photoExtensions, videoExtensions } from "@/constants";
import type { CalendarDate, MediaKind } from "@/types";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/** 解析正整數參數，未指定回傳 undefined，不合法時丟出 RangeError */
export function toPositiveInt(v: number | string | undefined, name: string) {
  if (v === undefined) return undefined;
  const n = typeof v === "number" ? v : /^\d+$/.test(v) ? Number(v) : NaN;
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`${name} 必須為正整數: ${v}`);
  }
  return n;
}

function includesExt(list: readonly string[], ext: string) {
  return list.includes(ext);
}

/** 依副檔名分類，不在清單內回傳 undefined */
export function classifyExtension(ext: string): MediaKind | undefined {
  const lower = ext.toLowerCase();
  if (includesExt(photoExtensions, lower)) return "image";
  if (includesExt(videoExtensions, lower)) return "video";
  return undefined;
}

export function formatDateFolder(date: CalendarDate) {
  const mm = String(date.month).padStart(2, "0");
  const dd = String(date.day).padStart(2, "0");
  return `${date.year}-${mm}-${dd}`;
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return undefined;
}
