import { stat } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { sentinelDate } from "@/constants";
import type {
  CalendarDate,
  DateSource,
  MediaKind,
  ResolvedDate,
} from "@/types";
import { LruCache } from "@/utils/LruCache";
import { errorMessage } from "@/utils/helper";

import { type ExifService, dateTagNames } from "../ExifService";
import type { VideoProbe } from "../VideoProbe";
import {
  imageDateFormats,
  parseDateText,
  videoDateFormats,
} from "./DateTextParser";
import {
  fileNameDatePatterns,
  parseDateFromFileName,
  videoNameDatePatterns,
} from "./FileNameDate";
import type { MediaDateResolver } from "./MediaDateResolver";

export const defaultDateCacheSize = 4096;

function withSource(date: CalendarDate, source: DateSource): ResolvedDate {
  return { ...date, source };
}

/**
 * 依序嘗試：
 *   影像 → 內嵌日期標籤
 *   影片 → ffprobe 容器時間 → 檔名（不含副檔名）
 *   檔名日期 → 檔案修改時間 → 1970-01-01
 *
 * 快取存放的是 Promise，同一路徑併發查詢只會實際解析一次。
 */
export class MediaDateResolverDefault implements MediaDateResolver {
  private readonly exifService: ExifService;
  private readonly videoProbe: VideoProbe;
  private readonly logger: Logger;
  private readonly cache: LruCache<string, Promise<ResolvedDate>>;

  constructor(deps: {
    exifService: ExifService;
    videoProbe: VideoProbe;
    logger: Logger;
    cacheSize?: number;
  }) {
    this.exifService = deps.exifService;
    this.videoProbe = deps.videoProbe;
    this.logger = deps.logger.extend("MediaDateResolver");
    this.cache = new LruCache(deps.cacheSize ?? defaultDateCacheSize);
  }

  resolve(filePath: string, kind: MediaKind): Promise<ResolvedDate> {
    const key = path.resolve(filePath);
    const cached = this.cache.get(key);
    if (cached) return cached;
    const pending = this.resolveUncached(filePath, kind);
    this.cache.set(key, pending);
    return pending;
  }

  private async resolveUncached(
    filePath: string,
    kind: MediaKind
  ): Promise<ResolvedDate> {
    const fileName = path.basename(filePath);
    try {
      const metadataDate =
        kind === "image"
          ? await this.fromImageTags(filePath)
          : await this.fromVideo(filePath);
      if (metadataDate) return metadataDate;

      const nameDate = parseDateFromFileName(fileName, fileNameDatePatterns);
      if (nameDate) return withSource(nameDate, "filename");
    } catch (error) {
      this.logger.debug({
        fileName,
        error: errorMessage(error),
      })`解析日期時發生錯誤，改用修改時間`;
    }
    return this.fromModifiedTime(filePath);
  }

  private async fromImageTags(filePath: string) {
    const exif = await this.exifService.readExif(filePath);
    if (isErr(exif)) {
      this.logger.debug({ reason: exif.error.type }, exif.error.message);
      return undefined;
    }
    for (const name of dateTagNames) {
      const text = exif.value.dateTags[name];
      if (!text) continue;
      const date = parseDateText(text, imageDateFormats);
      if (date) return withSource(date, "exif");
      this.logger.debug({ tag: name, text })`無法解析日期標籤`;
    }
    return undefined;
  }

  private async fromVideo(filePath: string) {
    const probe = await this.videoProbe.probeCreationTimes(filePath);
    if (isErr(probe)) {
      this.logger.debug({ reason: probe.error.type }, probe.error.message);
    } else {
      for (const line of probe.value) {
        const date = parseDateText(line, videoDateFormats);
        if (date) return withSource(date, "container");
      }
    }

    const nameDate = parseDateFromFileName(
      path.parse(filePath).name,
      videoNameDatePatterns
    );
    return nameDate ? withSource(nameDate, "video-filename") : undefined;
  }

  private async fromModifiedTime(filePath: string): Promise<ResolvedDate> {
    try {
      const { mtime } = await stat(filePath);
      return {
        year: mtime.getFullYear(),
        month: mtime.getMonth() + 1,
        day: mtime.getDate(),
        source: "mtime",
      };
    } catch (error) {
      this.logger.warn({
        filePath,
        error: errorMessage(error),
      })`無法讀取修改時間，歸入 1970-01-01`;
      return withSource(sentinelDate, "sentinel");
    }
  }
}
