import type { Logger } from "~shared/Logger";

import { getAppConfig } from "@/config";
import { ContentFingerprinterMd5 } from "@/services/ContentFingerprinter";
import {
  CollisionResolver,
  DestinationPlannerDefault,
} from "@/services/DestinationPlanner";
import { ExifServiceExifTool } from "@/services/ExifService";
import { MediaDateResolverDefault } from "@/services/MediaDateResolver";
import { MediaOrganizeServiceDefault } from "@/services/MediaOrganizeService";
import { RelocationExecutorDefault } from "@/services/RelocationExecutor";
import { VideoProbeFfprobe } from "@/services/VideoProbe";
import type { DuplicatePolicy } from "@/types";

export type ServiceOverrides = {
  workers?: number;
  ioWorkers?: number;
  duplicatePolicy?: DuplicatePolicy;
};

/** 日期解析相關服務，exifService 用完需 dispose */
export function buildDateResolver(logger: Logger) {
  const config = getAppConfig();
  const exifService = new ExifServiceExifTool();
  const videoProbe = new VideoProbeFfprobe({
    command: config.MEDIA_SORTER_FFPROBE_PATH,
    timeoutMs: config.MEDIA_SORTER_PROBE_TIMEOUT_MS,
  });
  const dateResolver = new MediaDateResolverDefault({
    exifService,
    videoProbe,
    logger,
    cacheSize: config.MEDIA_SORTER_CACHE_SIZE,
  });
  return { exifService, dateResolver };
}

export function buildOrganizeService(
  logger: Logger,
  overrides: ServiceOverrides = {}
) {
  const config = getAppConfig();
  const duplicatePolicy =
    overrides.duplicatePolicy ?? config.MEDIA_SORTER_DUPLICATE_POLICY;
  const { exifService, dateResolver } = buildDateResolver(logger);
  const collisions = new CollisionResolver({
    fingerprinter: new ContentFingerprinterMd5(),
    duplicatePolicy,
    logger,
  });
  const organizer = new MediaOrganizeServiceDefault({
    planner: new DestinationPlannerDefault({
      dateResolver,
      collisions,
      logger,
    }),
    executor: new RelocationExecutorDefault({ collisions, logger }),
    logger,
    workers: overrides.workers,
    ioWorkers: overrides.ioWorkers,
  });
  return { exifService, organizer, duplicatePolicy };
}
