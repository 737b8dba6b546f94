import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envInteger } from "~shared/ConfigFactory";

import { defaultDateCacheSize } from "@/services/MediaDateResolver";

export const appConfigSchema = t.Object({
  /** ffprobe 執行檔，可為絕對路徑 */
  MEDIA_SORTER_FFPROBE_PATH: t.String({ default: "ffprobe", minLength: 1 }),
  MEDIA_SORTER_PROBE_TIMEOUT_MS: envInteger({ minimum: 1, default: 5000 }),
  MEDIA_SORTER_DUPLICATE_POLICY: t.Union(
    [t.Literal("keep"), t.Literal("delete")],
    { default: "keep" }
  ),
  MEDIA_SORTER_CACHE_SIZE: envInteger({
    minimum: 1,
    default: defaultDateCacheSize,
  }),
});

export const getAppConfig = buildConfigFactoryEnv(appConfigSchema);
