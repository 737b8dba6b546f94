import path from "node:path";

import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole } from "./LoggerConsole";

export const defaultEmojiMap: Record<string, string> = {
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  start: "🏁",
  done: "✅",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_FILE_PATH: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_FILE_PATH } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_FILE_PATH) {
    logger.attachTransport(
      new RfsTransport({
        filename: path.basename(LOG_FILE_PATH),
        rfs: { path: path.dirname(LOG_FILE_PATH) },
      })
    );
  }
  return logger;
}
