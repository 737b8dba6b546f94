import {
  type LogLevel,
  LoggerConsole,
  defaultEmojiMap,
  isLogLevel,
} from "../Logger";

export function buildTestLogger(level?: LogLevel) {
  const envLevel = process.env.TEST_LOG_LEVEL;
  const resolved =
    level ?? (envLevel && isLogLevel(envLevel) ? envLevel : "error");
  return new LoggerConsole(resolved, ["test"], {}, defaultEmojiMap);
}
