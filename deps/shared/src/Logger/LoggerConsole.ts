import kleur from "kleur";

import { disposeAll } from "../utils/Disposeable";

import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTransport,
  type Logger,
  type TemplateLog,
  levelEnabled,
} from "./Logger";

const RESERVED_KEYS = new Set(["emoji", "event", "error"]);

export class LoggerConsole implements Logger, AsyncDisposable {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: Record<string, string> = {},
    private readonly transports: LogTransport[] = []
  ) {
    this.trace = this.createMethod("trace");
    this.debug = this.createMethod("debug");
    this.info = this.createMethod("info");
    this.warn = this.createMethod("warn");
    this.error = this.createMethod("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  /** 關閉所有 transport，extend 出來的 logger 共用同一組 */
  async [Symbol.asyncDispose]() {
    const transports = this.transports.splice(0);
    await disposeAll(transports);
  }

  private createMethod(level: LogLevel): LogMethod {
    const write = (context: LogContext, message: string, colored: string) =>
      this.write(level, context, message, colored);

    function method(message: string): void;
    function method(context: LogContext, message: string): void;
    function method(context?: LogContext): TemplateLog;
    function method(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog | void {
      if (typeof contextOrMessage === "string") {
        write({}, contextOrMessage, contextOrMessage);
        return;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        write(context, message, message);
        return;
      }
      return (strings, ...values) => {
        let plain = strings[0] ?? "";
        let colored = plain;
        const templateValues: Record<string, unknown> = {};
        values.forEach((value, i) => {
          const text = String(value);
          const tail = strings[i + 1] ?? "";
          plain += text + tail;
          colored += kleur.green(text) + tail;
          templateValues[`__${i}`] = value;
        });
        write({ ...context, ...templateValues }, plain, colored);
      };
    }

    return method;
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    colored: string
  ) {
    if (!levelEnabled(this.level, level)) return;

    const event = callContext.event ?? this.context.event;
    const merged: LogContext = { ...this.context, ...callContext };
    const emoji = this.pickEmoji(level, callContext, event);
    const label = event ?? level;
    const prefix = this.path.length > 0 ? `${this.path.join(":")}:` : "";

    const extra: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(merged)) {
      if (!RESERVED_KEYS.has(key)) extra[key] = value;
    }
    const json =
      Object.keys(extra).length > 0 ? ` ${safeStringify(extra)}` : "";
    const head = emoji ? `${emoji} ` : "";
    const line = `${head}${prefix}${label}: ${colored}${json}`;

    const error = merged.error;
    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        if (error instanceof Error) console.error(line, `\n${error.stack}`);
        else if (error !== undefined)
          console.error(line, safeStringify({ error }));
        else console.error(line);
        break;
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path.join(":"),
      event,
      msg: message,
      context: extra,
      err:
        error instanceof Error
          ? { name: error.name, message: error.message, stack: error.stack }
          : undefined,
    };
    for (const transport of this.transports) transport.write(record);
  }

  private pickEmoji(
    level: LogLevel,
    callContext: LogContext,
    event: string | undefined
  ) {
    if (callContext.emoji) return callContext.emoji;
    const eventEmoji = event ? this.emojiMap[event] : undefined;
    if (eventEmoji) return eventEmoji;
    // warn/error 一律使用層級圖示，避免被繼承的 emoji 蓋掉
    if (level === "warn" || level === "error") {
      const levelEmoji = this.emojiMap[level];
      if (levelEmoji) return levelEmoji;
    }
    return this.context.emoji ?? this.emojiMap[level] ?? "";
  }
}

export function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value, (_key, v: unknown) => {
      if (typeof v === "bigint") return v.toString();
      if (v instanceof Error) return { name: v.name, message: v.message };
      return v;
    });
  } catch {
    return String(value);
  }
}
