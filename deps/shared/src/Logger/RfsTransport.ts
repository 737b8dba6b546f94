import {
  type Options,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import { safeStringify } from "./LoggerConsole";
import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 rotating-file-stream 寫入 JSON Lines 日誌檔。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: { filename: string; rfs?: Options }) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 10,
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    const { context, ...rest } = record;
    this.stream.write(`${safeStringify({ ...context, ...rest })}\n`);
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
