import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";
import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  constructor(
    private readonly logger: Logger,
    private readonly outputDir = "dist/reports"
  ) {}

  async dump(name: string, data: unknown) {
    await mkdir(this.outputDir, { recursive: true });
    const fileName = `${name}-${format(new Date(), "yyyyMMdd-HHmmss")}.json`;
    const filePath = path.join(this.outputDir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", filePath })`已輸出報告 ${filePath}`;
    return filePath;
  }
}
