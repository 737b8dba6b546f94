import { type ExifTool, exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage } from "@/utils/helper";

import { type Exif, type ReadError, dateTagNames } from "./Exif";
import { toTagText } from "./ExifDateTimeHelper";
import type { ExifService } from "./ExifService";

/** 只需要 ExifTool 的讀取與關閉 */
export type ExifToolReader = Pick<ExifTool, "end"> & {
  read(filePath: string): Promise<object>;
};

export class ExifServiceExifTool implements ExifService, AsyncDisposable {
  constructor(private readonly tool: ExifToolReader = exiftool) {}

  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    try {
      const tags = await this.tool.read(filePath);
      const record: Record<string, unknown> = Object.fromEntries(
        Object.entries(tags)
      );

      const dateTags: Exif["dateTags"] = {};
      for (const name of dateTagNames) {
        const text = toTagText(record[name]);
        if (text) dateTags[name] = text;
      }
      if (Object.keys(dateTags).length === 0) {
        return err({
          type: "NO_EXIF_DATA",
          message: `無日期標籤: ${filePath}`,
        });
      }

      return ok({ filePath, dateTags });
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}: ${errorMessage(e)}`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await this.tool.end();
  }
}
