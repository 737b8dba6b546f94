import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  Exif,
  ExifService,
  ReadError,
} from "@/services/ExifService";

export class ExifServiceFake implements ExifService {
  private readonly records: Map<string, Result<Exif, ReadError>> = new Map();
  readonly calls: string[] = [];

  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    this.calls.push(filePath);
    const record = this.records.get(path.resolve(filePath));
    if (!record) {
      return err({
        type: "NO_EXIF_DATA",
        message: `無日期標籤: ${filePath}`,
      });
    }
    return record;
  }

  setDateTags(filePath: string, dateTags: Exif["dateTags"]) {
    this.records.set(path.resolve(filePath), ok({ filePath, dateTags }));
  }

  setReadError(filePath: string, error: ReadError) {
    this.records.set(path.resolve(filePath), err(error));
  }
}
