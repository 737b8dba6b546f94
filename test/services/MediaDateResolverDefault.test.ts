import { mkdir, rm, utimes, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { MediaDateResolverDefault } from "@/services/MediaDateResolver";

import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { VideoProbeFake } from "~test/fakes/VideoProbeFake";

const tmpDir = path.resolve("test/tmp/date-resolver");

function setup(cacheSize?: number) {
  const exifService = new ExifServiceFake();
  const videoProbe = new VideoProbeFake();
  const resolver = new MediaDateResolverDefault({
    exifService,
    videoProbe,
    logger: buildTestLogger(),
    cacheSize,
  });
  return { exifService, videoProbe, resolver };
}

async function touch(name: string, mtime = new Date(2021, 2, 3, 12, 0, 0)) {
  const filePath = path.join(tmpDir, name);
  await writeFile(filePath, name);
  await utimes(filePath, mtime, mtime);
  return filePath;
}

describe("MediaDateResolverDefault", () => {
  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
  });

  afterAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("影像優先使用 DateTimeOriginal", async () => {
    const { exifService, resolver } = setup();
    const filePath = await touch("IMG_0001.jpg");
    exifService.setDateTags(filePath, {
      DateTimeOriginal: "2023:05:14 10:20:00",
      CreateDate: "2020:01:01 00:00:00",
    });
    expect(await resolver.resolve(filePath, "image")).toEqual({
      year: 2023,
      month: 5,
      day: 14,
      source: "exif",
    });
  });

  test("影像同時有標籤與檔名日期時以標籤為準", async () => {
    const { exifService, resolver } = setup();
    const filePath = await touch("IMG_20200202_101010.jpg");
    exifService.setDateTags(filePath, {
      DateTimeOriginal: "2023:05:14 10:20:00",
    });
    expect(await resolver.resolve(filePath, "image")).toEqual({
      year: 2023,
      month: 5,
      day: 14,
      source: "exif",
    });
  });

  test("標籤無法解析時改用下一個標籤", async () => {
    const { exifService, resolver } = setup();
    const filePath = await touch("IMG_0002.jpg");
    exifService.setDateTags(filePath, {
      DateTimeOriginal: "0000:00:00 00:00:00",
      CreateDate: "2019:08:09 07:00:00",
    });
    expect(await resolver.resolve(filePath, "image")).toEqual({
      year: 2019,
      month: 8,
      day: 9,
      source: "exif",
    });
  });

  test("沒有日期標籤時使用檔名", async () => {
    const { exifService, resolver } = setup();
    const filePath = await touch("IMG_20200202_101010.jpg");
    exifService.setReadError(filePath, {
      type: "READ_FAILED",
      message: "損壞",
    });
    expect(await resolver.resolve(filePath, "image")).toEqual({
      year: 2020,
      month: 2,
      day: 2,
      source: "filename",
    });
  });

  test("都沒有時使用修改時間", async () => {
    const { resolver } = setup();
    const filePath = await touch("IMG_0003.jpg");
    expect(await resolver.resolve(filePath, "image")).toEqual({
      year: 2021,
      month: 3,
      day: 3,
      source: "mtime",
    });
  });

  test("影片使用容器建立時間，略過無法解析的行", async () => {
    const { exifService, videoProbe, resolver } = setup();
    const filePath = await touch("clip.mov");
    videoProbe.setCreationTimes(filePath, [
      "garbage",
      "2022-06-07T08:09:10.000000Z",
    ]);
    expect(await resolver.resolve(filePath, "video")).toEqual({
      year: 2022,
      month: 6,
      day: 7,
      source: "container",
    });
    expect(exifService.calls).toEqual([]);
  });

  test("探測失敗時影片改用檔名", async () => {
    const { videoProbe, resolver } = setup();
    const filePath = await touch("20220101_120000.mp4");
    videoProbe.setError(filePath, {
      type: "PROBE_TIMEOUT",
      message: "逾時",
    });
    expect(await resolver.resolve(filePath, "video")).toEqual({
      year: 2022,
      month: 1,
      day: 1,
      source: "video-filename",
    });
  });

  test("檔案不存在時回傳 1970-01-01", async () => {
    const { resolver } = setup();
    expect(
      await resolver.resolve(path.join(tmpDir, "missing.jpg"), "image")
    ).toEqual({ year: 1970, month: 1, day: 1, source: "sentinel" });
  });

  test("同一路徑只解析一次，併發查詢共用結果", async () => {
    const { exifService, resolver } = setup();
    const filePath = await touch("IMG_0004.jpg");
    exifService.setDateTags(filePath, {
      DateTimeOriginal: "2018:01:02 03:04:05",
    });
    const relative = path.relative(process.cwd(), filePath);
    const [a, b] = await Promise.all([
      resolver.resolve(filePath, "image"),
      resolver.resolve(relative, "image"),
    ]);
    const c = await resolver.resolve(filePath, "image");
    expect(a).toEqual({ year: 2018, month: 1, day: 2, source: "exif" });
    expect(b).toEqual(a);
    expect(c).toEqual(a);
    expect(exifService.calls).toHaveLength(1);
  });

  test("快取超過容量時重新解析", async () => {
    const { exifService, resolver } = setup(1);
    const first = await touch("IMG_0005.jpg");
    const second = await touch("IMG_0006.jpg");
    await resolver.resolve(first, "image");
    await resolver.resolve(second, "image");
    await resolver.resolve(first, "image");
    expect(exifService.calls).toEqual([first, second, first]);
  });
});
