import {
  mkdir,
  readFile,
  readdir,
  rm,
  utimes,
  writeFile,
} from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import type { Logger } from "~shared/Logger";
import { expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { ContentFingerprinterMd5 } from "@/services/ContentFingerprinter";
import {
  CollisionResolver,
  DestinationPlannerDefault,
} from "@/services/DestinationPlanner";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { MediaDateResolverDefault } from "@/services/MediaDateResolver";
import {
  MediaOrganizeServiceDefault,
  type OrganizePhase,
  type OrganizeProgress,
  defaultExecuteWorkers,
  defaultPlanWorkers,
} from "@/services/MediaOrganizeService";
import { RelocationExecutorDefault } from "@/services/RelocationExecutor";
import type { DuplicatePolicy } from "@/types";
import { exists } from "@/utils/helper";

import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { VideoProbeFake } from "~test/fakes/VideoProbeFake";

const tmpDir = path.resolve("test/tmp/organize");
const sourceRoot = path.join(tmpDir, "source");
const targetRoot = path.join(tmpDir, "target");
const march3 = new Date(2021, 2, 3, 12, 0, 0);

function setup(
  options: {
    duplicatePolicy?: DuplicatePolicy;
    workers?: number;
    ioWorkers?: number;
  } = {}
) {
  const logger: Logger = buildTestLogger();
  const exifService = new ExifServiceFake();
  const dateResolver = new MediaDateResolverDefault({
    exifService,
    videoProbe: new VideoProbeFake(),
    logger,
  });
  const collisions = new CollisionResolver({
    fingerprinter: new ContentFingerprinterMd5(),
    duplicatePolicy: options.duplicatePolicy ?? "keep",
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
    workers: options.workers,
    ioWorkers: options.ioWorkers,
  });
  const scanner = new FileSystemScannerDefault({ logger });
  const scan = async (root: string) => {
    const result = await scanner.scan(root);
    expectOk(result);
    return result.value.files;
  };
  return { exifService, organizer, scan };
}

async function put(relative: string, content: string, mtime = march3) {
  const filePath = path.join(sourceRoot, relative);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content);
  await utimes(filePath, mtime, mtime);
  return filePath;
}

/** 目錄下所有檔案的相對路徑 */
async function listTree(root: string, dir = root): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) files.push(...(await listTree(root, fullPath)));
    else if (entry.isFile()) files.push(path.relative(root, fullPath));
  }
  return files.sort();
}

describe("defaultPlanWorkers / defaultExecuteWorkers", () => {
  test("依檔案數決定工作數", () => {
    expect(defaultPlanWorkers(0)).toBe(4);
    expect(defaultPlanWorkers(350)).toBe(4);
    expect(defaultPlanWorkers(450)).toBe(5);
    expect(defaultPlanWorkers(100_000)).toBe(32);
    expect(defaultExecuteWorkers(4)).toBe(4);
    expect(defaultExecuteWorkers(32)).toBe(8);
  });

  test("明確指定的工作數必須為正整數", () => {
    const logger = buildTestLogger();
    const build = (workers: number) =>
      new MediaOrganizeServiceDefault({
        planner: {
          plan: async () => ({ status: "failed", sourcePath: "", error: "" }),
        },
        executor: {
          execute: async (plan) => ({
            status: "failed",
            sourcePath: plan.sourcePath,
            error: "",
          }),
        },
        logger,
        workers,
      });
    expect(() => build(0)).toThrow(RangeError);
    expect(() => build(2.5)).toThrow(RangeError);
  });
});

describe("MediaOrganizeServiceDefault", () => {
  beforeEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(sourceRoot, { recursive: true });
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  test("依 EXIF、影片檔名與修改時間歸檔", async () => {
    const { exifService, organizer, scan } = setup();
    const photo = await put("dcim/IMG_0001.jpg", "photo-a");
    exifService.setDateTags(photo, { DateTimeOriginal: "2023:05:14 10:20:00" });
    await put("videos/20220101_120000.mp4", "video-a");
    await put("misc/holiday.png", "photo-b");

    const result = await organizer.organize({
      files: await scan(sourceRoot),
      targetRoot,
    });

    expect(result.cancelled).toBe(false);
    expect(result.stats).toMatchObject({
      moved: 3,
      skipped: 0,
      failed: 0,
      processed: 3,
      totalBytes: 21,
    });
    expect(await listTree(targetRoot)).toEqual([
      path.join("2021-03-03", "holiday.png"),
      path.join("2022-01-01", "20220101_120000.mp4"),
      path.join("2023-05-14", "IMG_0001.jpg"),
    ]);
    expect(await exists(photo)).toBe(false);
  });

  test("相同內容的檔案只保留一份，keep 時來源留在原處", async () => {
    const { organizer, scan } = setup({ duplicatePolicy: "keep" });
    const a = await put("a/IMG_0002.jpg", "same-bytes");
    const b = await put("b/IMG_0002.jpg", "same-bytes");

    const result = await organizer.organize({
      files: await scan(sourceRoot),
      targetRoot,
    });

    expect(result.stats).toMatchObject({ moved: 1, skipped: 1, failed: 0 });
    expect(result.outcomes).toContainEqual(
      expect.objectContaining({ status: "skipped", reason: "duplicate" })
    );
    expect(await listTree(targetRoot)).toEqual([
      path.join("2021-03-03", "IMG_0002.jpg"),
    ]);
    // 其中一個被搬走，另一個保留
    expect([await exists(a), await exists(b)].sort()).toEqual([false, true]);
  });

  test("delete 時刪除重複的來源", async () => {
    const { organizer, scan } = setup({ duplicatePolicy: "delete" });
    const a = await put("a/IMG_0002.jpg", "same-bytes");
    const b = await put("b/IMG_0002.jpg", "same-bytes");

    const result = await organizer.organize({
      files: await scan(sourceRoot),
      targetRoot,
    });

    expect(result.stats).toMatchObject({ moved: 1, skipped: 1, failed: 0 });
    expect(await exists(a)).toBe(false);
    expect(await exists(b)).toBe(false);
    expect(await listTree(targetRoot)).toEqual([
      path.join("2021-03-03", "IMG_0002.jpg"),
    ]);
  });

  test("同名不同內容時另取檔名，資料不遺失", async () => {
    const { organizer, scan } = setup();
    await put("a/IMG_0003.jpg", "content-a");
    await put("b/IMG_0003.jpg", "content-b");
    await put("c/IMG_0003.jpg", "content-c");

    const result = await organizer.organize({
      files: await scan(sourceRoot),
      targetRoot,
    });

    expect(result.stats).toMatchObject({ moved: 3, skipped: 0, failed: 0 });
    expect(await listTree(targetRoot)).toEqual([
      path.join("2021-03-03", "IMG_0003.jpg"),
      path.join("2021-03-03", "IMG_0003_1.jpg"),
      path.join("2021-03-03", "IMG_0003_2.jpg"),
    ]);
    const contents = await Promise.all(
      ["IMG_0003.jpg", "IMG_0003_1.jpg", "IMG_0003_2.jpg"].map((name) =>
        readFile(path.join(targetRoot, "2021-03-03", name), "utf8")
      )
    );
    expect(contents.sort()).toEqual(["content-a", "content-b", "content-c"]);
  });

  test("來源即目標時重複執行不再搬移", async () => {
    await put("IMG_20230514_102000.jpg", "photo-a");
    await put("20220101_120000.mp4", "video-a");
    await put("nested/holiday.png", "photo-b");

    const first = setup();
    const firstResult = await first.organizer.organize({
      files: await first.scan(sourceRoot),
      targetRoot: sourceRoot,
    });
    expect(firstResult.stats).toMatchObject({
      moved: 3,
      skipped: 0,
      failed: 0,
    });
    const treeAfterFirst = await listTree(sourceRoot);
    expect(treeAfterFirst).toEqual([
      path.join("2021-03-03", "holiday.png"),
      path.join("2022-01-01", "20220101_120000.mp4"),
      path.join("2023-05-14", "IMG_20230514_102000.jpg"),
    ]);

    const second = setup();
    const secondResult = await second.organizer.organize({
      files: await second.scan(sourceRoot),
      targetRoot: sourceRoot,
    });
    expect(secondResult.stats).toMatchObject({
      moved: 0,
      skipped: 3,
      failed: 0,
    });
    expect(
      secondResult.outcomes.every(
        (o) => o.status === "skipped" && o.reason === "already-in-place"
      )
    ).toBe(true);
    expect(await listTree(sourceRoot)).toEqual(treeAfterFirst);
  });

  test.each([1, 3, 16])("工作數 %i 時每個檔案都有一個結果", async (workers) => {
    const { organizer, scan } = setup({ workers, ioWorkers: workers });
    for (let i = 0; i < 12; i++) {
      const name = `IMG_${String(i).padStart(4, "0")}.jpg`;
      await put(`batch/${name}`, `photo-${i % 4}`);
    }
    await put("other/IMG_0000.jpg", "photo-0");
    const files = await scan(sourceRoot);

    const result = await organizer.organize({ files, targetRoot });

    const { moved, skipped, failed, processed } = result.stats;
    expect(moved + skipped + failed).toBe(files.length);
    expect(processed).toBe(13);
    expect(result.outcomes).toHaveLength(13);
    expect(moved).toBe(12);
    expect(skipped).toBe(1);
  });

  test("開始前已取消時不處理任何檔案", async () => {
    const { organizer, scan } = setup();
    await put("IMG_0004.jpg", "photo-a");
    const controller = new AbortController();
    controller.abort();

    const result = await organizer.organize({
      files: await scan(sourceRoot),
      targetRoot,
      signal: controller.signal,
    });

    expect(result.cancelled).toBe(true);
    expect(result.outcomes).toEqual([]);
    expect(result.stats.processed).toBe(0);
    expect(await exists(targetRoot)).toBe(false);
  });

  test("取消後未開始的工作不啟動，也不進入搬移階段", async () => {
    const { organizer, scan } = setup({ workers: 1 });
    for (let i = 0; i < 5; i++) await put(`IMG_000${i}.jpg`, `photo-${i}`);
    const controller = new AbortController();
    const events: string[] = [];
    const progress: OrganizeProgress = {
      phaseStarted: (phase: OrganizePhase, total: number) => {
        events.push(`start:${phase}:${total}`);
      },
      advanced: (phase: OrganizePhase) => {
        events.push(`advance:${phase}`);
        controller.abort();
      },
      phaseFinished: (phase: OrganizePhase) => {
        events.push(`finish:${phase}`);
      },
    };

    const result = await organizer.organize({
      files: await scan(sourceRoot),
      targetRoot,
      signal: controller.signal,
      progress,
    });

    expect(events).toEqual(["start:plan:5", "advance:plan", "finish:plan"]);
    expect(result.cancelled).toBe(true);
    expect(result.plans).toHaveLength(1);
    expect(result.outcomes).toEqual([]);
    expect(result.stats.processed).toBe(0);
    expect(await readdir(sourceRoot)).toHaveLength(5);
  });

  test("回報兩個階段的進度", async () => {
    const { organizer, scan } = setup();
    await put("IMG_0005.jpg", "photo-a");
    await put("IMG_0006.jpg", "photo-b");
    const events: string[] = [];
    const progress: OrganizeProgress = {
      phaseStarted: (phase, total) => {
        events.push(`start:${phase}:${total}`);
      },
      advanced: (phase, fileName) => {
        events.push(`advance:${phase}:${fileName}`);
      },
      phaseFinished: (phase) => {
        events.push(`finish:${phase}`);
      },
    };

    await organizer.organize({
      files: await scan(sourceRoot),
      targetRoot,
      progress,
    });

    expect(events[0]).toBe("start:plan:2");
    expect(events).toContain("finish:plan");
    expect(events).toContain("start:execute:2");
    expect(events.at(-1)).toBe("finish:execute");
    const executed = events.filter((e) => e.startsWith("advance:execute:"));
    expect(executed).toHaveLength(2);
  });
});
