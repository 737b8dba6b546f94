import { describe, expect, test } from "vitest";

import { dispose, disposeAll } from "~shared/utils/Disposeable";
import { err, isErr, isOk, ok } from "~shared/utils/Result";

describe("Result", () => {
  test("ok / err", () => {
    const a = ok(1);
    const b = err({ type: "NOPE" });
    expect(isOk(a)).toBe(true);
    expect(isErr(a)).toBe(false);
    expect(isErr(b)).toBe(true);
    if (isOk(a)) expect(a.value).toBe(1);
    if (isErr(b)) expect(b.error.type).toBe("NOPE");
    expect(ok()).toEqual({ ok: true, value: undefined });
  });
});

describe("Disposeable", () => {
  test("disposeAll 全部執行後才拋出彙總錯誤", async () => {
    const calls: string[] = [];
    const good = {
      async [Symbol.asyncDispose]() {
        calls.push("good");
      },
    };
    const bad = {
      async [Symbol.asyncDispose]() {
        calls.push("bad");
        throw new Error("關不掉");
      },
    };
    await expect(disposeAll([bad, good])).rejects.toThrow(AggregateError);
    expect(calls.sort()).toEqual(["bad", "good"]);
    await dispose(good);
    expect(calls).toHaveLength(3);
  });
});
