export async function dispose(target: AsyncDisposable) {
  await target[Symbol.asyncDispose]();
}

export async function disposeAll(targets: AsyncDisposable[]) {
  const results = await Promise.allSettled(targets.map((t) => dispose(t)));
  const rejected = results.filter(
    (r): r is PromiseRejectedResult => r.status === "rejected"
  );
  if (rejected.length > 0) {
    throw new AggregateError(
      rejected.map((r) => r.reason),
      "釋放資源時發生錯誤"
    );
  }
}
