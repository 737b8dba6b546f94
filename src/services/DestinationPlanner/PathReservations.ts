import path from "node:path";

type Reservation = { promise: Promise<void> };

/**
 * 行程內的目標路徑鎖。同一路徑同時只會有一個持有者，
 * 其他人 acquire 時會等到前一位 release 才取得。
 */
export class PathReservations {
  private readonly pending = new Map<string, Reservation>();

  async acquire(p: string): Promise<() => void> {
    const key = path.resolve(p);
    for (;;) {
      const current = this.pending.get(key);
      if (!current) break;
      await current.promise;
    }

    let resolveFn: () => void = () => {};
    const promise = new Promise<void>((resolve) => {
      resolveFn = resolve;
    });
    const reservation: Reservation = { promise };
    this.pending.set(key, reservation);

    return () => {
      if (this.pending.get(key) === reservation) this.pending.delete(key);
      resolveFn();
    };
  }
}
