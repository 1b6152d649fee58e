import { Mutex, Semaphore } from "./concurrency";

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("Semaphore", () => {
  it("rejects a limit below one", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(Number.NaN)).toThrow("Semaphore limit must be at least 1, got NaN");
  });

  it("queues tasks beyond the limit and admits them in arrival order", async () => {
    const semaphore = new Semaphore(2);
    const order: string[] = [];
    const gates = new Map<string, () => void>();

    const task = (name: string) =>
      semaphore.run(async () => {
        order.push(`start ${name}`);
        await new Promise<void>((resolve) => gates.set(name, resolve));
        order.push(`end ${name}`);
        return name;
      });

    const a = task("a");
    const b = task("b");
    const c = task("c");
    await tick();

    expect(semaphore.running).toBe(2);
    expect(semaphore.pending).toBe(1);
    expect(order).toEqual(["start a", "start b"]);

    gates.get("b")?.();
    await tick();
    expect(order).toEqual(["start a", "start b", "end b", "start c"]);

    gates.get("a")?.();
    gates.get("c")?.();
    expect(await Promise.all([a, b, c])).toEqual(["a", "b", "c"]);
    expect(semaphore.running).toBe(0);
  });

  it("frees the slot when a task throws", async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.run(async () => {
        throw new Error("failed");
      })
    ).rejects.toThrow("failed");

    expect(semaphore.running).toBe(0);
    expect(await semaphore.run(async () => "next")).toBe("next");
  });

  it("never queues with an infinite limit", async () => {
    const semaphore = new Semaphore(Number.POSITIVE_INFINITY);
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const tasks = [1, 2, 3].map(() => semaphore.run(() => gate));
    await tick();

    expect(semaphore.running).toBe(3);
    expect(semaphore.pending).toBe(0);
    release();
    await Promise.all(tasks);
  });
});

describe("Mutex", () => {
  it("runs sections one at a time", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const section = (name: string) =>
      mutex.runExclusive(async () => {
        events.push(`enter ${name}`);
        await tick();
        events.push(`leave ${name}`);
      });

    await Promise.all([section("first"), section("second")]);

    expect(events).toEqual(["enter first", "leave first", "enter second", "leave second"]);
    expect(mutex.locked).toBe(false);
  });
});
