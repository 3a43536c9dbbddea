import { KeyedMutex } from "../src/common/keyed-mutex";

describe("KeyedMutex", () => {
  it("runs sections for the same key one after another", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.runExclusive("job", async () => {
      events.push("first:start");
      await firstGate;
      events.push("first:end");
    });
    const second = mutex.runExclusive("job", async () => {
      events.push("second:start");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(["first:start"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    let releaseA: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseA = resolve;
    });

    const a = mutex.runExclusive("a", () => gate);
    const b = await mutex.runExclusive("b", async () => "b done");

    expect(b).toBe("b done");
    releaseA();
    await a;
  });

  it("releases the key when a section throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("job", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(mutex.runExclusive("job", async () => 42)).resolves.toBe(42);
  });
});
