import { describe, expect, it } from "vitest";
import { ConcurrencyLimiter, PathQueue } from "./queue.js";

function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("ConcurrencyLimiter", () => {
  it("never runs more tasks than its limit", async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let peak = 0;

    const task = async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    };

    await Promise.all([1, 2, 3, 4, 5].map(() => limiter.run(task)));

    expect(peak).toBe(2);
    expect(limiter.activeCount).toBe(0);
  });

  it("rejects a limit below one", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });
});

describe("PathQueue", () => {
  it("runs one job per path and folds work that arrives meanwhile", async () => {
    const gate = deferred();
    const seen: string[] = [];
    const queue = new PathQueue<string, string>(
      async (_path, job) => {
        seen.push(job);
        if (seen.length === 1) {
          await gate.promise;
        }
        return `done:${job}`;
      },
      (pending, incoming) => `${pending}+${incoming}`,
      new ConcurrencyLimiter(4),
    );

    const first = queue.enqueue("/a.md", "1");
    const second = queue.enqueue("/a.md", "2");
    const third = queue.enqueue("/a.md", "3");
    expect(queue.isBusy("/a.md")).toBe(true);

    gate.resolve();

    expect(await first).toBe("done:1");
    expect(await second).toBe("done:2+3");
    expect(await third).toBe("done:2+3");
    expect(seen).toEqual(["1", "2+3"]);
  });

  it("runs different paths side by side and reports idle once all finish", async () => {
    const gates = new Map([
      ["/a.md", deferred()],
      ["/b.md", deferred()],
    ]);
    const started: string[] = [];
    const queue = new PathQueue<number>(
      async (path) => {
        started.push(path);
        await gates.get(path)?.promise;
      },
      (pending) => pending,
      new ConcurrencyLimiter(2),
    );

    const jobs = [queue.enqueue("/a.md", 1), queue.enqueue("/b.md", 1)];
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(started).toEqual(["/a.md", "/b.md"]);
    expect(queue.size).toBe(2);

    let idle = false;
    const onIdle = queue.onIdle().then(() => {
      idle = true;
    });
    gates.get("/a.md")?.resolve();
    await jobs[0];
    expect(idle).toBe(false);

    gates.get("/b.md")?.resolve();
    await Promise.all([...jobs, onIdle]);
    expect(idle).toBe(true);
    expect(queue.size).toBe(0);
  });

  it("rejects every waiter of a failed job and keeps serving the path", async () => {
    let calls = 0;
    const queue = new PathQueue<string>(
      async () => {
        calls++;
        if (calls === 1) {
          throw new Error("worker failed");
        }
      },
      (pending) => pending,
      new ConcurrencyLimiter(1),
    );

    await expect(queue.enqueue("/a.md", "x")).rejects.toThrow("worker failed");
    await expect(queue.enqueue("/a.md", "y")).resolves.toBeUndefined();
  });
});
