import path from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import { WorkerPool } from "./WorkerPool";

interface EchoMessage {
  value: number;
  delay?: number;
  fail?: boolean;
  exit?: number;
}

const ECHO_WORKER = path.join(__dirname, "__fixtures__", "echo.cjs");

describe("WorkerPool", () => {
  let pool: WorkerPool<EchoMessage, number> | null = null;

  afterEach(async () => {
    await pool?.terminate();
    pool = null;
    vi.restoreAllMocks();
  });

  it("starts the requested number of workers", () => {
    pool = new WorkerPool<EchoMessage, number>(ECHO_WORKER, 3);
    expect(pool.size).toBe(3);
  });

  it("resolves each task with its own response whatever the completion order", async () => {
    pool = new WorkerPool<EchoMessage, number>(ECHO_WORKER, 2);
    const results = await Promise.all([
      pool.post({ value: 1, delay: 60 }),
      pool.post({ value: 2 }),
      pool.post({ value: 3, delay: 20 }),
      pool.post({ value: 4 }),
    ]);
    expect(results).toEqual([2, 4, 6, 8]);
  });

  it("queues tasks while every worker is busy", async () => {
    const single = new WorkerPool<EchoMessage, number>(ECHO_WORKER, 1);
    pool = single;
    const results = await Promise.all(
      [5, 6, 7, 8, 9].map((value) => single.post({ value, delay: 5 }))
    );
    expect(results).toEqual([10, 12, 14, 16, 18]);
  });

  it("rejects the task and later posts when a worker fails", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    pool = new WorkerPool<EchoMessage, number>(ECHO_WORKER, 1);

    await expect(pool.post({ value: 3, fail: true })).rejects.toThrow("failed on 3");
    await expect(pool.post({ value: 1 })).rejects.toThrow("failed on 3");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("rejects the task and later posts when a worker exits with an error code", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    pool = new WorkerPool<EchoMessage, number>(ECHO_WORKER, 1);

    await expect(pool.post({ value: 1, exit: 2 })).rejects.toThrow(
      "Worker 0 exited with code 2"
    );
    await expect(pool.post({ value: 1 })).rejects.toThrow("Worker 0 exited with code 2");
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it("does not treat its own termination as a worker failure", async () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    pool = new WorkerPool<EchoMessage, number>(ECHO_WORKER, 2);

    await expect(pool.post({ value: 4 })).resolves.toBe(8);
    await pool.terminate();
    // exit events from terminate() arrive asynchronously
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("rejects posts after terminate", async () => {
    pool = new WorkerPool<EchoMessage, number>(ECHO_WORKER, 1);
    await pool.terminate();
    await expect(pool.post({ value: 1 })).rejects.toThrow(
      "Cannot post to a terminated worker pool"
    );
  });
});
