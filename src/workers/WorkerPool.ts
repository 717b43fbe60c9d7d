/**
 * Fixed-size pool of Node worker threads
 *
 * Each worker runs one task at a time; tasks posted while every worker is
 * busy wait in a FIFO queue. Responses resolve the promise of the task the
 * worker was given, so callers never depend on completion order.
 */

import { createRequire } from "node:module";
import path from "node:path";
import { Worker } from "node:worker_threads";

interface Task<I, O> {
  message: I;
  resolve: (result: O) => void;
  reject: (error: Error) => void;
}

/**
 * Start a worker for an entry module.
 *
 * TypeScript entries (running from sources, e.g. under the test runner) are
 * loaded through tsx's CommonJS hook.
 */
function spawnWorker(entry: string): Worker {
  if (path.extname(entry) === ".ts") {
    const loader = createRequire(__filename).resolve("tsx/cjs");
    const source = `require(${JSON.stringify(loader)});\nrequire(${JSON.stringify(entry)});`;
    return new Worker(source, { eval: true });
  }
  return new Worker(entry);
}

export class WorkerPool<I, O> {
  private readonly workers: Worker[] = [];
  private readonly active = new Map<number, Task<I, O>>();
  private readonly pending: Task<I, O>[] = [];
  private failure: Error | null = null;
  private terminated = false;

  constructor(entry: string, count: number) {
    for (let i = 0; i < count; i++) {
      const worker = spawnWorker(entry);
      worker.on("message", (result: O) => this.onResponse(i, result));
      worker.on("error", (error: Error) => this.onFailure(i, error));
      worker.on("exit", (code: number) => {
        if (!this.terminated && code !== 0) {
          this.onFailure(i, new Error(`Worker ${i} exited with code ${code}`));
        }
      });
      this.workers.push(worker);
    }
  }

  /** Number of worker threads */
  get size(): number {
    return this.workers.length;
  }

  /** Run a task on the first idle worker, or queue it */
  post(message: I): Promise<O> {
    if (this.terminated) {
      return Promise.reject(new Error("Cannot post to a terminated worker pool"));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<O>((resolve, reject) => {
      const task: Task<I, O> = { message, resolve, reject };
      for (let i = 0; i < this.workers.length; i++) {
        if (!this.active.has(i)) {
          this.dispatch(i, task);
          return;
        }
      }
      this.pending.push(task);
    });
  }

  /** Stop every worker; queued tasks are rejected */
  async terminate(): Promise<void> {
    if (this.terminated) return;
    this.terminated = true;

    const error = new Error("Worker pool terminated");
    for (const task of this.pending.splice(0)) {
      task.reject(error);
    }
    for (const task of this.active.values()) {
      task.reject(error);
    }
    this.active.clear();

    await Promise.all(this.workers.map((worker) => worker.terminate()));
  }

  private dispatch(index: number, task: Task<I, O>): void {
    const worker = this.workers[index];
    if (!worker) {
      task.reject(new Error(`No worker at index ${index}`));
      return;
    }
    this.active.set(index, task);
    worker.postMessage(task.message);
  }

  private onResponse(index: number, result: O): void {
    const task = this.active.get(index);
    this.active.delete(index);

    const next = this.pending.shift();
    if (next) {
      this.dispatch(index, next);
    }

    task?.resolve(result);
  }

  // A failed worker leaves the pool unable to finish its queue, so every
  // outstanding task fails with the same error.
  private onFailure(index: number, error: Error): void {
    if (this.failure) return;
    console.error(`[WorkerPool] worker ${index} failed:`, error);
    this.failure = error;

    for (const task of this.active.values()) {
      task.reject(error);
    }
    this.active.clear();
    for (const task of this.pending.splice(0)) {
      task.reject(error);
    }
  }
}
