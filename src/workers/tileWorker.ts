/**
 * Worker thread entry for the parallel strategy
 */

import { parentPort } from "node:worker_threads";
import { runTileTask, type TileTask } from "./tileTask";

const port = parentPort;
if (!port) {
  throw new Error("tileWorker must be started as a worker thread");
}

port.on("message", (task: TileTask) => {
  port.postMessage(runTileTask(task));
});
