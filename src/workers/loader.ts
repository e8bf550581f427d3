/**
 * Start point for remote workers
 * A fresh runtime cannot load .ts directly, so processes and threads boot
 * through a JS file that registers tsx first
 */

import { fileURLToPath } from "url";

export const WORKER_BOOTSTRAP = fileURLToPath(
  new URL("./worker-bootstrap.mjs", import.meta.url),
);
