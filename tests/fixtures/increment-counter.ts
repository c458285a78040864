/**
 * Child process for the cross-process state tests.
 * Usage: increment-counter <document> <times>
 */

import { z } from "zod";
import { StateStore } from "../../src/core/state/state-store.js";

const [path, times] = process.argv.slice(2);
if (path === undefined || times === undefined) {
  throw new Error("usage: increment-counter <document> <times>");
}

const store = new StateStore(path, z.object({ count: z.number().int().default(0) }), { pollIntervalMs: 2 });
for (let i = 0; i < Number(times); i++) {
  await store.update((state) => ({ count: state.count + 1 }));
}
