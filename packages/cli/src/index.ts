#!/usr/bin/env node
import { run } from "./cli.js";

const controller = new AbortController();
const shutdown = () => controller.abort();
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

run(process.argv.slice(2), process.env, { signal: controller.signal }).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  },
);
