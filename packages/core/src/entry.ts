#!/usr/bin/env node

import "dotenv/config";
import { runCli } from "./cli/program.js";
import { AppError } from "./infra/errors.js";

const controller = new AbortController();

process.once("SIGINT", () => {
  controller.abort(new AppError("Interrupted", "INTERRUPTED", 130));
});

process.exitCode = await runCli(process.argv.slice(2), {
  signal: controller.signal,
});
