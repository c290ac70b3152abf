#!/usr/bin/env node
import { runCli } from "./cli/program.js";
import { formatErrorMessage } from "./infra/errors.js";
import { defaultRuntime } from "./runtime.js";

runCli(process.argv).catch((err: unknown) => {
  defaultRuntime.error(`[qr-styler] ${formatErrorMessage(err)}`);
  defaultRuntime.exit(1);
});
