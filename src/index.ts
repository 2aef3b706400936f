#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage } from "./errors";
import { safeLog } from "./utils/redact";

runCli(process.argv, {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env: process.env,
  cwd: process.cwd()
}).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    safeLog("[cli] fatal", errorMessage(err));
    process.exitCode = 1;
  }
);
