#!/usr/bin/env -S node --import tsx
import { run } from "./cli";

process.exitCode = run(process.argv.slice(2), {
  env: process.env,
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
});
