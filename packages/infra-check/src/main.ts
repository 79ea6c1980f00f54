#!/usr/bin/env node
import { runCli } from "./cli";

const main = async () => {
  process.exitCode = await runCli({
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    isTTY: process.stderr.isTTY
  });
};

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
