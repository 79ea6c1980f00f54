#!/usr/bin/env node
import { runPluginCommand } from "./cli";

const main = async () => {
  process.exitCode = await runPluginCommand(process.argv, {
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    cwd: process.cwd()
  });
};

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
