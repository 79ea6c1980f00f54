import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { Writable } from "stream";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { getArgValue, parsePluginCliArgs, runPluginCommand } from "../src";

const createSink = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    }
  });
  return { stream, text: () => chunks.join("") };
};

let tempDir: string;

beforeAll(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "plugin-host-cli-"));
  const target = path.join(tempDir, "devflow-plugin-echo");
  fs.writeFileSync(target, `#!/bin/sh\nprintf '{"ok":true,"message":"echo","data":'\ncat\nprintf '}'\n`, "utf8");
  fs.chmodSync(target, 0o755);
});

afterAll(() => {
  if (tempDir) {
    fs.rmSync(tempDir, { recursive: true, force: true });
  }
});

const run = async (args: string[]) => {
  const stdout = createSink();
  const stderr = createSink();
  const code = await runPluginCommand(["node", "/usr/local/bin/devflow-plugin-run", ...args], {
    stdout: stdout.stream,
    stderr: stderr.stream,
    env: { PATH: `${tempDir}${path.delimiter}${process.env.PATH ?? ""}` },
    cwd: tempDir
  });
  return { code, stdout: stdout.text(), stderr: stderr.text() };
};

describe("parsePluginCliArgs", () => {
  test("reads the plugin name and options", () => {
    expect(
      parsePluginCliArgs(["node", "/opt/bin/devflow-plugin-run", "--timeout=500", "infra-check", '--payload={"a":1}'], "x")
    ).toEqual({
      scriptName: "devflow-plugin-run",
      name: "infra-check",
      payload: '{"a":1}',
      timeoutMs: 500
    });
  });

  test("ignores a timeout that is not a positive number", () => {
    expect(parsePluginCliArgs(["node", "run", "x", "--timeout=soon"], "run").timeoutMs).toBeUndefined();
    expect(parsePluginCliArgs(["node", "run", "x", "--timeout=0"], "run").timeoutMs).toBeUndefined();
  });

  test("getArgValue returns null for an absent flag", () => {
    expect(getArgValue(["infra-check"], "--payload=")).toBeNull();
  });
});

describe("runPluginCommand", () => {
  test("prints the pretty response", async () => {
    const result = await run(["echo", '--payload={"dryRun":true}']);
    expect(result.code).toBe(0);
    expect(result.stdout).toBe(
      `${JSON.stringify({ ok: true, message: "echo", data: { command: "echo", payload: { dryRun: true } } }, null, 2)}\n`
    );
  });

  test("wraps a payload that is not JSON", async () => {
    const result = await run(["echo", "--payload=staging"]);
    expect(JSON.parse(result.stdout).data.payload).toEqual({ raw: "staging" });
  });

  test("prints usage without a plugin name", async () => {
    const result = await run([]);
    expect(result.code).toBe(2);
    expect(result.stderr).toBe("Usage: devflow-plugin-run <plugin> [--payload=<json>] [--timeout=<ms>]\n");
  });

  test("reports dispatch failures", async () => {
    const result = await run(["missing"]);
    expect(result.code).toBe(1);
    expect(result.stdout).toBe("");
    expect(result.stderr).toBe("Error: plugin not found: devflow-plugin-missing\n");
  });
});
