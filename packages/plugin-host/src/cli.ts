import * as path from "path";
import type { Writable } from "stream";
import { dispatchPlugin } from "./dispatch";
import { formatPluginResponse, formatUnknownError, parsePluginPayload } from "./protocol";

export const getArgValue = (args: string[], prefix: string): string | null => {
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : null;
};

export type PluginCliArgs = {
  scriptName: string;
  name: string | null;
  payload: string | undefined;
  timeoutMs: number | undefined;
};

const parsePositiveNumber = (value: string | null): number | undefined => {
  const parsed = Number(value);
  return value !== null && Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
};

export const parsePluginCliArgs = (argv: string[], fallbackScriptName: string): PluginCliArgs => {
  const args = argv.slice(2);
  return {
    scriptName: path.basename(argv[1] || fallbackScriptName),
    name: args.find((a) => !a.startsWith("--")) || null,
    payload: getArgValue(args, "--payload=") ?? undefined,
    timeoutMs: parsePositiveNumber(getArgValue(args, "--timeout="))
  };
};

export type PluginCliIo = {
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  cwd: string;
};

/**
 * `devflow-plugin-run <name> [--payload=<json>] [--timeout=<ms>]`
 * Prints the plugin response; exit code 1 when the plugin cannot be run.
 */
export const runPluginCommand = async (argv: string[], io: PluginCliIo): Promise<number> => {
  const args = parsePluginCliArgs(argv, "devflow-plugin-run");
  if (!args.name) {
    io.stderr.write(`Usage: ${args.scriptName} <plugin> [--payload=<json>] [--timeout=<ms>]\n`);
    return 2;
  }

  try {
    const response = await dispatchPlugin(args.name, parsePluginPayload(args.payload), {
      env: io.env,
      pathEnv: io.env.PATH ?? "",
      cwd: io.cwd,
      timeoutMs: args.timeoutMs,
      onStderr: (text) => {
        io.stderr.write(text);
      }
    });
    io.stdout.write(`${formatPluginResponse(response)}\n`);
    return 0;
  } catch (err) {
    io.stderr.write(`Error: ${formatUnknownError(err)}\n`);
    return 1;
  }
};
