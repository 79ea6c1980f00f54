import { spawn } from "child_process";
import { PluginError, formatUnknownError, parsePluginResponse, type PluginRequest, type PluginResponse } from "./protocol";
import { resolvePluginExecutable, type ResolvePluginOptions } from "./resolve";

export type DispatchPluginOptions = ResolvePluginOptions & {
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  // Plugin diagnostics (stderr), one chunk at a time.
  onStderr?: (text: string) => void;
};

type ChildResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
};

const runPluginProcess = (
  executable: string,
  request: PluginRequest,
  options: DispatchPluginOptions
): Promise<ChildResult> =>
  new Promise((resolve, reject) => {
    const child = spawn(executable, [], {
      cwd: options.cwd || undefined,
      env: options.env ?? process.env
    });

    let stdout = "";
    let settled = false;
    let timer: NodeJS.Timeout | null = null;

    const finish = (fn: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      if (timer) {
        clearTimeout(timer);
      }
      fn();
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      const timeoutMs = options.timeoutMs;
      timer = setTimeout(() => {
        // Grandchildren can keep the pipes open after the plugin itself is gone.
        child.kill();
        child.stdin.destroy();
        child.stdout.destroy();
        child.stderr.destroy();
        child.unref();
        finish(() => reject(new PluginError(`plugin timed out after ${timeoutMs}ms`)));
      }, timeoutMs);
    }

    // Decode through the stream so multibyte characters split across chunks survive.
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");

    child.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });

    child.stderr.on("data", (chunk: string) => {
      options.onStderr?.(chunk);
    });

    child.on("error", (err) => {
      finish(() => reject(new PluginError(`failed to launch plugin: ${err.message}`)));
    });

    child.on("close", (code, signal) => {
      finish(() => resolve({ code, signal, stdout }));
    });

    // A plugin may exit without reading its request.
    child.stdin.on("error", (err) => {
      if ("code" in err && err.code === "EPIPE") {
        return;
      }
      finish(() => reject(new PluginError(`failed to write plugin request: ${err.message}`)));
    });
    child.stdin.end(JSON.stringify(request));
  });

export const dispatchPlugin = async (
  name: string,
  payload: unknown,
  options: DispatchPluginOptions = {}
): Promise<PluginResponse> => {
  if (name.endsWith(".wasm")) {
    throw new PluginError("WASM plugin runtime not enabled in this build");
  }

  const executable = resolvePluginExecutable(name, options);
  const request: PluginRequest = { command: name, payload };

  let result: ChildResult;
  try {
    result = await runPluginProcess(executable, request, options);
  } catch (err) {
    if (err instanceof PluginError) {
      throw err;
    }
    throw new PluginError(formatUnknownError(err));
  }

  if (result.code !== 0) {
    const status = result.code === null ? `signal ${result.signal ?? "unknown"}` : String(result.code);
    throw new PluginError(`plugin exited with status ${status}`);
  }
  return parsePluginResponse(result.stdout);
};
