import type { Readable, Writable } from "stream";
import { runInfraCheck, serializeResponse, type EnvSnapshot } from "./check";
import { loadInfraCheckConfig, parseBoolean, VERBOSE_ENV } from "./config";
import { errorCodeOf, formatUnknownError } from "./errors";
import { createPluginLogger, type PluginLogger } from "./logger";
import { parseRequest, readAll } from "./request";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;

export const PLUGIN_NAME = "infra-check";

export type CliIo = {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  env: EnvSnapshot;
  // Whether stderr is a terminal.
  isTTY?: boolean;
};

export const formatFatalError = (err: unknown): string =>
  JSON.stringify({ ok: false, error: { code: errorCodeOf(err), message: formatUnknownError(err) } });

const createLogger = (io: CliIo, verbose: boolean, useColor: boolean): PluginLogger =>
  createPluginLogger({
    prefix: PLUGIN_NAME,
    useColor,
    verbose,
    write: (text) => {
      io.stderr.write(text);
    }
  });

/**
 * Runs one check and returns the process exit code. Missing credentials are a normal
 * result (exit 0); only fatal failures return non-zero, with nothing written to stdout.
 */
export const runCli = async (io: CliIo): Promise<number> => {
  // Before config is loaded only the verbose flag is known; colour stays off.
  let logger = createLogger(io, parseBoolean(io.env[VERBOSE_ENV]), false);
  try {
    const raw = await readAll(io.stdin);
    const request = parseRequest(raw);

    const config = loadInfraCheckConfig(io.env, Boolean(io.isTTY));
    logger = createLogger(io, config.verbose, config.useColor);
    if (config.configPath && !config.configLoaded) {
      logger.logWarn(`config not found, using defaults: ${config.configPath}`);
    } else if (config.configPath) {
      logger.logDebug(`config: ${config.configPath}`);
    }
    logger.logDebug("required env:", config.requiredEnv);

    const response = runInfraCheck(request, io.env, config.requiredEnv);
    if (!response.ok) {
      logger.logDebug("missing env:", response.data.missing);
    }

    io.stdout.write(serializeResponse(response));
    return EXIT_OK;
  } catch (err) {
    if (err instanceof Error && err.stack) {
      logger.logDebug(err.stack);
    }
    io.stderr.write(`${formatFatalError(err)}\n`);
    return EXIT_FATAL;
  }
};
