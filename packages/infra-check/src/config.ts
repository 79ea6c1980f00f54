import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import * as JSON5 from "json5";
import { REQUIRED_ENV_VARS, type EnvSnapshot } from "./check";
import { ConfigError, formatUnknownError } from "./errors";

export const CONFIG_PATH_ENV = "DEVFLOW_INFRA_CHECK_CONFIG";
export const VERBOSE_ENV = "DEVFLOW_PLUGIN_VERBOSE";

export type InfraCheckFileConfig = {
  requiredEnv?: string[];
};

export type InfraCheckConfig = {
  requiredEnv: readonly string[];
  verbose: boolean;
  useColor: boolean;
  configPath: string | null;
  configLoaded: boolean;
};

const resolveHomeDir = (value: string) => {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
};

export const parseBoolean = (value: string | undefined): boolean => {
  const normalized = String(value ?? "").trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
};

const normalizeRequiredEnv = (value: unknown, configPath: string): string[] => {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${configPath}: requiredEnv must be an array of strings`);
  }
  const seen = new Set<string>();
  const result: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string" || !entry.trim()) {
      throw new ConfigError(`${configPath}: requiredEnv entries must be non-empty strings`);
    }
    const key = entry.trim();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(key);
    }
  }
  return result;
};

/**
 * Returns null when the file does not exist. Supports JSON5 (comments, trailing commas).
 */
export const loadFileConfig = (configPath: string): InfraCheckFileConfig | null => {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`${configPath}: ${formatUnknownError(err)}`);
  }

  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`${configPath}: config must be an object`);
  }
  const requiredEnv: unknown = Object.prototype.hasOwnProperty.call(parsed, "requiredEnv")
    ? Reflect.get(parsed, "requiredEnv")
    : undefined;
  if (requiredEnv === undefined) {
    return {};
  }
  return { requiredEnv: normalizeRequiredEnv(requiredEnv, configPath) };
};

// Colour only when the log sink is a terminal; under the host stderr is a pipe.
export const loadInfraCheckConfig = (env: EnvSnapshot, isTTY = false): InfraCheckConfig => {
  const rawPath = (env[CONFIG_PATH_ENV] || "").trim();
  const configPath = rawPath ? resolveHomeDir(rawPath) : null;
  const fileConfig = configPath ? loadFileConfig(configPath) : null;

  return {
    requiredEnv: fileConfig?.requiredEnv ?? REQUIRED_ENV_VARS,
    verbose: parseBoolean(env[VERBOSE_ENV]),
    useColor: isTTY && !env.NO_COLOR,
    configPath,
    configLoaded: fileConfig !== null
  };
};
