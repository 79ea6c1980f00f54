import * as util from "util";

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

export type CreatePluginLoggerOptions = {
  prefix: string;
  useColor: boolean;
  verbose: boolean;
  // stdout carries the plugin response, so every level goes here.
  write: (text: string) => void;
  now?: () => Date;
};

export type PluginLogger = {
  log: (...args: unknown[]) => void;
  logWarn: (...args: unknown[]) => void;
  logError: (...args: unknown[]) => void;
  logDebug: (...args: unknown[]) => void;
};

const ansi = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  magenta: "\x1b[35m"
};

export const createPluginLogger = (options: CreatePluginLoggerOptions): PluginLogger => {
  const now = options.now ?? (() => new Date());
  const color = (code: string, text: unknown) => (options.useColor ? `${code}${text}${ansi.reset}` : String(text));

  const inspectForLog = (value: unknown) => {
    if (typeof value === "string") {
      return value;
    }
    return util.inspect(value, {
      depth: 6,
      colors: options.useColor,
      breakLength: 120,
      maxArrayLength: 50
    });
  };

  const formatPrefix = (level: LogLevel, timestamp: string) => {
    const base = `[${options.prefix} ${timestamp}]`;
    const bracketedLevel = `[${level}]`;
    if (!options.useColor) {
      return `${base} ${bracketedLevel}`;
    }
    const levelColored = (() => {
      if (level === "ERROR") return color(ansi.red, bracketedLevel);
      if (level === "WARN") return color(ansi.yellow, bracketedLevel);
      if (level === "DEBUG") return color(ansi.magenta, bracketedLevel);
      return color(ansi.green, bracketedLevel);
    })();
    return `${color(ansi.dim, base)} ${levelColored}`;
  };

  const logWithLevel = (level: LogLevel, ...args: unknown[]) => {
    const prefix = formatPrefix(level, now().toISOString());
    const message = args.map((arg) => inspectForLog(arg)).join(" ");
    const lines = message.split(/\r?\n/).map((line) => `${prefix} ${line}`);
    options.write(`${lines.join("\n")}\n`);
  };

  return {
    log: (...args) => logWithLevel("INFO", ...args),
    logWarn: (...args) => logWithLevel("WARN", ...args),
    logError: (...args) => logWithLevel("ERROR", ...args),
    logDebug: (...args) => {
      if (!options.verbose) {
        return;
      }
      logWithLevel("DEBUG", ...args);
    }
  };
};
