import * as fs from "fs";
import * as path from "path";
import { PLUGIN_PREFIX, PluginError } from "./protocol";

export type ResolvePluginOptions = {
  pathEnv?: string;
  cwd?: string;
};

export const pluginExecutableName = (name: string): string =>
  name.startsWith(PLUGIN_PREFIX) ? name : `${PLUGIN_PREFIX}${name}`;

const isExecutableFile = (candidate: string): boolean => {
  try {
    if (!fs.statSync(candidate).isFile()) {
      return false;
    }
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

/**
 * Looks in every PATH directory first, then in `<cwd>/plugins`.
 */
export const resolvePluginExecutable = (name: string, options: ResolvePluginOptions = {}): string => {
  const executable = pluginExecutableName(name);
  const pathEnv = options.pathEnv ?? process.env.PATH ?? "";

  for (const dir of pathEnv.split(path.delimiter)) {
    if (!dir) {
      continue;
    }
    const candidate = path.join(dir, executable);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }

  const local = path.join(options.cwd ?? process.cwd(), "plugins", executable);
  if (fs.existsSync(local)) {
    return local;
  }

  throw new PluginError(`plugin not found: ${executable}`);
};
