export {
  PLUGIN_PREFIX,
  PluginError,
  formatPluginResponse,
  isPluginResponse,
  parsePluginPayload,
  parsePluginResponse,
  type PluginRequest,
  type PluginResponse
} from "./protocol";
export { pluginExecutableName, resolvePluginExecutable, type ResolvePluginOptions } from "./resolve";
export { dispatchPlugin, type DispatchPluginOptions } from "./dispatch";
export { getArgValue, parsePluginCliArgs, runPluginCommand, type PluginCliArgs, type PluginCliIo } from "./cli";
