export {
  HEALTHY_MESSAGE,
  REQUIRED_ENV_VARS,
  UNHEALTHY_MESSAGE,
  findMissingEnv,
  runInfraCheck,
  serializeResponse,
  type EnvSnapshot,
  type InfraCheckRequest,
  type InfraCheckResponse
} from "./check";
export { CONFIG_PATH_ENV, VERBOSE_ENV, loadFileConfig, loadInfraCheckConfig, type InfraCheckConfig } from "./config";
export { ConfigError, InfraCheckError, MalformedRequestError, type InfraCheckErrorCode } from "./errors";
export { EXIT_FATAL, EXIT_OK, formatFatalError, runCli, type CliIo } from "./cli";
export { parseRequest, readAll } from "./request";
