export const REQUIRED_ENV_VARS: readonly string[] = ["AWS_PROFILE", "KUBECONFIG"];

export const HEALTHY_MESSAGE = "infra credentials healthy";
export const UNHEALTHY_MESSAGE = "missing infra credentials";

/** Read-only view of the environment; `process.env` satisfies it. */
export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

export type InfraCheckRequest = {
  command?: unknown;
  [key: string]: unknown;
};

export type InfraCheckResponse = {
  ok: boolean;
  message: string;
  data: {
    command: unknown;
    missing: string[];
  };
};

/**
 * Names from `required` that are unset or empty in `env`, in declared order.
 * Only presence is checked; values are never inspected beyond that.
 */
export const findMissingEnv = (required: readonly string[], env: EnvSnapshot): string[] =>
  required.filter((key) => !env[key]);

const requestCommand = (request: InfraCheckRequest): unknown =>
  Object.prototype.hasOwnProperty.call(request, "command") ? request.command : null;

export const runInfraCheck = (
  request: InfraCheckRequest,
  env: EnvSnapshot,
  required: readonly string[] = REQUIRED_ENV_VARS
): InfraCheckResponse => {
  const missing = findMissingEnv(required, env);
  const ok = missing.length === 0;
  return {
    ok,
    message: ok ? HEALTHY_MESSAGE : UNHEALTHY_MESSAGE,
    data: {
      command: requestCommand(request),
      missing
    }
  };
};

export const serializeResponse = (response: InfraCheckResponse): string => JSON.stringify(response);
